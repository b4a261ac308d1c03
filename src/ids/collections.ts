/**
 * Ordered sequences of identifiers.
 *
 * The wire encoding writes the element count before the elements, so two
 * lists compare by length first and element-wise only when the lengths match.
 * Sorting a batch of lists with `compare` therefore gives the same order as
 * sorting their encodings.
 *
 * @packageDocumentation
 */
import { ByteReader, ByteWriter } from '../bufferutils.js';
import { U32_LEN } from '../constants.js';
import { DecodeError, ErrorCode } from '../errors.js';
import type { FixedId } from './base.js';
import { Id } from './id.js';
import { NodeId } from './node-id.js';
import { ShortId } from './short-id.js';

interface ElementCodec<T extends FixedId> {
    readonly width: number;
    readonly fromBytes: (bytes: Uint8Array) => T;
}

function unpack<T extends FixedId>(bytes: Uint8Array, codec: ElementCodec<T>, listName: string): T[] {
    const reader = new ByteReader(bytes);
    if (reader.remaining < U32_LEN) {
        throw new DecodeError(`${listName} encoding is missing its length prefix`, ErrorCode.INVALID_LENGTH, {
            expected: U32_LEN,
            actual: bytes.length,
        });
    }
    const count = reader.readUInt32();
    const expected = U32_LEN + count * codec.width;
    if (bytes.length !== expected) {
        throw new DecodeError(`${listName} of ${count} elements must be ${expected} bytes, got ${bytes.length}`, ErrorCode.INVALID_LENGTH, {
            expected,
            actual: bytes.length,
        });
    }

    const items: T[] = [];
    for (let i = 0; i < count; i++) {
        items.push(codec.fromBytes(reader.readSlice(codec.width)));
    }
    return items;
}

/**
 * Immutable, ordered list of identifiers of one family.
 */
export abstract class IdList<T extends FixedId, L extends IdList<T, L>> implements Iterable<T> {
    readonly #items: readonly T[];

    protected constructor(items: readonly T[]) {
        this.#items = Object.freeze([...items]);
    }

    /** Builds a list of the same concrete type. */
    protected abstract create(items: readonly T[]): L;

    get length(): number {
        return this.#items.length;
    }

    at(index: number): T | undefined {
        return this.#items.at(index);
    }

    [Symbol.iterator](): Iterator<T> {
        return this.#items[Symbol.iterator]();
    }

    toArray(): T[] {
        return [...this.#items];
    }

    /**
     * Shorter lists order first; equal-length lists compare element by
     * element and the first difference decides.
     *
     * @returns -1, 0 or 1
     */
    compare(other: L): number {
        const a = this.#items;
        const b = other.#items;
        if (a.length !== b.length) {
            return a.length < b.length ? -1 : 1;
        }
        for (let i = 0; i < a.length; i++) {
            const order = a[i].compare(b[i]);
            if (order !== 0) return order;
        }
        return 0;
    }

    /** Same length and pairwise-equal elements, in the same order. */
    equals(other: L): boolean {
        return this.compare(other) === 0;
    }

    /** A new list with the elements in ascending order. */
    sorted(): L {
        return this.create([...this.#items].sort((a, b) => a.compare(b)));
    }

    /**
     * Canonical wire encoding: big-endian u32 element count followed by the
     * fixed-width bytes of each element.
     */
    toBytes(): Uint8Array {
        const width = this.#items.length === 0 ? 0 : this.#items[0].length;
        const writer = ByteWriter.withCapacity(U32_LEN + this.#items.length * width);
        writer.writeUInt32(this.#items.length);
        for (const item of this.#items) {
            writer.writeSlice(item.toBytes());
        }
        return writer.end();
    }

    toJSON(): string[] {
        return this.#items.map((item) => item.toString());
    }
}

const ID_CODEC: ElementCodec<Id> = { width: Id.LENGTH, fromBytes: Id.fromBytes };
const SHORT_ID_CODEC: ElementCodec<ShortId> = { width: ShortId.LENGTH, fromBytes: ShortId.fromBytes };
const NODE_ID_CODEC: ElementCodec<NodeId> = { width: NodeId.LENGTH, fromBytes: NodeId.fromBytes };

/**
 * @example
 * ```typescript
 * import { Id, Ids } from 'ledger-ids';
 *
 * const ids = new Ids([Id.fromBytes(new Uint8Array([3])), Id.fromBytes(new Uint8Array([1]))]).sorted();
 * ```
 */
export class Ids extends IdList<Id, Ids> {
    constructor(items: readonly Id[] = []) {
        super(items);
    }

    static fromBytes(bytes: Uint8Array): Ids {
        return new Ids(unpack(bytes, ID_CODEC, 'Ids'));
    }

    protected create(items: readonly Id[]): Ids {
        return new Ids(items);
    }
}

export class ShortIds extends IdList<ShortId, ShortIds> {
    constructor(items: readonly ShortId[] = []) {
        super(items);
    }

    static fromBytes(bytes: Uint8Array): ShortIds {
        return new ShortIds(unpack(bytes, SHORT_ID_CODEC, 'ShortIds'));
    }

    protected create(items: readonly ShortId[]): ShortIds {
        return new ShortIds(items);
    }
}

export class NodeIds extends IdList<NodeId, NodeIds> {
    constructor(items: readonly NodeId[] = []) {
        super(items);
    }

    static fromBytes(bytes: Uint8Array): NodeIds {
        return new NodeIds(unpack(bytes, NODE_ID_CODEC, 'NodeIds'));
    }

    protected create(items: readonly NodeId[]): NodeIds {
        return new NodeIds(items);
    }
}
