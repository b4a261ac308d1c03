/**
 * Base class for fixed-width identifiers.
 *
 * Equality, ordering and hashing all read the same fixed-length buffer, so
 * `a.equals(b)` implies `a.hashCode() === b.hashCode()` and agrees with
 * `compare`.
 *
 * @packageDocumentation
 */
import { ConstructionError, DecodeError, ErrorCode } from '../errors.js';
import { cb58 } from '../io/base58check.js';
import { fromHex, toHex } from '../io/hex.js';
import { compare, fnv1a, isZero } from '../io/utils.js';
import type { IdType } from '../types.js';

/**
 * Copies `bytes` into a new buffer of exactly `length` bytes, right-padded
 * with zeros.
 *
 * @throws ConstructionError if `bytes` is longer than `length`
 */
export function toFixedWidth(bytes: Uint8Array, length: number, type: IdType): Uint8Array {
    if (bytes.length > length) {
        throw new ConstructionError(`${type} takes at most ${length} bytes, got ${bytes.length}`, ErrorCode.INVALID_LENGTH, {
            expected: length,
            actual: bytes.length,
        });
    }
    const fixed = new Uint8Array(length);
    fixed.set(bytes);
    return fixed;
}

/**
 * Decodes CB58 text whose payload must be exactly `length` bytes.
 *
 * @throws DecodeError on bad base58, checksum mismatch or wrong width
 */
export function decodeFixedWidth(text: string, length: number, type: IdType): Uint8Array {
    const payload = cb58.decode(text);
    if (payload.length !== length) {
        throw new DecodeError(`${type} '${text}' decodes to ${payload.length} bytes, expected ${length}`, ErrorCode.INVALID_LENGTH, {
            value: text,
            expected: length,
            actual: payload.length,
        });
    }
    return payload;
}

/**
 * Decodes a hex string into at most `length` bytes.
 *
 * @throws DecodeError if the string is not hex or holds more than `length` bytes
 */
export function decodeHex(hex: string, length: number, type: IdType): Uint8Array {
    let bytes: Uint8Array;
    try {
        bytes = fromHex(hex);
    } catch (e) {
        throw new DecodeError(`invalid ${type} hex '${hex}'`, ErrorCode.INVALID_ENCODING, { value: hex }, e);
    }
    if (bytes.length > length) {
        throw new DecodeError(`${type} hex '${hex}' holds ${bytes.length} bytes, expected at most ${length}`, ErrorCode.INVALID_LENGTH, {
            value: hex,
            expected: length,
            actual: bytes.length,
        });
    }
    return bytes;
}

/**
 * Abstract base for {@link Id}, {@link ShortId} and {@link NodeId}.
 *
 * Instances are frozen and never expose their buffer; `toBytes()` hands out
 * a copy.
 */
export abstract class FixedId {
    /** Identifier family discriminant */
    abstract readonly type: IdType;

    readonly #bytes: Uint8Array;
    #hash?: number;

    protected constructor(bytes: Uint8Array) {
        this.#bytes = bytes;
    }

    /**
     * Orders two identifiers of the same family. Usable directly as an
     * `Array#sort` comparator.
     *
     * @example
     * ```typescript
     * ids.sort(Id.compare);
     * ```
     */
    static compare<T extends FixedId>(a: T, b: T): number {
        return a.compare(b);
    }

    /** Raw buffer, for subclasses. Never handed to callers. */
    protected get bytes(): Uint8Array {
        return this.#bytes;
    }

    get length(): number {
        return this.#bytes.length;
    }

    /**
     * Unsigned byte-lexicographic order of the full buffer.
     *
     * @returns -1, 0 or 1
     */
    compare(other: this): number {
        return Math.sign(compare(this.#bytes, other.#bytes));
    }

    equals(other: this): boolean {
        return this.compare(other) === 0;
    }

    hashCode(): number {
        if (this.#hash === undefined) {
            this.#hash = fnv1a(this.#bytes);
        }
        return this.#hash;
    }

    isEmpty(): boolean {
        return isZero(this.#bytes);
    }

    toBytes(): Uint8Array {
        return this.#bytes.slice();
    }

    toHex(): string {
        return toHex(this.#bytes);
    }

    /** Canonical text form. */
    toString(): string {
        return cb58.encode(this.#bytes);
    }

    toJSON(): string {
        return this.toString();
    }
}
