/**
 * 32-byte general-purpose identifier (content, transaction, chain).
 *
 * @packageDocumentation
 */
import { ByteWriter } from '../bufferutils.js';
import { ID_LEN, U64_LEN } from '../constants.js';
import { sha256 } from '../crypto.js';
import { ConstructionError, DecodeError, ErrorCode } from '../errors.js';
import { isUInt53, isUInt64 } from '../types.js';
import { decodeFixedWidth, decodeHex, FixedId, toFixedWidth } from './base.js';

/** A prefix tag: an unsigned 64-bit integer, or a safe non-negative number. */
export type PrefixTag = bigint | number;

function toUInt64(tag: PrefixTag): bigint {
    if (typeof tag === 'number') {
        if (!isUInt53(tag)) {
            throw new ConstructionError(`prefix tag ${tag} is not a non-negative safe integer`, ErrorCode.INVALID_TAG, {
                value: tag,
            });
        }
        return BigInt(tag);
    }
    if (!isUInt64(tag)) {
        throw new ConstructionError(`prefix tag ${tag} is outside the u64 range`, ErrorCode.INVALID_TAG, { value: tag });
    }
    return tag;
}

/**
 * A 32-byte identifier with CB58 text form.
 *
 * @example
 * ```typescript
 * import { Id, fromHex } from 'ledger-ids';
 *
 * const id = Id.fromBytes(fromHex('3d0ad12b...'));
 * id.toString(); // 'TtF4d2QWbk5vzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES'
 * Id.parse(id.toString()).equals(id); // true
 * ```
 */
export class Id extends FixedId {
    static readonly LENGTH = ID_LEN;

    static #empty: Id | undefined;

    readonly type = 'Id' as const;

    private constructor(bytes: Uint8Array) {
        super(bytes);
        Object.freeze(this);
    }

    /** The all-zero id, created once. */
    static get EMPTY(): Id {
        if (Id.#empty === undefined) {
            Id.#empty = new Id(new Uint8Array(ID_LEN));
        }
        return Id.#empty;
    }

    static empty(): Id {
        return Id.EMPTY;
    }

    /**
     * Copies up to 32 bytes, right-padding shorter input with zeros.
     *
     * @throws ConstructionError if `bytes` is longer than 32
     */
    static fromBytes(bytes: Uint8Array): Id {
        return new Id(toFixedWidth(bytes, ID_LEN, 'Id'));
    }

    static fromHex(hex: string): Id {
        return Id.fromBytes(decodeHex(hex, Id.LENGTH, 'Id'));
    }

    /**
     * Parses the canonical CB58 text form.
     *
     * @throws DecodeError if the text is not CB58, fails its checksum or does not hold 32 bytes
     */
    static parse(text: string): Id {
        return new Id(decodeFixedWidth(text, ID_LEN, 'Id'));
    }

    static tryParse(text: string): Id | undefined {
        try {
            return Id.parse(text);
        } catch (e) {
            if (e instanceof DecodeError) return undefined;
            throw e;
        }
    }

    /**
     * Derives a child id: `sha256(tag_0 || ... || tag_n || id)`, each tag
     * packed as a big-endian u64.
     *
     * @example
     * ```typescript
     * const utxoId = txId.prefix(outputIndex);
     * ```
     */
    prefix(...tags: PrefixTag[]): Id {
        const writer = ByteWriter.withCapacity(tags.length * U64_LEN + ID_LEN);
        for (const tag of tags) {
            writer.writeUInt64(toUInt64(tag));
        }
        writer.writeSlice(this.bytes);
        return new Id(sha256(writer.end()));
    }
}
