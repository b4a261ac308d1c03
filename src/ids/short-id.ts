/**
 * 20-byte address-like identifier.
 *
 * @packageDocumentation
 */
import { SHORT_ID_LEN } from '../constants.js';
import { DecodeError } from '../errors.js';
import { decodeFixedWidth, decodeHex, FixedId, toFixedWidth } from './base.js';

export class ShortId extends FixedId {
    static readonly LENGTH = SHORT_ID_LEN;

    static #empty: ShortId | undefined;

    readonly type = 'ShortId' as const;

    private constructor(bytes: Uint8Array) {
        super(bytes);
        Object.freeze(this);
    }

    static get EMPTY(): ShortId {
        if (ShortId.#empty === undefined) {
            ShortId.#empty = new ShortId(new Uint8Array(SHORT_ID_LEN));
        }
        return ShortId.#empty;
    }

    static empty(): ShortId {
        return ShortId.EMPTY;
    }

    /**
     * Copies up to 20 bytes, right-padding shorter input with zeros.
     *
     * @throws ConstructionError if `bytes` is longer than 20
     */
    static fromBytes(bytes: Uint8Array): ShortId {
        return new ShortId(toFixedWidth(bytes, SHORT_ID_LEN, 'ShortId'));
    }

    static fromHex(hex: string): ShortId {
        return ShortId.fromBytes(decodeHex(hex, ShortId.LENGTH, 'ShortId'));
    }

    static parse(text: string): ShortId {
        return new ShortId(decodeFixedWidth(text, SHORT_ID_LEN, 'ShortId'));
    }

    static tryParse(text: string): ShortId | undefined {
        try {
            return ShortId.parse(text);
        } catch (e) {
            if (e instanceof DecodeError) return undefined;
            throw e;
        }
    }
}
