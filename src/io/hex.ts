/**
 * Hex encoding and decoding.
 *
 * @packageDocumentation
 */

const HEX_CHARS = '0123456789abcdef';

/**
 * Converts a hex string to Uint8Array.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @throws Error if hex string is invalid
 *
 * @example
 * ```typescript
 * import { fromHex } from 'ledger-ids';
 *
 * const bytes = fromHex('deadbeef');
 * // bytes is Uint8Array [222, 173, 190, 239]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    if (hex.length % 2 !== 0) {
        throw new Error('Invalid hex string: odd length');
    }
    if (!isHex(hex)) {
        throw new Error('Invalid hex string: unexpected character');
    }
    const length = hex.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        result[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return result;
}

/**
 * Converts a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += HEX_CHARS[bytes[i] >> 4] + HEX_CHARS[bytes[i] & 0x0f];
    }
    return result;
}

export function isHex(value: unknown): value is string {
    if (typeof value !== 'string') return false;
    if (value.length % 2 !== 0) return false;
    return /^[0-9a-fA-F]*$/.test(value);
}
