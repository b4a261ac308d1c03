/**
 * Uint8Array helpers shared by the codec, the identifier types and the
 * collection encoding.
 *
 * @packageDocumentation
 */

/**
 * Compares two Uint8Arrays lexicographically as unsigned bytes,
 * most significant byte first.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 *
 * @example
 * ```typescript
 * import { compare, fromHex } from 'ledger-ids';
 *
 * compare(fromHex('0001'), fromHex('0002')); // -1
 * compare(fromHex('ff'), fromHex('01')); // 254
 * ```
 */
export function compare(a: Uint8Array, b: Uint8Array): number {
    const minLength = Math.min(a.length, b.length);
    for (let i = 0; i < minLength; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

/**
 * Checks if a Uint8Array is all zeros.
 */
export function isZero(bytes: Uint8Array): boolean {
    for (let i = 0; i < bytes.length; i++) {
        if (bytes[i] !== 0) return false;
    }
    return true;
}

/**
 * 32-bit FNV-1a over the bytes, returned as an unsigned integer.
 */
export function fnv1a(bytes: Uint8Array): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < bytes.length; i++) {
        hash ^= bytes[i];
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}
