/**
 * Hash primitives consumed by identifier derivation and the CB58 checksum.
 *
 * @packageDocumentation
 */
import { ripemd160 as nobleRipemd160 } from '@noble/hashes/legacy.js';
import { sha256 as nobleSha256 } from '@noble/hashes/sha2.js';
import { isBytes20, isBytes32, type Bytes20, type Bytes32 } from './types.js';

export function sha256(data: Uint8Array): Bytes32 {
    const digest = nobleSha256(data);
    if (!isBytes32(digest)) throw new TypeError('sha256 digest must be 32 bytes');
    return digest;
}

export function ripemd160(data: Uint8Array): Bytes20 {
    const digest = nobleRipemd160(data);
    if (!isBytes20(digest)) throw new TypeError('ripemd160 digest must be 20 bytes');
    return digest;
}

/**
 * Computes the 20-byte short address `ripemd160(sha256(data))`.
 *
 * @example
 * ```typescript
 * import { hash160 } from 'ledger-ids';
 *
 * const address = hash160(certificateDer); // 20 bytes
 * ```
 */
export function hash160(data: Uint8Array): Bytes20 {
    return ripemd160(sha256(data));
}
