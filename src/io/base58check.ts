/**
 * CB58 encoding/decoding using @scure/base and @noble/hashes.
 *
 * CB58 is Base58 (Bitcoin alphabet) over `payload ++ checksum`, where the
 * checksum is the last 4 bytes of a single SHA-256 of the payload. It is the
 * only text form identifiers have, so it must match peer implementations
 * byte for byte.
 *
 * @packageDocumentation
 */

import { base58, utils } from '@scure/base';
import { CB58_CHECKSUM_LEN } from '../constants.js';
import { sha256 } from '../crypto.js';
import { DecodeError, ErrorCode } from '../errors.js';

/**
 * Checksum appended to a CB58 payload.
 */
export function checksum(payload: Uint8Array): Uint8Array {
    const digest = sha256(payload);
    return digest.slice(digest.length - CB58_CHECKSUM_LEN);
}

const checksummed = utils.checksum(CB58_CHECKSUM_LEN, checksum);
const base58Checksummed = utils.chain(checksummed, base58);

/**
 * Encode a Uint8Array to a CB58 string.
 */
export function encode(data: Uint8Array): string {
    return base58Checksummed.encode(data);
}

/**
 * Decode a CB58 string to its payload.
 *
 * @throws DecodeError if the string is not base58, is too short to carry a
 * checksum, or the checksum does not match
 */
export function decode(str: string): Uint8Array {
    let raw: Uint8Array;
    try {
        raw = base58.decode(str);
    } catch (e) {
        throw new DecodeError(`invalid base58 string '${str}'`, ErrorCode.INVALID_ENCODING, { value: str }, e);
    }
    if (raw.length < CB58_CHECKSUM_LEN) {
        throw new DecodeError(`'${str}' is too short to carry a checksum`, ErrorCode.INVALID_LENGTH, {
            value: str,
            expected: CB58_CHECKSUM_LEN,
            actual: raw.length,
        });
    }

    try {
        return checksummed.decode(raw);
    } catch (e) {
        throw new DecodeError(`checksum mismatch for '${str}'`, ErrorCode.CHECKSUM_MISMATCH, { value: str }, e);
    }
}

/**
 * CB58 codec as an encode/decode pair.
 */
export const cb58 = { encode, decode } as const;
