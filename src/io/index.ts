/**
 * Byte and text encoding helpers.
 *
 * @packageDocumentation
 */

// CB58 text codec
export { cb58, checksum as cb58Checksum } from './base58check.js';

// Hex encoding/decoding
export { toHex, fromHex, isHex } from './hex.js';

// Base64 (PEM bodies)
export { fromBase64 } from './base64.js';

// Utility functions
export { compare, isZero, fnv1a } from './utils.js';
