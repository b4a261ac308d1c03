/**
 * Base64 decoding for PEM bodies.
 *
 * @packageDocumentation
 */
import { base64 } from '@scure/base';

/**
 * Decodes a base64 string to a Uint8Array.
 * Whitespace (line breaks in PEM bodies) is ignored; padding is required.
 *
 * @param str - The base64-encoded string to decode
 * @returns Uint8Array containing the decoded bytes
 * @throws If the string contains characters outside the base64 alphabet
 */
export function fromBase64(str: string): Uint8Array {
    return base64.decode(str.replace(/\s+/g, ''));
}
