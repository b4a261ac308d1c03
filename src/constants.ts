/**
 * Identifier widths and text-form constants shared by every peer implementation.
 *
 * @packageDocumentation
 */

/** Byte length of an {@link Id}. */
export const ID_LEN = 32;

/** Byte length of a {@link ShortId}. */
export const SHORT_ID_LEN = 20;

/** Byte length of a {@link NodeId}. Same layout as a short id. */
export const NODE_ID_LEN = 20;

/** Literal prefix carried by the text form of a node id. */
export const NODE_ID_ENCODE_PREFIX = 'NodeID-';

/** Number of SHA-256 bytes appended to a CB58 payload. */
export const CB58_CHECKSUM_LEN = 4;

/** Byte length of a packed prefix tag (big-endian u64). */
export const U64_LEN = 8;

/** Byte length of the collection length prefix (big-endian u32). */
export const U32_LEN = 4;
