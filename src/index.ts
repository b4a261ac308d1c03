import * as crypto from './crypto.js';
import * as io from './io/index.js';
import * as serde from './serde.js';
import { Id, Ids, NodeId, NodeIds, ShortId, ShortIds } from './ids/index.js';

export * as crypto from './crypto.js';
export * as io from './io/index.js';
export * as serde from './serde.js';

export * from './ids/index.js';
export * from './constants.js';
export * from './errors.js';
export * from './serde.js';
export { sha256, ripemd160, hash160 } from './crypto.js';
export { cb58, fromHex, toHex, compare } from './io/index.js';
export { ByteReader, ByteWriter } from './bufferutils.js';
export { readFirstPemBlock, certificateFromPem, readCertificateFile, type PemBlock } from './cert.js';
export { UINT64_MAX } from './types.js';
export type { Bytes20, Bytes32, IdType } from './types.js';

const ids = {
    Id,
    ShortId,
    NodeId,
    Ids,
    ShortIds,
    NodeIds,
    crypto,
    io,
    serde,
};

export default ids;
