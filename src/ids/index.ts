export { FixedId } from './base.js';
export { Id, type PrefixTag } from './id.js';
export { ShortId } from './short-id.js';
export { NodeId, stripNodeIdPrefix } from './node-id.js';
export { IdList, Ids, ShortIds, NodeIds } from './collections.js';
