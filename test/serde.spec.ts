import assert from 'assert';
import { describe, it } from 'vitest';

import {
    DecodeError,
    ErrorCode,
    Id,
    NodeId,
    SchemaBindingError,
    ShortId,
    deserializeId,
    deserializeNodeId,
    deserializeShortId,
    idBinding,
    idReviver,
    mustDeserializeId,
    mustDeserializeNodeId,
    mustDeserializeShortId,
    nodeIdBinding,
    readIdArray,
    readIdField,
    serializeId,
    shortIdBinding,
} from '../src/index.js';

const ID_TEXT = 'TtF4d2QWbk5vzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES';
const SHORT_TEXT = '6ZmBHXTqjknJoZtXbnJ6x7af863rXDTwx';
const NODE_TEXT = `NodeID-${SHORT_TEXT}`;

function bindingError(fn: () => unknown): SchemaBindingError {
    try {
        fn();
    } catch (e) {
        assert.ok(e instanceof SchemaBindingError, `expected SchemaBindingError, got ${String(e)}`);
        return e;
    }
    assert.fail('expected a SchemaBindingError');
}

describe('serde', () => {
    describe('serializeId', () => {
        it('writes the canonical text', () => {
            assert.strictEqual(serializeId(Id.parse(ID_TEXT)), ID_TEXT);
            assert.strictEqual(serializeId(NodeId.parse(SHORT_TEXT)), NODE_TEXT);
        });
    });

    describe('optional binding', () => {
        it('maps absent and null to undefined', () => {
            assert.strictEqual(deserializeId(undefined), undefined);
            assert.strictEqual(deserializeShortId(null), undefined);
            assert.strictEqual(deserializeNodeId(undefined), undefined);
        });

        it('parses present values', () => {
            assert.ok(deserializeId(ID_TEXT)?.equals(Id.parse(ID_TEXT)));
            assert.ok(deserializeShortId(SHORT_TEXT)?.equals(ShortId.parse(SHORT_TEXT)));
            assert.ok(deserializeNodeId(SHORT_TEXT)?.equals(NodeId.parse(NODE_TEXT)));
        });

        it('still fails on a present value that does not parse', () => {
            const err = bindingError(() => deserializeId('TtF4d2QWbkavzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES', 'txId'));
            assert.strictEqual(err.code, ErrorCode.INVALID_FIELD);
            assert.strictEqual(err.details.field, 'txId');
            assert.ok(err.cause instanceof DecodeError);
        });

        it('fails on a non-string value', () => {
            const err = bindingError(() => deserializeShortId(42));
            assert.strictEqual(err.message, 'ShortId must be a string, got number');
        });
    });

    describe('required binding', () => {
        it('fails on absent values', () => {
            const err = bindingError(() => mustDeserializeId(undefined));
            assert.strictEqual(err.code, ErrorCode.MISSING_FIELD);
            assert.strictEqual(err.message, 'empty Id from deserialization');
            assert.strictEqual(bindingError(() => mustDeserializeNodeId(null)).code, ErrorCode.MISSING_FIELD);
        });

        it('parses present values', () => {
            assert.ok(mustDeserializeShortId(SHORT_TEXT).equals(ShortId.parse(SHORT_TEXT)));
            assert.ok(mustDeserializeNodeId(NODE_TEXT).equals(NodeId.parse(SHORT_TEXT)));
        });
    });

    describe('readIdField', () => {
        const doc: unknown = JSON.parse(JSON.stringify({ chainId: Id.parse(ID_TEXT), nodeId: NodeId.parse(SHORT_TEXT) }));

        it('binds fields of a parsed document', () => {
            assert.ok(readIdField(doc, 'chainId', idBinding, 'required').equals(Id.parse(ID_TEXT)));
            assert.ok(readIdField(doc, 'nodeId', nodeIdBinding, 'optional')?.equals(NodeId.parse(NODE_TEXT)));
            assert.strictEqual(readIdField(doc, 'subnetId', idBinding, 'optional'), undefined);
        });

        it('fails the document on a missing required field', () => {
            const err = bindingError(() => readIdField(doc, 'subnetId', idBinding, 'required'));
            assert.strictEqual(err.code, ErrorCode.MISSING_FIELD);
            assert.strictEqual(err.message, "empty Id field 'subnetId' from deserialization");
        });

        it('fails when a field holds the wrong kind of id', () => {
            const err = bindingError(() => readIdField(doc, 'chainId', shortIdBinding, 'required'));
            assert.strictEqual(err.code, ErrorCode.INVALID_FIELD);
            assert.strictEqual(err.details.field, 'chainId');
        });

        it('does not read inherited properties', () => {
            assert.strictEqual(readIdField({}, 'toString', idBinding, 'optional'), undefined);
        });

        it('fails on a document that is not an object', () => {
            assert.strictEqual(bindingError(() => readIdField([ID_TEXT], '0', idBinding, 'required')).code, ErrorCode.INVALID_FIELD);
            assert.strictEqual(bindingError(() => readIdField(null, 'chainId', idBinding, 'optional')).code, ErrorCode.INVALID_FIELD);
        });
    });

    describe('readIdArray', () => {
        it('binds every element', () => {
            const bound = readIdArray([SHORT_TEXT, NODE_TEXT], nodeIdBinding, 'validators');
            assert.strictEqual(bound.length, 2);
            assert.ok(bound[0].equals(bound[1]));
        });

        it('names the failing element', () => {
            const err = bindingError(() => readIdArray([ID_TEXT, null], idBinding, 'parents'));
            assert.strictEqual(err.code, ErrorCode.MISSING_FIELD);
            assert.strictEqual(err.details.field, 'parents[1]');
        });

        it('fails on a non-array', () => {
            assert.strictEqual(bindingError(() => readIdArray(ID_TEXT, idBinding)).code, ErrorCode.INVALID_FIELD);
        });
    });

    describe('idReviver', () => {
        const reviver = idReviver({
            chainId: [idBinding, 'required'],
            nodeId: [nodeIdBinding, 'optional'],
        });

        it('binds named fields while parsing', () => {
            const doc: { chainId: Id; nodeId: NodeId; height: number } = JSON.parse(
                `{"chainId":"${ID_TEXT}","nodeId":"${SHORT_TEXT}","height":7}`,
                reviver,
            );
            assert.ok(doc.chainId instanceof Id);
            assert.ok(doc.chainId.equals(Id.parse(ID_TEXT)));
            assert.ok(doc.nodeId instanceof NodeId);
            assert.strictEqual(doc.nodeId.toString(), NODE_TEXT);
            assert.strictEqual(doc.height, 7);
        });

        it('drops an optional field holding null', () => {
            const doc: object = JSON.parse(`{"chainId":"${ID_TEXT}","nodeId":null}`, reviver);
            assert.strictEqual(Object.hasOwn(doc, 'nodeId'), false);
        });

        it('fails the document on a missing required field', () => {
            const err = bindingError(() => JSON.parse(`{"nodeId":"${NODE_TEXT}"}`, reviver));
            assert.strictEqual(err.code, ErrorCode.MISSING_FIELD);
            assert.strictEqual(err.message, "empty Id field 'chainId' from deserialization");
        });

        it('fails the document on the first bad required field', () => {
            const bad = 'TtF4d2QWbkavzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES';
            const err = bindingError(() => JSON.parse(`{"chainId":"${bad}","nodeId":42}`, reviver));
            assert.strictEqual(err.code, ErrorCode.INVALID_FIELD);
            assert.strictEqual(err.details.field, 'chainId');
            assert.ok(err.cause instanceof DecodeError);
        });

        it('rejects a required field holding null', () => {
            const err = bindingError(() => JSON.parse('{"chainId":null}', reviver));
            assert.strictEqual(err.code, ErrorCode.MISSING_FIELD);
            assert.strictEqual(err.details.field, 'chainId');
        });
    });
});
