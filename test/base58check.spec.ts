import assert from 'assert';
import { describe, it } from 'vitest';

import { cb58, checksum } from '../src/io/base58check.js';
import { fromHex, toHex } from '../src/io/hex.js';
import { DecodeError, ErrorCode } from '../src/errors.js';

const PAYLOAD_32 = '3d0ad12b8ee8928edf248ca91ca55600fb383f07c32bff1d6dec472b25cf59a7';

function decodeError(fn: () => unknown): DecodeError {
    try {
        fn();
    } catch (e) {
        assert.ok(e instanceof DecodeError, `expected DecodeError, got ${String(e)}`);
        return e;
    }
    assert.fail('expected a DecodeError');
}

describe('cb58', () => {
    describe('encode', () => {
        const vectors: Array<[string, string]> = [
            [PAYLOAD_32, 'TtF4d2QWbk5vzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES'],
            ['00'.repeat(32), '11111111111111111111111111111111LpoYY'],
            ['3d0ad12b8ee8928edf248ca91ca55600fb383f07', '6ZmBHXTqjknJoZtXbnJ6x7af863rXDTwx'],
            ['00'.repeat(20), '111111111111111111116DBWJs'],
        ];

        for (const [hex, text] of vectors) {
            it(`encodes ${hex.slice(0, 16)}... (${hex.length / 2} bytes)`, () => {
                assert.strictEqual(cb58.encode(fromHex(hex)), text);
                assert.strictEqual(toHex(cb58.decode(text)), hex);
            });
        }
    });

    describe('checksum', () => {
        it('is the last four bytes of sha256(payload)', () => {
            // sha256('') = e3b0c442...7852b855
            assert.strictEqual(toHex(checksum(new Uint8Array(0))), '7852b855');
        });
    });

    describe('decode', () => {
        it('rejects a changed character with a checksum mismatch', () => {
            const err = decodeError(() => cb58.decode('TtF4d2QWbkavzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES'));
            assert.strictEqual(err.code, ErrorCode.CHECKSUM_MISMATCH);
            assert.ok(err.cause instanceof Error);
        });

        it('rejects a change at any position', () => {
            const text = 'TtF4d2QWbk5vzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES';
            for (let i = 0; i < text.length; i++) {
                const replacement = text[i] === '2' ? '3' : '2';
                const changed = text.slice(0, i) + replacement + text.slice(i + 1);
                const err = decodeError(() => cb58.decode(changed));
                assert.strictEqual(err.code, ErrorCode.CHECKSUM_MISMATCH, `position ${i}`);
            }
        });

        it('rejects characters outside the base58 alphabet', () => {
            const err = decodeError(() => cb58.decode('0tF4d2QWbk5vzQGTEPrN48x6vwgAoAmKQ9cbp79inpQmcRKES'));
            assert.strictEqual(err.code, ErrorCode.INVALID_ENCODING);
            assert.ok(err.cause instanceof Error);
        });

        it('rejects text too short to carry a checksum', () => {
            const err = decodeError(() => cb58.decode('11'));
            assert.strictEqual(err.code, ErrorCode.INVALID_LENGTH);
            assert.strictEqual(err.details.actual, 2);
        });

        it('rejects a valid-looking string whose checksum is not the first digest bytes', () => {
            // base58(32 zero bytes ++ first four bytes of sha256): the wrong end of the digest
            const err = decodeError(() => cb58.decode('111111111111111111111111111111113cpqAU'));
            assert.strictEqual(err.code, ErrorCode.CHECKSUM_MISMATCH);
        });
    });
});
