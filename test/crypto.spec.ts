import assert from 'assert';
import { describe, it } from 'vitest';

import { hash160, ripemd160, sha256 } from '../src/crypto.js';
import { toHex } from '../src/io/hex.js';

describe('crypto', () => {
    it('sha256', () => {
        assert.strictEqual(toHex(sha256(Buffer.from('abc', 'utf8'))), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('ripemd160', () => {
        assert.strictEqual(toHex(ripemd160(new Uint8Array(0))), '9c1185a5c5e9fc54612808977ee8f548b2258d31');
    });

    it('hash160 is ripemd160 over sha256', () => {
        assert.strictEqual(toHex(hash160(Buffer.from('abc', 'utf8'))), 'bb1be98c142444d7a56aa3981c3942a978e4dc33');
    });
});
