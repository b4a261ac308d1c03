/**
 * Big-endian writer and reader for the packed forms used in derivation and
 * the collection wire encoding.
 *
 * @packageDocumentation
 */
import { U32_LEN, U64_LEN } from './constants.js';
import { isUInt32, isUInt64 } from './types.js';

function verifyOffset(offset: number): void {
    if (typeof offset !== 'number' || offset < 0 || !Number.isInteger(offset)) {
        throw new TypeError('offset must be a non-negative integer');
    }
}

export class ByteWriter {
    public buffer: Uint8Array;
    public offset: number;
    readonly #view: DataView;

    constructor(buffer: Uint8Array, offset: number = 0) {
        if (!(buffer instanceof Uint8Array)) {
            throw new TypeError('buffer must be a Uint8Array');
        }
        verifyOffset(offset);
        this.buffer = buffer;
        this.offset = offset;
        this.#view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    }

    static withCapacity(size: number): ByteWriter {
        return new ByteWriter(new Uint8Array(size));
    }

    writeUInt32(value: number): void {
        if (!isUInt32(value)) throw new RangeError(`value ${value} out of u32 range`);
        this.#ensure(U32_LEN);
        this.#view.setUint32(this.offset, value, false);
        this.offset += U32_LEN;
    }

    writeUInt64(value: bigint): void {
        if (!isUInt64(value)) throw new RangeError(`value ${value} out of u64 range`);
        this.#ensure(U64_LEN);
        this.#view.setBigUint64(this.offset, value, false);
        this.offset += U64_LEN;
    }

    writeSlice(slice: Uint8Array): void {
        this.#ensure(slice.length);
        this.buffer.set(slice, this.offset);
        this.offset += slice.length;
    }

    end(): Uint8Array {
        if (this.buffer.length === this.offset) {
            return this.buffer;
        }
        throw new Error(`buffer size ${this.buffer.length}, offset ${this.offset}`);
    }

    #ensure(n: number): void {
        if (this.buffer.length < this.offset + n) {
            throw new Error('Cannot write slice out of bounds');
        }
    }
}

export class ByteReader {
    public buffer: Uint8Array;
    public offset: number;
    readonly #view: DataView;

    constructor(buffer: Uint8Array, offset: number = 0) {
        if (!(buffer instanceof Uint8Array)) {
            throw new TypeError('buffer must be a Uint8Array');
        }
        verifyOffset(offset);
        this.buffer = buffer;
        this.offset = offset;
        this.#view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    }

    get remaining(): number {
        return this.buffer.length - this.offset;
    }

    readUInt32(): number {
        this.#ensure(U32_LEN);
        const result = this.#view.getUint32(this.offset, false);
        this.offset += U32_LEN;
        return result;
    }

    readSlice(n: number): Uint8Array {
        this.#ensure(n);
        const result = this.buffer.slice(this.offset, this.offset + n);
        this.offset += n;
        return result;
    }

    #ensure(n: number): void {
        if (this.buffer.length < this.offset + n) {
            throw new Error('Cannot read slice out of bounds');
        }
    }
}
