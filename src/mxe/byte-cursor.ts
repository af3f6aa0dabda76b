import { TruncatedStreamError } from './errors.js';

/**
 * Forward-only reader over a decompressed MXE stream. All multi-byte reads are
 * big-endian; every read either consumes its full width or throws.
 */
export class ByteCursor {
    private readonly view: DataView;
    private pos: number = 0;

    constructor(private readonly bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get offset(): number {
        return this.pos;
    }

    get remaining(): number {
        return this.bytes.length - this.pos;
    }

    /**
     * Reserves `n` bytes for `field` and returns the offset they start at.
     */
    require(n: number, field: string): number {
        if (n > this.remaining) {
            throw new TruncatedStreamError(field, this.pos, n, this.remaining);
        }
        const start = this.pos;
        this.pos += n;
        return start;
    }

    readExactly(n: number, field: string): Uint8Array {
        const start = this.require(n, field);
        return this.bytes.subarray(start, start + n);
    }

    readUint8(field: string): number {
        return this.view.getUint8(this.require(1, field));
    }

    readUint32BE(field: string): number {
        return this.view.getUint32(this.require(4, field), false);
    }

    readInt32BE(field: string): number {
        return this.view.getInt32(this.require(4, field), false);
    }

    readFloat64BE(field: string): number {
        return this.view.getFloat64(this.require(8, field), false);
    }

    /** DataView over the whole stream, for bulk reads after `require`. */
    get dataView(): DataView {
        return this.view;
    }
}
