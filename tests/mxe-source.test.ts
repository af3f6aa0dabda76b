import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { gzipSync } from 'zlib';
import { decode, decodeBytes, NotFoundError, TruncatedStreamError, UnrecognizedFormatError } from '../src/index.js';
import { hasGzipSignature, inflateMxe, openMxeSource, readMxeFileAsync } from '../src/mxe/source.js';
import { buildMxeFile, buildMxeStream, writeFixture, SAMPLE_HEADER } from './helpers/mxe-fixture.js';

const SAMPLE_DATA = [1, 2, 3, 4, 5, 6];

describe('MXE stream opener', () => {
    describe('file access', () => {
        it('throws NotFoundError for a missing path', () => {
            const missing = path.join(process.env.MXE_TEST_ROOT ?? '', 'does-not-exist.mxe');
            try {
                decode(missing);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(NotFoundError);
                if (error instanceof NotFoundError) {
                    expect(error.path).toBe(missing);
                    expect(error.code).toBe('NOT_FOUND');
                    expect(error.message).toBe(`MXE file not found or unreadable: ${missing}`);
                }
            }
        });

        it('throws NotFoundError for an empty path', () => {
            expect(() => decode('')).toThrow('No file name supplied');
        });

        it('throws NotFoundError for a directory', () => {
            const dir = path.join(process.env.MXE_TEST_ROOT ?? '', 'a-directory');
            fs.mkdirSync(dir, { recursive: true });
            expect(() => decode(dir)).toThrow(NotFoundError);
        });

        it('throws NotFoundError when a path component is a file', () => {
            const file = writeFixture('not-a-dir.mxe', buildMxeFile(SAMPLE_HEADER, SAMPLE_DATA));
            expect(() => decode(path.join(file, 'child.mxe'))).toThrow(NotFoundError);
        });

        it('async reader rejects a directory with NotFoundError', async () => {
            await expect(readMxeFileAsync(process.env.MXE_TEST_ROOT ?? '')).rejects.toThrow(NotFoundError);
        });

        it('opens a cursor positioned at the start of the inflated stream', () => {
            const file = writeFixture('cursor.mxe', buildMxeFile(SAMPLE_HEADER, SAMPLE_DATA));
            const cursor = openMxeSource(file, 'gzip');

            expect(cursor.offset).toBe(0);
            expect(cursor.remaining).toBe(6 + 40 + 24);
        });
    });

    describe('compression', () => {
        it('detects the gzip signature', () => {
            expect(hasGzipSignature(new Uint8Array([0x1F, 0x8B, 0x08]))).toBe(true);
            expect(hasGzipSignature(new Uint8Array([0xAC, 0xED]))).toBe(false);
            expect(hasGzipSignature(new Uint8Array([0x1F]))).toBe(false);
        });

        it('reads an uncompressed stream as-is in auto mode', () => {
            const grid = decodeBytes(buildMxeStream(SAMPLE_HEADER, SAMPLE_DATA));
            expect(Array.from(grid.data ?? [])).toEqual(SAMPLE_DATA);
        });

        it('rejects an uncompressed stream in gzip mode', () => {
            expect(() => decodeBytes(buildMxeStream(SAMPLE_HEADER, SAMPLE_DATA), { compression: 'gzip' })).toThrow(
                'Not a gzip stream: missing 1f 8b signature'
            );
        });

        it('inflates concatenated gzip members as one stream', () => {
            const stream = buildMxeStream(SAMPLE_HEADER, SAMPLE_DATA);
            const first = gzipSync(stream.subarray(0, 30));
            const second = gzipSync(stream.subarray(30));
            const joined = new Uint8Array(first.length + second.length);
            joined.set(first, 0);
            joined.set(second, first.length);

            expect(Array.from(inflateMxe(joined, 'gzip'))).toEqual(Array.from(stream));
        });

        it('maps a cut gzip stream to TruncatedStreamError', () => {
            const bytes = buildMxeFile(SAMPLE_HEADER, SAMPLE_DATA);
            const cut = bytes.slice(0, bytes.length - 12);
            try {
                decodeBytes(cut);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(TruncatedStreamError);
                if (error instanceof TruncatedStreamError) {
                    expect(error.field).toBe('gzip');
                    expect(error.needed).toBeNull();
                    expect(error.available).toBeNull();
                    expect(error.message).toBe(`Truncated stream while reading gzip at offset ${cut.length}`);
                }
            }
        });

        it('maps a corrupt gzip header to UnrecognizedFormatError', () => {
            const bytes = buildMxeFile(SAMPLE_HEADER, SAMPLE_DATA);
            bytes[2] = 0x07; // compression method other than deflate
            expect(() => decodeBytes(bytes)).toThrow(UnrecognizedFormatError);
        });
    });
});
