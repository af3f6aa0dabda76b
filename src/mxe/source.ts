import { closeSync, fstatSync, openSync, readFileSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip, gunzipSync } from 'node:zlib';
import { ByteCursor } from './byte-cursor.js';
import { NotFoundError, TruncatedStreamError, UnrecognizedFormatError } from './errors.js';
import { GZIP_SIGNATURE } from './format.js';
import type { CompressionMode } from './types.js';

const gunzipAsync = promisify(gunzip);

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM']);

function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function toOpenError(filePath: string, error: unknown): unknown {
    const code = errnoCode(error);
    return code !== undefined && NOT_FOUND_CODES.has(code) ? new NotFoundError(filePath, { cause: error }) : error;
}

export function hasGzipSignature(bytes: Uint8Array): boolean {
    return bytes.length >= GZIP_SIGNATURE.length
        && bytes[0] === GZIP_SIGNATURE[0]
        && bytes[1] === GZIP_SIGNATURE[1];
}

function toInflateError(error: unknown, compressedLength: number): Error {
    if (errnoCode(error) === 'Z_BUF_ERROR') {
        return new TruncatedStreamError('gzip', compressedLength, null, null, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new UnrecognizedFormatError(`Corrupt gzip stream: ${reason}`, { cause: error });
}

/** False when the bytes are to be read as-is. */
function shouldInflate(raw: Uint8Array, mode: CompressionMode): boolean {
    if (hasGzipSignature(raw)) return true;
    if (mode === 'gzip') {
        throw new UnrecognizedFormatError('Not a gzip stream: missing 1f 8b signature');
    }
    return false;
}

export function inflateMxe(raw: Uint8Array, mode: CompressionMode): Uint8Array {
    if (!shouldInflate(raw, mode)) return raw;
    try {
        return gunzipSync(raw);
    } catch (error) {
        throw toInflateError(error, raw.length);
    }
}

export async function inflateMxeAsync(raw: Uint8Array, mode: CompressionMode): Promise<Uint8Array> {
    if (!shouldInflate(raw, mode)) return raw;
    try {
        return await gunzipAsync(raw);
    } catch (error) {
        throw toInflateError(error, raw.length);
    }
}

function openOrThrow(filePath: string): number {
    try {
        return openSync(filePath, 'r');
    } catch (error) {
        throw toOpenError(filePath, error);
    }
}

/**
 * Reads the whole file through a handle that is closed on every exit path.
 */
export function readMxeFile(filePath: string): Uint8Array {
    if (filePath === '') throw new NotFoundError(filePath);

    const fd = openOrThrow(filePath);

    try {
        if (!fstatSync(fd).isFile()) throw new NotFoundError(filePath);
        return readFileSync(fd);
    } catch (error) {
        throw toOpenError(filePath, error);
    } finally {
        closeSync(fd);
    }
}

export async function readMxeFileAsync(filePath: string): Promise<Uint8Array> {
    if (filePath === '') throw new NotFoundError(filePath);

    const handle = await fs.open(filePath, 'r').catch((error: unknown) => {
        throw toOpenError(filePath, error);
    });

    try {
        const stat = await handle.stat();
        if (!stat.isFile()) throw new NotFoundError(filePath);
        return await handle.readFile();
    } catch (error) {
        throw toOpenError(filePath, error);
    } finally {
        await handle.close();
    }
}

export function openMxeSource(filePath: string, mode: CompressionMode): ByteCursor {
    return new ByteCursor(inflateMxe(readMxeFile(filePath), mode));
}

export async function openMxeSourceAsync(filePath: string, mode: CompressionMode): Promise<ByteCursor> {
    return new ByteCursor(await inflateMxeAsync(await readMxeFileAsync(filePath), mode));
}
