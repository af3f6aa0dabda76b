/**
 * MXE raster reader public API
 *
 * @module mxe
 */

import { MxeDecoder } from './mxe/decode.js';
import { MxeError } from './mxe/errors.js';
import type { MxeDecoderOptions } from './mxe/types.js';
import type { RasterGrid } from './mxe-types.js';
import { err, ok, type Result } from './result.js';

export type {
    RasterHeader, RasterGrid, DecodedRasterGrid, UnsupportedRasterGrid,
    CellType, DataTypeLabel, BlockShape, Preamble, GridExtent, GridSummary,
} from './mxe-types.js';
export type {
    MxeDecoderOptions as DecoderOptions, MxeLogger as Logger, MagicCheckMode, CompressionMode,
} from './mxe/types.js';
export { MxeError, NotFoundError, UnrecognizedFormatError, TruncatedStreamError, InvalidHeaderError } from './mxe/errors.js';
export type { MxeErrorCode } from './mxe/errors.js';
export { DataTypeTag, BlockShapeMarker } from './mxe/format.js';
export { ELEMENT_CODECS, getElementCodec } from './mxe/payload.js';
export type { ElementCodec } from './mxe/payload.js';
export { cellAt, cellCenter, cellIndex, gridExtent, isNoData, summarize, toRows } from './mxe/grid.js';
export { ok, err, unwrap } from './result.js';
export type { Result } from './result.js';
export { MxeDecoder };

/**
 * Decodes the MXE file at `path`. Throws an MxeError subclass on failure.
 */
export function decode(path: string, options?: MxeDecoderOptions): RasterGrid {
    return new MxeDecoder(options).decodeFile(path);
}

export function decodeAsync(path: string, options?: MxeDecoderOptions): Promise<RasterGrid> {
    return new MxeDecoder(options).decodeFileAsync(path);
}

/**
 * Decodes MXE bytes already in memory (gzip-compressed or inflated).
 */
export function decodeBytes(bytes: Uint8Array, options?: MxeDecoderOptions): RasterGrid {
    return new MxeDecoder(options).decodeBytes(bytes);
}

/**
 * Same as `decode`, with decode failures returned instead of thrown.
 * Anything that is not an MxeError still propagates.
 */
export function tryDecode(path: string, options?: MxeDecoderOptions): Result<RasterGrid, MxeError> {
    try {
        return ok(decode(path, options));
    } catch (error) {
        if (error instanceof MxeError) return err(error);
        throw error;
    }
}

// The MXE Namespace Object
export const MXE = {
    decode,
    decodeAsync,
    decodeBytes,
    tryDecode,

    /**
     * Decoder class for reusing one set of options across files.
     */
    Decoder: MxeDecoder,
};

export default MXE;
