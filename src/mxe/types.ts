export type MxeLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * How the serialization magic (`AC ED`) and version (`00 05`) are checked.
 *
 * - `strict` (default): mismatch throws UnrecognizedFormatError
 * - `warn`: mismatch is logged and decoding continues
 * - `off`: bytes are not inspected
 */
export type MagicCheckMode = 'strict' | 'warn' | 'off';

/**
 * - `auto` (default): gunzip when the gzip signature is present, otherwise read the bytes as-is
 * - `gzip`: input must be gzip
 */
export type CompressionMode = 'auto' | 'gzip';

export type MxeDecoderOptions = {
    magicCheck?: MagicCheckMode;
    compression?: CompressionMode;
    /** Upper bound on rowCount × colCount accepted before allocating the grid. Default 2^28. */
    maxCells?: number;
    /** Optional logger hook; the library itself never writes to the console. */
    logger?: MxeLogger | null;
};
