export const MXE_STREAM_MAGIC = new Uint8Array([0xAC, 0xED]);
export const MXE_STREAM_VERSION = new Uint8Array([0x00, 0x05]);
export const GZIP_SIGNATURE = new Uint8Array([0x1F, 0x8B]);

export const PREAMBLE_SIZE = 5; // magic(2) + version(2) + block shape(1)

export enum BlockShapeMarker {
    SHORT = 0x77, // TC_BLOCKDATA
    LONG = 0x7A,  // TC_BLOCKDATALONG
}

export enum DataTypeTag {
    FLOAT32 = 1,
    INT8 = 2,
    INT32 = 3,
}

// Header layout (big-endian):
// [originX f64] [originY f64] [cellSize f64] [rows i32] [cols i32] [noData i32] [dataType i32]
export const HEADER_SIZE = 8 * 3 + 4 * 4;

export const DEFAULT_MAX_CELLS = 2 ** 28;
