/**
 * MXE Types - Core type definitions
 *
 * @module mxe
 *
 * An MXE file holds one raster: the geometry header followed by a flat,
 * row-major array of cells. Row 0 is the northern-most row.
 */

/**
 * Geometry and encoding fields, in the order they appear in the stream.
 */
export interface RasterHeader {
    /** x-coordinate of the lower-left EDGE of the grid */
    readonly originX: number;
    /** y-coordinate of the lower-left EDGE of the grid */
    readonly originY: number;
    /** Side length of a square cell, in grid coordinates */
    readonly cellSize: number;
    readonly rowCount: number;
    readonly colCount: number;
    /** Sentinel marking a cell with no data */
    readonly noDataValue: number;
    /** 1 = 32-bit float, 2 = signed byte, 3 = 4-byte integer */
    readonly dataTypeTag: number;
}

/** Width and interpretation of a payload element before widening. */
export type CellType = 'float32' | 'int8' | 'int32';

export type DataTypeLabel = '32-bit float' | 'Signed byte' | '4-byte integer' | 'Unknown';

export interface DecodedRasterGrid {
    readonly status: 'decoded';
    readonly header: RasterHeader;
    readonly cellType: CellType;
    readonly dataTypeLabel: Exclude<DataTypeLabel, 'Unknown'>;
    /**
     * rowCount × colCount cells in on-disk (row-major) order. Each decode
     * allocates a fresh array that belongs to the caller; freezing the result
     * does not make its elements read-only.
     */
    readonly data: Float64Array;
}

/**
 * The header decoded but the data-type tag is not one this reader knows,
 * so the payload was left unread.
 */
export interface UnsupportedRasterGrid {
    readonly status: 'unsupported-data-type';
    readonly header: RasterHeader;
    readonly cellType: null;
    readonly dataTypeLabel: 'Unknown';
    readonly data: null;
}

export type RasterGrid = DecodedRasterGrid | UnsupportedRasterGrid;

export type BlockShape = 'short' | 'long';

export interface Preamble {
    readonly magic: number;
    readonly version: number;
    readonly shape: BlockShape;
    /** The discarded block-length filler, kept for diagnostics only */
    readonly blockLength: number;
}

export interface GridExtent {
    xmin: number;
    ymin: number;
    xmax: number;
    ymax: number;
}

export interface GridSummary {
    count: number;
    noDataCount: number;
    min: number | null;
    max: number | null;
    mean: number | null;
}
