import type { CellType, DataTypeLabel, RasterHeader } from '../mxe-types.js';
import type { ByteCursor } from './byte-cursor.js';
import { InvalidHeaderError } from './errors.js';
import { DataTypeTag } from './format.js';

export interface ElementCodec {
    tag: DataTypeTag;
    cellType: CellType;
    label: Exclude<DataTypeLabel, 'Unknown'>;
    /** Bytes per element on disk */
    width: number;
    read(view: DataView, offset: number): number;
}

/**
 * Registry of payload element codecs, keyed by data-type tag.
 */
export const ELEMENT_CODECS: Map<number, ElementCodec> = new Map();

export const ElementCodecFloat32: ElementCodec = {
    tag: DataTypeTag.FLOAT32,
    cellType: 'float32',
    label: '32-bit float',
    width: 4,
    read: (view, offset) => view.getFloat32(offset, false),
};

export const ElementCodecInt8: ElementCodec = {
    tag: DataTypeTag.INT8,
    cellType: 'int8',
    label: 'Signed byte',
    width: 1,
    read: (view, offset) => view.getInt8(offset),
};

export const ElementCodecInt32: ElementCodec = {
    tag: DataTypeTag.INT32,
    cellType: 'int32',
    label: '4-byte integer',
    width: 4,
    read: (view, offset) => view.getInt32(offset, false),
};

ELEMENT_CODECS.set(DataTypeTag.FLOAT32, ElementCodecFloat32);
ELEMENT_CODECS.set(DataTypeTag.INT8, ElementCodecInt8);
ELEMENT_CODECS.set(DataTypeTag.INT32, ElementCodecInt32);

/** Null when the tag is not one this reader decodes. */
export function getElementCodec(tag: number): ElementCodec | null {
    return ELEMENT_CODECS.get(tag) ?? null;
}

export function checkDimensions(header: RasterHeader): void {
    if (header.rowCount < 0) {
        throw new InvalidHeaderError('rowCount', `Negative row count: ${header.rowCount}`);
    }
    if (header.colCount < 0) {
        throw new InvalidHeaderError('colCount', `Negative column count: ${header.colCount}`);
    }
}

/**
 * rowCount × colCount, rejected when it cannot be allocated safely.
 */
export function cellCount(header: RasterHeader, maxCells: number): number {
    checkDimensions(header);
    const cells = header.rowCount * header.colCount;
    if (!Number.isSafeInteger(cells) || cells > maxCells) {
        throw new InvalidHeaderError(
            'cellCount',
            `Cell count ${header.rowCount} x ${header.colCount} exceeds the limit of ${maxCells}`
        );
    }
    return cells;
}

/**
 * Reads rowCount × colCount elements in on-disk order, widened to float64.
 * The byte range is reserved up front, so a short payload throws
 * TruncatedStreamError before anything is allocated.
 */
export function decodePayload(cursor: ByteCursor, header: RasterHeader, codec: ElementCodec, maxCells: number): Float64Array {
    const cells = cellCount(header, maxCells);
    const start = cursor.require(cells * codec.width, 'payload');
    const view = cursor.dataView;

    const data = new Float64Array(cells);
    for (let i = 0, offset = start; i < cells; i++, offset += codec.width) {
        data[i] = codec.read(view, offset);
    }
    return data;
}
