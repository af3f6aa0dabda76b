import type { RasterHeader } from '../mxe-types.js';
import type { ByteCursor } from './byte-cursor.js';

/**
 * Reads the seven geometry fields in stream order. A short read at any field
 * throws TruncatedStreamError naming that field; nothing is defaulted.
 */
export function readHeader(cursor: ByteCursor): RasterHeader {
    const originX = cursor.readFloat64BE('originX');
    const originY = cursor.readFloat64BE('originY');
    const cellSize = cursor.readFloat64BE('cellSize');
    const rowCount = cursor.readInt32BE('rowCount');
    const colCount = cursor.readInt32BE('colCount');
    const noDataValue = cursor.readInt32BE('noDataValue');
    const dataTypeTag = cursor.readInt32BE('dataTypeTag');

    return Object.freeze({ originX, originY, cellSize, rowCount, colCount, noDataValue, dataTypeTag });
}
