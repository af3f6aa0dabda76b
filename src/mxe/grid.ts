import type { GridExtent, GridSummary, RasterGrid, RasterHeader } from '../mxe-types.js';

export function cellIndex(header: RasterHeader, row: number, col: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= header.rowCount) {
        throw new RangeError(`Row ${row} out of range [0, ${header.rowCount})`);
    }
    if (!Number.isInteger(col) || col < 0 || col >= header.colCount) {
        throw new RangeError(`Column ${col} out of range [0, ${header.colCount})`);
    }
    return row * header.colCount + col;
}

export function isNoData(grid: RasterGrid, value: number): boolean {
    return value === grid.header.noDataValue;
}

/**
 * Value of one cell, or null when the payload was not decoded or the cell
 * holds the no-data sentinel.
 */
export function cellAt(grid: RasterGrid, row: number, col: number): number | null {
    const index = cellIndex(grid.header, row, col);
    if (grid.data === null) return null;
    const value = grid.data[index];
    return isNoData(grid, value) ? null : value;
}

export function gridExtent(header: RasterHeader): GridExtent {
    return {
        xmin: header.originX,
        ymin: header.originY,
        xmax: header.originX + header.colCount * header.cellSize,
        ymax: header.originY + header.rowCount * header.cellSize,
    };
}

/** Row 0 is the northern edge, so y counts down from the top of the extent. */
export function cellCenter(header: RasterHeader, row: number, col: number): { x: number; y: number } {
    cellIndex(header, row, col);
    return {
        x: header.originX + (col + 0.5) * header.cellSize,
        y: header.originY + (header.rowCount - row - 0.5) * header.cellSize,
    };
}

/**
 * One view per row over the grid's data; no copies. A grid with no cells has
 * no rows, whatever its header's row count says.
 */
export function toRows(grid: RasterGrid): Float64Array[] {
    if (grid.data === null || grid.data.length === 0) return [];
    const { rowCount, colCount } = grid.header;
    const rows: Float64Array[] = [];
    for (let r = 0; r < rowCount; r++) {
        rows.push(grid.data.subarray(r * colCount, (r + 1) * colCount));
    }
    return rows;
}

export function summarize(grid: RasterGrid): GridSummary {
    const summary: GridSummary = { count: 0, noDataCount: 0, min: null, max: null, mean: null };
    if (grid.data === null) return summary;

    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const value of grid.data) {
        if (isNoData(grid, value) || Number.isNaN(value)) {
            summary.noDataCount++;
            continue;
        }
        summary.count++;
        if (value < min) min = value;
        if (value > max) max = value;
        sum += value;
    }

    if (summary.count > 0) {
        summary.min = min;
        summary.max = max;
        summary.mean = sum / summary.count;
    }
    return summary;
}
