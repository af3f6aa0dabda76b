import type { DecodedRasterGrid, RasterGrid, RasterHeader, UnsupportedRasterGrid } from '../mxe-types.js';
import { ByteCursor } from './byte-cursor.js';
import { MxeError } from './errors.js';
import { DEFAULT_MAX_CELLS } from './format.js';
import { readPreamble } from './framing.js';
import { readHeader } from './header.js';
import { checkDimensions, decodePayload, getElementCodec } from './payload.js';
import { inflateMxe, openMxeSource, openMxeSourceAsync } from './source.js';
import type { MxeDecoderOptions } from './types.js';

export class MxeDecoder {
    private readonly options: Required<MxeDecoderOptions>;

    constructor(options: MxeDecoderOptions = {}) {
        // Per-field so that an explicit `undefined` still falls back to the default.
        this.options = {
            magicCheck: options.magicCheck ?? 'strict',
            compression: options.compression ?? 'auto',
            maxCells: options.maxCells ?? DEFAULT_MAX_CELLS,
            logger: options.logger ?? null,
        };

        if (!Number.isSafeInteger(this.options.maxCells) || this.options.maxCells < 1) {
            throw new RangeError(`maxCells must be a positive integer, got ${this.options.maxCells}`);
        }
    }

    /**
     * Decodes the MXE file at `filePath`. The file handle is released before
     * this returns or throws.
     */
    decodeFile(filePath: string): RasterGrid {
        return this.guard(filePath, () => this.decodeCursor(openMxeSource(filePath, this.options.compression)));
    }

    async decodeFileAsync(filePath: string): Promise<RasterGrid> {
        try {
            const cursor = await openMxeSourceAsync(filePath, this.options.compression);
            return this.decodeCursor(cursor);
        } catch (error) {
            this.report(filePath, error);
            throw error;
        }
    }

    /**
     * Decodes an in-memory MXE stream, gzip-compressed or already inflated.
     */
    decodeBytes(bytes: Uint8Array): RasterGrid {
        return this.guard('<bytes>', () => this.decodeCursor(new ByteCursor(inflateMxe(bytes, this.options.compression))));
    }

    private guard(source: string, run: () => RasterGrid): RasterGrid {
        try {
            return run();
        } catch (error) {
            this.report(source, error);
            throw error;
        }
    }

    private report(source: string, error: unknown): void {
        if (error instanceof MxeError) {
            this.options.logger?.error?.(`[MXE] ${source}: ${error.name}: ${error.message}`);
        }
    }

    private decodeCursor(cursor: ByteCursor): RasterGrid {
        const { logger, magicCheck, maxCells } = this.options;

        readPreamble(cursor, magicCheck, logger);
        const header = readHeader(cursor);
        logger?.info?.(`[MXE] ${header.rowCount} x ${header.colCount} cells of ${header.cellSize} at (${header.originX}, ${header.originY})`);

        const codec = getElementCodec(header.dataTypeTag);
        if (!codec) {
            checkDimensions(header);
            logger?.warn?.(`[MXE] Unsupported data type tag ${header.dataTypeTag}; payload not read`);
            return unsupportedGrid(header);
        }

        const data = decodePayload(cursor, header, codec, maxCells);
        if (cursor.remaining > 0) {
            logger?.info?.(`[MXE] ${cursor.remaining} trailing bytes after payload ignored`);
        }

        const grid: DecodedRasterGrid = {
            status: 'decoded',
            header,
            cellType: codec.cellType,
            dataTypeLabel: codec.label,
            data,
        };
        return Object.freeze(grid);
    }
}

function unsupportedGrid(header: RasterHeader): UnsupportedRasterGrid {
    const grid: UnsupportedRasterGrid = {
        status: 'unsupported-data-type',
        header,
        cellType: null,
        dataTypeLabel: 'Unknown',
        data: null,
    };
    return Object.freeze(grid);
}
