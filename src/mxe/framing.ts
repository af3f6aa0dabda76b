import type { BlockShape, Preamble } from '../mxe-types.js';
import type { ByteCursor } from './byte-cursor.js';
import { UnrecognizedFormatError } from './errors.js';
import { BlockShapeMarker, MXE_STREAM_MAGIC, MXE_STREAM_VERSION, PREAMBLE_SIZE } from './format.js';
import type { MagicCheckMode, MxeLogger } from './types.js';

export interface BlockShapeReader {
    shape: BlockShape;
    /** Bytes of block-length filler that follow the marker */
    fillerSize: number;
    readFiller(cursor: ByteCursor): number;
}

const BLOCK_SHAPES: ReadonlyMap<number, BlockShapeReader> = new Map<number, BlockShapeReader>([
    [BlockShapeMarker.SHORT, {
        shape: 'short',
        fillerSize: 1,
        readFiller: (cursor: ByteCursor) => cursor.readUint8('blockLength'),
    }],
    [BlockShapeMarker.LONG, {
        shape: 'long',
        fillerSize: 4,
        readFiller: (cursor: ByteCursor) => cursor.readUint32BE('blockLength'),
    }],
]);

export function getBlockShapeReader(marker: number): BlockShapeReader {
    const reader = BLOCK_SHAPES.get(marker);
    if (!reader) {
        throw new UnrecognizedFormatError(
            `This is not a recognized MXE format: block marker 0x${marker.toString(16).padStart(2, '0')} is neither 0x77 nor 0x7a`
        );
    }
    return reader;
}

function checkMagic(magic: number, version: number, mode: MagicCheckMode, logger: MxeLogger | null): void {
    if (mode === 'off') return;

    const expectedMagic = (MXE_STREAM_MAGIC[0] << 8) | MXE_STREAM_MAGIC[1];
    const expectedVersion = (MXE_STREAM_VERSION[0] << 8) | MXE_STREAM_VERSION[1];
    if (magic === expectedMagic && version === expectedVersion) return;

    const message = `Unexpected stream header ${hex16(magic)} ${hex16(version)} (expected ${hex16(expectedMagic)} ${hex16(expectedVersion)})`;
    if (mode === 'warn') {
        logger?.warn?.(`[MXE] ${message}; continuing`);
        return;
    }
    throw new UnrecognizedFormatError(message);
}

function hex16(value: number): string {
    return `0x${value.toString(16).padStart(4, '0')}`;
}

/**
 * Consumes the 5-byte preamble and the block-length filler that follows it,
 * leaving the cursor on the first header field.
 */
export function readPreamble(cursor: ByteCursor, mode: MagicCheckMode, logger: MxeLogger | null = null): Preamble {
    const start = cursor.require(PREAMBLE_SIZE, 'preamble');
    const view = cursor.dataView;
    const magic = view.getUint16(start, false);
    const version = view.getUint16(start + 2, false);
    const marker = view.getUint8(start + 4);

    checkMagic(magic, version, mode, logger);
    const reader = getBlockShapeReader(marker);
    const blockLength = reader.readFiller(cursor);

    logger?.info?.(`[MXE] ${reader.shape} block (filler ${reader.fillerSize} bytes, value ${blockLength})`);
    return { magic, version, shape: reader.shape, blockLength };
}
