/**
 * CLI: MXE inspector
 *
 * Usage:  tsx tools/inspect.ts <file.mxe> [--magic strict|warn|off] [--compression auto|gzip] [--json] [--verbose]
 *
 * Decodes one MXE file and prints its header, data type and cell statistics.
 */

import { MxeError, gridExtent, summarize, tryDecode, type CompressionMode, type Logger, type MagicCheckMode } from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

function isMagicCheckMode(value: string): value is MagicCheckMode {
    return value === 'strict' || value === 'warn' || value === 'off';
}

function isCompressionMode(value: string): value is CompressionMode {
    return value === 'auto' || value === 'gzip';
}

const filePath = args.find((arg, i) => !arg.startsWith('--') && (i === 0 || !['--magic', '--compression'].includes(args[i - 1])));
const magic = getArg('magic', 'strict');
const compression = getArg('compression', 'auto');

if (!filePath || !isMagicCheckMode(magic) || !isCompressionMode(compression)) {
    console.error('Usage: inspect <file.mxe> [--magic strict|warn|off] [--compression auto|gzip] [--json] [--verbose]');
    process.exit(2);
}

const logger: Logger | null = args.includes('--verbose')
    ? { info: (msg) => console.error(msg), warn: (msg) => console.warn(msg), error: (msg) => console.error(msg) }
    : null;

const result = tryDecode(filePath, { magicCheck: magic, compression, logger });

if (!result.ok) {
    const error: MxeError = result.error;
    console.error(`${error.name} (${error.code}): ${error.message}`);
    process.exit(1);
}

const grid = result.data;
const summary = summarize(grid);
const extent = gridExtent(grid.header);

if (args.includes('--json')) {
    console.log(JSON.stringify({ header: grid.header, status: grid.status, dataType: grid.dataTypeLabel, extent, summary }, null, 2));
} else {
    const h = grid.header;
    console.log(`File:       ${filePath}`);
    console.log(`Origin:     (${h.originX}, ${h.originY})`);
    console.log(`Cell size:  ${h.cellSize}`);
    console.log(`Dimensions: ${h.rowCount} rows x ${h.colCount} cols`);
    console.log(`Extent:     [${extent.xmin}, ${extent.ymin}] - [${extent.xmax}, ${extent.ymax}]`);
    console.log(`NoData:     ${h.noDataValue}`);
    console.log(`Data type:  ${grid.dataTypeLabel} (tag ${h.dataTypeTag})`);
    if (grid.status === 'decoded') {
        console.log(`Cells:      ${summary.count} valid, ${summary.noDataCount} no-data`);
        console.log(`Range:      ${summary.min} .. ${summary.max} (mean ${summary.mean})`);
    } else {
        console.log('Cells:      not decoded (unsupported data type)');
    }
}
