export type MxeErrorCode =
    | 'NOT_FOUND'
    | 'UNRECOGNIZED_FORMAT'
    | 'TRUNCATED_STREAM'
    | 'INVALID_HEADER';

export abstract class MxeError extends Error {
    abstract readonly code: MxeErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MxeError';
    }
}

export class NotFoundError extends MxeError {
    readonly code = 'NOT_FOUND';

    constructor(public readonly path: string, options?: { cause?: unknown }) {
        super(path === '' ? 'No file name supplied' : `MXE file not found or unreadable: ${path}`, options);
        this.name = 'NotFoundError';
    }
}

export class UnrecognizedFormatError extends MxeError {
    readonly code = 'UNRECOGNIZED_FORMAT';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'UnrecognizedFormatError';
    }
}

/**
 * Raised when the stream ends before a field or element could be read in full.
 * `field` names the stage or header field being read. `needed` and `available`
 * are null when the shortfall was not measured, as for a cut gzip stream.
 */
export class TruncatedStreamError extends MxeError {
    readonly code = 'TRUNCATED_STREAM';

    constructor(
        public readonly field: string,
        public readonly offset: number,
        public readonly needed: number | null,
        public readonly available: number | null,
        options?: { cause?: unknown }
    ) {
        super(
            needed === null || available === null
                ? `Truncated stream while reading ${field} at offset ${offset}`
                : `Truncated stream while reading ${field} at offset ${offset} (needed ${needed} bytes, ${available} available)`,
            options
        );
        this.name = 'TruncatedStreamError';
    }
}

export class InvalidHeaderError extends MxeError {
    readonly code = 'INVALID_HEADER';

    constructor(public readonly field: string, message: string) {
        super(message);
        this.name = 'InvalidHeaderError';
    }
}
