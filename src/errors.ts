export type FormatStage = 'base64' | 'gzip' | 'table-structure' | 'utf8';

export class SaveTabError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'SaveTabError';
    }
}

/**
 * Malformed input. `stage` names the component that rejected it.
 */
export class FormatError extends SaveTabError {
    constructor(public readonly stage: FormatStage, message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'FormatError';
    }
}

export class Base64FormatError extends FormatError {
    constructor(message: string, originalError?: unknown) {
        super('base64', message, originalError);
        this.name = 'Base64FormatError';
    }
}

export class GzipFormatError extends FormatError {
    constructor(message: string, originalError?: unknown) {
        super('gzip', message, originalError);
        this.name = 'GzipFormatError';
    }
}

export class TableStructureError extends FormatError {
    constructor(message: string, originalError?: unknown) {
        super('table-structure', message, originalError);
        this.name = 'TableStructureError';
    }
}

export class Utf8FormatError extends FormatError {
    constructor(message: string, originalError?: unknown) {
        super('utf8', message, originalError);
        this.name = 'Utf8FormatError';
    }
}

export class LimitExceededError extends SaveTabError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

/**
 * node:zlib reports corrupt input through errors carrying a `Z_*` code
 * (`Z_DATA_ERROR`, `Z_BUF_ERROR` for a truncated member, ...).
 */
export function isZlibError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('Z_');
}

export function isBufferTooLargeError(error: unknown): boolean {
    return error instanceof RangeError && 'code' in error && error.code === 'ERR_BUFFER_TOO_LARGE';
}
