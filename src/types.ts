export type SaveTabLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type EnvelopeDecodeOptions = {
    /** Upper bound on decompressed bytes, a non-negative integer. Exceeding it raises LimitExceededError. Default: unbounded. */
    maxOutputLength?: number;
    /** Optional logger hook; the codec never writes to the console itself. */
    logger?: SaveTabLogger | null;
};

export type EnvelopeStreamOptions = EnvelopeDecodeOptions & {
    /** Largest chunk handed to the codec per step (default 8192). */
    chunkSize?: number;
};

export type EnvelopeStreamStats = {
    /** Bytes read from the source. */
    bytesIn: number;
    /** Bytes written to the sink. */
    bytesOut: number;
    /** Number of chunks the source was sliced into. */
    chunks: number;
};

/**
 * What the parser does with a data row holding more fields than the header.
 * - 'reject' (default): throw TableStructureError
 * - 'truncate': keep the row, drop the extra fields, log a warning
 * - 'skip': drop the row, log a warning
 */
export type LongRowPolicy = 'reject' | 'truncate' | 'skip';

export type TableParseOptions = {
    longRowPolicy?: LongRowPolicy;
    logger?: SaveTabLogger | null;
};

export type TableValidateOptions = {
    /** Table names a save must contain. Default: DEFAULT_REQUIRED_TABLES. */
    requiredTables?: readonly string[];
};

export type LoadSaveOptions = EnvelopeDecodeOptions & TableParseOptions;
