/**
 * Envelope codec, whole-buffer mode.
 *
 * An envelope is base64(gzip(bytes)): a single gzip member at the default
 * compression level, encoded with the standard base64 alphabet and `=`
 * padding, with no line breaks.
 */
import { gunzipSync, gzipSync } from 'node:zlib';
import { GZIP_MAGIC } from '../constants.js';
import { GzipFormatError, LimitExceededError, isBufferTooLargeError, isZlibError } from '../errors.js';
import type { EnvelopeDecodeOptions } from '../types.js';
import { decodeBase64, encodeBase64, stripWhitespace } from './base64.js';

/** Byte input is read as ASCII; latin1 keeps stray high bytes visible to validation. */
export function envelopeText(input: string | Uint8Array): string {
    if (typeof input === 'string') return input;
    return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('latin1');
}

/**
 * Output limit in bytes, shared by both codec modes. Unset means unbounded;
 * 0 admits only an empty payload.
 */
export function resolveMaxOutputLength(value: number | undefined): number {
    if (value === undefined) return Number.POSITIVE_INFINITY;
    if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`maxOutputLength must be a non-negative integer, got ${value}`);
    }
    return value;
}

function limitExceeded(limit: number): LimitExceededError {
    return new LimitExceededError(`Decompressed size limit exceeded (limit: ${limit})`);
}

export function gunzipEnvelopeBytes(compressed: Uint8Array, options: EnvelopeDecodeOptions = {}): Uint8Array {
    const limit = resolveMaxOutputLength(options.maxOutputLength);
    if (compressed.length === 0) {
        throw new GzipFormatError('gzip decompress failed: empty input');
    }
    if (compressed.length < GZIP_MAGIC.length || compressed[0] !== GZIP_MAGIC[0] || compressed[1] !== GZIP_MAGIC[1]) {
        throw new GzipFormatError('gzip decompress failed: not a gzip member (bad magic)');
    }

    let raw: Buffer;
    try {
        // zlib takes no limit below 1; a 0 limit is checked on the result
        raw = Number.isFinite(limit)
            ? gunzipSync(compressed, { maxOutputLength: Math.max(limit, 1) })
            : gunzipSync(compressed);
    } catch (e) {
        if (isBufferTooLargeError(e)) {
            throw limitExceeded(limit);
        }
        if (isZlibError(e)) {
            throw new GzipFormatError(`gzip decompress failed: ${e.message}`, e);
        }
        throw e;
    }
    if (raw.length > limit) {
        throw limitExceeded(limit);
    }
    return raw;
}

/**
 * Decodes an envelope back to the bytes it wraps.
 *
 * Surrounding whitespace is trimmed and line breaks inside the text are
 * ignored. Throws Base64FormatError for anything outside the standard
 * alphabet or malformed padding, GzipFormatError when the decoded bytes are
 * not one well-formed gzip member.
 */
export function decodeEnvelope(input: string | Uint8Array, options: EnvelopeDecodeOptions = {}): Uint8Array {
    resolveMaxOutputLength(options.maxOutputLength);
    const text = stripWhitespace(envelopeText(input));
    const compressed = decodeBase64(text);
    const raw = gunzipEnvelopeBytes(compressed, options);
    options.logger?.info?.(`[envelope] decoded ${text.length} chars -> ${raw.length} bytes`);
    return raw;
}

export function encodeEnvelope(input: Uint8Array): string {
    return encodeBase64(gzipSync(input));
}
