/**
 * Envelope codec, streaming mode.
 *
 * Memory stays proportional to the chunk size: the base64 stages carry at
 * most one partial group between chunks (< 4 characters when decoding,
 * < 3 bytes when encoding) and node:zlib keeps its own bounded window.
 *
 *   decode: source → slice(chunkSize) → Base64DecodeStream → gunzip → sink
 *   encode: source → slice(chunkSize) → gzip → Base64EncodeStream → sink
 *
 * Output is byte-identical to the whole-buffer codec for any chunk size.
 */
import { Transform, type TransformCallback, type TransformOptions, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';
import { BASE64_GROUP_BYTES, BASE64_GROUP_CHARS, DEFAULT_CHUNK_SIZE } from '../constants.js';
import { Base64FormatError, GzipFormatError, LimitExceededError, SaveTabError, isZlibError } from '../errors.js';
import type { EnvelopeStreamOptions, EnvelopeStreamStats, SaveTabLogger } from '../types.js';
import { alignedLength, encodeBase64, stripWhitespace, validateGroups } from './base64.js';
import { resolveMaxOutputLength } from './codec.js';

export type ChunkSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

type ResolvedStreamOptions = {
    chunkSize: number;
    maxOutputLength: number;
    logger: SaveTabLogger | null;
};

function resolveStreamOptions(options: EnvelopeStreamOptions): ResolvedStreamOptions {
    const resolved: ResolvedStreamOptions = {
        chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        maxOutputLength: resolveMaxOutputLength(options.maxOutputLength),
        logger: options.logger ?? null,
    };
    if (!Number.isInteger(resolved.chunkSize) || resolved.chunkSize < 1) {
        throw new RangeError(`chunkSize must be a positive integer, got ${resolved.chunkSize}`);
    }
    return resolved;
}

function toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
}

/**
 * Base64 text in, decoded bytes out. Whitespace is dropped, every complete
 * 4-character group is validated and decoded as soon as it arrives, and the
 * 1–3 leftover characters wait for the next chunk.
 */
export class Base64DecodeStream extends Transform {
    private pending = '';
    private consumed = 0;
    private padded = false;
    private decodedBytes = 0;

    constructor(options: TransformOptions = {}) {
        super(options);
    }

    get bytesDecoded(): number {
        return this.decodedBytes;
    }

    _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
        try {
            const text = typeof chunk === 'string' ? chunk : chunk.toString('latin1');
            this.pending += stripWhitespace(text);

            const n = alignedLength(this.pending.length, BASE64_GROUP_CHARS);
            if (n > 0) {
                this.decodeGroups(this.pending.slice(0, n));
                this.pending = this.pending.slice(n);
            }
            callback();
        } catch (e) {
            callback(toError(e));
        }
    }

    _flush(callback: TransformCallback): void {
        if (this.pending.length > 0) {
            callback(new Base64FormatError(
                `Invalid base64 length: ${this.consumed + this.pending.length} is not a multiple of ${BASE64_GROUP_CHARS}`
            ));
            return;
        }
        callback();
    }

    private decodeGroups(groups: string): void {
        if (this.padded) {
            throw new Base64FormatError(`Invalid base64 padding at offset ${this.consumed}: data follows '='`);
        }
        this.padded = validateGroups(groups, this.consumed);
        this.consumed += groups.length;

        const bytes = Buffer.from(groups, 'base64');
        this.decodedBytes += bytes.length;
        this.push(bytes);
    }
}

/**
 * Bytes in, base64 text out. Only whole 3-byte groups are encoded until the
 * input ends, so no `=` appears before the final group.
 */
export class Base64EncodeStream extends Transform {
    private pending: Buffer = Buffer.alloc(0);

    constructor(options: TransformOptions = {}) {
        super(options);
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        const buf = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
        const n = alignedLength(buf.length, BASE64_GROUP_BYTES);
        if (n > 0) {
            this.push(encodeBase64(buf.subarray(0, n)), 'ascii');
        }
        // Copy so the tail does not pin the whole chunk
        this.pending = Buffer.from(buf.subarray(n));
        callback();
    }

    _flush(callback: TransformCallback): void {
        if (this.pending.length > 0) {
            this.push(encodeBase64(this.pending), 'ascii');
            this.pending = Buffer.alloc(0);
        }
        callback();
    }
}

/** Counts bytes on their way to the sink and enforces the output limit. */
class ByteMeter extends Transform {
    bytes = 0;

    constructor(private readonly limit: number) {
        super();
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.bytes += chunk.length;
        if (this.bytes > this.limit) {
            callback(new LimitExceededError(`Decompressed size limit exceeded (${this.bytes} > ${this.limit})`));
            return;
        }
        callback(null, chunk);
    }
}

async function* sliceChunks(source: ChunkSource, chunkSize: number, stats: EnvelopeStreamStats): AsyncGenerator<Buffer> {
    for await (const chunk of source) {
        let buf: Buffer;
        if (typeof chunk === 'string') {
            buf = Buffer.from(chunk, 'utf8');
        } else if (chunk instanceof Uint8Array) {
            buf = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
        } else {
            throw new TypeError(`Unsupported chunk type: ${typeof chunk}`);
        }

        stats.bytesIn += buf.length;
        for (let i = 0; i < buf.length; i += chunkSize) {
            stats.chunks++;
            yield buf.subarray(i, i + chunkSize);
        }
    }
}

function mapStreamError(e: unknown, direction: 'decode' | 'encode'): unknown {
    if (e instanceof SaveTabError) return e;
    if (isZlibError(e)) {
        return new GzipFormatError(`gzip ${direction === 'decode' ? 'decompress' : 'compress'} failed during stream: ${e.message}`, e);
    }
    return e;
}

/**
 * Streams an envelope from `source` into raw bytes on `sink`.
 * The sink is ended once the envelope is complete.
 */
export async function streamDecode(
    source: ChunkSource,
    sink: Writable,
    options: EnvelopeStreamOptions = {}
): Promise<EnvelopeStreamStats> {
    const opts = resolveStreamOptions(options);
    const stats: EnvelopeStreamStats = { bytesIn: 0, bytesOut: 0, chunks: 0 };
    const decoder = new Base64DecodeStream();
    const meter = new ByteMeter(opts.maxOutputLength);

    try {
        await pipeline(sliceChunks(source, opts.chunkSize, stats), decoder, createGunzip(), meter, sink);
    } catch (e) {
        throw mapStreamError(e, 'decode');
    }

    if (decoder.bytesDecoded === 0) {
        throw new GzipFormatError('gzip decompress failed during stream: empty input');
    }

    stats.bytesOut = meter.bytes;
    opts.logger?.info?.(`[envelope] stream decode: ${stats.bytesIn} bytes in, ${stats.bytesOut} bytes out, ${stats.chunks} chunks`);
    return stats;
}

/**
 * Streams raw bytes from `source` into envelope text on `sink`.
 * The sink is ended once the final base64 group is written.
 */
export async function streamEncode(
    source: ChunkSource,
    sink: Writable,
    options: EnvelopeStreamOptions = {}
): Promise<EnvelopeStreamStats> {
    const opts = resolveStreamOptions(options);
    const stats: EnvelopeStreamStats = { bytesIn: 0, bytesOut: 0, chunks: 0 };
    const meter = new ByteMeter(Number.POSITIVE_INFINITY);

    try {
        await pipeline(sliceChunks(source, opts.chunkSize, stats), createGzip(), new Base64EncodeStream(), meter, sink);
    } catch (e) {
        throw mapStreamError(e, 'encode');
    }

    stats.bytesOut = meter.bytes;
    opts.logger?.info?.(`[envelope] stream encode: ${stats.bytesIn} bytes in, ${stats.bytesOut} bytes out, ${stats.chunks} chunks`);
    return stats;
}
