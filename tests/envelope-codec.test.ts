import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import { decodeEnvelope, encodeEnvelope } from '../src/envelope/codec.js';
import {
    Base64FormatError,
    FormatError,
    GzipFormatError,
    LimitExceededError,
} from '../src/errors.js';
import { hex, noiseBytes, recordingLogger } from './helpers/test-utils.js';

function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}

describe('Envelope codec (whole-buffer)', () => {

    describe('round-trip', () => {
        const payloads: Array<[string, Buffer]> = [
            ['empty', Buffer.alloc(0)],
            ['short text', Buffer.from('Hello from test\n', 'utf8')],
            ['single byte', Buffer.from([0x00])],
            ['binary noise', noiseBytes(4096)],
            ['repetitive 100KB', Buffer.from('The quick brown fox jumps over the lazy dog. '.repeat(2500)).subarray(0, 100_000)],
        ];

        for (const [label, payload] of payloads) {
            it(`decode(encode(x)) == x for ${label}`, () => {
                expect(hex(decodeEnvelope(encodeEnvelope(payload)))).toBe(hex(payload));
            });
        }

        it('returns the exact bytes of "Hello from test\\n"', () => {
            const out = decodeEnvelope(encodeEnvelope(Buffer.from('Hello from test\n')));
            expect(Buffer.from(out).toString('utf8')).toBe('Hello from test\n');
        });
    });

    describe('encode()', () => {
        it('emits standard padded base64 with no line breaks', () => {
            const text = encodeEnvelope(noiseBytes(3000));
            expect(text).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
            expect(text.length % 4).toBe(0);
        });

        it('wraps a gzip member', () => {
            const text = encodeEnvelope(Buffer.from('abc'));
            // 1f 8b 08 → "H4sI"
            expect(text.startsWith('H4sI')).toBe(true);
        });

        it('matches base64 of gzipSync at the default level', () => {
            const payload = Buffer.from('###Savegame\nName\tMoney\nAlice\t500\n\n');
            expect(encodeEnvelope(payload)).toBe(gzipSync(payload).toString('base64'));
        });
    });

    describe('decode() input handling', () => {
        const payload = Buffer.from('tab\tseparated\nlines\n');
        const envelope = encodeEnvelope(payload);

        it('trims surrounding whitespace', () => {
            expect(hex(decodeEnvelope(`  \n${envelope}\r\n`))).toBe(hex(payload));
        });

        it('ignores line breaks inside wrapped base64', () => {
            const wrapped = envelope.match(/.{1,8}/g)?.join('\n') ?? '';
            expect(wrapped).toContain('\n');
            expect(hex(decodeEnvelope(wrapped))).toBe(hex(payload));
        });

        it('accepts the envelope as ASCII bytes', () => {
            expect(hex(decodeEnvelope(Buffer.from(envelope, 'ascii')))).toBe(hex(payload));
        });

        it('ignores trailing zero padding after the gzip member', () => {
            const padded = Buffer.concat([gzipSync(payload), Buffer.alloc(4)]).toString('base64');
            expect(hex(decodeEnvelope(padded))).toBe(hex(payload));
        });
    });

    describe('base64 errors', () => {
        it('rejects "not-valid-base64!!" as a base64 FormatError', () => {
            const err = thrownBy(() => decodeEnvelope('not-valid-base64!!'));
            expect(err).toBeInstanceOf(FormatError);
            expect(err).toBeInstanceOf(Base64FormatError);
            expect(err).toMatchObject({ stage: 'base64', name: 'Base64FormatError' });
        });

        it('names the offending character and offset', () => {
            expect(() => decodeEnvelope('QUFB-UFB')).toThrow("Invalid base64 character '-' at offset 4");
        });

        it('rejects a length that is not a whole number of groups', () => {
            expect(() => decodeEnvelope('QUFBQ')).toThrow('Invalid base64 length: 5 is not a multiple of 4');
        });

        it('rejects malformed padding', () => {
            expect(() => decodeEnvelope('QQ=A')).toThrow(Base64FormatError);
            expect(() => decodeEnvelope('Q===')).toThrow(Base64FormatError);
        });

        it('rejects data after a padded group', () => {
            expect(() => decodeEnvelope('QQ==QUFB')).toThrow("Invalid base64 padding at offset 2: data follows '='");
        });

        it('rejects non-ASCII bytes', () => {
            const bytes = Buffer.concat([Buffer.from('QUF'), Buffer.from([0xc2])]);
            expect(() => decodeEnvelope(bytes)).toThrow('Invalid base64 character 0xc2 at offset 3');
        });
    });

    describe('gzip errors', () => {
        it('rejects base64 that does not wrap gzip', () => {
            const err = thrownBy(() => decodeEnvelope(Buffer.from('hello world').toString('base64')));
            expect(err).toBeInstanceOf(GzipFormatError);
            expect(err).toMatchObject({ stage: 'gzip' });
        });

        it('rejects an empty envelope', () => {
            expect(() => decodeEnvelope('')).toThrow(GzipFormatError);
            expect(() => decodeEnvelope('  \n ')).toThrow('gzip decompress failed: empty input');
        });

        it('rejects a truncated member', () => {
            const gz = gzipSync(noiseBytes(1000));
            const truncated = gz.subarray(0, gz.length - 10).toString('base64');
            expect(() => decodeEnvelope(truncated)).toThrow(GzipFormatError);
        });

        it('rejects a corrupt CRC and keeps the zlib error', () => {
            const gz = Buffer.from(gzipSync(Buffer.from('checksummed payload')));
            gz[gz.length - 8] ^= 0xff;
            const err = thrownBy(() => decodeEnvelope(gz.toString('base64')));
            expect(err).toBeInstanceOf(GzipFormatError);
            expect(err).toMatchObject({ originalError: expect.objectContaining({ code: 'Z_DATA_ERROR' }) });
        });
    });

    describe('options', () => {
        const envelope = encodeEnvelope(Buffer.alloc(10_000, 'A'));

        it('enforces maxOutputLength', () => {
            expect(() => decodeEnvelope(envelope, { maxOutputLength: 100 })).toThrow(LimitExceededError);
        });

        it('decodes when the output fits the limit', () => {
            expect(decodeEnvelope(envelope, { maxOutputLength: 20_000 }).length).toBe(10_000);
        });

        it('allows output of exactly the limit', () => {
            expect(decodeEnvelope(envelope, { maxOutputLength: 10_000 }).length).toBe(10_000);
            expect(() => decodeEnvelope(envelope, { maxOutputLength: 9_999 })).toThrow(LimitExceededError);
        });

        it('treats a zero limit as "empty payloads only"', () => {
            expect(decodeEnvelope(encodeEnvelope(Buffer.alloc(0)), { maxOutputLength: 0 }).length).toBe(0);
            expect(() => decodeEnvelope(encodeEnvelope(Buffer.from('x')), { maxOutputLength: 0 }))
                .toThrow('Decompressed size limit exceeded (limit: 0)');
        });

        it('rejects a negative or fractional limit', () => {
            expect(() => decodeEnvelope(envelope, { maxOutputLength: -1 }))
                .toThrow(new RangeError('maxOutputLength must be a non-negative integer, got -1'));
            expect(() => decodeEnvelope(envelope, { maxOutputLength: 1.5 }))
                .toThrow('maxOutputLength must be a non-negative integer, got 1.5');
            expect(() => decodeEnvelope('not-valid-base64!!', { maxOutputLength: Number.NaN })).toThrow(RangeError);
        });

        it('reports through the logger hook', () => {
            const logger = recordingLogger();
            const small = encodeEnvelope(Buffer.from('Hello from test\n'));
            decodeEnvelope(small, { logger });
            expect(logger.lines).toEqual([`info [envelope] decoded ${small.length} chars -> 16 bytes`]);
        });
    });
});
