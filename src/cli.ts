/**
 * CLI: envelope decoder/encoder
 *
 * Usage:  savetab [input] [--infile F] [-o F] [-e ENC] [--stream] [--encode] [--self-test]
 *
 * Decodes base64+gzip text to raw bytes (default) or encodes bytes into an
 * envelope (--encode). Input comes from the positional argument, --infile, or
 * stdin; output goes to --output or stdout.
 */
import { createReadStream, createWriteStream } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { PassThrough, type Readable, type Writable } from 'node:stream';
import { decodeEnvelope, encodeEnvelope } from './envelope/codec.js';
import { streamDecode, streamEncode, type ChunkSource } from './envelope/stream.js';
import { decodeUtf8 } from './save-file.js';

export interface CliIO {
    stdin: Readable;
    stdout: Writable;
    stderr: Writable;
}

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_SELF_TEST_FAILED = 2;
export const EXIT_ERROR = 3;
export const EXIT_TEXT_DECODE_FAILED = 4;
export const EXIT_STREAM_SELF_TEST_FAILED = 5;
export const EXIT_STREAM_ROUNDTRIP_FAILED = 6;

export interface CliArgs {
    input: string | null;
    infile: string | null;
    output: string | null;
    encoding: string | null;
    stream: boolean;
    encode: boolean;
    selfTest: boolean;
    help: boolean;
}

const USAGE = `Usage: savetab [input] [options]

Decode base64 + gzip data (or encode with --encode).

  input               base64 string to decode; if omitted read --infile or stdin
  --infile <path>     read input from a file
  -o, --output <path> write output to a file instead of stdout
  -e, --encoding <e>  decode output bytes to text with this encoding (e.g. utf-8)
  --stream            use the streaming codec (bounded memory)
  --encode            gzip then base64-encode the input (reverse operation)
  --self-test         run built-in round trips
  -h, --help          show this help
`;

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        input: null,
        infile: null,
        output: null,
        encoding: null,
        stream: false,
        encode: false,
        selfTest: false,
        help: false,
    };

    const valueOf = (i: number, flag: string): string => {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
            throw new CliUsageError(`${flag} requires a value`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--infile':
                args.infile = valueOf(i++, arg);
                break;
            case '-o':
            case '--output':
                args.output = valueOf(i++, arg);
                break;
            case '-e':
            case '--encoding':
                args.encoding = valueOf(i++, arg);
                break;
            case '--stream':
                args.stream = true;
                break;
            case '--encode':
                args.encode = true;
                break;
            case '--self-test':
                args.selfTest = true;
                break;
            case '-h':
            case '--help':
                args.help = true;
                break;
            default:
                if (arg.startsWith('-')) throw new CliUsageError(`Unknown option: ${arg}`);
                if (args.input !== null) throw new CliUsageError(`Unexpected argument: ${arg}`);
                args.input = arg;
        }
    }
    return args;
}

async function readAll(source: ChunkSource): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of source) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
}

function write(sink: Writable, data: string | Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
        sink.write(data, (err) => (err ? reject(err) : resolve()));
    });
}

function inputSource(args: CliArgs, io: CliIO): ChunkSource {
    if (args.infile !== null) return createReadStream(args.infile);
    if (args.input !== null) return [args.input];
    // Nothing is piped in on an interactive terminal: empty input
    if (isInteractive(io.stdin)) return [];
    return io.stdin;
}

function isInteractive(stream: Readable): boolean {
    return 'isTTY' in stream && stream.isTTY === true;
}

function outputSink(args: CliArgs, io: CliIO): Writable {
    return args.output !== null ? createWriteStream(args.output) : io.stdout;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
    return Buffer.compare(Buffer.from(a), Buffer.from(b)) === 0;
}

async function collect(run: (sink: Writable) => Promise<unknown>): Promise<Buffer> {
    const sink = new PassThrough();
    const [collected] = await Promise.all([readAll(sink), run(sink)]);
    return collected;
}

/** Whole-buffer round trip, a ~100KB streaming decode, and a streaming encode→decode. */
export async function runSelfTest(io: CliIO): Promise<number> {
    const say = (line: string) => write(io.stdout, `${line}\n`);

    const original = Buffer.from('Hello from savetab self-test\n', 'utf8');
    if (!sameBytes(decodeEnvelope(encodeEnvelope(original)), original)) {
        await say('self-test: FAILED');
        return EXIT_SELF_TEST_FAILED;
    }
    await say('self-test: OK');

    const big = Buffer.from('The quick brown fox jumps over the lazy dog. '.repeat(2500)).subarray(0, 100_000);
    const decoded = await collect((sink) => streamDecode([encodeEnvelope(big)], sink));
    if (!sameBytes(decoded, big)) {
        await write(io.stderr, 'stream self-test: FAILED\n');
        return EXIT_STREAM_SELF_TEST_FAILED;
    }
    await say('stream self-test: OK');

    const big2 = Buffer.alloc(200_000, 'A');
    const envelope = await collect((sink) => streamEncode([big2], sink));
    const roundTrip = await collect((sink) => streamDecode([envelope], sink));
    if (!sameBytes(roundTrip, big2)) {
        await write(io.stderr, 'encode->decode stream self-test: FAILED\n');
        return EXIT_STREAM_ROUNDTRIP_FAILED;
    }
    await say('encode->decode stream self-test: OK');
    return EXIT_OK;
}

function bytesToText(bytes: Uint8Array, encoding: string): string {
    const normalized = encoding.toLowerCase();
    if (normalized === 'utf-8' || normalized === 'utf8') {
        return decodeUtf8(bytes);
    }
    if (!Buffer.isEncoding(normalized)) {
        throw new Error(`unknown encoding: ${encoding}`);
    }
    return Buffer.from(bytes).toString(normalized);
}

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (e) {
        await write(io.stderr, `${e instanceof Error ? e.message : String(e)}\n${USAGE}`);
        return EXIT_USAGE;
    }

    if (args.help) {
        await write(io.stdout, USAGE);
        return EXIT_OK;
    }
    if (args.selfTest) {
        return runSelfTest(io);
    }

    try {
        if (args.encode) {
            if (args.stream) {
                await streamEncode(inputSource(args, io), outputSink(args, io));
                return EXIT_OK;
            }
            const data = args.infile !== null ? await readFile(args.infile) : await readAll(inputSource(args, io));
            const envelope = encodeEnvelope(data);
            if (args.output !== null) {
                await writeFile(args.output, envelope, 'ascii');
            } else {
                await write(io.stdout, envelope);
            }
            return EXIT_OK;
        }

        if (args.stream) {
            await streamDecode(inputSource(args, io), outputSink(args, io));
            return EXIT_OK;
        }

        const result = decodeEnvelope(await readAll(inputSource(args, io)));
        if (args.output !== null) {
            await writeFile(args.output, result);
        } else if (args.encoding !== null) {
            let text: string;
            try {
                text = bytesToText(result, args.encoding);
            } catch (e) {
                await write(io.stderr, `decode to text failed: ${e instanceof Error ? e.message : String(e)}\n`);
                return EXIT_TEXT_DECODE_FAILED;
            }
            await write(io.stdout, text);
        } else {
            await write(io.stdout, result);
        }
        return EXIT_OK;
    } catch (e) {
        await write(io.stderr, `Error: ${e instanceof Error ? e.message : String(e)}\n`);
        return EXIT_ERROR;
    }
}
