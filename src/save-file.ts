/**
 * Load/save helpers for callers that hold a whole save in memory: an editor
 * reads an envelope into tables, lets the user change cells, and writes the
 * tables back. No file I/O happens here.
 */
import { Utf8FormatError } from './errors.js';
import { decodeEnvelope, encodeEnvelope } from './envelope/codec.js';
import { formatTables } from './tables/format.js';
import { parseTables } from './tables/parse.js';
import type { HeaderOrder, ParsedTables, TableSet } from './tables/types.js';
import type { LoadSaveOptions, TableParseOptions } from './types.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

export function decodeUtf8(bytes: Uint8Array): string {
    try {
        return utf8Decoder.decode(bytes);
    } catch (e) {
        throw new Utf8FormatError('Save plaintext is not valid UTF-8', e);
    }
}

export function loadSave(envelope: string | Uint8Array, options: LoadSaveOptions = {}): ParsedTables {
    const plaintext = decodeUtf8(decodeEnvelope(envelope, options));
    return parseTables(plaintext, options);
}

/** For saves already exported as plaintext. */
export function loadPlaintext(plaintext: string, options: TableParseOptions = {}): ParsedTables {
    return parseTables(plaintext, options);
}

export function saveToEnvelope(tables: TableSet, headerOrder?: HeaderOrder): string {
    return encodeEnvelope(utf8Encoder.encode(formatTables(tables, headerOrder)));
}

export function savePlaintext(tables: TableSet, headerOrder?: HeaderOrder): string {
    return formatTables(tables, headerOrder);
}
