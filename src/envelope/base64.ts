import { BASE64_GROUP_BYTES, BASE64_GROUP_CHARS } from '../constants.js';
import { Base64FormatError } from '../errors.js';

const PAD = 0x3d; // '='

/** Standard alphabet lookup: char code → 6-bit value, -1 for anything else. */
const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
const DECODE_TABLE = new Int8Array(128).fill(-1);
for (let i = 0; i < ALPHABET.length; i++) {
    DECODE_TABLE[ALPHABET.charCodeAt(i)] = i;
}

const WHITESPACE = /[\t\n\v\f\r ]+/g;

export function stripWhitespace(text: string): string {
    return text.replace(WHITESPACE, '');
}

export function isBase64Char(code: number): boolean {
    return code < 128 && DECODE_TABLE[code] !== -1;
}

function describeChar(code: number): string {
    return code >= 0x20 && code < 0x7f ? `'${String.fromCharCode(code)}'` : `0x${code.toString(16).padStart(2, '0')}`;
}

/**
 * Checks that `groups` is a whole number of 4-character base64 groups with
 * padding only in the last one. `offset` is the position of `groups` in the
 * full (whitespace-free) input and only feeds error messages.
 *
 * Returns true when the last group is padded, i.e. the encoded data ends here.
 */
export function validateGroups(groups: string, offset: number = 0): boolean {
    if (groups.length % BASE64_GROUP_CHARS !== 0) {
        throw new Base64FormatError(
            `Invalid base64 length: ${offset + groups.length} is not a multiple of ${BASE64_GROUP_CHARS}`
        );
    }

    const last = groups.length - BASE64_GROUP_CHARS;
    for (let i = 0; i < groups.length; i++) {
        const code = groups.charCodeAt(i);
        if (isBase64Char(code)) continue;

        if (code === PAD && i >= last) {
            // Only "xx==" and "xxx=" are legal
            const posInGroup = i - last;
            const rest = groups.slice(i);
            if ((posInGroup === 2 && rest === '==') || (posInGroup === 3 && rest === '=')) {
                return true;
            }
            throw new Base64FormatError(`Invalid base64 padding at offset ${offset + i}`);
        }

        if (code === PAD) {
            throw new Base64FormatError(`Invalid base64 padding at offset ${offset + i}: data follows '='`);
        }
        throw new Base64FormatError(`Invalid base64 character ${describeChar(code)} at offset ${offset + i}`);
    }
    return false;
}

/**
 * Strict standard-alphabet decode. Node's own decoder skips characters it does
 * not understand, so the input is validated first.
 */
export function decodeBase64(text: string, offset: number = 0): Buffer {
    validateGroups(text, offset);
    return Buffer.from(text, 'base64');
}

/**
 * Standard alphabet with `=` padding, no line breaks.
 * `bytes.length` must be a multiple of 3 unless this is the final group.
 */
export function encodeBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/** Largest prefix length of `n` that is a whole number of groups of `size`. */
export function alignedLength(n: number, size: number = BASE64_GROUP_BYTES): number {
    return n - (n % size);
}
