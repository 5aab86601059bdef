import { TableStructureError } from '../errors.js';
import type { Cell, FloatCell, IntegerCell, TextCell } from './types.js';

const FLOAT_PATTERN = /^-?(?:[0-9]+\.[0-9]*|\.[0-9]+)$/;
const INTEGER_PATTERN = /^-?[0-9]+$/;

export function integerCell(value: bigint | number): IntegerCell {
    return { type: 'integer', value: BigInt(value) };
}

export function floatCell(value: number): FloatCell {
    return { type: 'float', value };
}

export function textCell(value: string): TextCell {
    return { type: 'text', value };
}

/**
 * Schema-free inference, applied to each cell on its own:
 *   1. one `.` among digits, optional leading `-`  → float
 *   2. digits, optional leading `-`               → integer
 *   3. anything else, the empty string included   → text
 *
 * A float literal too large for a double stays text rather than becoming Infinity.
 */
export function inferCell(text: string): Cell {
    if (FLOAT_PATTERN.test(text)) {
        const value = Number(text);
        return Number.isFinite(value) ? floatCell(value) : textCell(text);
    }
    if (INTEGER_PATTERN.test(text)) {
        return integerCell(BigInt(text));
    }
    return textCell(text);
}

/** Rewrites `<mantissa>e<exponent>` in plain positional notation. */
function expandExponent(mantissa: string, exponent: number): string {
    const negative = mantissa.startsWith('-');
    const unsigned = negative ? mantissa.slice(1) : mantissa;
    const dot = unsigned.indexOf('.');
    const digits = dot === -1 ? unsigned : unsigned.slice(0, dot) + unsigned.slice(dot + 1);
    const pointAt = (dot === -1 ? unsigned.length : dot) + exponent;

    let out: string;
    if (pointAt <= 0) {
        out = `0.${'0'.repeat(-pointAt)}${digits}`;
    } else if (pointAt >= digits.length) {
        out = `${digits}${'0'.repeat(pointAt - digits.length)}.0`;
    } else {
        out = `${digits.slice(0, pointAt)}.${digits.slice(pointAt)}`;
    }
    return negative ? `-${out}` : out;
}

/**
 * Shortest text that reads back as the same double and still infers as a
 * float: always a `.`, never an exponent.
 */
export function renderFloat(value: number): string {
    if (!Number.isFinite(value)) {
        throw new TableStructureError(`Cannot write non-finite float ${value}`);
    }
    if (Object.is(value, -0)) return '-0.0';

    const s = String(value);
    const e = s.indexOf('e');
    if (e === -1) {
        return s.includes('.') ? s : `${s}.0`;
    }
    return expandExponent(s.slice(0, e), Number(s.slice(e + 1)));
}

export function renderCell(cell: Cell): string {
    switch (cell.type) {
        case 'integer':
            return cell.value.toString();
        case 'float':
            return renderFloat(cell.value);
        case 'text':
            return cell.value;
    }
}

export function cellToPrimitive(cell: Cell): bigint | number | string {
    return cell.value;
}
