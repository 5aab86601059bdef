// NOTE: Vitest globals are enabled (see vitest.config.ts).
import { cellToPrimitive, floatCell, inferCell, integerCell, renderCell, renderFloat, textCell } from '../src/tables/cell.js';
import { TableStructureError } from '../src/errors.js';

describe('inferCell()', () => {
    const cases: Array<[string, ReturnType<typeof inferCell>]> = [
        ['123', integerCell(123)],
        ['-45', integerCell(-45)],
        ['0', integerCell(0)],
        ['007', integerCell(7)],
        ['3.14', floatCell(3.14)],
        ['-0.5', floatCell(-0.5)],
        ['5.', floatCell(5)],
        ['.5', floatCell(0.5)],
        ['-.25', floatCell(-0.25)],
        ['abc', textCell('abc')],
        ['', textCell('')],
        ['12.3.4', textCell('12.3.4')],
        ['-', textCell('-')],
        ['.', textCell('.')],
        ['-.', textCell('-.')],
        ['--5', textCell('--5')],
        ['+5', textCell('+5')],
        [' 5', textCell(' 5')],
        ['1e5', textCell('1e5')],
        ['1-2', textCell('1-2')],
        ['٣', textCell('٣')],
    ];

    for (const [input, expected] of cases) {
        it(`infers ${JSON.stringify(input)} as ${expected.type}`, () => {
            expect(inferCell(input)).toEqual(expected);
        });
    }

    it('keeps long digit runs exact', () => {
        expect(inferCell('123456789012345678901234567890')).toEqual({
            type: 'integer',
            value: 123456789012345678901234567890n,
        });
    });

    it('keeps a float literal beyond double range as text', () => {
        const huge = `${'9'.repeat(400)}.5`;
        expect(inferCell(huge)).toEqual(textCell(huge));
    });
});

describe('renderFloat()', () => {
    const cases: Array<[number, string]> = [
        [3.14, '3.14'],
        [-0.5, '-0.5'],
        [1, '1.0'],
        [-2, '-2.0'],
        [0, '0.0'],
        [-0, '-0.0'],
        [1e21, '1000000000000000000000.0'],
        [1.2345e25, '12345000000000000000000000.0'],
        [1.5e-7, '0.00000015'],
        [-2.5e-8, '-0.000000025'],
    ];

    for (const [value, text] of cases) {
        it(`renders ${String(value)} as ${text}`, () => {
            expect(renderFloat(value)).toBe(text);
        });
    }

    it('reads back as the same float', () => {
        for (const value of [3.14, 1, -0, 1e21, 1.5e-7, 0.1 + 0.2, Number.MAX_VALUE, Number.MIN_VALUE]) {
            expect(inferCell(renderFloat(value))).toEqual(floatCell(value));
        }
    });

    it('refuses non-finite values', () => {
        expect(() => renderFloat(Number.NaN)).toThrow(TableStructureError);
        expect(() => renderFloat(Number.POSITIVE_INFINITY)).toThrow('Cannot write non-finite float Infinity');
    });
});

describe('renderCell()', () => {
    it('renders each cell type', () => {
        expect(renderCell(integerCell(-45))).toBe('-45');
        expect(renderCell(integerCell(123456789012345678901234567890n))).toBe('123456789012345678901234567890');
        expect(renderCell(floatCell(500))).toBe('500.0');
        expect(renderCell(textCell('Alice'))).toBe('Alice');
        expect(renderCell(textCell(''))).toBe('');
    });

    it('exposes the raw value', () => {
        expect(cellToPrimitive(integerCell(500))).toBe(500n);
        expect(cellToPrimitive(floatCell(2.5))).toBe(2.5);
        expect(cellToPrimitive(textCell('x'))).toBe('x');
    });
});
