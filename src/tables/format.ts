import { COLUMN_SEPARATOR, ROW_SEPARATOR, TABLE_MARKER } from '../constants.js';
import { TableStructureError } from '../errors.js';
import { renderCell } from './cell.js';
import type { Cell, HeaderOrder, Row, TableSet } from './types.js';

const SEPARATOR_CHARS = /[\t\n\r]/;

/**
 * Column order used to write a table: the captured header if there is one,
 * else the key order of the first row.
 */
export function resolveColumns(table: string, rows: readonly Row[], headerOrder: HeaderOrder): readonly string[] {
    const captured = headerOrder.get(table);
    if (captured) return captured;
    return rows.length > 0 ? [...rows[0].keys()] : [];
}

/**
 * Why a value cannot be written so that it parses back the same, or null.
 * `leading` marks the first field of a line, where the table marker would
 * open a new table.
 */
export function fieldProblem(text: string, leading: boolean): string | null {
    if (SEPARATOR_CHARS.test(text)) return 'contains a tab or line break';
    if (leading && text.startsWith(TABLE_MARKER)) return `starts with '${TABLE_MARKER}'`;
    return null;
}

export function cellProblem(cell: Cell, leading: boolean): string | null {
    if (cell.type === 'float') {
        return Number.isFinite(cell.value) ? null : 'non-finite float';
    }
    return cell.type === 'text' ? fieldProblem(cell.value, leading) : null;
}

/**
 * Writes tables back to save plaintext, in the Map's order. Every table is
 * followed by a blank line; empty tables get only their marker. Missing
 * cells are written empty and keys outside the column order are not written.
 */
export function formatTables(tables: TableSet, headerOrder: HeaderOrder = new Map()): string {
    const out: string[] = [];

    for (const [name, rows] of tables) {
        const nameProblem = SEPARATOR_CHARS.test(name) ? 'contains a tab or line break' : null;
        if (nameProblem) {
            throw new TableStructureError(`Table name ${JSON.stringify(name)} ${nameProblem}`);
        }
        out.push(TABLE_MARKER + name + ROW_SEPARATOR);

        if (rows.length > 0) {
            const columns = resolveColumns(name, rows, headerOrder);
            columns.forEach((column, c) => {
                const problem = fieldProblem(column, c === 0);
                if (problem) {
                    throw new TableStructureError(`Column ${JSON.stringify(column)} of table '${name}' ${problem}`);
                }
            });
            out.push(columns.join(COLUMN_SEPARATOR) + ROW_SEPARATOR);

            rows.forEach((row, r) => {
                const fields = columns.map((column, c) => {
                    const cell = row.get(column);
                    if (!cell) return '';
                    const problem = cellProblem(cell, c === 0);
                    if (problem) {
                        throw new TableStructureError(`Cell '${column}' of row ${r} in table '${name}' ${problem}`);
                    }
                    return renderCell(cell);
                });
                out.push(fields.join(COLUMN_SEPARATOR) + ROW_SEPARATOR);
            });
        }

        out.push(ROW_SEPARATOR);
    }

    return out.join('');
}
