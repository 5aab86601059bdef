import { DEFAULT_REQUIRED_TABLES } from '../constants.js';
import type { TableValidateOptions } from '../types.js';
import { inferCell } from './cell.js';
import { cellProblem, resolveColumns } from './format.js';
import type { HeaderOrder, TableIssue, TableSet } from './types.js';

/**
 * Reports what would go wrong on save without throwing: required tables that
 * are missing, row keys that formatTables would leave out, cells it would
 * reject, and text cells that would read back as a number. An empty list
 * means the set saves and reloads unchanged.
 */
export function validateTables(
    tables: TableSet,
    headerOrder: HeaderOrder = new Map(),
    options: TableValidateOptions = {}
): TableIssue[] {
    const issues: TableIssue[] = [];

    for (const table of options.requiredTables ?? DEFAULT_REQUIRED_TABLES) {
        if (!tables.has(table)) {
            issues.push({ kind: 'missing-table', table });
        }
    }

    for (const [table, rows] of tables) {
        if (rows.length === 0) continue;
        const columns = resolveColumns(table, rows, headerOrder);
        const positions = new Map(columns.map((column, c) => [column, c] as const));

        rows.forEach((row, r) => {
            for (const [column, cell] of row) {
                const position = positions.get(column);
                if (position === undefined) {
                    issues.push({ kind: 'dropped-column', table, row: r, column });
                    continue;
                }
                const reason = cellProblem(cell, position === 0);
                if (reason) {
                    issues.push({ kind: 'unrenderable-cell', table, row: r, column, reason });
                    continue;
                }
                // Integer and float cells always render back to their own type
                if (cell.type === 'text') {
                    const reread = inferCell(cell.value);
                    if (reread.type !== 'text') {
                        issues.push({ kind: 'type-change', table, row: r, column, from: 'text', to: reread.type });
                    }
                }
            }
        });
    }

    return issues;
}
