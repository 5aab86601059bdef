import { COLUMN_SEPARATOR, ROW_SEPARATOR, TABLE_MARKER } from '../constants.js';
import { TableStructureError } from '../errors.js';
import type { LongRowPolicy, SaveTabLogger, TableParseOptions } from '../types.js';
import { inferCell } from './cell.js';
import type { HeaderOrder, ParsedTables, Row, TableSet } from './types.js';

/**
 * Parses save plaintext into typed tables plus the header order of each.
 *
 * Layout:
 *   ###<name>            opens a table
 *   col\tcol\t...        first line with more than one field: the header
 *   val\tval\t...        data rows, zipped against the header
 *   (blank lines)        skipped anywhere
 *
 * Lines before the first marker are ignored. Short rows are padded with empty
 * text cells; long rows follow `longRowPolicy`.
 */
export function parseTables(plaintext: string, options: TableParseOptions = {}): ParsedTables {
    const policy: LongRowPolicy = options.longRowPolicy ?? 'reject';
    const logger: SaveTabLogger | null = options.logger ?? null;

    const tables: TableSet = new Map();
    const headerOrder: HeaderOrder = new Map();

    let tableName = '';
    let rows: Row[] | null = null;
    let headers: readonly string[] | null = null;

    const lines = plaintext.split(ROW_SEPARATOR);
    for (let i = 0; i < lines.length; i++) {
        const lineNo = i + 1;
        const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
        // Blank or space-only lines are skipped; a line of tabs is a row of empty cells
        if (!line.includes(COLUMN_SEPARATOR) && line.trim().length === 0) continue;

        if (line.startsWith(TABLE_MARKER)) {
            tableName = line.slice(TABLE_MARKER.length);
            rows = [];
            tables.set(tableName, rows);
            headerOrder.delete(tableName);
            headers = null;
            continue;
        }

        if (rows === null) continue;

        let fields = line.split(COLUMN_SEPARATOR);

        if (headers === null) {
            if (fields.length > 1) {
                headers = fields;
                headerOrder.set(tableName, fields);
            } else {
                logger?.info?.(`[tables] ${tableName}: line ${lineNo} ignored, no header yet`);
            }
            continue;
        }

        if (fields.length > headers.length) {
            const detail = `table '${tableName}' line ${lineNo}: ${fields.length} fields, header has ${headers.length}`;
            if (policy === 'reject') {
                throw new TableStructureError(`Row longer than header in ${detail}`);
            }
            if (policy === 'skip') {
                logger?.warn?.(`[tables] skipped long row in ${detail}`);
                continue;
            }
            logger?.warn?.(`[tables] truncated long row in ${detail}`);
            fields = fields.slice(0, headers.length);
        }

        const row: Row = new Map();
        for (let c = 0; c < headers.length; c++) {
            row.set(headers[c], inferCell(c < fields.length ? fields[c] : ''));
        }
        rows.push(row);
    }

    return { tables, headerOrder };
}
