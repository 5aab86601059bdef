export type IntegerCell = { readonly type: 'integer'; readonly value: bigint };
export type FloatCell = { readonly type: 'float'; readonly value: number };
export type TextCell = { readonly type: 'text'; readonly value: string };

/** One typed scalar at a row/column position. There is no null, boolean or date cell. */
export type Cell = IntegerCell | FloatCell | TextCell;

export type CellType = Cell['type'];

/** Column name → cell. Emission order comes from the header order, not from the Map. */
export type Row = Map<string, Cell>;

/** Table name → rows. Insertion order is the order tables are written back. */
export type TableSet = Map<string, Row[]>;

/** Table name → column names as captured from the table's header line. */
export type HeaderOrder = Map<string, readonly string[]>;

export interface ParsedTables {
    tables: TableSet;
    headerOrder: HeaderOrder;
}

export type TableIssue =
    | { kind: 'missing-table'; table: string }
    | { kind: 'dropped-column'; table: string; row: number; column: string }
    | { kind: 'unrenderable-cell'; table: string; row: number; column: string; reason: string }
    | { kind: 'type-change'; table: string; row: number; column: string; from: CellType; to: CellType };
