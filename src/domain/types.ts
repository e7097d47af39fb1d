export const CURRENCIES = ['BGN', 'EUR'] as const;

export type Currency = (typeof CURRENCIES)[number];

export type CellValue = string | number | boolean | null;

export type GridRow = Readonly<Record<string, CellValue>>;

/**
 * One report as a table of already-computed cell values.
 *
 * `columns` lists the column identifiers (header names) in sheet order and
 * must not repeat. Row order is significant: discrepancies are located by
 * position. `firstRowNumber` is the sheet row of `rows[0]` and defaults to 1.
 */
export interface Grid {
  columns: readonly string[];
  rows: readonly GridRow[];
  firstRowNumber?: number;
}

export type ColumnSelection =
  | { mode: 'all' }
  | { mode: 'explicit'; columns: readonly string[] };

export interface CellPair {
  rowIndex: number;
  column: string;
  sourceRaw: CellValue;
  targetRaw: CellValue;
}
