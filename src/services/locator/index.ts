import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CellPair, CellValue, ColumnSelection, Grid, GridRow } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { toMonetary } from '../conversion/index.js';
import type { GridSide, RowAlignment } from './types.js';

export type { GridSide, RowAlignment } from './types.js';

const log = logger.child({ module: 'locator' });

export function readCell(row: GridRow | undefined, column: string): CellValue {
  if (row === undefined || !Object.hasOwn(row, column)) return null;
  return row[column] ?? null;
}

function hasNumericCell(grid: Grid, column: string): boolean {
  return grid.rows.some((row) => toMonetary(readCell(row, column), 'BGN').ok);
}

export function resolveColumns(
  source: Grid,
  target: Grid,
  selection: ColumnSelection,
): Result<string[], AppError> {
  if (selection.mode === 'all') {
    const numeric = source.columns.filter((column) => hasNumericCell(source, column));
    const absent = numeric.filter((column) => !target.columns.includes(column));

    if (absent.length > 0) {
      log.warn({ columns: absent }, 'Numeric source columns missing from target');
    }

    log.debug({ columns: numeric }, 'Inferred numeric columns');
    return ok(numeric);
  }

  const requested = [...new Set(selection.columns)];
  if (requested.length === 0) {
    return err(createAppError(ErrorCode.EMPTY_COLUMN_SELECTION, 'Select at least one column to verify', false));
  }

  const grids: Array<[GridSide, Grid]> = [['source', source], ['target', target]];
  for (const column of requested) {
    for (const [side, grid] of grids) {
      if (!grid.columns.includes(column)) {
        log.error({ errorCode: ErrorCode.UNKNOWN_COLUMN, column, side }, 'Selected column not found');
        return err(
          createAppError(
            ErrorCode.UNKNOWN_COLUMN,
            `Column '${column}' not found in ${side} report`,
            false,
            `Available ${side} columns: ${grid.columns.join(', ')}`,
          ),
        );
      }
    }
  }

  return ok(requested);
}

export function alignRows(source: Grid, target: Grid): RowAlignment {
  const sourceRowCount = source.rows.length;
  const targetRowCount = target.rows.length;
  const overlap = Math.min(sourceRowCount, targetRowCount);

  return {
    rowIndices: Array.from({ length: overlap }, (_, i) => i),
    sourceRowCount,
    targetRowCount,
  };
}

export function* producePairs(
  source: Grid,
  target: Grid,
  columns: readonly string[],
  alignment: RowAlignment,
): Generator<CellPair> {
  for (const rowIndex of alignment.rowIndices) {
    const sourceRow = source.rows[rowIndex];
    const targetRow = target.rows[rowIndex];

    for (const column of columns) {
      yield {
        rowIndex,
        column,
        sourceRaw: readCell(sourceRow, column),
        targetRaw: readCell(targetRow, column),
      };
    }
  }
}

/** Columns of `source`, in source order, that `target` also has. */
export function commonColumns(source: Grid, target: Grid): string[] {
  return source.columns.filter((column) => target.columns.includes(column));
}
