import * as XLSX from 'xlsx';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import type { CellValue, Grid, GridRow } from '../domain/types.js';
import { logger } from './logger.js';

export const MAX_WORKBOOK_SIZE_BYTES = 10 * 1024 * 1024; // 10MB

// .xlsx files are zip archives
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

export interface ReadWorkbookOptions {
  sheet?: string;
  /** Used in logs only. */
  workbookName?: string;
}

interface HeaderColumn {
  name: string;
  index: number;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function isBlankRow(row: GridRow, columns: readonly string[]): boolean {
  return columns.every((column) => {
    const value = row[column];
    return value === null || (typeof value === 'string' && value.trim() === '');
  });
}

export function readWorkbookGrid(
  input: Buffer | string,
  options: ReadWorkbookOptions = {},
): Result<Grid, AppError> {
  const log = logger.child({ step: 'reading_workbook', ...(options.workbookName !== undefined && { workbook: options.workbookName }) });
  const buffer = typeof input === 'string' ? Buffer.from(input, 'base64') : input;

  if (buffer.length > MAX_WORKBOOK_SIZE_BYTES) {
    log.error(
      { errorCode: ErrorCode.WORKBOOK_TOO_LARGE, retryable: false, sizeBytes: buffer.length },
      'Workbook exceeds size limit',
    );
    return err(
      createAppError(
        ErrorCode.WORKBOOK_TOO_LARGE,
        `Workbook size ${buffer.length} bytes exceeds ${MAX_WORKBOOK_SIZE_BYTES} byte limit`,
        false,
      ),
    );
  }

  if (!ZIP_SIGNATURE.every((byte, i) => buffer[i] === byte)) {
    log.error({ errorCode: ErrorCode.WORKBOOK_PARSE_FAILED, retryable: false }, 'Input is not an .xlsx workbook');
    return err(createAppError(ErrorCode.WORKBOOK_PARSE_FAILED, 'Input is not an .xlsx workbook', false));
  }

  let workbook: XLSX.WorkBook;
  try {
    // Date cells come back as Date objects, not serial numbers
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ errorCode: ErrorCode.WORKBOOK_PARSE_FAILED, retryable: false, details }, 'Failed to parse workbook');
    return err(createAppError(ErrorCode.WORKBOOK_PARSE_FAILED, 'Failed to parse workbook', false, details));
  }

  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (sheetName === undefined || sheet === undefined) {
    log.error({ errorCode: ErrorCode.SHEET_NOT_FOUND, sheet: sheetName }, 'Sheet not found');
    return err(
      createAppError(
        ErrorCode.SHEET_NOT_FOUND,
        sheetName === undefined ? 'Workbook has no sheets' : `Sheet '${sheetName}' not found`,
        false,
        `Available sheets: ${workbook.SheetNames.join(', ')}`,
      ),
    );
  }

  const ref = sheet['!ref'];
  if (ref === undefined) {
    log.info({ sheet: sheetName }, 'Sheet is empty');
    return ok({ columns: [], rows: [], firstRowNumber: 2 });
  }

  const range = XLSX.utils.decode_range(ref);
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });

  const headerCells = matrix[0] ?? [];
  const header: HeaderColumn[] = [];
  const seen = new Set<string>();

  for (const [index, cell] of headerCells.entries()) {
    const name = cell === null || cell === undefined ? '' : String(cell).trim();
    if (name === '') continue;

    if (seen.has(name)) {
      log.error({ errorCode: ErrorCode.DUPLICATE_COLUMN, sheet: sheetName, column: name }, 'Duplicate column header');
      return err(
        createAppError(
          ErrorCode.DUPLICATE_COLUMN,
          `Column '${name}' appears more than once in sheet '${sheetName}'`,
          false,
        ),
      );
    }
    seen.add(name);
    header.push({ name, index });
  }

  const columns = header.map((column) => column.name);
  const rows: GridRow[] = matrix.slice(1).map((cells) => {
    const row: Record<string, CellValue> = {};
    for (const column of header) {
      row[column.name] = toCellValue(cells[column.index]);
    }
    return row;
  });

  while (rows.length > 0 && isBlankRow(rows[rows.length - 1], columns)) {
    rows.pop();
  }

  log.info({ sheet: sheetName, columnCount: columns.length, rowCount: rows.length }, 'Workbook read');
  return ok({ columns, rows, firstRowNumber: range.s.r + 2 });
}
