export const ErrorCode = {
  // Column selection
  UNKNOWN_COLUMN: 'UNKNOWN_COLUMN',
  EMPTY_COLUMN_SELECTION: 'EMPTY_COLUMN_SELECTION',
  DUPLICATE_COLUMN: 'DUPLICATE_COLUMN',

  // Cell values
  NON_NUMERIC_VALUE: 'NON_NUMERIC_VALUE',

  // Workbooks
  WORKBOOK_PARSE_FAILED: 'WORKBOOK_PARSE_FAILED',
  WORKBOOK_TOO_LARGE: 'WORKBOOK_TOO_LARGE',
  SHEET_NOT_FOUND: 'SHEET_NOT_FOUND',

  // Requests
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}
