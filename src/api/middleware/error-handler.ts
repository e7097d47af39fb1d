import type { Request, Response, NextFunction } from 'express';
import type { ZodError } from 'zod';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

// body-parser marks its own failures (malformed JSON, payload too large) with a status
function hasClientStatus(value: unknown): value is Error & { status: number } {
  return (
    value instanceof Error &&
    'status' in value &&
    typeof value.status === 'number' &&
    value.status >= 400 &&
    value.status < 500
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.WORKBOOK_PARSE_FAILED:
    case ErrorCode.WORKBOOK_TOO_LARGE:
      return 400;

    case ErrorCode.SHEET_NOT_FOUND:
      return 404;

    case ErrorCode.UNKNOWN_COLUMN:
    case ErrorCode.EMPTY_COLUMN_SELECTION:
    case ErrorCode.DUPLICATE_COLUMN:
    case ErrorCode.VALIDATION_ERROR:
      return 422;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function sendValidationError(res: Response, error: ZodError): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid request body', details, false));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (hasClientStatus(err)) {
    logger.warn({ err: err.message, status: err.status }, 'Rejected request body');
    res.status(err.status).json(errorResponse('INVALID_REQUEST', err.message, undefined, false));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
