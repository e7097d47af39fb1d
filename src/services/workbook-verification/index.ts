import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { Grid } from '../../domain/types.js';
import { readWorkbookGrid } from '../../infrastructure/workbook-reader.js';
import { commonColumns } from '../locator/index.js';
import { verify, type VerificationReport } from '../verification/index.js';
import type { VerifyWorkbooksInput, WorkbookColumns, WorkbookPairInput } from './types.js';

export type { VerifyWorkbooksInput, WorkbookColumns, WorkbookPairInput } from './types.js';

function readPair(input: WorkbookPairInput): Result<{ source: Grid; target: Grid }, AppError> {
  const source = readWorkbookGrid(input.source, { sheet: input.sourceSheet, workbookName: input.sourceName });
  if (!source.ok) return source;

  const target = readWorkbookGrid(input.target, { sheet: input.targetSheet, workbookName: input.targetName });
  if (!target.ok) return target;

  return ok({ source: source.value, target: target.value });
}

export function verifyWorkbooks(input: VerifyWorkbooksInput): Result<VerificationReport, AppError> {
  const grids = readPair(input);
  if (!grids.ok) return grids;

  return verify(grids.value.source, grids.value.target, input.columns, {
    runId: input.runId,
    sourceName: input.sourceName,
    targetName: input.targetName,
  });
}

export function listWorkbookColumns(input: WorkbookPairInput): Result<WorkbookColumns, AppError> {
  const grids = readPair(input);
  if (!grids.ok) return grids;

  const { source, target } = grids.value;
  return ok({
    sourceColumns: [...source.columns],
    targetColumns: [...target.columns],
    commonColumns: commonColumns(source, target),
  });
}
