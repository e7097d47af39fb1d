import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { CellPair, ColumnSelection, Grid } from '../../domain/types.js';
import { createRunLogger, logger } from '../../infrastructure/logger.js';
import {
  createRateConverter,
  formatAmount,
  formatRaw,
  isEmptyCell,
  roundToCents,
  toMonetary,
  type RateConverter,
} from '../conversion/index.js';
import { alignRows, producePairs, resolveColumns } from '../locator/index.js';
import type { CellDiscrepancy, Discrepancy, VerificationReport, VerifyOptions } from './types.js';

export type {
  CellDiscrepancy,
  Discrepancy,
  NonNumericTarget,
  RowCountMismatch,
  TargetEmpty,
  ValueMismatch,
  VerificationReport,
  VerifyOptions,
} from './types.js';

const defaultConverter = createRateConverter();

type PairOutcome = { kind: 'skipped' } | { kind: 'match' } | { kind: 'discrepancy'; discrepancy: CellDiscrepancy };

export function checkPair(pair: CellPair, converter: RateConverter, firstRowNumber: number): PairOutcome {
  const source = toMonetary(pair.sourceRaw, 'BGN');
  if (!source.ok) return { kind: 'skipped' };

  const expected = converter.convertBgnToEur(source.value);
  const location = {
    rowIndex: pair.rowIndex,
    rowNumber: firstRowNumber + pair.rowIndex,
    column: pair.column,
    source: formatRaw(source.value),
    expected: formatAmount(expected),
  };

  if (isEmptyCell(pair.targetRaw)) {
    return { kind: 'discrepancy', discrepancy: { ...location, reason: 'target_empty', actual: null, delta: null } };
  }

  const target = toMonetary(pair.targetRaw, 'EUR');
  if (!target.ok) {
    return {
      kind: 'discrepancy',
      discrepancy: { ...location, reason: 'non_numeric', actual: String(pair.targetRaw), delta: null },
    };
  }

  const actual = roundToCents(target.value);
  if (actual.amount.eq(expected.amount)) return { kind: 'match' };

  return {
    kind: 'discrepancy',
    discrepancy: {
      ...location,
      reason: 'value_mismatch',
      actual: formatAmount(actual),
      delta: formatAmount({ amount: actual.amount.minus(expected.amount), currency: 'EUR' }),
    },
  };
}

export function verify(
  source: Grid,
  target: Grid,
  selection: ColumnSelection,
  options: VerifyOptions = {},
): Result<VerificationReport, AppError> {
  const converter = options.converter ?? defaultConverter;
  const log = options.runId !== undefined
    ? createRunLogger(options.runId, options.sourceName, options.targetName).child({ module: 'verification' })
    : logger.child({ module: 'verification' });

  const columnsResult = resolveColumns(source, target, selection);
  if (!columnsResult.ok) return columnsResult;
  const columns = columnsResult.value;

  const alignment = alignRows(source, target);
  const discrepancies: Discrepancy[] = [];

  if (alignment.sourceRowCount !== alignment.targetRowCount) {
    log.warn(
      { sourceRowCount: alignment.sourceRowCount, targetRowCount: alignment.targetRowCount },
      'Row counts differ, comparing overlapping rows',
    );
    discrepancies.push({
      reason: 'row_count_mismatch',
      sourceRowCount: alignment.sourceRowCount,
      targetRowCount: alignment.targetRowCount,
    });
  }

  log.info({ selection: selection.mode, columns, rows: alignment.rowIndices.length }, 'Starting verification');

  const firstRowNumber = source.firstRowNumber ?? 1;
  let checkedCount = 0;
  let skippedCount = 0;

  for (const pair of producePairs(source, target, columns, alignment)) {
    const outcome = checkPair(pair, converter, firstRowNumber);

    switch (outcome.kind) {
      case 'skipped':
        skippedCount++;
        break;
      case 'match':
        checkedCount++;
        break;
      case 'discrepancy':
        if (outcome.discrepancy.reason === 'value_mismatch') checkedCount++;
        discrepancies.push(outcome.discrepancy);
        break;
    }
  }

  const report: VerificationReport = {
    pass: discrepancies.length === 0,
    discrepancies,
    checkedCount,
    skippedCount,
    columns,
    rowsCompared: alignment.rowIndices.length,
    rate: converter.rate.quotePerBase.toString(),
  };

  if (report.pass) {
    log.info({ checkedCount, skippedCount }, 'Verification passed');
  } else {
    log.info(
      { checkedCount, skippedCount, discrepancyCount: discrepancies.length },
      'Verification found discrepancies',
    );
  }

  return ok(report);
}
