import type { RateConverter } from '../conversion/types.js';

interface CellDiscrepancyBase {
  rowIndex: number;
  rowNumber: number;
  column: string;
  /** BGN amount as read from the source, full precision. */
  source: string;
  /** Converted EUR amount, 2 decimal places. */
  expected: string;
}

export interface ValueMismatch extends CellDiscrepancyBase {
  reason: 'value_mismatch';
  actual: string;
  /** actual - expected */
  delta: string;
}

export interface TargetEmpty extends CellDiscrepancyBase {
  reason: 'target_empty';
  actual: null;
  delta: null;
}

export interface NonNumericTarget extends CellDiscrepancyBase {
  reason: 'non_numeric';
  actual: string;
  delta: null;
}

export interface RowCountMismatch {
  reason: 'row_count_mismatch';
  sourceRowCount: number;
  targetRowCount: number;
}

export type CellDiscrepancy = ValueMismatch | TargetEmpty | NonNumericTarget;

export type Discrepancy = CellDiscrepancy | RowCountMismatch;

export interface VerificationReport {
  readonly pass: boolean;
  readonly discrepancies: readonly Discrepancy[];
  readonly checkedCount: number;
  readonly skippedCount: number;
  readonly columns: readonly string[];
  readonly rowsCompared: number;
  /** BGN per EUR used for the run. */
  readonly rate: string;
}

export interface VerifyOptions {
  converter?: RateConverter;
  runId?: string;
  sourceName?: string;
  targetName?: string;
}
