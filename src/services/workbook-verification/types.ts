import type { ColumnSelection } from '../../domain/types.js';

export interface WorkbookPairInput {
  /** Raw bytes or base64 text of the BGN workbook. */
  source: Buffer | string;
  /** Raw bytes or base64 text of the EUR workbook. */
  target: Buffer | string;
  sourceSheet?: string;
  targetSheet?: string;
  sourceName?: string;
  targetName?: string;
}

export interface VerifyWorkbooksInput extends WorkbookPairInput {
  columns: ColumnSelection;
  runId?: string;
}

export interface WorkbookColumns {
  sourceColumns: string[];
  targetColumns: string[];
  commonColumns: string[];
}
