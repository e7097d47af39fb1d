import Papa from 'papaparse';
import type { Discrepancy, VerificationReport } from '../verification/index.js';

export const CSV_HEADER = ['Row', 'Column', 'Reason', 'Source BGN', 'Expected EUR', 'Actual EUR', 'Delta', 'Note'] as const;

export function describeDiscrepancy(discrepancy: Discrepancy): string {
  switch (discrepancy.reason) {
    case 'row_count_mismatch':
      return `Row counts differ: source has ${discrepancy.sourceRowCount} rows, target has ${discrepancy.targetRowCount}`;
    case 'target_empty':
      return `Row ${discrepancy.rowNumber}, column '${discrepancy.column}': target is empty, expected ${discrepancy.expected} EUR`;
    case 'non_numeric':
      return `Row ${discrepancy.rowNumber}, column '${discrepancy.column}': target value '${discrepancy.actual}' is not a number, expected ${discrepancy.expected} EUR`;
    case 'value_mismatch':
      return `Row ${discrepancy.rowNumber}, column '${discrepancy.column}': expected ${discrepancy.expected} EUR, found ${discrepancy.actual} EUR (delta ${discrepancy.delta})`;
  }
}

export function summarizeReport(report: VerificationReport): string {
  if (report.pass) {
    return `Verification passed: ${report.checkedCount} cells checked across ${report.rowsCompared} rows and ${report.columns.length} columns, ${report.skippedCount} skipped`;
  }
  const noun = report.discrepancies.length === 1 ? 'discrepancy' : 'discrepancies';
  return `Found ${report.discrepancies.length} ${noun}: ${report.checkedCount} cells checked, ${report.skippedCount} skipped`;
}

function toCsvRow(discrepancy: Discrepancy): string[] {
  if (discrepancy.reason === 'row_count_mismatch') {
    const note = `source ${discrepancy.sourceRowCount} rows, target ${discrepancy.targetRowCount} rows`;
    return ['', '', discrepancy.reason, '', '', '', '', note];
  }
  return [
    String(discrepancy.rowNumber),
    discrepancy.column,
    discrepancy.reason,
    discrepancy.source,
    discrepancy.expected,
    discrepancy.actual ?? '',
    discrepancy.delta ?? '',
    '',
  ];
}

export function reportToCsv(report: VerificationReport): string {
  return Papa.unparse({
    fields: [...CSV_HEADER],
    data: report.discrepancies.map(toCsvRow),
  });
}
