import { readFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { Command, Option } from 'commander';
import type { ColumnSelection } from '../domain/types.js';
import { logger } from '../infrastructure/logger.js';
import { describeDiscrepancy, reportToCsv, summarizeReport } from '../services/report/index.js';
import { verifyWorkbooks } from '../services/workbook-verification/index.js';

const log = logger.child({ module: 'cli' });

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_DISCREPANCIES = 2;

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface VerifyCommandOptions {
  columns?: string;
  sheet?: string;
  targetSheet?: string;
  format: 'json' | 'csv' | 'text';
}

const consoleOutput: CliOutput = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

export function parseColumnsOption(value: string | undefined): ColumnSelection {
  if (value === undefined) return { mode: 'all' };
  const columns = value.split(',').map((column) => column.trim()).filter((column) => column !== '');
  return { mode: 'explicit', columns };
}

export async function runVerify(
  sourcePath: string,
  targetPath: string,
  options: VerifyCommandOptions,
  output: CliOutput = consoleOutput,
): Promise<number> {
  const runId = `cli-${basename(sourcePath)}-${basename(targetPath)}`;
  log.debug({ runId, sourcePath, targetPath }, 'Reading workbooks');

  let source: Buffer;
  let target: Buffer;
  try {
    [source, target] = await Promise.all([readFile(resolve(sourcePath)), readFile(resolve(targetPath))]);
  } catch (cause) {
    output.err(`Cannot read workbook: ${cause instanceof Error ? cause.message : String(cause)}`);
    return EXIT_FAILED;
  }

  const result = verifyWorkbooks({
    source,
    target,
    sourceSheet: options.sheet,
    targetSheet: options.targetSheet ?? options.sheet,
    sourceName: basename(sourcePath),
    targetName: basename(targetPath),
    columns: parseColumnsOption(options.columns),
    runId,
  });

  if (!result.ok) {
    output.err(`${result.error.code}: ${result.error.message}`);
    if (result.error.details) output.err(result.error.details);
    return EXIT_FAILED;
  }

  const report = result.value;
  switch (options.format) {
    case 'json':
      output.out(JSON.stringify(report, null, 2));
      break;
    case 'csv':
      output.out(reportToCsv(report));
      break;
    case 'text':
      for (const discrepancy of report.discrepancies) {
        output.out(describeDiscrepancy(discrepancy));
      }
      break;
  }

  output.err(summarizeReport(report));
  return report.pass ? EXIT_PASSED : EXIT_DISCREPANCIES;
}

export function createProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command();

  program
    .name('bgn-eur-verify')
    .description('Check that a EUR workbook is a correct conversion of a BGN workbook (1 EUR = 1.95583 BGN)')
    .version('1.0.0')
    .argument('<source>', 'BGN workbook (.xlsx)')
    .argument('<target>', 'EUR workbook (.xlsx)')
    .option('-c, --columns <names>', 'comma-separated column headers to check (default: every numeric column)')
    .option('-s, --sheet <name>', 'sheet to read (default: first sheet)')
    .option('-t, --target-sheet <name>', 'sheet to read from the target, if named differently')
    .addOption(new Option('-f, --format <format>', 'output format').choices(['text', 'json', 'csv']).default('text'))
    .action(async (sourcePath: string, targetPath: string, options: VerifyCommandOptions) => {
      process.exitCode = await runVerify(sourcePath, targetPath, options, output);
    });

  return program;
}
