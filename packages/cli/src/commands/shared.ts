/**
 * Helpers shared by the commands
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import { ConsoleTransport } from '@custodian/audit-logger';
import type { AuditTransport } from '@custodian/audit-logger';
import { describeCauseChain, formatError, loadConfig } from '@custodian/core';
import type { CustodianConfig } from '@custodian/core';
import type { BatchResult } from '@custodian/case-session';
import type { CaseRunResult } from '../workflow.js';

export interface RootOptions {
  root?: string;
}

/**
 * Environment configuration with a --root override
 */
export function resolveConfig(options: RootOptions): CustodianConfig {
  const config = loadConfig();
  return options.root ? { ...config, rootDir: options.root } : config;
}

export function echoTransports(config: CustodianConfig): AuditTransport[] {
  return config.echoLog ? [new ConsoleTransport()] : [];
}

/**
 * Spinner ending for a batch: a warning when any file failed
 */
export function batchOutcome(
  batch: Pick<BatchResult, 'processed' | 'failureCount'>,
  requested: number
): { status: 'succeed' | 'warn'; text: string } {
  const acquired = batch.processed.length;
  return batch.failureCount > 0
    ? { status: 'warn', text: `Acquired ${acquired} of ${requested} files` }
    : { status: 'succeed', text: `Acquired ${acquired} files` };
}

/**
 * Print a command failure and mark the process as failed
 */
export function reportFailure(error: unknown, spinner?: Ora): void {
  if (spinner?.isSpinning) {
    spinner.fail();
  }
  console.error(chalk.red(formatError(error)));
  if (error instanceof Error && error.cause !== undefined) {
    console.error(chalk.gray(`  caused by: ${describeCauseChain(error.cause)}`));
  }
  process.exitCode = 1;
}

/**
 * Print the outcome of a case run
 */
export function printCaseResult(result: CaseRunResult): void {
  const { batch, summary, integrity, reportPath, upload } = result;

  console.log();
  console.log(chalk.bold(`Case ${result.caseInfo.caseId.number}`));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`Directory: ${chalk.cyan(result.layout.root)}`);
  console.log(`Session:   ${chalk.gray(result.sessionId)}`);
  console.log(`Acquired:  ${chalk.green(batch.processed.length)}`);
  console.log(`Failed:    ${batch.failureCount > 0 ? chalk.red(batch.failureCount) : '0'}`);
  console.log(`Total:     ${summary.totalFiles} files, ${summary.totalSizeMb.toFixed(2)} MB`);

  for (const category of summary.categories) {
    console.log(
      chalk.gray(`  ${category.category}: ${category.count} (${category.percentage.toFixed(1)}%)`)
    );
  }

  if (integrity) {
    const line = `Integrity: ${integrity.intact} intact, ${integrity.tampered} tampered, ${integrity.missing} missing`;
    console.log(integrity.passed ? chalk.green(line) : chalk.red(line));
  }
  if (reportPath) {
    console.log(`Report:    ${chalk.cyan(reportPath)}`);
  }
  if (upload) {
    const line = `Uploaded:  ${upload.uploaded.length}/${upload.total}`;
    console.log(upload.complete ? chalk.green(line) : chalk.yellow(line));
  }

  if (batch.failureCount > 0 || (integrity && !integrity.passed) || (upload && !upload.complete)) {
    process.exitCode = 1;
  }
}
