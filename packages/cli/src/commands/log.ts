/**
 * custodian log - Print a case audit trail
 *
 * Usage:
 *   custodian log --case 5 --errors
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatLogTimestamp } from '@custodian/core';
import { readCaseLog } from '../workflow.js';
import { reportFailure, resolveConfig } from './shared.js';

interface LogOptions {
  case: string;
  root?: string;
  errors: boolean;
}

export const logCommand = new Command('log')
  .description('Print the audit log of a case')
  .requiredOption('-c, --case <number>', 'Case number')
  .option('-r, --root <dir>', 'Case root directory (overrides CUSTODIAN_ROOT)')
  .option('--errors', 'Only show error entries', false)
  .action(async (options: LogOptions) => {
    try {
      const config = resolveConfig(options);
      const { entries, malformedLines } = await readCaseLog(options.case, config);

      for (const entry of entries) {
        if (options.errors && entry.severity !== 'error') continue;
        const text = entry.severity === 'error' ? chalk.red(entry.message) : entry.message;
        console.log(`${chalk.gray(`[${formatLogTimestamp(entry.timestamp)}]`)} ${text}`);
      }

      if (malformedLines.length > 0) {
        console.log(chalk.yellow(`\nUnparseable lines: ${malformedLines.join(', ')}`));
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure(error);
    }
  });
