/**
 * custodian verify - Re-check a case's stored copies against their digest files
 *
 * Usage:
 *   custodian verify --case 5
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { verifyCase } from '../workflow.js';
import { echoTransports, reportFailure, resolveConfig } from './shared.js';

interface VerifyOptions {
  case: string;
  root?: string;
}

export const verifyCommand = new Command('verify')
  .description('Verify the integrity of an existing case from its digest files')
  .requiredOption('-c, --case <number>', 'Case number')
  .option('-r, --root <dir>', 'Case root directory (overrides CUSTODIAN_ROOT)')
  .action(async (options: VerifyOptions) => {
    const spinner = ora(`Verifying case ${options.case}...`).start();

    try {
      const config = resolveConfig(options);
      const { layout, report } = await verifyCase({
        caseNumber: options.case,
        config,
        transports: echoTransports(config),
      });

      if (report.checks.length === 0) {
        spinner.warn(`No digest files in ${layout.hashesDir}`);
        return;
      }

      for (const check of report.checks) {
        const name = check.storedFilename ?? check.digestPath;
        if (check.status === 'intact') {
          console.log(chalk.green(`  ✓ ${name}`));
        } else {
          console.log(chalk.red(`  ✗ ${name}: ${check.status}${check.detail ? ` (${check.detail})` : ''}`));
        }
      }

      const line = `${report.intact} intact, ${report.tampered} tampered, ${report.missing} missing`;
      if (report.passed) {
        spinner.succeed(line);
      } else {
        spinner.fail(line);
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure(error, spinner);
    }
  });
