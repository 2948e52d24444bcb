/**
 * custodian acquire - Acquire files into a case
 *
 * Usage:
 *   custodian acquire ./photo.jpg ./notes.pdf --case 5 --investigator "Det. Example" --report
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { basename } from 'node:path';
import { runCase } from '../workflow.js';
import { batchOutcome, echoTransports, printCaseResult, reportFailure, resolveConfig } from './shared.js';

interface AcquireOptions {
  case: string;
  investigator: string;
  victim?: string;
  suspect?: string;
  crime?: string;
  root?: string;
  sample: boolean;
  verify: boolean;
  report: boolean;
  upload: boolean;
  concurrency?: string;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid --concurrency value: ${value}`);
  }
  return parsed;
}

export const acquireCommand = new Command('acquire')
  .description('Copy, hash and record evidence files for a case')
  .argument('[files...]', 'Source files to acquire')
  .requiredOption('-c, --case <number>', 'Case number (zero-padded to the configured width)')
  .requiredOption('-i, --investigator <name>', 'Investigator name')
  .option('--victim <name>', 'Victim name')
  .option('--suspect <name>', 'Suspect name')
  .option('--crime <type>', 'Crime type')
  .option('-r, --root <dir>', 'Case root directory (overrides CUSTODIAN_ROOT)')
  .option('--sample', 'Also acquire a generated sample evidence file', false)
  .option('--verify', 'Re-hash every stored copy after acquisition', false)
  .option('--report', 'Write an HTML forensic report', false)
  .option('--upload', 'Upload stored copies and digests to object storage', false)
  .option('--concurrency <n>', 'Files processed in parallel (1-16)')
  .action(async (files: string[], options: AcquireOptions) => {
    const spinner = ora();

    try {
      if (files.length === 0 && !options.sample) {
        console.error(chalk.red('No files given (pass file paths or --sample)'));
        process.exitCode = 1;
        return;
      }

      const config = resolveConfig(options);
      spinner.start(`Acquiring evidence for case ${options.case}...`);

      const result = await runCase({
        caseNumber: options.case,
        investigator: options.investigator,
        victim: options.victim,
        suspect: options.suspect,
        crimeType: options.crime,
        files,
        sample: options.sample,
        verify: options.verify,
        report: options.report,
        upload: options.upload,
        concurrency: parseConcurrency(options.concurrency),
        config,
        transports: echoTransports(config),
        onRecord: record => {
          spinner.text = `Acquired ${record.originalFilename}`;
        },
        onFailure: failure => {
          spinner.text = `Failed ${basename(failure.sourcePath)}`;
        },
      });

      const outcome = batchOutcome(result.batch, files.length + (options.sample ? 1 : 0));
      spinner[outcome.status](outcome.text);

      printCaseResult(result);
    } catch (error) {
      reportFailure(error, spinner);
    }
  });
