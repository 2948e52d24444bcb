/**
 * custodian run - Run a case from a YAML intake file
 *
 * Usage:
 *   custodian run intake.yaml
 */

import { Command } from 'commander';
import ora from 'ora';
import { loadIntake } from '../intake.js';
import { runCase } from '../workflow.js';
import { batchOutcome, echoTransports, printCaseResult, reportFailure, resolveConfig } from './shared.js';

interface RunOptions {
  root?: string;
}

export const runCommand = new Command('run')
  .description('Run acquisition from a YAML intake file')
  .argument('<intake>', 'Path to the intake file')
  .option('-r, --root <dir>', 'Case root directory (overrides CUSTODIAN_ROOT)')
  .action(async (intakePath: string, options: RunOptions) => {
    const spinner = ora('Loading intake...').start();

    try {
      const intake = await loadIntake(intakePath);
      const config = resolveConfig(options);
      spinner.succeed(`Intake loaded: case ${intake.case}, ${intake.files.length} files`);

      spinner.start('Acquiring evidence...');
      const result = await runCase({
        caseNumber: intake.case,
        investigator: intake.investigator,
        victim: intake.victim,
        suspect: intake.suspect,
        crimeType: intake.crimeType,
        files: intake.files,
        sample: intake.sample,
        verify: intake.verify,
        report: intake.report,
        upload: intake.upload,
        concurrency: intake.concurrency,
        config,
        transports: echoTransports(config),
        onRecord: record => {
          spinner.text = `Acquired ${record.originalFilename}`;
        },
      });
      const outcome = batchOutcome(result.batch, intake.files.length + (intake.sample ? 1 : 0));
      spinner[outcome.status](outcome.text);

      printCaseResult(result);
    } catch (error) {
      reportFailure(error, spinner);
    }
  });
