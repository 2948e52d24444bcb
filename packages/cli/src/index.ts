#!/usr/bin/env -S node --import tsx
/**
 * Custodian CLI
 *
 * Evidence acquisition and chain-of-custody tooling.
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { acquireCommand } from './commands/acquire.js';
import { runCommand } from './commands/run.js';
import { verifyCommand } from './commands/verify.js';
import { logCommand } from './commands/log.js';

// Load environment variables
config();

const program = new Command();

program
  .name('custodian')
  .description('Acquire digital evidence with a hashed, audited chain of custody')
  .version('0.1.0');

program.addCommand(acquireCommand);
program.addCommand(runCommand);
program.addCommand(verifyCommand);
program.addCommand(logCommand);

await program.parseAsync();
