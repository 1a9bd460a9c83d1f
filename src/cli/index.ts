#!/usr/bin/env node
// probe-preflight CLI

import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';

const program = new Command();

program
  .name('probe-preflight')
  .description('Preflight validation for building and running the eBPF probe agent')
  .version('0.1.0');

// Running with no arguments performs the validation
program.addCommand(validateCommand, { isDefault: true });

await program.parseAsync();
