#!/usr/bin/env node
// csvlint CLI

import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';
import { registerInitCommand } from './commands/init.js';
import { handleError } from './utils/error-handler.js';

const program = new Command();

program
  .name('csvlint')
  .description('A CSV linter that validates CSV files according to RFC 4180')
  .version('0.1.0');

// `csvlint file.csv` runs validate
program.addCommand(validateCommand, { isDefault: true });
registerInitCommand(program);

program.parseAsync().catch(handleError);
