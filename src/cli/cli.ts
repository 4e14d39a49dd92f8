#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import {
  addCommand,
  combineCommand,
  divCommand,
  mulCommand,
  subCommand,
} from './commands/arithmetic';
import { scaleCommand } from './commands/scale';
import { normalizeCommand } from './commands/normalize';

const program = new Command();

program
  .name('pricemath')
  .description('pricemath - Fixed-point price arithmetic with confidence propagation')
  .version('1.0.0');

program.addCommand(addCommand);
program.addCommand(subCommand);
program.addCommand(mulCommand);
program.addCommand(divCommand);
program.addCommand(combineCommand);
program.addCommand(scaleCommand);
program.addCommand(normalizeCommand);

program.exitOverride(err => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red(`Unknown command: ${err.message}`));
    console.log(chalk.yellow('Run "pricemath --help" to see available commands'));
    process.exit(1);
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  throw err;
});

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});

if (process.argv.length === 2) {
  program.help();
}
