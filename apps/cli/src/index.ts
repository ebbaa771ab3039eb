#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for splitwave.
 * Runs the segmentation engine in-process against local files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEnv } from './config/index.js';
import { planCommand } from './commands/plan.js';
import { probeCommand } from './commands/probe.js';
import { splitCommand } from './commands/split.js';

loadEnv();

const program = new Command();

program
  .name('splitwave')
  .description('Split audio files into time- or size-bounded segments')
  .version('1.0.0');

program
  .command('probe <input>')
  .description('Show duration and stream properties of an audio file')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

program
  .command('plan <input>')
  .description('Show the segments a split would produce, without encoding')
  .option('-s, --seconds <seconds>', 'Target segment length in seconds')
  .option('-m, --megabytes <megabytes>', 'Target segment size in megabytes')
  .option('--json', 'Output in JSON format')
  .action(planCommand);

program
  .command('split <input>')
  .description('Split an audio file into segments')
  .requiredOption('-o, --output <dir>', 'Directory for the segments')
  .option('-s, --seconds <seconds>', 'Target segment length in seconds')
  .option('-m, --megabytes <megabytes>', 'Target segment size in megabytes')
  .option('--concurrency <count>', 'Segments encoded in parallel')
  .option('--timeout <ms>', 'Timeout per encoding attempt in milliseconds')
  .option('--json', 'Output in JSON format')
  .action(splitCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('splitwave --help'), 'for available commands');
  }
  process.exit(1);
});

await program.parseAsync();
