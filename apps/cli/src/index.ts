#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Thin HTTP client for the syncprobe API server.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { pingCommand } from './commands/ping.js';
import { analyzeCommand } from './commands/analyze.js';

const program = new Command();

program
  .name('syncprobe')
  .description('Audio/video sync triage for uploaded videos')
  .version('1.0.0');

program
  .command('ping')
  .description('Check the API server and its ffprobe')
  .option('--json', 'Output in JSON format')
  .action(pingCommand);

program
  .command('analyze <file>')
  .description('Upload a video and print its sync report')
  .option('-p, --policy <policy>', 'Deciding check: start_time or duration')
  .option('--json', 'Output in JSON format')
  .action(analyzeCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('syncprobe --help'), 'for available commands');
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(1);
});

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
