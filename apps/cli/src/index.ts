#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for reeldrop.
 */

import './config/env.js';
import { Command } from 'commander';
import chalk from 'chalk';
import { fetchCommand } from './commands/fetch.js';

const program = new Command();

function integer(value: string): number {
  return Number.parseInt(value, 10);
}

program
  .name('reeldrop')
  .description('Download a list of media links into one folder')
  .version('0.1.0');

program
  .command('fetch')
  .description('Download every matching link in a list')
  .requiredOption('-l, --list <file>', 'Text file containing the links')
  .option('-t, --target <dir>', 'Directory to download into (REELDROP_TARGET_DIR)')
  .option('-e, --ext <ext>', 'Media extension to keep: mkv or mp4 (REELDROP_EXT)')
  .option('-j, --jobs <count>', 'Parallel downloads (REELDROP_MAX_CONCURRENT)', integer)
  .option('-n, --limit <count>', 'Download at most this many new files', integer)
  .option('--no-probe', 'Skip the HEAD probe; take filenames from the links')
  .option('--dry-run', 'Show what would be downloaded and exit')
  .option('--json', 'Output in JSON format')
  .action(fetchCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
