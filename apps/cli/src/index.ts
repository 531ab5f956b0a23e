#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for file-sorter.
 * Commands only parse input and print results; sorting lives in @file-sorter/sorter.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEnvFile } from './config/index.js';
import { createContext, type CliContext, type GlobalOptions } from './lib/context.js';
import { increaseVerbosity, parseMilliseconds } from './lib/options.js';
import { printError } from './lib/output.js';

// Commands
import { trackCommand, stopOnSignals, type TrackOptions } from './commands/track.js';
import { writeCommand, type WriteOptions } from './commands/write.js';
import { readCommand } from './commands/read.js';
import { locationsCommand, type LocationsOptions } from './commands/locations.js';

loadEnvFile();

const program = new Command();

program
  .name('file-sorter')
  .description('Watch directories and sort new files by extension')
  .version('1.0.0', '-V, --version')
  .option('-d, --debug', 'Write debug records to the log file')
  .option('-v, --verbose', 'Log to the console, repeat for more (-vv, -vvv)', increaseVerbosity, 0)
  .option('--log-location <path>', 'Log file location (a .log file)')
  .option('--configs-location <path>', 'Configuration file location (a .json file)');

function reportFailure(error: unknown): void {
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

async function run(command: (context: CliContext) => Promise<void> | void): Promise<void> {
  let context: CliContext;
  try {
    context = createContext(program.opts<GlobalOptions>());
  } catch (error) {
    reportFailure(error);
    return;
  }

  try {
    await command(context);
  } catch (error) {
    context.logger.error({ err: error }, 'Command failed');
    reportFailure(error);
  }
}

// ============================================
// SORTING
// ============================================

program
  .command('track')
  .description('Watch directories and move new files to their configured destination')
  .argument('<paths...>', 'Directories to watch')
  .option('-r, --recursive', 'Also watch subdirectories')
  .option('--autostart', 'Run this command at logon (Windows only)')
  .option('--polling', 'Poll the directories instead of using native notifications')
  .option('--interval <ms>', 'Polling interval', parseMilliseconds)
  .option('--debounce <ms>', 'Quiet time before a changed file is handled', parseMilliseconds)
  .option('--date-folders', 'Sort into year/month subfolders of each destination')
  .option('--undefined-to <path>', 'Destination for files without a configured extension')
  .action((paths: string[], options: TrackOptions) =>
    run(async context => {
      const session = await trackCommand(paths, options, context);
      if (session) {
        stopOnSignals(session, context.logger);
      }
    })
  );

// ============================================
// CONFIGURATION
// ============================================

program
  .command('write')
  .description('Edit the extension configuration')
  .option('-a, --add <extension-and-path...>', 'Add an extension and its destination, e.g. -a .jpg ~/Pictures')
  .option('-r, --remove <extensions...>', 'Remove extensions')
  .option('-j, --json <files...>', 'Merge { "extension": "path" } JSON files')
  .option('-u, --undefined-to <path>', 'Destination for files without a configured extension')
  .option('--clear-undefined', 'Leave files without a configured extension in place')
  .action((options: WriteOptions) => run(context => writeCommand(options, context)));

program
  .command('read')
  .description('Show configured extensions')
  .argument('[extensions...]', 'Only show these extensions')
  .action((extensions: string[]) => run(context => readCommand(extensions, context)));

program
  .command('locations')
  .description('Show the log and configuration file paths')
  .option('-l, --log', 'Only the log file')
  .option('-c, --config', 'Only the configuration file')
  .action((options: LocationsOptions) => run(context => locationsCommand(options, context)));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('file-sorter --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch(reportFailure);
