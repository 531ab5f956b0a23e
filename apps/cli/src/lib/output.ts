/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { SortOutcome } from '@file-sorter/sorter';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * One line per handled file; vanished files are not worth a line
 */
export function printOutcome(outcome: SortOutcome): void {
  switch (outcome.status) {
    case 'moved':
      printSuccess(`${outcome.sourcePath} ${chalk.gray('→')} ${outcome.destinationPath}`);
      break;
    case 'skipped':
      if (outcome.reason === 'undefined-extension') {
        printWarning(`No destination for ${outcome.sourcePath}`);
      }
      break;
    case 'failed':
      printError(outcome.error.message);
      break;
    case 'vanished':
      break;
  }
}
