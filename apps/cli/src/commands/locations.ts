/**
 * Locations Command
 */

import type { CliContext } from '../lib/context.js';
import { printKeyValue } from '../lib/output.js';

export interface LocationsOptions {
  log?: boolean;
  config?: boolean;
}

export function locationsCommand(options: LocationsOptions, context: CliContext): void {
  const { logFile, configFile } = context.config;

  // A single flag prints the bare path, for scripts
  if (options.log && !options.config) {
    console.log(logFile);
    return;
  }
  if (options.config && !options.log) {
    console.log(configFile);
    return;
  }

  printKeyValue('Log file', logFile);
  printKeyValue('Config file', configFile);
}
