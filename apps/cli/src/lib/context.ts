/**
 * What every command needs: resolved paths and the root logger
 */

import type { Logger } from '@file-sorter/utils';
import { loadConfig, type CliConfig } from '../config/index.js';
import { createCliLogger } from './logger.js';

export interface GlobalOptions {
  debug?: boolean;
  verbose: number;
  logLocation?: string;
  configsLocation?: string;
}

export interface CliContext {
  config: CliConfig;
  logger: Logger;
}

export function createContext(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env, { logFile: globals.logLocation, configFile: globals.configsLocation });
  const logger = createCliLogger({
    logFile: config.logFile,
    debug: globals.debug ?? false,
    verbose: globals.verbose,
    envLevel: config.logLevel,
    env: config.env,
    warnings: config.warnings,
  });
  return { config, logger };
}
