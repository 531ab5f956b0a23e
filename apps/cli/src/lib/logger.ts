/**
 * CLI logging setup
 *
 * The log file always gets `info` and above (`debug` with --debug) and is
 * truncated on every run. Each -v adds console output: warn, info, debug.
 */

import { createLogger, type Logger, type LogLevel } from '@file-sorter/utils';

export const MAX_VERBOSITY = 3;

const CONSOLE_LEVELS: readonly LogLevel[] = ['warn', 'info', 'debug'];

export interface LoggingPlan {
  fileLevel: LogLevel;
  consoleLevel: LogLevel | null;
  warnings: string[];
}

export function planLogging(verbose: number, debug: boolean, envLevel?: LogLevel): LoggingPlan {
  const warnings: string[] = [];
  const fileLevel: LogLevel = debug ? 'debug' : envLevel ?? 'info';

  if (verbose > MAX_VERBOSITY) {
    warnings.push(`Verbosity is capped at -vvv, ignoring ${verbose - MAX_VERBOSITY} extra -v`);
  }
  const count = Math.min(Math.max(verbose, 0), MAX_VERBOSITY);

  let consoleLevel: LogLevel | null = count === 0 ? null : CONSOLE_LEVELS[count - 1] ?? null;
  if (count === MAX_VERBOSITY && !debug) {
    warnings.push('Debug output is disabled without --debug, console shows info and above');
    consoleLevel = 'info';
  }

  return { fileLevel, consoleLevel, warnings };
}

export interface CliLoggerOptions {
  logFile: string;
  debug: boolean;
  verbose: number;
  envLevel?: LogLevel;
  env: string;
  // Logged after the logging plan's own warnings
  warnings?: readonly string[];
}

export function createCliLogger(options: CliLoggerOptions): Logger {
  const plan = planLogging(options.verbose, options.debug, options.envLevel);

  const logger = createLogger({
    service: 'file-sorter',
    env: options.env,
    level: plan.fileLevel,
    file: options.logFile,
    truncate: true,
    console: plan.consoleLevel ? { level: plan.consoleLevel } : false,
  });

  for (const warning of [...plan.warnings, ...(options.warnings ?? [])]) {
    logger.warn(warning);
  }
  return logger;
}
