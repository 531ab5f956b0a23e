/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Loggers are built explicitly and passed down; nothing here is module state.
 */

import pino, { type LevelWithSilent, type Logger, type TransportTargetOptions } from 'pino';

export type { Logger };
export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  service?: string;
  env?: string;

  // Minimum level written to the log file / stdout
  level?: LogLevel;

  // Log file location; when unset records go to stdout
  file?: string;

  // Truncate the log file on start instead of appending
  truncate?: boolean;

  // Pretty console output on stderr, independent from the file level
  console?: { level: LogLevel } | false;
}

const LEVEL_ORDER: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Pick the most verbose of the given levels
 */
export function lowestLevel(...levels: LogLevel[]): LogLevel {
  return levels.reduce((lowest, level) =>
    LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(lowest) ? level : lowest,
  'silent');
}

/**
 * Build a root logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const base = {
    service: options.service ?? 'file-sorter',
    env: options.env ?? 'production',
  };

  const targets: TransportTargetOptions[] = [];

  if (options.file) {
    targets.push({
      target: 'pino/file',
      level,
      options: {
        destination: options.file,
        mkdir: true,
        append: !options.truncate,
      },
    });
  }

  if (options.console) {
    targets.push({
      target: 'pino-pretty',
      level: options.console.level,
      options: {
        colorize: true,
        ignore: 'pid,hostname,service,env',
        destination: 2,
      },
    });
  }

  if (targets.length === 0) {
    return pino({
      level,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base,
    });
  }

  // Custom level formatters are not allowed together with transport targets
  const consoleLevel: LogLevel = options.console ? options.console.level : 'silent';
  return pino(
    {
      level: options.file ? lowestLevel(level, consoleLevel) : consoleLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
      base,
    },
    pino.transport({ targets }),
  );
}

/**
 * Logger that drops everything, for library defaults and tests
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
