/**
 * CLI Configuration
 *
 * Paths and log settings loaded from environment variables (and a .env file
 * in the working directory, when there is one). The --log-location and
 * --configs-location options override the file paths; one with the wrong
 * suffix is ignored with a warning.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { extname, join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '@file-sorter/core';
import { resolveUserPath } from '@file-sorter/utils';

const CONFIG_FILE_NAME = 'configs.json';
const LOG_FILE_NAME = 'file-sorter.log';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  // Directory holding the configuration and log files
  FILE_SORTER_HOME: z.string().trim().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface CliConfig {
  env: Env['NODE_ENV'];
  logLevel?: Env['LOG_LEVEL'];
  configDir: string;
  configFile: string;
  logFile: string;
  // Overrides that were ignored, logged once the logger exists
  warnings: string[];
}

export interface LocationOverrides {
  logFile?: string;
  configFile?: string;
}

export function loadEnvFile(): void {
  dotenvConfig();
}

function pickLocation(
  given: string | undefined,
  suffix: string,
  fallback: string,
  label: string,
  warnings: string[]
): string {
  if (!given) {
    return fallback;
  }
  const path = resolveUserPath(given);
  if (extname(path).toLowerCase() !== suffix) {
    warnings.push(`${label} location '${path}' is not a '${suffix}' file, using ${fallback}`);
    return fallback;
  }
  return path;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: LocationOverrides = {}
): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ValidationError('environment', issues);
  }

  const configDir = parsed.data.FILE_SORTER_HOME
    ? resolveUserPath(parsed.data.FILE_SORTER_HOME)
    : join(homedir(), '.file-sorter');

  const warnings: string[] = [];
  return {
    env: parsed.data.NODE_ENV,
    logLevel: parsed.data.LOG_LEVEL,
    configDir,
    configFile: pickLocation(overrides.configFile, '.json', join(configDir, CONFIG_FILE_NAME), 'Configs', warnings),
    logFile: pickLocation(overrides.logFile, '.log', join(configDir, LOG_FILE_NAME), 'Logging', warnings),
    warnings,
  };
}
