/**
 * Windows startup script
 *
 * `track --autostart` drops a .vbs file into the user's Startup folder that
 * re-runs the same command hidden at logon, without console verbosity.
 */

import { join } from 'node:path';
import { safeWriteFile, type Logger } from '@file-sorter/utils';

export const STARTUP_SCRIPT_NAME = 'file-sorter.vbs';

const DROPPED_ARGUMENT = /^(-v+|--verbose|--autostart)$/;

function quoteArgument(arg: string): string {
  return arg === '' || /\s/.test(arg) ? `"${arg}"` : arg;
}

/**
 * Command line for the startup script: the current invocation without verbosity or --autostart
 */
export function buildStartupCommand(argv: readonly string[]): string {
  return argv
    .filter(arg => !DROPPED_ARGUMENT.test(arg))
    .map(quoteArgument)
    .join(' ');
}

export function startupScriptContent(command: string): string {
  const escaped = command.replaceAll('"', '""');
  return `Set objShell = WScript.CreateObject("WScript.Shell")\nobjShell.Run "${escaped}", 0, True\n`;
}

export function startupDirectory(env: NodeJS.ProcessEnv): string | null {
  const appData = env['APPDATA'];
  if (!appData) {
    return null;
  }
  return join(appData, 'Microsoft', 'Windows', 'Start Menu', 'Programs', 'Startup');
}

export interface InstallOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

/**
 * Write the startup script. Returns its path, or null where autostart is not supported.
 */
export async function installStartupScript(
  argv: readonly string[],
  logger: Logger,
  options: InstallOptions = {}
): Promise<string | null> {
  const platform = options.platform ?? process.platform;
  if (platform !== 'win32') {
    logger.warn({ platform }, 'Autostart is only supported on Windows');
    return null;
  }

  const directory = startupDirectory(options.env ?? process.env);
  if (!directory) {
    logger.warn('APPDATA is not set, cannot find the Startup folder');
    return null;
  }

  const scriptPath = join(directory, STARTUP_SCRIPT_NAME);
  const command = buildStartupCommand(argv);
  await safeWriteFile(scriptPath, startupScriptContent(command));
  logger.info({ path: scriptPath, command }, 'Installed startup script');
  return scriptPath;
}
