/**
 * Track Command
 *
 * Watches the given directories and sorts new files until interrupted.
 */

import ora from 'ora';
import { ExtensionConfigStore, toSessionConfig } from '@file-sorter/core';
import {
  WatchSupervisor,
  createFolderWatcher,
  createPollingWatcherFactory,
  type RunningSession,
  type UndefinedExtensionPolicy,
} from '@file-sorter/sorter';
import { formatDuration, resolveUserPath, type Logger } from '@file-sorter/utils';
import type { CliContext } from '../lib/context.js';
import { installStartupScript } from '../lib/autostart.js';
import { printError, printInfo, printKeyValue, printOutcome, printSuccess, printWarning } from '../lib/output.js';

export interface TrackOptions {
  recursive?: boolean;
  autostart?: boolean;
  polling?: boolean;
  interval?: number;
  debounce?: number;
  dateFolders?: boolean;
  undefinedTo?: string;
}

/**
 * Start a session. Returns null (with exit code 1) when there is nothing to sort.
 */
export async function trackCommand(
  paths: readonly string[],
  options: TrackOptions,
  context: CliContext,
  argv: readonly string[] = process.argv
): Promise<RunningSession | null> {
  const { logger } = context;
  const store = new ExtensionConfigStore(context.config.configFile, logger);
  const sessionConfig = toSessionConfig(await store.read());

  const undefinedExtensionPolicy: UndefinedExtensionPolicy = options.undefinedTo
    ? { kind: 'move-to', path: resolveUserPath(options.undefinedTo) }
    : sessionConfig.undefinedExtensionPolicy;

  if (Object.keys(sessionConfig.extensionMap).length === 0 && undefinedExtensionPolicy.kind === 'skip') {
    logger.error('No extensions configured and no path for undefined extensions');
    printError('No extensions configured and no path for undefined extensions, nothing to sort');
    printInfo('Add one with: file-sorter write -a .pdf ~/Documents');
    process.exitCode = 1;
    return null;
  }

  if (options.autostart) {
    const scriptPath = await installStartupScript(argv, logger);
    if (scriptPath) {
      printSuccess(`Startup script written to ${scriptPath}`);
    } else {
      printWarning('Autostart is only supported on Windows, skipping');
    }
  }

  const supervisor = new WatchSupervisor({
    logger,
    watcherFactory: options.polling
      ? createPollingWatcherFactory({ intervalMs: options.interval })
      : createFolderWatcher,
  });

  const spinner = ora('Starting watchers...').start();
  let session: RunningSession;
  try {
    session = await supervisor.start({
      directories: paths.map(path => resolveUserPath(path)),
      recursive: options.recursive ?? false,
      extensionMap: sessionConfig.extensionMap,
      undefinedExtensionPolicy,
      dateSubfolders: options.dateFolders ?? false,
      debounceMs: options.debounce,
      onOutcome: printOutcome,
    });
  } catch (error) {
    spinner.fail('Failed to start watchers');
    throw error;
  }

  spinner.succeed(`Tracking ${session.directories.length} ${session.directories.length === 1 ? 'directory' : 'directories'}`);
  for (const directory of session.directories) {
    printKeyValue('Watching', directory);
  }
  printInfo('Press Ctrl+C to stop');

  return session;
}

/**
 * Stop the session on SIGINT / SIGTERM
 */
export function stopOnSignals(session: RunningSession, logger: Logger): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Received signal, stopping');
    session
      .stop()
      .then(report => {
        if (report.forced.length > 0) {
          printWarning(`Forced to stop: ${report.forced.join(', ')}`);
        }
        if (report.failed.length > 0) {
          printWarning(`Stopped watching earlier after an error: ${report.failed.join(', ')}`);
        }
        printSuccess(`Stopped after ${formatDuration(Date.now() - session.startedAt.getTime())}`);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to stop cleanly');
        printError(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
