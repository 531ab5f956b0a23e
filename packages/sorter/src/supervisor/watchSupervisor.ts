/**
 * Watch Supervisor
 *
 * Owns the lifecycle of a sorting session: validates the tracked directories,
 * starts one worker per directory, and stops all of them on request.
 *
 * Guarantees:
 * - No worker starts unless every directory is valid
 * - A watcher that fails to attach stops the workers already started
 * - stop() is idempotent and bounded by a timeout, after which the remaining
 *   workers are force-terminated
 * - A worker whose watcher died is reported as a failed outcome when it dies
 *   and listed under `failed` when the session stops
 */

import { randomUUID } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigurationError, WatchStartError } from '@file-sorter/core';
import { errorCode, withTimeout, type Logger } from '@file-sorter/utils';
import { ExtensionResolver } from '../resolver/extensionResolver.js';
import { CollisionSafeMover } from '../mover/collisionSafeMover.js';
import { SortEventHandler } from '../handler/sortEventHandler.js';
import { createFolderWatcher } from '../watcher/folderWatcher.js';
import { DirectoryWorker } from './directoryWorker.js';
import type {
  ExtensionMap,
  OutcomeListener,
  UndefinedExtensionPolicy,
  WatcherFactory,
} from '../types.js';

export const DEFAULT_STOP_TIMEOUT_MS = 10_000;

export interface WatchSupervisorOptions {
  logger: Logger;
  watcherFactory?: WatcherFactory;
  mover?: CollisionSafeMover;
  stopTimeoutMs?: number;
}

export interface StartOptions {
  directories: readonly string[];
  recursive?: boolean;
  extensionMap: ExtensionMap;
  undefinedExtensionPolicy?: UndefinedExtensionPolicy;
  dateSubfolders?: boolean;
  debounceMs?: number;
  ignorePartials?: boolean;
  ignoreHidden?: boolean;
  onOutcome?: OutcomeListener;
}

export interface StopReport {
  // Directories whose worker finished cleanly
  stopped: string[];
  // Directories whose worker was force-terminated after the timeout
  forced: string[];
  // Directories whose watcher died while the session was running
  failed: string[];
}

export class RunningSession {
  readonly id: string = randomUUID();
  readonly startedAt: Date = new Date();
  private stopping: Promise<StopReport> | null = null;

  constructor(
    private readonly workers: readonly DirectoryWorker[],
    private readonly stopTimeoutMs: number,
    private readonly logger: Logger,
    private readonly onStopped?: (session: RunningSession) => void
  ) {}

  get directories(): string[] {
    return this.workers.map(worker => worker.directory);
  }

  get active(): boolean {
    return this.stopping === null;
  }

  /**
   * Stop every worker. Safe to call repeatedly and from signal handlers.
   */
  stop(timeoutMs: number = this.stopTimeoutMs): Promise<StopReport> {
    if (!this.stopping) {
      this.stopping = this.stopAll(timeoutMs);
    }
    return this.stopping;
  }

  private async stopAll(timeoutMs: number): Promise<StopReport> {
    this.logger.info({ session: this.id }, 'Stopping session');

    const results = await Promise.all(
      this.workers.map(async worker => {
        const result = await withTimeout(worker.stop(), timeoutMs);
        if (result.timedOut) {
          await worker.terminate();
        }
        return { directory: worker.directory, forced: result.timedOut, failed: worker.failureReason !== null };
      })
    );

    const report: StopReport = {
      stopped: results.filter(r => !r.failed && !r.forced).map(r => r.directory),
      forced: results.filter(r => !r.failed && r.forced).map(r => r.directory),
      failed: results.filter(r => r.failed).map(r => r.directory),
    };

    if (report.forced.length > 0) {
      this.logger.warn({ session: this.id, forced: report.forced }, 'Some watchers did not stop in time');
    }
    if (report.failed.length > 0) {
      this.logger.warn({ session: this.id, failed: report.failed }, 'Some watchers had already failed');
    }
    this.logger.info({ session: this.id }, 'Session stopped');
    this.onStopped?.(this);
    return report;
  }
}

async function checkDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EACCES' || code === 'EPERM') {
      return false;
    }
    throw error;
  }
}

export class WatchSupervisor {
  private readonly logger: Logger;
  private readonly watcherFactory: WatcherFactory;
  private readonly mover: CollisionSafeMover;
  private readonly stopTimeoutMs: number;
  private readonly sessions = new Set<RunningSession>();

  constructor(options: WatchSupervisorOptions) {
    this.logger = options.logger.child({ component: 'supervisor' });
    this.watcherFactory = options.watcherFactory ?? createFolderWatcher;
    this.mover = options.mover ?? new CollisionSafeMover({ logger: options.logger.child({ component: 'mover' }) });
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  /**
   * Validate all directories, then start one worker per directory
   */
  async start(options: StartOptions): Promise<RunningSession> {
    const directories = [...new Set(options.directories.map(directory => resolve(directory)))];
    if (directories.length === 0) {
      throw new ConfigurationError([], 'No directories to track');
    }

    const checks = await Promise.all(directories.map(checkDirectory));
    const invalid = directories.filter((_, index) => !checks[index]);
    if (invalid.length > 0) {
      this.logger.error({ invalid }, 'Invalid tracked directories');
      throw new ConfigurationError(invalid);
    }

    const recursive = options.recursive ?? false;
    const resolver = new ExtensionResolver(options.extensionMap, options.undefinedExtensionPolicy);

    const workers = directories.map(directory => {
      const logger = this.logger.child({ component: 'worker', directory });
      return new DirectoryWorker({
        directory,
        logger,
        onOutcome: options.onOutcome,
        watcher: this.watcherFactory(directory, {
          recursive,
          debounceMs: options.debounceMs,
          ignorePartials: options.ignorePartials,
          ignoreHidden: options.ignoreHidden,
        }),
        handler: new SortEventHandler({
          directory,
          recursive,
          resolver,
          mover: this.mover,
          logger,
          dateSubfolders: options.dateSubfolders,
        }),
      });
    });

    const started = await Promise.allSettled(workers.map(worker => worker.start()));
    const failedIndex = started.findIndex(result => result.status === 'rejected');
    const failed = started[failedIndex];

    if (failed && failed.status === 'rejected') {
      await Promise.all(workers.map(worker => worker.stop()));
      const directory = directories[failedIndex] ?? '';
      this.logger.error({ directory, err: failed.reason }, 'Failed to start watcher');
      throw new WatchStartError(directory, failed.reason);
    }

    const session = new RunningSession(workers, this.stopTimeoutMs, this.logger, stopped => {
      this.sessions.delete(stopped);
    });
    this.sessions.add(session);

    this.logger.info(
      {
        session: session.id,
        directories,
        recursive,
        extensions: resolver.size,
        undefinedExtensions: resolver.undefinedExtensionPolicy.kind,
      },
      'Session started'
    );
    return session;
  }

  stop(session: RunningSession): Promise<StopReport> {
    return session.stop(this.stopTimeoutMs);
  }

  /**
   * Stop every session started by this supervisor
   */
  async stopAll(): Promise<StopReport> {
    const reports = await Promise.all([...this.sessions].map(session => this.stop(session)));
    return {
      stopped: reports.flatMap(report => report.stopped),
      forced: reports.flatMap(report => report.forced),
      failed: reports.flatMap(report => report.failed),
    };
  }

  get activeSessions(): number {
    return this.sessions.size;
  }
}
