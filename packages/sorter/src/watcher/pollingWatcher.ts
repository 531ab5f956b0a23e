/**
 * Polling Watcher
 *
 * Fallback for filesystems where native notifications are unreliable
 * (network shares, some container mounts). Rescans the directory on an
 * interval and reports files that appeared or changed since the last scan.
 *
 * A new or changed file is only reported once its size and modification time
 * have stayed the same for `stabilityChecks` consecutive scans, so a file
 * still being written is picked up after the writer is done.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { errorCode } from '@file-sorter/utils';
import { shouldIgnore, type NameFilterOptions } from './filters.js';
import type {
  Subscription,
  WatchEventType,
  WatchListener,
  Watcher,
  WatcherFactory,
  WatcherOptions,
} from '../types.js';

export const DEFAULT_POLL_INTERVAL_MS = 2000;

export interface PollingWatcherOptions extends WatcherOptions {
  intervalMs?: number;
  stabilityChecks?: number;
}

export interface PollingSubscription extends Subscription {
  // Run one scan now
  poll(): Promise<void>;
}

interface FileSignature {
  size: number;
  mtimeMs: number;
}

interface PendingFile {
  signature: FileSignature;
  type: WatchEventType;
  checks: number;
}

function sameSignature(a: FileSignature, b: FileSignature): boolean {
  return a.size === b.size && a.mtimeMs === b.mtimeMs;
}

export class PollingWatcher implements Watcher {
  private readonly recursive: boolean;
  private readonly intervalMs: number;
  private readonly stabilityChecks: number;
  private readonly filters: NameFilterOptions;

  constructor(
    public readonly directory: string,
    options: PollingWatcherOptions
  ) {
    this.recursive = options.recursive;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.stabilityChecks = options.stabilityChecks ?? 1;
    this.filters = {
      ignorePartials: options.ignorePartials ?? true,
      ignoreHidden: options.ignoreHidden ?? false,
    };
  }

  async subscribe(listener: WatchListener): Promise<PollingSubscription> {
    // Files present at subscription time are not reported
    const known = await this.scan(this.directory);
    const pending = new Map<string, PendingFile>();
    let closed = false;
    let running: Promise<void> | null = null;

    const compare = async (): Promise<void> => {
      const current = await this.scan(this.directory);
      if (closed) {
        return;
      }

      for (const [path, signature] of current) {
        const previous = known.get(path);
        if (previous && sameSignature(previous, signature)) {
          pending.delete(path);
          continue;
        }

        let entry = pending.get(path);
        if (entry && sameSignature(entry.signature, signature)) {
          entry.checks++;
        } else {
          entry = {
            signature,
            type: entry?.type ?? (previous ? 'modified' : 'created'),
            checks: 0,
          };
          pending.set(path, entry);
        }

        if (entry.checks >= this.stabilityChecks) {
          pending.delete(path);
          known.set(path, signature);
          listener.onEvent({ type: entry.type, path, directory: this.directory, timestamp: new Date() });
        }
      }

      for (const path of known.keys()) {
        if (!current.has(path)) known.delete(path);
      }
      for (const path of pending.keys()) {
        if (!current.has(path)) pending.delete(path);
      }
    };

    const poll = async (): Promise<void> => {
      // Never overlap two scans
      if (running) {
        return running;
      }
      running = compare()
        .catch((error: unknown) => {
          listener.onError(error instanceof Error ? error : new Error(String(error)));
        })
        .finally(() => {
          running = null;
        });
      return running;
    };

    const timer = setInterval(() => {
      void poll();
    }, this.intervalMs);

    return {
      poll,
      unsubscribe: async () => {
        if (closed) {
          return;
        }
        closed = true;
        clearInterval(timer);
        if (running) {
          await running;
        }
      },
    };
  }

  private async scan(dirPath: string): Promise<Map<string, FileSignature>> {
    const files = new Map<string, FileSignature>();
    await this.scanInto(dirPath, files);
    return files;
  }

  private async scanInto(dirPath: string, files: Map<string, FileSignature>): Promise<void> {
    const entries = await readdir(dirPath, { withFileTypes: true }).catch((error: unknown) => {
      // A subdirectory removed mid-scan
      if (dirPath !== this.directory && errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    });
    if (!entries) {
      return;
    }

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);

      if (shouldIgnore(fullPath, this.filters)) {
        continue;
      }

      if (entry.isDirectory()) {
        if (this.recursive) {
          await this.scanInto(fullPath, files);
        }
        continue;
      }

      if (!entry.isFile()) {
        continue;
      }

      try {
        const stats = await stat(fullPath);
        files.set(fullPath, { size: stats.size, mtimeMs: stats.mtimeMs });
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
          throw error;
        }
      }
    }
  }
}

export function createPollingWatcherFactory(
  settings: Pick<PollingWatcherOptions, 'intervalMs' | 'stabilityChecks'> = {}
): WatcherFactory {
  return (directory, options) => new PollingWatcher(directory, { ...options, ...settings });
}
