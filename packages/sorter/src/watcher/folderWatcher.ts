/**
 * Folder Watcher
 *
 * Watches one directory with native fs.watch and delivers debounced
 * `created` / `modified` notifications.
 *
 * Features:
 * - Optional recursive watching
 * - Debounced events (a file written in chunks is reported once it goes quiet)
 * - Deletions and renames away are dropped, only paths that exist are reported
 * - Partial download and hidden file filtering
 */

import { watch, type FSWatcher } from 'node:fs';
import { join } from 'node:path';
import { safeStat } from '@file-sorter/utils';
import { createDebouncer } from './debounce.js';
import { shouldIgnore, type NameFilterOptions } from './filters.js';
import type {
  Subscription,
  WatchEventType,
  WatchListener,
  Watcher,
  WatcherFactory,
  WatcherOptions,
} from '../types.js';

export const DEFAULT_DEBOUNCE_MS = 500;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class FolderWatcher implements Watcher {
  private readonly recursive: boolean;
  private readonly debounceMs: number;
  private readonly filters: NameFilterOptions;

  constructor(
    public readonly directory: string,
    options: WatcherOptions
  ) {
    this.recursive = options.recursive;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.filters = {
      ignorePartials: options.ignorePartials ?? true,
      ignoreHidden: options.ignoreHidden ?? false,
    };
  }

  async subscribe(listener: WatchListener): Promise<Subscription> {
    const debouncer = createDebouncer(this.debounceMs);
    // First notification type inside one debounce window wins, so created+modified stays created
    const pendingTypes = new Map<string, WatchEventType>();
    let closed = false;

    const deliver = async (fullPath: string): Promise<void> => {
      const type = pendingTypes.get(fullPath) ?? 'modified';
      pendingTypes.delete(fullPath);

      try {
        const stats = await safeStat(fullPath);
        // Deleted or moved away (including by our own moves)
        if (!stats || closed) {
          return;
        }
        listener.onEvent({ type, path: fullPath, directory: this.directory, timestamp: new Date() });
      } catch (error) {
        listener.onError(toError(error));
      }
    };

    const handle: FSWatcher = watch(
      this.directory,
      { recursive: this.recursive, persistent: true },
      (eventType, filename) => {
        if (!filename || closed) {
          return;
        }

        const fullPath = join(this.directory, filename);
        if (shouldIgnore(fullPath, this.filters)) {
          return;
        }

        if (!pendingTypes.has(fullPath)) {
          pendingTypes.set(fullPath, eventType === 'rename' ? 'created' : 'modified');
        }
        debouncer.debounce(fullPath, () => {
          void deliver(fullPath);
        });
      }
    );

    handle.on('error', (error: Error) => {
      listener.onError(error);
    });

    return {
      unsubscribe: async () => {
        if (closed) {
          return;
        }
        closed = true;
        debouncer.clear();
        pendingTypes.clear();
        handle.close();
      },
    };
  }
}

export const createFolderWatcher: WatcherFactory = (directory, options) =>
  new FolderWatcher(directory, options);
