/**
 * Sorter Types
 */

import type { MoveError } from '@file-sorter/core';

export type { ExtensionMap, UndefinedExtensionPolicy } from '@file-sorter/core';

// ============================================
// WATCHING
// ============================================

export type WatchEventType = 'created' | 'modified';

export interface WatchEvent {
  type: WatchEventType;
  // Absolute path of the file that changed
  path: string;
  // Tracked directory the notification came from
  directory: string;
  timestamp: Date;
}

export interface WatchListener {
  onEvent(event: WatchEvent): void;
  onError(error: Error): void;
}

export interface Subscription {
  // Releases the underlying watch handle and drops pending notifications
  unsubscribe(): Promise<void>;
}

/**
 * Anything that can deliver change notifications for one directory
 */
export interface Watcher {
  readonly directory: string;
  subscribe(listener: WatchListener): Promise<Subscription>;
}

export interface WatcherOptions {
  recursive: boolean;

  // Quiet window before a burst of notifications for one path is delivered
  debounceMs?: number;

  // Ignore in-progress download files (.part, .crdownload, ...)
  ignorePartials?: boolean;

  // Ignore names starting with a dot
  ignoreHidden?: boolean;
}

export type WatcherFactory = (directory: string, options: WatcherOptions) => Watcher;

// ============================================
// SORTING
// ============================================

export type Destination =
  | { kind: 'move-to'; directory: string }
  | { kind: 'skip' };

export interface PendingMove {
  sourcePath: string;
  extension: string;
  destination: Destination;
}

export type SkipReason = 'undefined-extension' | 'already-in-destination';

export type SortOutcome =
  | { status: 'moved'; directory: string; sourcePath: string; destinationPath: string; copied: boolean }
  | { status: 'skipped'; directory: string; sourcePath: string; extension: string; reason: SkipReason }
  | { status: 'vanished'; directory: string; sourcePath: string }
  | { status: 'failed'; directory: string; sourcePath: string; error: MoveError };

export type OutcomeListener = (outcome: SortOutcome) => void;

/**
 * Turns one notification into at most one move
 */
export interface Handler {
  plan(sourcePath: string): PendingMove;
  handle(event: WatchEvent): Promise<SortOutcome | null>;
}
