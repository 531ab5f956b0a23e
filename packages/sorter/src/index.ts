/**
 * @file-sorter/sorter
 *
 * Sorting engine:
 * - Folder watchers (native and polling)
 * - Extension resolver
 * - Collision-safe mover
 * - Per-directory workers and the watch supervisor
 */

// Types
export type {
  WatchEventType,
  WatchEvent,
  WatchListener,
  Subscription,
  Watcher,
  WatcherOptions,
  WatcherFactory,
  Destination,
  PendingMove,
  SkipReason,
  SortOutcome,
  OutcomeListener,
  Handler,
  ExtensionMap,
  UndefinedExtensionPolicy,
} from './types.js';

// Watching
export {
  FolderWatcher,
  createFolderWatcher,
  DEFAULT_DEBOUNCE_MS,
} from './watcher/folderWatcher.js';
export {
  PollingWatcher,
  createPollingWatcherFactory,
  DEFAULT_POLL_INTERVAL_MS,
  type PollingWatcherOptions,
  type PollingSubscription,
} from './watcher/pollingWatcher.js';
export { createDebouncer, type Debouncer } from './watcher/debounce.js';
export {
  PARTIAL_PATTERNS,
  isPartialDownload,
  shouldIgnore,
  type NameFilterOptions,
} from './watcher/filters.js';

// Resolving and moving
export { ExtensionResolver, normalizeExtension } from './resolver/extensionResolver.js';
export {
  CollisionSafeMover,
  candidateName,
  classifyMoveError,
  type FileOps,
  type MoverOptions,
  type MoveResult,
} from './mover/collisionSafeMover.js';
export { SortEventHandler, type SortEventHandlerOptions } from './handler/sortEventHandler.js';

// Supervision
export {
  DirectoryWorker,
  type DirectoryWorkerOptions,
  type WorkerState,
} from './supervisor/directoryWorker.js';
export {
  WatchSupervisor,
  RunningSession,
  DEFAULT_STOP_TIMEOUT_MS,
  type WatchSupervisorOptions,
  type StartOptions,
  type StopReport,
} from './supervisor/watchSupervisor.js';
