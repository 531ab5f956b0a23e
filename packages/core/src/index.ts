/**
 * @file-sorter/core
 * 
 * Core package containing:
 * - Error handling
 * - Extension configuration store
 * - Types shared with the sorting engine
 */

// Types
export type {
  ExtensionMap,
  UndefinedExtensionPolicy,
  SessionConfig,
} from './types/sorting.js';

// Errors
export {
  FileSorterError,
  ValidationError,
  ConfigurationError,
  ConfigFileError,
  MoveError,
  WatchStartError,
  isFileSorterError,
  type MoveErrorKind,
} from './errors/index.js';

// Extension configuration
export {
  ExtensionConfigStore,
  EXTENSION_PATTERN,
  emptyConfig,
  normalizeConfigExtension,
  isValidConfigExtension,
  addExtension,
  removeExtensions,
  mergeExtensions,
  setUndefinedExtensionPath,
  selectExtensions,
  toSessionConfig,
  type ExtensionConfig,
  type RemoveResult,
  type SelectResult,
} from './config/extensionConfig.js';
