/**
 * Write Command
 *
 * Edits the extension configuration. Fragments are merged first, then single
 * additions, then removals, then the undefined extension path.
 */

import {
  ExtensionConfigStore,
  ValidationError,
  addExtension,
  mergeExtensions,
  normalizeConfigExtension,
  removeExtensions,
  setUndefinedExtensionPath,
} from '@file-sorter/core';
import type { CliContext } from '../lib/context.js';
import { printInfo, printSuccess, printWarning } from '../lib/output.js';

export interface WriteOptions {
  // Flat list of extension/path pairs
  add?: string[];
  remove?: string[];
  json?: string[];
  undefinedTo?: string;
  clearUndefined?: boolean;
}

function toPairs(values: readonly string[]): [string, string][] {
  if (values.length % 2 !== 0) {
    throw new ValidationError('add', 'expects an extension followed by a path, e.g. -a .jpg ~/Pictures');
  }
  const pairs: [string, string][] = [];
  for (let i = 0; i < values.length; i += 2) {
    pairs.push([values[i] ?? '', values[i + 1] ?? '']);
  }
  return pairs;
}

export async function writeCommand(options: WriteOptions, context: CliContext): Promise<void> {
  if (options.undefinedTo !== undefined && options.clearUndefined) {
    throw new ValidationError('undefined-to', 'cannot be combined with --clear-undefined');
  }

  const pairs = toPairs(options.add ?? []);
  const removals = options.remove ?? [];
  const fragments = options.json ?? [];

  if (
    pairs.length === 0 &&
    removals.length === 0 &&
    fragments.length === 0 &&
    options.undefinedTo === undefined &&
    !options.clearUndefined
  ) {
    printInfo('Nothing to write, see: file-sorter write --help');
    return;
  }

  const store = new ExtensionConfigStore(context.config.configFile, context.logger);
  let config = await store.read();

  for (const fragmentPath of fragments) {
    const fragment = await store.readFragment(fragmentPath);
    config = mergeExtensions(config, fragment);
    printSuccess(`Merged ${Object.keys(fragment).length} extensions from ${fragmentPath}`);
  }

  for (const [extension, path] of pairs) {
    config = addExtension(config, extension, path);
  }

  if (removals.length > 0) {
    const result = removeExtensions(config, removals);
    config = result.config;
    for (const raw of result.ignored) {
      printWarning(`Not configured, nothing to remove: ${raw}`);
    }
    if (result.removed.length > 0) {
      printSuccess(`Removed ${result.removed.join(', ')}`);
    }
  }

  if (options.undefinedTo !== undefined) {
    config = setUndefinedExtensionPath(config, options.undefinedTo);
  } else if (options.clearUndefined) {
    config = setUndefinedExtensionPath(config, null);
  }

  await store.write(config);

  for (const [raw] of pairs) {
    const extension = normalizeConfigExtension(raw);
    printSuccess(`Saved ${extension}: ${config.extensions[extension] ?? ''}`);
  }
  if (options.undefinedTo !== undefined) {
    printSuccess(`Files without a destination go to ${config.undefinedExtensionPath ?? ''}`);
  } else if (options.clearUndefined) {
    printSuccess('Files without a destination stay where they are');
  }
}
