/**
 * Extension Resolver
 * 
 * Maps a file name to its destination directory by extension.
 * Keys and lookups are normalized the same way: lowercase, no leading dot.
 */

import { getExtension } from '@file-sorter/utils';
import type { Destination, ExtensionMap, UndefinedExtensionPolicy } from '../types.js';

export function normalizeExtension(extension: string): string {
  return extension.trim().toLowerCase().replace(/^\./, '');
}

export class ExtensionResolver {
  private readonly destinations: ReadonlyMap<string, string>;
  private readonly policy: UndefinedExtensionPolicy;

  constructor(
    extensionMap: ExtensionMap,
    policy: UndefinedExtensionPolicy = { kind: 'skip' }
  ) {
    const destinations = new Map<string, string>();
    // Later keys win when two raw keys normalize to the same extension
    for (const [extension, directory] of Object.entries(extensionMap)) {
      destinations.set(normalizeExtension(extension), directory);
    }
    this.destinations = destinations;
    this.policy = policy;
  }

  /**
   * Extension of a file name as used for lookups (may be empty)
   */
  extensionOf(filename: string): string {
    return getExtension(filename);
  }

  resolve(filename: string): Destination {
    const mapped = this.lookup(this.extensionOf(filename));
    if (mapped !== undefined) {
      return { kind: 'move-to', directory: mapped };
    }

    return this.policy.kind === 'move-to'
      ? { kind: 'move-to', directory: this.policy.path }
      : { kind: 'skip' };
  }

  lookup(extension: string): string | undefined {
    return this.destinations.get(normalizeExtension(extension));
  }

  get size(): number {
    return this.destinations.size;
  }

  get undefinedExtensionPolicy(): UndefinedExtensionPolicy {
    return this.policy;
  }
}
