/**
 * Names the watchers never report
 */

import { basename } from 'node:path';

// Common partial download patterns
export const PARTIAL_PATTERNS: readonly RegExp[] = [
  /\.part$/i,
  /\.partial$/i,
  /\.crdownload$/i,
  /\.download$/i,
  /\.tmp$/i,
  /\.temp$/i,
  /~$/,
  /\.!qB$/i,      // qBittorrent
  /\.!ut$/i,      // uTorrent
  /\.bc!$/i,      // BitComet
  /\.aria2$/i,    // aria2
];

export interface NameFilterOptions {
  ignorePartials: boolean;
  ignoreHidden: boolean;
}

export function isPartialDownload(filename: string): boolean {
  return PARTIAL_PATTERNS.some(pattern => pattern.test(filename));
}

export function shouldIgnore(path: string, options: NameFilterOptions): boolean {
  const name = basename(path);

  if (options.ignoreHidden && name.startsWith('.')) {
    return true;
  }

  return options.ignorePartials && isPartialDownload(name);
}
