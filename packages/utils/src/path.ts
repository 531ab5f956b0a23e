/**
 * Path Utilities
 */

import { basename, extname, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve a user-supplied path: trims it, expands a leading ~ and makes it absolute
 */
export function resolveUserPath(input: string, cwd: string = process.cwd()): string {
  const trimmed = input.trim();
  if (trimmed === '~') {
    return homedir();
  }
  if (trimmed.startsWith('~/') || trimmed.startsWith('~\\')) {
    return resolve(homedir(), trimmed.slice(2));
  }
  return resolve(cwd, trimmed);
}

/**
 * Get file extension: the text after the last dot of the base name, lowercase.
 * `archive.tar.GZ` gives `gz`, `Makefile` gives an empty string.
 */
export function getExtension(filename: string): string {
  const name = basename(filename);
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot + 1).toLowerCase();
}

/**
 * Split a base name into stem and suffix, keeping the dot on the suffix
 */
export function splitName(filename: string): { stem: string; suffix: string } {
  const name = basename(filename);
  const suffix = extname(name);
  return { stem: name.slice(0, name.length - suffix.length), suffix };
}
