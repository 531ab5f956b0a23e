/**
 * Commander argument parsers
 */

import { InvalidArgumentError } from 'commander';

export function increaseVerbosity(_value: string | undefined, previous: number): number {
  return previous + 1;
}

export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number of milliseconds.');
  }
  return parsed;
}
