/**
 * Collision-Safe Mover
 *
 * Moves one file into a destination directory without ever replacing an
 * existing entry. On a name clash the file gets a numeric suffix:
 * `report.pdf`, `report (1).pdf`, `report (2).pdf`, ...
 *
 * Each candidate name is claimed with an exclusive create right before the
 * transfer, so concurrent movers into the same directory never pick the same
 * name. The transfer is a rename; across volumes it falls back to copy,
 * timestamp restore and delete.
 */

import {
  copyFile as fsCopyFile,
  lstat,
  open,
  rename as fsRename,
  rm,
  unlink as fsUnlink,
  utimes as fsUtimes,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, join } from 'node:path';
import { MoveError, type MoveErrorKind } from '@file-sorter/core';
import { createSilentLogger, ensureDir, errorCode, splitName, type Logger } from '@file-sorter/utils';

export interface FileOps {
  rename(source: string, destination: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  unlink(path: string): Promise<void>;
  utimes(path: string, atime: Date, mtime: Date): Promise<void>;
}

export interface MoverOptions {
  // Highest numeric suffix tried before giving up
  maxSuffix?: number;
  logger?: Logger;
  // Filesystem primitives, replaceable for tests
  fileOps?: Partial<FileOps>;
}

export type MoveResult =
  | { ok: true; path: string; copied: boolean }
  | { ok: false; error: MoveError };

type MovePhase = 'source' | 'destination' | 'transfer';

const defaultFileOps: FileOps = {
  rename: fsRename,
  copyFile: (source, destination) => fsCopyFile(source, destination),
  unlink: fsUnlink,
  utimes: (path, atime, mtime) => fsUtimes(path, atime, mtime),
};

/**
 * Name for the n-th attempt: 0 keeps the original name
 */
export function candidateName(filename: string, attempt: number): string {
  if (attempt === 0) {
    return filename;
  }
  const { stem, suffix } = splitName(filename);
  return `${stem} (${attempt})${suffix}`;
}

/**
 * Map a filesystem error to a move error kind, depending on where it happened
 */
export function classifyMoveError(error: unknown, phase: MovePhase): MoveErrorKind {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return phase === 'destination' ? 'destination-unwritable' : 'source-vanished';
    case 'EACCES':
    case 'EPERM':
    case 'EBUSY':
      return phase === 'destination' ? 'destination-unwritable' : 'permission-denied';
    case 'EROFS':
    case 'EISDIR':
    case 'EEXIST':
      return 'destination-unwritable';
    default:
      return 'unexpected-io';
  }
}

function describeFailure(kind: MoveErrorKind, error: unknown): string {
  const reason = error instanceof Error ? error.message : String(error);
  switch (kind) {
    case 'source-vanished':
      return `Source disappeared before it could be moved: ${reason}`;
    case 'permission-denied':
      return `Permission denied: ${reason}`;
    case 'destination-unwritable':
      return `Destination is not writable: ${reason}`;
    case 'unexpected-io':
      return `Unexpected I/O error: ${reason}`;
  }
}

export class CollisionSafeMover {
  private readonly maxSuffix: number;
  private readonly logger: Logger;
  private readonly fileOps: FileOps;

  constructor(options: MoverOptions = {}) {
    this.maxSuffix = options.maxSuffix ?? 9999;
    this.logger = options.logger ?? createSilentLogger();
    this.fileOps = { ...defaultFileOps, ...options.fileOps };
  }

  async move(sourcePath: string, destinationDir: string): Promise<MoveResult> {
    let sourceStats: Stats;
    try {
      sourceStats = await lstat(sourcePath);
    } catch (error) {
      return this.failure(sourcePath, destinationDir, error, 'source');
    }

    if (!sourceStats.isFile()) {
      return {
        ok: false,
        error: new MoveError('unexpected-io', sourcePath, destinationDir, `Not a regular file: ${sourcePath}`),
      };
    }

    try {
      await ensureDir(destinationDir);
    } catch (error) {
      return this.failure(sourcePath, destinationDir, error, 'destination');
    }

    const filename = basename(sourcePath);

    for (let attempt = 0; attempt <= this.maxSuffix; attempt++) {
      const target = join(destinationDir, candidateName(filename, attempt));

      try {
        if (!(await this.claim(target))) {
          continue;
        }
      } catch (error) {
        return this.failure(sourcePath, destinationDir, error, 'destination');
      }

      try {
        const copied = await this.transfer(sourcePath, target, sourceStats);
        return { ok: true, path: target, copied };
      } catch (error) {
        await this.release(target);
        return this.failure(sourcePath, destinationDir, error, 'transfer');
      }
    }

    return {
      ok: false,
      error: new MoveError(
        'unexpected-io',
        sourcePath,
        destinationDir,
        `No free name for ${filename} in ${destinationDir} up to suffix (${this.maxSuffix})`
      ),
    };
  }

  /**
   * Reserve a name with an exclusive create. False when the name is taken.
   */
  private async claim(target: string): Promise<boolean> {
    try {
      const handle = await open(target, 'wx');
      await handle.close();
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Replace the claimed placeholder with the source. Returns true when copied across volumes.
   */
  private async transfer(source: string, target: string, stats: Stats): Promise<boolean> {
    try {
      await this.fileOps.rename(source, target);
      return false;
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
    }

    this.logger.debug({ source, target }, 'Cross-device move, copying');
    await this.fileOps.copyFile(source, target);

    try {
      await this.fileOps.utimes(target, stats.atime, stats.mtime);
    } catch (error) {
      this.logger.debug({ target, error }, 'Could not restore timestamps');
    }

    try {
      await this.fileOps.unlink(source);
    } catch (error) {
      // Source already gone: the copy is the only one left, keep it
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
    return true;
  }

  private async release(target: string): Promise<void> {
    try {
      await rm(target, { force: true });
    } catch (error) {
      this.logger.warn({ target, error }, 'Could not remove claimed destination name');
    }
  }

  private failure(
    sourcePath: string,
    destinationDir: string,
    error: unknown,
    phase: MovePhase
  ): MoveResult {
    const kind = classifyMoveError(error, phase);
    return {
      ok: false,
      error: new MoveError(kind, sourcePath, destinationDir, describeFailure(kind, error), error),
    };
  }
}
