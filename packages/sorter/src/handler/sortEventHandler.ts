/**
 * Sort Event Handler
 *
 * Turns notifications for one tracked directory into moves:
 * filter → resolve destination → collision-safe move → outcome.
 *
 * Never throws. Every failure becomes a `failed` outcome, and a source that
 * is already gone (moved by an earlier notification, deleted by the user)
 * becomes `vanished`.
 */

import { lstat } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { MoveError } from '@file-sorter/core';
import { errorCode, yearMonthSegments, type Logger } from '@file-sorter/utils';
import type { ExtensionResolver } from '../resolver/extensionResolver.js';
import type { CollisionSafeMover } from '../mover/collisionSafeMover.js';
import type { Handler, PendingMove, SortOutcome, WatchEvent } from '../types.js';

export interface SortEventHandlerOptions {
  directory: string;
  recursive: boolean;
  resolver: ExtensionResolver;
  mover: CollisionSafeMover;
  logger: Logger;

  // Move into destination/YYYY/Mon instead of destination
  dateSubfolders?: boolean;
  now?: () => Date;
}

export class SortEventHandler implements Handler {
  readonly directory: string;
  private readonly recursive: boolean;
  private readonly resolver: ExtensionResolver;
  private readonly mover: CollisionSafeMover;
  private readonly logger: Logger;
  private readonly dateSubfolders: boolean;
  private readonly now: () => Date;

  constructor(options: SortEventHandlerOptions) {
    this.directory = resolve(options.directory);
    this.recursive = options.recursive;
    this.resolver = options.resolver;
    this.mover = options.mover;
    this.logger = options.logger;
    this.dateSubfolders = options.dateSubfolders ?? false;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Whether a path belongs to this handler's directory
   */
  isInScope(path: string): boolean {
    const rel = relative(this.directory, resolve(path));
    if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return false;
    }
    return this.recursive || dirname(rel) === '.';
  }

  plan(sourcePath: string): PendingMove {
    const destination = this.resolver.resolve(sourcePath);
    return {
      sourcePath,
      extension: this.resolver.extensionOf(sourcePath),
      destination: destination.kind === 'move-to' && this.dateSubfolders
        ? { kind: 'move-to', directory: join(destination.directory, ...yearMonthSegments(this.now())) }
        : destination,
    };
  }

  async handle(event: WatchEvent): Promise<SortOutcome | null> {
    const sourcePath = resolve(event.path);
    if (!this.isInScope(sourcePath)) {
      return null;
    }

    try {
      return await this.process(sourcePath);
    } catch (error) {
      const failure = new MoveError(
        'unexpected-io',
        sourcePath,
        undefined,
        `Unexpected error while handling ${sourcePath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
      this.logger.error({ source: sourcePath, kind: failure.kind, err: error }, 'Failed to handle file');
      return { status: 'failed', directory: this.directory, sourcePath, error: failure };
    }
  }

  private async process(sourcePath: string): Promise<SortOutcome | null> {
    let isFile: boolean;
    try {
      isFile = (await lstat(sourcePath)).isFile();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return this.vanished(sourcePath);
      }
      throw error;
    }

    if (!isFile) {
      this.logger.debug({ path: sourcePath }, 'Skipping directory');
      return null;
    }

    const pending = this.plan(sourcePath);

    if (pending.destination.kind === 'skip') {
      this.logger.warn(
        { source: sourcePath, extension: pending.extension },
        'Skipping file, no path defined for its extension and no path for undefined extensions'
      );
      return {
        status: 'skipped',
        directory: this.directory,
        sourcePath,
        extension: pending.extension,
        reason: 'undefined-extension',
      };
    }

    const destinationDir = resolve(pending.destination.directory);
    if (dirname(sourcePath) === destinationDir) {
      this.logger.debug({ source: sourcePath }, 'File is already in its destination');
      return {
        status: 'skipped',
        directory: this.directory,
        sourcePath,
        extension: pending.extension,
        reason: 'already-in-destination',
      };
    }

    const result = await this.mover.move(sourcePath, destinationDir);

    if (result.ok) {
      this.logger.info({ source: sourcePath, destination: result.path, copied: result.copied }, 'Moved file');
      return {
        status: 'moved',
        directory: this.directory,
        sourcePath,
        destinationPath: result.path,
        copied: result.copied,
      };
    }

    if (result.error.kind === 'source-vanished') {
      return this.vanished(sourcePath);
    }

    this.logger.error(
      { source: sourcePath, destination: destinationDir, kind: result.error.kind, err: result.error.cause },
      result.error.message
    );
    return { status: 'failed', directory: this.directory, sourcePath, error: result.error };
  }

  private vanished(sourcePath: string): SortOutcome {
    this.logger.debug({ source: sourcePath }, 'File no longer exists, nothing to move');
    return { status: 'vanished', directory: this.directory, sourcePath };
  }
}
