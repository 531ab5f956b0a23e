/**
 * Directory Worker
 *
 * One watcher subscription plus one handler for a tracked directory.
 * Notifications are handled one at a time in delivery order; anything thrown
 * inside the handler is caught here and reported as an `unexpected-io`
 * failure, so the worker keeps running. A watcher that dies moves the worker
 * to `failed` and is reported the same way.
 */

import { MoveError } from '@file-sorter/core';
import type { Logger } from '@file-sorter/utils';
import type { Handler, OutcomeListener, SortOutcome, Subscription, WatchEvent, Watcher } from '../types.js';

export type WorkerState = 'idle' | 'running' | 'stopping' | 'stopped' | 'failed';

export interface DirectoryWorkerOptions {
  directory: string;
  watcher: Watcher;
  handler: Handler;
  logger: Logger;
  onOutcome?: OutcomeListener;
}

export class DirectoryWorker {
  readonly directory: string;
  private readonly watcher: Watcher;
  private readonly handler: Handler;
  private readonly logger: Logger;
  private readonly onOutcome?: OutcomeListener;

  private state: WorkerState = 'idle';
  private subscription: Subscription | null = null;
  private queue: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private handled = 0;
  private failure: Error | null = null;

  constructor(options: DirectoryWorkerOptions) {
    this.directory = options.directory;
    this.watcher = options.watcher;
    this.handler = options.handler;
    this.logger = options.logger;
    this.onOutcome = options.onOutcome;
  }

  get status(): WorkerState {
    return this.state;
  }

  get handledCount(): number {
    return this.handled;
  }

  // Why the watcher died, when it did
  get failureReason(): Error | null {
    return this.failure;
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Worker for ${this.directory} was already started`);
    }

    this.subscription = await this.watcher.subscribe({
      onEvent: event => this.enqueue(event),
      onError: error => this.fail(error),
    });
    this.state = 'running';
    this.logger.info('Started watching directory');
  }

  /**
   * Stop taking notifications, let the one in flight finish, release the watch handle
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Release the watch handle without waiting for the notification in flight
   */
  async terminate(): Promise<void> {
    if (this.state !== 'failed') {
      this.state = 'stopped';
    }
    await this.releaseSubscription();
    this.logger.warn('Watcher force-terminated');
  }

  private async shutdown(): Promise<void> {
    if (this.state === 'idle' || this.state === 'stopped') {
      this.state = 'stopped';
      return;
    }
    if (this.state === 'failed') {
      await this.queue;
      return;
    }

    this.state = 'stopping';
    await this.releaseSubscription();
    await this.queue;
    this.state = 'stopped';
    this.logger.info({ handled: this.handled }, 'Stopped watching directory');
  }

  private async releaseSubscription(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      await subscription.unsubscribe();
    }
  }

  /**
   * The watch handle is gone: drop queued notifications, let the one in flight
   * finish, release what is left of the subscription and tell the listener
   */
  private fail(error: Error): void {
    if (this.state !== 'running') {
      this.logger.warn({ err: error }, 'Watcher error after stop');
      return;
    }

    this.state = 'failed';
    this.failure = error;
    this.logger.error({ err: error }, 'Watcher failed, no longer watching directory');

    this.queue = this.queue
      .then(() => this.releaseSubscription())
      .catch((releaseError: unknown) => {
        this.logger.error({ err: releaseError }, 'Failed to release watch handle');
      });

    this.report({
      status: 'failed',
      directory: this.directory,
      sourcePath: this.directory,
      error: new MoveError('unexpected-io', this.directory, undefined, `Watcher failed: ${error.message}`, error),
    });
  }

  private enqueue(event: WatchEvent): void {
    if (this.state !== 'running') {
      return;
    }
    this.queue = this.queue.then(() => this.process(event));
  }

  private async process(event: WatchEvent): Promise<void> {
    // Queued before a stop request
    if (this.state !== 'running') {
      return;
    }

    let outcome: SortOutcome | null;
    try {
      outcome = await this.handler.handle(event);
    } catch (error) {
      this.logger.error({ path: event.path, err: error }, 'Handler failed unexpectedly');
      outcome = {
        status: 'failed',
        directory: this.directory,
        sourcePath: event.path,
        error: new MoveError(
          'unexpected-io',
          event.path,
          undefined,
          `Handler failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        ),
      };
    }

    if (!outcome) {
      return;
    }

    this.handled++;
    this.report(outcome);
  }

  private report(outcome: SortOutcome): void {
    if (!this.onOutcome) {
      return;
    }
    try {
      this.onOutcome(outcome);
    } catch (error) {
      this.logger.error({ err: error, status: outcome.status }, 'Outcome listener threw');
    }
  }
}
