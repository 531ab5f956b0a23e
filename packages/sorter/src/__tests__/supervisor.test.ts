import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, WatchStartError } from '@file-sorter/core';
import { createSilentLogger } from '@file-sorter/utils';
import { DirectoryWorker } from '../supervisor/directoryWorker.js';
import { WatchSupervisor } from '../supervisor/watchSupervisor.js';
import { CollisionSafeMover } from '../mover/collisionSafeMover.js';
import type {
  Handler,
  SortOutcome,
  Subscription,
  WatchEvent,
  WatchListener,
  Watcher,
  WatcherFactory,
} from '../types.js';

class FakeWatcher implements Watcher {
  listener: WatchListener | null = null;
  unsubscribed = false;

  constructor(
    readonly directory: string,
    private readonly failWith?: Error
  ) {}

  async subscribe(listener: WatchListener): Promise<Subscription> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.listener = listener;
    return {
      unsubscribe: async () => {
        this.unsubscribed = true;
        this.listener = null;
      },
    };
  }

  emit(path: string): void {
    this.listener?.onEvent({ type: 'created', path, directory: this.directory, timestamp: new Date() });
  }

  die(error: Error): void {
    this.listener?.onError(error);
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

function movedOutcome(event: WatchEvent): SortOutcome {
  return {
    status: 'moved',
    directory: event.directory,
    sourcePath: event.path,
    destinationPath: `${event.path}.sorted`,
    copied: false,
  };
}

function fakeHandler(handle: (event: WatchEvent) => Promise<SortOutcome | null>): Handler {
  return {
    plan: sourcePath => ({ sourcePath, extension: '', destination: { kind: 'skip' } }),
    handle,
  };
}

describe('DirectoryWorker', () => {
  it('handles notifications one at a time in order', async () => {
    const watcher = new FakeWatcher('/downloads');
    const seen: string[] = [];
    let active = 0;
    let maxActive = 0;
    const outcomes: SortOutcome[] = [];

    const worker = new DirectoryWorker({
      directory: '/downloads',
      watcher,
      logger: createSilentLogger(),
      onOutcome: outcome => outcomes.push(outcome),
      handler: fakeHandler(async event => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(done => setTimeout(done, 5));
        seen.push(event.path);
        active--;
        return movedOutcome(event);
      }),
    });

    await worker.start();
    watcher.emit('/downloads/a.jpg');
    watcher.emit('/downloads/b.jpg');
    watcher.emit('/downloads/c.jpg');

    await vi.waitFor(() => {
      expect(outcomes).toHaveLength(3);
    });
    expect(seen).toEqual(['/downloads/a.jpg', '/downloads/b.jpg', '/downloads/c.jpg']);
    expect(maxActive).toBe(1);
    expect(worker.handledCount).toBe(3);

    await worker.stop();
  });

  it('keeps running after the handler throws', async () => {
    const watcher = new FakeWatcher('/downloads');
    const outcomes: SortOutcome[] = [];

    const worker = new DirectoryWorker({
      directory: '/downloads',
      watcher,
      logger: createSilentLogger(),
      onOutcome: outcome => outcomes.push(outcome),
      handler: fakeHandler(async event => {
        if (event.path.endsWith('bad.jpg')) {
          throw new Error('disk on fire');
        }
        return movedOutcome(event);
      }),
    });

    await worker.start();
    watcher.emit('/downloads/bad.jpg');
    watcher.emit('/downloads/good.jpg');

    await vi.waitFor(() => {
      expect(outcomes).toHaveLength(2);
    });
    const [failed, moved] = outcomes;
    expect(failed?.status).toBe('failed');
    if (failed?.status === 'failed') {
      expect(failed.error.kind).toBe('unexpected-io');
      expect(failed.error.message).toBe('Handler failed: disk on fire');
    }
    expect(moved?.status).toBe('moved');
    expect(worker.status).toBe('running');

    await worker.stop();
  });

  it('lets the notification in flight finish before stopping', async () => {
    const watcher = new FakeWatcher('/downloads');
    const started = deferred();
    const release = deferred();
    const outcomes: SortOutcome[] = [];

    const worker = new DirectoryWorker({
      directory: '/downloads',
      watcher,
      logger: createSilentLogger(),
      onOutcome: outcome => outcomes.push(outcome),
      handler: fakeHandler(async event => {
        started.resolve();
        await release.promise;
        return movedOutcome(event);
      }),
    });

    await worker.start();
    const listener = watcher.listener;
    watcher.emit('/downloads/a.jpg');
    await started.promise;

    let stopped = false;
    const stopping = worker.stop().then(() => {
      stopped = true;
    });
    await new Promise(done => setTimeout(done, 10));
    expect(stopped).toBe(false);
    expect(worker.status).toBe('stopping');
    expect(watcher.unsubscribed).toBe(true);

    release.resolve();
    await stopping;

    expect(stopped).toBe(true);
    expect(worker.status).toBe('stopped');
    expect(outcomes).toHaveLength(1);

    // Late notifications from a handle that was already released are dropped
    listener?.onEvent({ type: 'created', path: '/downloads/late.jpg', directory: '/downloads', timestamp: new Date() });
    await new Promise(done => setTimeout(done, 10));
    expect(outcomes).toHaveLength(1);
  });

  it('reports a dead watcher and stops taking notifications', async () => {
    const watcher = new FakeWatcher('/downloads');
    const outcomes: SortOutcome[] = [];
    const handle = vi.fn(async (event: WatchEvent) => movedOutcome(event));

    const worker = new DirectoryWorker({
      directory: '/downloads',
      watcher,
      logger: createSilentLogger(),
      onOutcome: outcome => outcomes.push(outcome),
      handler: fakeHandler(handle),
    });

    await worker.start();
    const listener = watcher.listener;
    watcher.die(new Error('watch handle died'));

    expect(worker.status).toBe('failed');
    expect(worker.failureReason?.message).toBe('watch handle died');
    expect(outcomes).toHaveLength(1);
    const [failed] = outcomes;
    expect(failed?.status).toBe('failed');
    if (failed?.status === 'failed') {
      expect(failed.sourcePath).toBe('/downloads');
      expect(failed.error.kind).toBe('unexpected-io');
      expect(failed.error.message).toBe('Watcher failed: watch handle died');
    }
    await vi.waitFor(() => {
      expect(watcher.unsubscribed).toBe(true);
    });

    listener?.onEvent({ type: 'created', path: '/downloads/late.jpg', directory: '/downloads', timestamp: new Date() });
    await worker.stop();

    expect(handle).not.toHaveBeenCalled();
    expect(worker.status).toBe('failed');
    expect(outcomes).toHaveLength(1);
  });

  it('cannot be started twice', async () => {
    const worker = new DirectoryWorker({
      directory: '/downloads',
      watcher: new FakeWatcher('/downloads'),
      logger: createSilentLogger(),
      handler: fakeHandler(async () => null),
    });

    await worker.start();
    await expect(worker.start()).rejects.toThrow('Worker for /downloads was already started');
    await worker.stop();
    await worker.stop();
    expect(worker.status).toBe('stopped');
  });
});

describe('WatchSupervisor', () => {
  let tempDir: string;
  let downloads: string;
  let desktop: string;
  let photos: string;
  let watchers: FakeWatcher[];
  let factory: WatcherFactory;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'file-sorter-supervisor-'));
    downloads = join(tempDir, 'downloads');
    desktop = join(tempDir, 'desktop');
    photos = join(tempDir, 'photos');
    await mkdir(downloads);
    await mkdir(desktop);
    watchers = [];
    factory = directory => {
      const watcher = new FakeWatcher(directory);
      watchers.push(watcher);
      return watcher;
    };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('refuses to start when any directory is invalid', async () => {
    const notADirectory = join(tempDir, 'file.txt');
    await writeFile(notADirectory, 'x');
    const missing = join(tempDir, 'missing');
    const watcherFactory = vi.fn(factory);
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory });

    const attempt = supervisor.start({ directories: [downloads, missing, notADirectory], extensionMap: {} });

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toMatchObject({ invalidPaths: [missing, notADirectory] });
    expect(watcherFactory).not.toHaveBeenCalled();
    expect(supervisor.activeSessions).toBe(0);
  });

  it('refuses to start with no directories', async () => {
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });

    await expect(supervisor.start({ directories: [], extensionMap: {} })).rejects.toThrow('No directories to track');
  });

  it('starts one worker per distinct directory', async () => {
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });

    const session = await supervisor.start({
      directories: [downloads, `${downloads}/`, desktop],
      extensionMap: { jpg: photos },
    });

    expect(session.directories).toEqual([downloads, desktop]);
    expect(watchers.map(watcher => watcher.directory)).toEqual([downloads, desktop]);
    expect(session.active).toBe(true);

    await supervisor.stop(session);
  });

  it('sorts files reported by any tracked directory', async () => {
    const outcomes: SortOutcome[] = [];
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });
    const session = await supervisor.start({
      directories: [downloads, desktop],
      extensionMap: { '.jpg': photos },
      onOutcome: outcome => outcomes.push(outcome),
    });

    await writeFile(join(downloads, 'a.jpg'), 'a');
    await writeFile(join(desktop, 'a.jpg'), 'b');
    watchers[0]?.emit(join(downloads, 'a.jpg'));
    watchers[1]?.emit(join(desktop, 'a.jpg'));

    await vi.waitFor(() => {
      expect(outcomes).toHaveLength(2);
    });
    expect(outcomes.every(outcome => outcome.status === 'moved')).toBe(true);
    expect((await readdir(photos)).sort()).toEqual(['a (1).jpg', 'a.jpg']);

    await supervisor.stop(session);
  });

  it('stops the started workers when one watcher fails to attach', async () => {
    const supervisor = new WatchSupervisor({
      logger: createSilentLogger(),
      watcherFactory: directory => {
        const watcher = new FakeWatcher(directory, directory === desktop ? new Error('too many watches') : undefined);
        watchers.push(watcher);
        return watcher;
      },
    });

    const attempt = supervisor.start({ directories: [downloads, desktop], extensionMap: {} });

    await expect(attempt).rejects.toBeInstanceOf(WatchStartError);
    await expect(attempt).rejects.toThrow(`Failed to watch ${desktop}: too many watches`);
    expect(watchers[0]?.unsubscribed).toBe(true);
    expect(supervisor.activeSessions).toBe(0);
  });

  it('stops every worker once, however often stop is called', async () => {
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });
    const session = await supervisor.start({ directories: [downloads, desktop], extensionMap: {} });

    const first = session.stop();
    const second = session.stop();

    expect(second).toBe(first);
    await expect(first).resolves.toEqual({ stopped: [downloads, desktop], forced: [], failed: [] });
    expect(session.active).toBe(false);
    expect(watchers.every(watcher => watcher.unsubscribed)).toBe(true);
    expect(supervisor.activeSessions).toBe(0);
    await expect(supervisor.stopAll()).resolves.toEqual({ stopped: [], forced: [], failed: [] });
  });

  it('lists directories whose watcher died when the session stops', async () => {
    const outcomes: SortOutcome[] = [];
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });
    const session = await supervisor.start({
      directories: [downloads, desktop],
      extensionMap: {},
      onOutcome: outcome => outcomes.push(outcome),
    });

    watchers[0]?.die(new Error('watch handle died'));

    expect(outcomes.map(outcome => [outcome.status, outcome.directory])).toEqual([['failed', downloads]]);
    await expect(session.stop()).resolves.toEqual({ stopped: [desktop], forced: [], failed: [downloads] });
    expect(supervisor.activeSessions).toBe(0);
  });

  it('forgets a session stopped through the session itself', async () => {
    const supervisor = new WatchSupervisor({ logger: createSilentLogger(), watcherFactory: factory });
    const first = await supervisor.start({ directories: [downloads], extensionMap: {} });
    const second = await supervisor.start({ directories: [desktop], extensionMap: {} });
    expect(supervisor.activeSessions).toBe(2);

    await first.stop();
    expect(supervisor.activeSessions).toBe(1);

    await expect(supervisor.stopAll()).resolves.toEqual({ stopped: [desktop], forced: [], failed: [] });
    expect(second.active).toBe(false);
    expect(supervisor.activeSessions).toBe(0);
  });

  it('force-terminates workers that do not stop in time', async () => {
    const rename = vi.fn(() => new Promise<void>(() => undefined));
    const supervisor = new WatchSupervisor({
      logger: createSilentLogger(),
      watcherFactory: factory,
      mover: new CollisionSafeMover({ fileOps: { rename } }),
      stopTimeoutMs: 50,
    });
    const session = await supervisor.start({ directories: [downloads, desktop], extensionMap: { jpg: photos } });

    await writeFile(join(downloads, 'stuck.jpg'), 'x');
    watchers[0]?.emit(join(downloads, 'stuck.jpg'));
    await vi.waitFor(() => {
      expect(rename).toHaveBeenCalled();
    });

    const report = await supervisor.stop(session);

    expect(report).toEqual({ stopped: [desktop], forced: [downloads], failed: [] });
    expect(watchers.every(watcher => watcher.unsubscribed)).toBe(true);
  });
});
