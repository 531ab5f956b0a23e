import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDebouncer } from '../watcher/debounce.js';
import { isPartialDownload, shouldIgnore } from '../watcher/filters.js';
import { PollingWatcher } from '../watcher/pollingWatcher.js';
import { FolderWatcher } from '../watcher/folderWatcher.js';
import type { WatchEvent, WatchListener } from '../types.js';

function collect(): { events: WatchEvent[]; errors: Error[]; listener: WatchListener } {
  const events: WatchEvent[] = [];
  const errors: Error[] = [];
  return {
    events,
    errors,
    listener: {
      onEvent: event => events.push(event),
      onError: error => errors.push(error),
    },
  };
}

describe('createDebouncer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs once per key after the key goes quiet', () => {
    const debouncer = createDebouncer(100);
    const calls: string[] = [];

    debouncer.debounce('a', () => calls.push('a1'));
    vi.advanceTimersByTime(60);
    debouncer.debounce('a', () => calls.push('a2'));
    debouncer.debounce('b', () => calls.push('b1'));
    expect(debouncer.size).toBe(2);

    vi.advanceTimersByTime(99);
    expect(calls).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(calls).toEqual(['a2', 'b1']);
    expect(debouncer.size).toBe(0);
  });

  it('drops pending callbacks on clear', () => {
    const debouncer = createDebouncer(100);
    const fn = vi.fn();

    debouncer.debounce('a', fn);
    debouncer.clear();
    vi.advanceTimersByTime(500);

    expect(fn).not.toHaveBeenCalled();
  });
});

describe('name filters', () => {
  it('recognizes partial downloads', () => {
    expect(isPartialDownload('movie.mkv.part')).toBe(true);
    expect(isPartialDownload('setup.exe.crdownload')).toBe(true);
    expect(isPartialDownload('movie.mkv')).toBe(false);
  });

  it('ignores hidden names only when asked', () => {
    expect(shouldIgnore('/downloads/.DS_Store', { ignorePartials: true, ignoreHidden: false })).toBe(false);
    expect(shouldIgnore('/downloads/.DS_Store', { ignorePartials: true, ignoreHidden: true })).toBe(true);
    expect(shouldIgnore('/downloads/a.tmp', { ignorePartials: false, ignoreHidden: false })).toBe(false);
  });
});

describe('PollingWatcher', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'file-sorter-poll-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reports new files once they are stable, not files present at start', async () => {
    await writeFile(join(tempDir, 'existing.txt'), 'old');
    const watcher = new PollingWatcher(tempDir, { recursive: false, intervalMs: 60_000 });
    const { events, errors, listener } = collect();
    const subscription = await watcher.subscribe(listener);

    await writeFile(join(tempDir, 'new.jpg'), 'a');
    await subscription.poll();
    expect(events).toEqual([]);

    await subscription.poll();
    expect(events.map(event => [event.type, event.path])).toEqual([['created', join(tempDir, 'new.jpg')]]);
    expect(events[0]?.directory).toBe(tempDir);

    await subscription.poll();
    expect(events).toHaveLength(1);
    expect(errors).toEqual([]);

    await subscription.unsubscribe();
  });

  it('waits while a file keeps growing', async () => {
    const watcher = new PollingWatcher(tempDir, { recursive: false, intervalMs: 60_000 });
    const { events, listener } = collect();
    const subscription = await watcher.subscribe(listener);

    await writeFile(join(tempDir, 'big.iso'), 'a');
    await subscription.poll();
    await writeFile(join(tempDir, 'big.iso'), 'ab');
    await subscription.poll();
    expect(events).toEqual([]);

    await subscription.poll();
    expect(events.map(event => event.type)).toEqual(['created']);

    await subscription.unsubscribe();
  });

  it('reports changes to known files as modified', async () => {
    await writeFile(join(tempDir, 'notes.txt'), 'a');
    const watcher = new PollingWatcher(tempDir, { recursive: false, intervalMs: 60_000 });
    const { events, listener } = collect();
    const subscription = await watcher.subscribe(listener);

    await writeFile(join(tempDir, 'notes.txt'), 'changed');
    await subscription.poll();
    await subscription.poll();

    expect(events.map(event => [event.type, event.path])).toEqual([['modified', join(tempDir, 'notes.txt')]]);
    await subscription.unsubscribe();
  });

  it('looks into subdirectories only when recursive and skips partial downloads', async () => {
    await mkdir(join(tempDir, 'sub'));
    const flat = collect();
    const deep = collect();
    const flatSubscription = await new PollingWatcher(tempDir, { recursive: false, intervalMs: 60_000 }).subscribe(flat.listener);
    const deepSubscription = await new PollingWatcher(tempDir, { recursive: true, intervalMs: 60_000 }).subscribe(deep.listener);

    await writeFile(join(tempDir, 'sub', 'nested.pdf'), 'x');
    await writeFile(join(tempDir, 'video.mkv.part'), 'x');
    for (const subscription of [flatSubscription, deepSubscription]) {
      await subscription.poll();
      await subscription.poll();
    }

    expect(flat.events).toEqual([]);
    expect(deep.events.map(event => event.path)).toEqual([join(tempDir, 'sub', 'nested.pdf')]);

    await flatSubscription.unsubscribe();
    await deepSubscription.unsubscribe();
  });

  it('stops reporting after unsubscribe', async () => {
    const watcher = new PollingWatcher(tempDir, { recursive: false, intervalMs: 60_000 });
    const { events, listener } = collect();
    const subscription = await watcher.subscribe(listener);

    await writeFile(join(tempDir, 'late.jpg'), 'a');
    await subscription.unsubscribe();
    await subscription.poll();
    await subscription.poll();

    expect(events).toEqual([]);
  });
});

describe('FolderWatcher', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'file-sorter-watch-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('delivers one notification for a burst of writes', async () => {
    const watcher = new FolderWatcher(tempDir, { recursive: false, debounceMs: 200 });
    const { events, errors, listener } = collect();
    const subscription = await watcher.subscribe(listener);

    const file = join(tempDir, 'photo.jpg');
    await writeFile(file, 'a');
    await writeFile(file, 'ab');

    await vi.waitFor(() => {
      expect(events.map(event => event.path)).toEqual([file]);
    });
    expect(events[0]?.directory).toBe(tempDir);
    expect(errors).toEqual([]);

    await subscription.unsubscribe();
    await subscription.unsubscribe();
  });

  it('rejects when the directory does not exist', async () => {
    const watcher = new FolderWatcher(join(tempDir, 'missing'), { recursive: false });

    await expect(watcher.subscribe(collect().listener)).rejects.toThrow();
  });
});
