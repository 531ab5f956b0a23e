/**
 * Per-key debouncing: the callback runs once the key has been quiet for `delayMs`
 */

export interface Debouncer {
  debounce(key: string, fn: () => void): void;
  clear(): void;
  readonly size: number;
}

export function createDebouncer(delayMs: number): Debouncer {
  const timers = new Map<string, NodeJS.Timeout>();

  function debounce(key: string, fn: () => void): void {
    const existing = timers.get(key);
    if (existing) clearTimeout(existing);
    timers.set(
      key,
      setTimeout(() => {
        timers.delete(key);
        fn();
      }, delayMs)
    );
  }

  function clear(): void {
    for (const timer of timers.values()) clearTimeout(timer);
    timers.clear();
  }

  return {
    debounce,
    clear,
    get size() {
      return timers.size;
    },
  };
}
