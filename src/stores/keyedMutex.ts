export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  timer: NodeJS.Timeout;
}

interface LockEntry {
  held: boolean;
  waiters: Waiter[];
}

export class LockWaitTimeoutError extends Error {
  public readonly key: string;
  public readonly waitedMs: number;

  constructor(key: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock on ${key}`);
    this.name = "LockWaitTimeoutError";
    this.key = key;
    this.waitedMs = waitedMs;
  }
}

/**
 * KeyedMutex serializes work per key. Waiters are granted in arrival order
 * and give up after a bounded wait. Entries are dropped once nobody holds
 * or waits for a key, so the map only grows with live contention.
 */
export class KeyedMutex {
  private entries = new Map<string, LockEntry>();

  acquire(key: string, waitMs: number): Promise<Release> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { held: false, waiters: [] };
      this.entries.set(key, entry);
    }

    if (!entry.held) {
      entry.held = true;
      return Promise.resolve(this.releaser(key, entry));
    }

    const current = entry;
    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          current.waiters = current.waiters.filter((w) => w !== waiter);
          reject(new LockWaitTimeoutError(key, waitMs));
        }, waitMs),
      };
      current.waiters.push(waiter);
    });
  }

  isLocked(key: string): boolean {
    return this.entries.get(key)?.held ?? false;
  }

  /** Number of callers queued behind the holder of a key. */
  waiting(key: string): number {
    return this.entries.get(key)?.waiters.length ?? 0;
  }

  private releaser(key: string, entry: LockEntry): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = entry.waiters.shift();
      if (next) {
        clearTimeout(next.timer);
        next.grant(this.releaser(key, entry));
        return;
      }

      entry.held = false;
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    };
  }
}
