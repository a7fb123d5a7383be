/**
 * Promise-chain mutex. Callers queue in arrival order; the lock is released on
 * every exit path of `runExclusive`, including rejections.
 */
export class RoomLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;
  private waiting = 0;

  get isLocked() {
    return this.holders > 0;
  }

  get waitingCount() {
    return this.waiting;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = current;

    this.waiting += 1;
    await previous;
    this.waiting -= 1;
    this.holders += 1;
    try {
      return await fn();
    } finally {
      this.holders -= 1;
      release();
    }
  }
}

/** One `RoomLock` per key, dropped once nobody holds or waits on it. */
export class KeyedLock {
  private readonly locks = new Map<string, RoomLock>();

  isLocked(key: string) {
    return this.locks.get(key)?.isLocked ?? false;
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const normalizedKey = String(key || "");
    if (!normalizedKey) return await fn();

    let lock = this.locks.get(normalizedKey);
    if (!lock) {
      lock = new RoomLock();
      this.locks.set(normalizedKey, lock);
    }
    const held = lock;
    try {
      return await held.runExclusive(fn);
    } finally {
      if (!held.isLocked && held.waitingCount === 0 && this.locks.get(normalizedKey) === held) {
        this.locks.delete(normalizedKey);
      }
    }
  }

  clear() {
    this.locks.clear();
  }
}
