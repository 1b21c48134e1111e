export type Release = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  public isLocked(): boolean {
    return this.locked;
  }

  /**
   * Wait for the lock; the returned function releases it (repeat calls are no-ops)
   */
  public async acquire(): Promise<Release> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    this.locked = false;
  }
}

/**
 * One mutex per key; idle entries are dropped once nobody holds or waits on them.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, { mutex: Mutex; users: number }>();

  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  public async acquire(key: string): Promise<Release> {
    let entry = this.mutexes.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.mutexes.set(key, entry);
    }
    entry.users++;
    const held = entry;

    const release = await held.mutex.acquire();
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      held.users--;
      if (held.users === 0) {
        this.mutexes.delete(key);
      }
    };
  }

  /**
   * Someone holds or waits on the key
   */
  public isHeld(key: string): boolean {
    return this.mutexes.has(key);
  }

  public get size(): number {
    return this.mutexes.size;
  }
}
