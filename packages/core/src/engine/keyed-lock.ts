class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }
}

/**
 * One mutex per key. Sections for the same key run one at a time in call
 * order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly mutexes = new Map<string, Mutex>();

  async withLock<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (mutex.idle && this.mutexes.get(key) === mutex) {
        this.mutexes.delete(key);
      }
    }
  }

  get size(): number {
    return this.mutexes.size;
  }
}
