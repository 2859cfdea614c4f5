type Release = () => void;

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async acquire(): Promise<Release> {
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
}

/**
 * One FIFO mutex per key, dropped once nobody holds or waits for it.
 * Used to serialize read-modify-write cycles against a single store file.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, Mutex>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    const release = await mutex.acquire();
    try {
      return await task();
    } finally {
      release();
      if (mutex.idle) this.mutexes.delete(key);
    }
  }

  get size(): number {
    return this.mutexes.size;
  }
}
