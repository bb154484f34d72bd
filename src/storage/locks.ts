type Mode = 'read' | 'write';

interface Waiter {
  mode: Mode;
  grant: () => void;
}

/**
 * Async reader/writer lock. Readers share, writers are exclusive, and waiters are
 * served in arrival order so a steady stream of readers cannot starve a writer.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private waiters: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get writeLocked(): boolean {
    return this.writing;
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.waiters.length === 0 && this.available(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiters.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private available(mode: Mode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private take(mode: Mode): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.available(next.mode)) return;
      this.waiters.shift();
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}

// Serializes work per key; unrelated keys run concurrently.
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
