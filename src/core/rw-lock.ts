/**
 * ReadWriteLock: FIFO async shared/exclusive lock.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are granted in arrival order, so a queued writer blocks readers that
 * arrive after it. Not re-entrant: acquiring inside a held section deadlocks.
 *
 * Usage:
 *   const lock = new ReadWriteLock();
 *   await lock.read(() => snapshot());
 *   await lock.write(async () => { await mutate(); });
 */

type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  /** Run `fn` under shared access. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  /** Run `fn` under exclusive access. */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writing) return false;
    return mode === "read" || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "read") {
      this.readers++;
    } else {
      this.writing = true;
    }
  }

  private release(mode: LockMode): void {
    if (mode === "read") {
      this.readers--;
    } else {
      this.writing = false;
    }
    this.drain();
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.mode)) return;
      this.waiters.shift();
      next.grant();
      if (next.mode === "write") return;
    }
  }
}
