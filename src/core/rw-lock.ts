/**
 * Async reader/writer lock.
 *
 * Many readers may hold the lock together; a writer holds it alone.
 * Waiters are granted in arrival order, so a queued writer blocks readers
 * that arrive after it.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LockMode = 'read' | 'write';

/** Call once to give the lock back. Later calls are ignored. */
export type ReleaseFn = () => void;

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

// ---------------------------------------------------------------------------
// AsyncRwLock
// ---------------------------------------------------------------------------

export class AsyncRwLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  /** Number of readers currently holding the lock. */
  get activeReaders(): number {
    return this.readers;
  }

  /** Whether a writer currently holds the lock. */
  get writeLocked(): boolean {
    return this.writer;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.queue.length;
  }

  acquireRead(): Promise<ReleaseFn> {
    return this.acquire('read');
  }

  acquireWrite(): Promise<ReleaseFn> {
    return this.acquire('write');
  }

  /** Run `fn` under a read lock. */
  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Run `fn` under the write lock. */
  async withWrite<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private acquire(mode: LockMode): Promise<ReleaseFn> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve(this.releaser(mode));
    }

    return new Promise<ReleaseFn>((resolve) => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve(this.releaser(mode));
        },
      });
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writer) return false;
    return mode === 'read' || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'write') {
      this.writer = true;
    } else {
      this.readers++;
    }
  }

  private releaser(mode: LockMode): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      if (mode === 'write') {
        this.writer = false;
      } else {
        this.readers--;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0 && this.canGrant(this.queue[0].mode)) {
      const next = this.queue.shift();
      if (next === undefined) return;
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}
