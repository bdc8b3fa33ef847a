/**
 * Write Lock
 *
 * In-process FIFO mutex. Waiters are granted the lock in arrival order.
 */

export type ReleaseFn = () => void;

export class WriteLock {
  private held = false;
  private waiters: Array<(release: ReleaseFn) => void> = [];

  get isLocked(): boolean {
    return this.held;
  }

  /** Number of callers blocked in acquire() */
  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<ReleaseFn> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}

/**
 * Lock shared by every writer in the process unless one is injected.
 */
export const sharedWriteLock = new WriteLock();
