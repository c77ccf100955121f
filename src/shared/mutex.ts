/**
 * Promise-based mutual exclusion.
 *
 * Waiters are served in FIFO order. The lock is never held across backend
 * I/O; callers keep critical sections to in-memory bookkeeping.
 */
export class Mutex {
  private locked = false;
  private waiting: Array<() => void> = [];

  /** Run `fn` with the lock held and release it afterwards, even on throw. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Ownership passes straight to the next waiter.
      next();
    } else {
      this.locked = false;
    }
  }
}
