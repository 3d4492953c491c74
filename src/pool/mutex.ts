/**
 * FIFO async mutex. Ownership passes directly to the next waiter on release,
 * so `isLocked` never flickers between holders.
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Idle: unlocked with nobody queued. */
  get isIdle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => resolve(this.releaser()));
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
