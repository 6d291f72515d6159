/**
 * Async FIFO mutex. Waiters are granted the lock in the order they asked for it.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async acquire(): Promise<Lock> {
    if (!this.locked) {
      this.locked = true;
      return new Lock(() => this.release());
    }

    return new Promise<Lock>((resolve) => {
      this.waiters.push(() => resolve(new Lock(() => this.release())));
    });
  }

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const lock = await this.acquire();
    try {
      return await task();
    } finally {
      lock.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true
      next();
    } else {
      this.locked = false;
    }
  }
}

export class Lock {
  private released = false;

  constructor(private readonly unlock: () => void) {}

  release() {
    if (this.released) return;
    this.released = true;
    this.unlock();
  }
}
