// ═══════════════════════════════════════════════════════════════════════════════
// MUTEX — Async Mutual Exclusion
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * FIFO async mutex. Waiters are resumed in the order they called acquire().
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>(resolve => this.queue.push(resolve));
  }

  /**
   * Hand the lock to the next waiter, or unlock when nobody waits.
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}
