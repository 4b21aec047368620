// ═══════════════════════════════════════════════════════════════════════════════
// READ-WRITE LOCK — Shared Readers, Exclusive Writer
// ═══════════════════════════════════════════════════════════════════════════════
//
// Writer-preferred: once a writer is waiting, new readers queue behind it,
// so a steady stream of recalls cannot starve a commit.
//
// ═══════════════════════════════════════════════════════════════════════════════

export class ReadWriteLock {
  private activeReaders = 0;
  private writing = false;
  private readonly waitingReaders: Array<() => void> = [];
  private readonly waitingWriters: Array<() => void> = [];

  async acquireRead(): Promise<void> {
    if (!this.writing && this.waitingWriters.length === 0) {
      this.activeReaders += 1;
      return;
    }
    await new Promise<void>(resolve => this.waitingReaders.push(resolve));
  }

  releaseRead(): void {
    if (this.activeReaders === 0) {
      throw new Error('releaseRead() called without a held read lock');
    }
    this.activeReaders -= 1;
    if (this.activeReaders === 0) {
      this.wakeNext();
    }
  }

  async acquireWrite(): Promise<void> {
    if (!this.writing && this.activeReaders === 0) {
      this.writing = true;
      return;
    }
    await new Promise<void>(resolve => this.waitingWriters.push(resolve));
  }

  releaseWrite(): void {
    if (!this.writing) {
      throw new Error('releaseWrite() called without a held write lock');
    }
    this.writing = false;
    this.wakeNext();
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  // Ownership is transferred before the waiter resumes, so no one can slip in between.
  private wakeNext(): void {
    const writer = this.waitingWriters.shift();
    if (writer) {
      this.writing = true;
      writer();
      return;
    }

    const readers = this.waitingReaders.splice(0);
    this.activeReaders += readers.length;
    for (const resume of readers) {
      resume();
    }
  }
}
