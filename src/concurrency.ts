/**
 * Concurrency primitives for the daemon's shared state and request handling.
 *
 * Key features:
 * - Mutex for serializing critical sections in async code
 * - Read-write lock allowing concurrent readers or a single writer
 * - Both locks hand ownership directly to the next waiter, so queued
 *   operations run in the order they asked for the lock
 */

// ============================================================================
// Basic Concurrency Primitives
// ============================================================================

/**
 * A simple mutex implementation for JavaScript/TypeScript.
 * Provides mutual exclusion for critical sections in async code.
 */
export class Mutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquires the mutex lock.
   * If the mutex is already locked, waits until it becomes available.
   */
  async acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
        return;
      }

      this.waitQueue.push(() => resolve());
    });
  }

  /**
   * Releases the mutex lock.
   * Ownership passes to the oldest waiter without the lock ever being free,
   * so a late `acquire` cannot overtake queued callers.
   */
  release(): void {
    if (!this.locked) {
      throw new Error("Cannot release unlocked mutex");
    }

    const nextWaiter = this.waitQueue.shift();
    if (nextWaiter) {
      nextWaiter();
      return;
    }

    this.locked = false;
  }

  /**
   * Executes a function with the mutex locked.
   * Automatically handles lock acquisition and release.
   *
   * @param fn - Function to execute under lock
   */
  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
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

  /** Number of callers waiting for the lock. */
  pending(): number {
    return this.waitQueue.length;
  }
}

/**
 * Read-Write lock implementation.
 * Allows multiple readers or a single writer at a time. Waiting writers block
 * new readers, so a steady stream of reads cannot starve a mutation.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private waitingReaders: Array<() => void> = [];
  private waitingWriters: Array<() => void> = [];

  /**
   * Acquires a read lock.
   * Multiple read locks can be held simultaneously.
   */
  async acquireRead(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.writer && this.waitingWriters.length === 0) {
        this.readers++;
        resolve();
        return;
      }

      this.waitingReaders.push(() => resolve());
    });
  }

  /**
   * Releases a read lock.
   */
  releaseRead(): void {
    if (this.readers === 0) {
      throw new Error("Cannot release read lock: no active readers");
    }

    this.readers--;

    if (this.readers === 0) {
      this.wakeWriter();
    }
  }

  /**
   * Acquires a write lock.
   * Only one write lock can be held at a time, and never alongside readers.
   */
  async acquireWrite(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.writer && this.readers === 0) {
        this.writer = true;
        resolve();
        return;
      }

      this.waitingWriters.push(() => resolve());
    });
  }

  /**
   * Releases a write lock.
   */
  releaseWrite(): void {
    if (!this.writer) {
      throw new Error("Cannot release write lock: no active writer");
    }

    this.writer = false;

    // Readers queued behind this writer go first, then the next writer
    if (this.waitingReaders.length > 0) {
      this.wakeReaders();
    } else {
      this.wakeWriter();
    }
  }

  /**
   * Executes a function with a read lock.
   *
   * @param fn - Function to execute under read lock
   */
  async withReadLock<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  /**
   * Executes a function with a write lock.
   *
   * @param fn - Function to execute under write lock
   */
  async withWriteLock<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  /** Number of read locks currently held. */
  activeReaders(): number {
    return this.readers;
  }

  private wakeWriter(): void {
    const nextWriter = this.waitingWriters.shift();
    if (nextWriter) {
      this.writer = true;
      nextWriter();
    }
  }

  private wakeReaders(): void {
    const readers = this.waitingReaders.splice(0);
    this.readers += readers.length;
    for (const reader of readers) {
      reader();
    }
  }
}
