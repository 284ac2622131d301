/**
 * Unit tests for the locks guarding the state store and the request queue.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { Mutex, ReadWriteLock } from "./concurrency.js";

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Helper function to create a delay promise.
 */
const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Helper function to measure execution time.
 */
const measureTime = async <T>(fn: () => Promise<T>): Promise<{ result: T; duration: number }> => {
  const start = Date.now();
  const result = await fn();
  const duration = Date.now() - start;
  return { result, duration };
};

// ============================================================================
// Mutex Tests
// ============================================================================

describe("Mutex", () => {
  let mutex: Mutex;

  beforeEach(() => {
    mutex = new Mutex();
  });

  describe("Basic Operations", () => {
    it("should acquire and release lock successfully", async () => {
      expect(mutex.isLocked()).toBe(false);

      await mutex.acquire();
      expect(mutex.isLocked()).toBe(true);

      mutex.release();
      expect(mutex.isLocked()).toBe(false);
    });

    it("should throw when releasing unlocked mutex", () => {
      expect(() => mutex.release()).toThrow("Cannot release unlocked mutex");
    });

    it("should handle concurrent access properly", async () => {
      const results: number[] = [];
      let counter = 0;

      const task = async (id: number) => {
        await mutex.acquire();
        const temp = counter;
        await delay(10); // Simulate work
        counter = temp + 1;
        results.push(id);
        mutex.release();
      };

      // Start multiple concurrent tasks
      const promises = [1, 2, 3, 4, 5].map((id) => task(id));
      await Promise.all(promises);

      expect(counter).toBe(5);
      expect(results).toHaveLength(5);
      expect(results.sort()).toEqual([1, 2, 3, 4, 5]);
    });

    it("should hand the lock to the next waiter without unlocking", async () => {
      await mutex.acquire();
      const waiter = mutex.acquire();

      expect(mutex.pending()).toBe(1);
      mutex.release();

      expect(mutex.isLocked()).toBe(true);
      await waiter;
      mutex.release();
      expect(mutex.isLocked()).toBe(false);
    });

    it("should respect acquisition order", async () => {
      const order: number[] = [];

      // First task acquires lock
      await mutex.acquire();

      // Queue up several waiting tasks
      const tasks = [1, 2, 3].map(async (id) => {
        await mutex.acquire();
        order.push(id);
        mutex.release();
      });

      await delay(10); // Let tasks queue up

      // Release the initial lock
      mutex.release();

      await Promise.all(tasks);
      expect(order).toEqual([1, 2, 3]); // FIFO order
    });
  });

  describe("WithLock Pattern", () => {
    it("should execute function with lock", async () => {
      let executed = false;

      const result = await mutex.withLock(async () => {
        expect(mutex.isLocked()).toBe(true);
        executed = true;
        return "test result";
      });

      expect(result).toBe("test result");
      expect(executed).toBe(true);
      expect(mutex.isLocked()).toBe(false);
    });

    it("should release lock even if function throws", async () => {
      const testError = new Error("Test error");

      await expect(
        mutex.withLock(async () => {
          throw testError;
        })
      ).rejects.toThrow(testError);

      expect(mutex.isLocked()).toBe(false);
    });
  });
});

// ============================================================================
// ReadWriteLock Tests
// ============================================================================

describe("ReadWriteLock", () => {
  let rwLock: ReadWriteLock;

  beforeEach(() => {
    rwLock = new ReadWriteLock();
  });

  describe("Read Lock Operations", () => {
    it("should allow multiple readers", async () => {
      const readers = 5;
      const readTasks = Array.from({ length: readers }, async (_, i) => {
        await rwLock.acquireRead();
        await delay(10);
        rwLock.releaseRead();
        return i;
      });

      const { duration } = await measureTime(async () => {
        await Promise.all(readTasks);
      });

      // Should complete in roughly 10ms since readers run concurrently
      expect(duration).toBeLessThan(50);
    });

    it("should throw when releasing read lock without active readers", () => {
      expect(() => rwLock.releaseRead()).toThrow("Cannot release read lock: no active readers");
    });

    it("should execute function with read lock", async () => {
      const result = await rwLock.withReadLock(async () => {
        await delay(10);
        return "read result";
      });

      expect(result).toBe("read result");
    });
  });

  describe("Write Lock Operations", () => {
    it("should allow only one writer", async () => {
      const writers = 3;
      const results: number[] = [];

      const writeTasks = Array.from({ length: writers }, async (_, i) => {
        await rwLock.acquireWrite();
        results.push(i);
        await delay(10);
        rwLock.releaseWrite();
        return i;
      });

      const { duration } = await measureTime(async () => {
        await Promise.all(writeTasks);
      });

      // Should take at least 30ms since writers are sequential
      expect(duration).toBeGreaterThan(25);
      expect(results).toHaveLength(3);
    });

    it("should throw when releasing write lock without active writer", () => {
      expect(() => rwLock.releaseWrite()).toThrow("Cannot release write lock: no active writer");
    });

    it("should execute function with write lock", async () => {
      const result = await rwLock.withWriteLock(async () => {
        await delay(10);
        return "write result";
      });

      expect(result).toBe("write result");
    });
  });

  describe("Reader-Writer Coordination", () => {
    it("should block writers when readers are active", async () => {
      // Acquire read lock
      await rwLock.acquireRead();

      let writerStarted = false;
      const writerTask = rwLock.acquireWrite().then(() => {
        writerStarted = true;
      });

      await delay(20);
      expect(writerStarted).toBe(false); // Writer should be blocked

      rwLock.releaseRead();
      await writerTask;
      expect(writerStarted).toBe(true);

      rwLock.releaseWrite();
    });

    it("should block readers when writer is active", async () => {
      // Acquire write lock
      await rwLock.acquireWrite();

      let readerStarted = false;
      const readerTask = rwLock.acquireRead().then(() => {
        readerStarted = true;
      });

      await delay(20);
      expect(readerStarted).toBe(false); // Reader should be blocked

      rwLock.releaseWrite();
      await readerTask;
      expect(readerStarted).toBe(true);

      rwLock.releaseRead();
    });

    it("should wake readers queued behind a writer before the next writer", async () => {
      const order: string[] = [];

      await rwLock.acquireWrite();

      const readerTask = rwLock.acquireRead().then(() => {
        order.push("reader");
        rwLock.releaseRead();
      });
      const writerTask = rwLock.acquireWrite().then(() => {
        order.push("writer");
        rwLock.releaseWrite();
      });

      await delay(10);
      rwLock.releaseWrite();

      await Promise.all([readerTask, writerTask]);
      expect(order).toEqual(["reader", "writer"]);
    });

    it("should prioritize writers over readers", async () => {
      const order: string[] = [];

      // Start a reader
      await rwLock.acquireRead();

      // Queue a writer
      const writerTask = rwLock.acquireWrite().then(() => {
        order.push("writer");
        rwLock.releaseWrite();
      });

      // Queue another reader
      const readerTask = rwLock.acquireRead().then(() => {
        order.push("reader");
        rwLock.releaseRead();
      });

      await delay(10);

      // Release the initial reader
      rwLock.releaseRead();

      await Promise.all([writerTask, readerTask]);

      // Writer should execute before the queued reader
      expect(order[0]).toBe("writer");
    });
  });
});

