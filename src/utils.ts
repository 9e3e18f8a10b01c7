/**
 * Shared utility functions used across the turntable-mcp codebase.
 *
 * @module utils
 */

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @param v - Value to check
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Type guard to check if a value is a non-empty string.
 *
 * @param v - Value to check
 * @returns true if v is a string with length > 0 after trimming
 */
export function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

/**
 * A keyed lock for serializing async operations.
 *
 * Operations on the same key are serialized (run one at a time).
 * Operations on different keys run concurrently.
 *
 * The vendor tool is not known to be reentrant, so tool handlers hold the
 * lock for the device index they address.
 *
 * Each caller chains onto the current promise synchronously (before any await),
 * so no two callers can enter the critical section simultaneously and
 * ordering is FIFO.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 *
 * // These run serially (same key):
 * await lock.withLock("device:0", async () => { ... });
 * await lock.withLock("device:0", async () => { ... });
 *
 * // These can run concurrently (different keys):
 * await Promise.all([
 *   lock.withLock("device:0", async () => { ... }),
 *   lock.withLock("device:1", async () => { ... }),
 * ]);
 * ```
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>();

  /**
   * Execute an async function while holding the lock for the given key.
   *
   * @param key - The key to lock on
   * @param fn - The async function to execute
   * @returns The result of the function
   * @throws Re-throws any error from the function after releasing the lock
   */
  public async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Capture predecessor BEFORE registering (synchronous - no race window)
    const predecessor = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const ourLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    // Register synchronously before any await so simultaneous callers chain
    // onto each other in arrival order.
    this.locks.set(key, ourLock);

    try {
      await predecessor;
      return await fn();
    } finally {
      release();
      // Only cleanup if we're still the tail (no one chained after us)
      if (this.locks.get(key) === ourLock) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Check if a key currently has an operation in progress.
   */
  public isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
