/**
 * Concurrency control for row tasks and geocoder lookups.
 *
 * @module geocoding/concurrency
 */

import type { Logger } from '../pipeline/types.js';

/**
 * Statistics about the current state of the ConcurrencyLimiter.
 */
export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
}

export interface ConcurrencyLimiterOptions {
  /**
   * Minimum time between the starts of two consecutive operations run through
   * {@link ConcurrencyLimiter.run}. Used to honor a service's request rate.
   */
  minIntervalMs?: number;
  logger?: Logger;
}

export interface LimiterRunOptions {
  /** An aborted caller skips the start spacing and wakes from it early */
  signal?: AbortSignal;
}

/**
 * Wait `ms`, or less if the signal fires first.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * ConcurrencyLimiter controls the maximum number of concurrent operations.
 *
 * Uses a semaphore pattern with promise-based queue for waiting callers.
 * The batch orchestrator bounds row tasks with one instance; the geocoder
 * gate bounds lookups with another, with start spacing enabled.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(1, { minIntervalMs: 1100 });
 *
 * const result = await limiter.run(async () => {
 *   return await geocoder.resolve(query);
 * });
 * ```
 */
export class ConcurrencyLimiter {
  /** Maximum number of concurrent operations */
  private readonly limit: number;

  private readonly minIntervalMs: number;

  private readonly logger?: Logger;

  /** Current number of running operations */
  private running: number = 0;

  /** FIFO queue of pending acquire() calls waiting for a slot */
  private queue: Array<() => void> = [];

  /** Earliest time the next run() may start its function */
  private nextStartAt: number = 0;

  /**
   * Creates a new ConcurrencyLimiter.
   *
   * @param limit - Maximum number of concurrent operations (default: 1)
   * @throws Error if limit is not a positive integer or the interval is negative
   */
  constructor(limit: number = 1, options: ConcurrencyLimiterOptions = {}) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    const minIntervalMs = options.minIntervalMs ?? 0;
    if (minIntervalMs < 0 || !Number.isFinite(minIntervalMs)) {
      throw new Error('Minimum interval must be a non-negative number');
    }
    this.limit = limit;
    this.minIntervalMs = minIntervalMs;
    this.logger = options.logger;
  }

  /**
   * Acquires a slot for execution.
   *
   * If a slot is available, returns immediately. Otherwise, queues the request
   * and waits until a slot becomes available (FIFO ordering).
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Releases a previously acquired slot and hands it to the next waiter.
   * Always call this in a finally block.
   *
   * @remarks
   * Logs a warning if called without a matching acquire() but does not throw.
   */
  release(): void {
    if (this.running <= 0) {
      this.logger?.warn('[limiter] release() called without matching acquire()');
      return;
    }

    this.running--;

    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  /**
   * Executes a function with automatic acquire/release handling, waiting for
   * the start spacing when one is configured. A caller whose signal has
   * fired books no start time and runs `fn` at once, so `fn` can report the
   * abort without holding up the queue behind it.
   *
   * @throws Rethrows any error from fn after releasing the slot
   */
  async run<T>(fn: () => Promise<T>, options: LimiterRunOptions = {}): Promise<T> {
    await this.acquire();
    try {
      await this.waitForStartSlot(options.signal);
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Reserve the next start time and wait until it arrives.
   * The reservation is taken synchronously so starts keep acquisition order.
   */
  private async waitForStartSlot(signal?: AbortSignal): Promise<void> {
    if (this.minIntervalMs === 0 || signal?.aborted) {
      return;
    }
    const now = Date.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.minIntervalMs;
    if (startAt > now) {
      await sleep(startAt - now, signal);
    }
  }

  /**
   * Gets current statistics about the limiter state.
   */
  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }

  /**
   * @returns true if acquire() would return immediately, false if it would queue
   */
  isAvailable(): boolean {
    return this.running < this.limit;
  }

  getLimit(): number {
    return this.limit;
  }

  getMinIntervalMs(): number {
    return this.minIntervalMs;
  }
}
