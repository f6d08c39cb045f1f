/**
 * Analysis cache keyed by file content and result-affecting options.
 *
 * Concurrent requests for the same key share one computation. Only
 * completed results are stored; a failure reaches every waiter and leaves
 * nothing behind, so the next request computes again.
 */

import type { AnalysisResult } from './types.js';

export interface AnalysisCacheOptions {
  /** Completed results kept before the least recently used is evicted */
  maxEntries?: number;
}

export class AnalysisCache {
  private readonly results = new Map<string, AnalysisResult>();
  private readonly inFlight = new Map<string, Promise<AnalysisResult>>();
  private readonly maxEntries: number;

  constructor(options: AnalysisCacheOptions = {}) {
    const max = options.maxEntries ?? 64;
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${max}`);
    }
    this.maxEntries = max;
  }

  /** Completed results held */
  get size(): number {
    return this.results.size;
  }

  get(key: string): AnalysisResult | undefined {
    const result = this.results.get(key);
    if (result) this.touch(key, result);
    return result;
  }

  has(key: string): boolean {
    return this.results.has(key);
  }

  /**
   * The cached result for `key`, the pending computation for it, or a new
   * one started with `compute`.
   */
  getOrCompute(key: string, compute: () => Promise<AnalysisResult>): Promise<AnalysisResult> {
    const cached = this.get(key);
    if (cached) return Promise.resolve(cached);
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const promise = Promise.resolve()
      .then(compute)
      .then(
        result => {
          // A clear or invalidate while computing means the result is not stored
          if (this.inFlight.get(key) === promise) {
            this.inFlight.delete(key);
            this.store(key, result);
          }
          return result;
        },
        (err: unknown) => {
          if (this.inFlight.get(key) === promise) this.inFlight.delete(key);
          throw err;
        },
      );
    this.inFlight.set(key, promise);
    return promise;
  }

  /** Drop one key; a computation in flight for it still settles for its waiters */
  invalidate(key: string): boolean {
    const hadPending = this.inFlight.delete(key);
    return this.results.delete(key) || hadPending;
  }

  clear(): void {
    this.results.clear();
    this.inFlight.clear();
  }

  dispose(): void {
    this.clear();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  private store(key: string, result: AnalysisResult): void {
    this.results.set(key, result);
    while (this.results.size > this.maxEntries) {
      const oldest = this.results.keys().next();
      if (oldest.done) break;
      this.results.delete(oldest.value);
    }
  }

  /** Move a key to the most recently used end */
  private touch(key: string, result: AnalysisResult): void {
    this.results.delete(key);
    this.results.set(key, result);
  }
}
