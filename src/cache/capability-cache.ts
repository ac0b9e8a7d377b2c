/**
 * Capability caching module
 */

import type { Logger } from '../logger/index.js';

export interface CacheEntry<T> {
  data: T;
  timestamp: number;
  ttl: number;
}

export interface CapabilityCacheOptions<T> {
  /** Fact category, used in logs and stats */
  name: string;
  /** Milliseconds a value stays fresh; Infinity keeps it for the process lifetime */
  ttl: number;
  resolve: () => Promise<T>;
  /** Values rejected here are returned but not stored, so the next call retries */
  shouldMemoize?: (value: T) => boolean;
  clock?: () => number;
  logger?: Logger;
}

export interface CapabilityCacheStats {
  name: string;
  ttl: number;
  cached: boolean;
  age: number | null;
  hits: number;
  misses: number;
  recomputations: number;
}

/**
 * Time-boxed memoization of one resolver with single flight: concurrent
 * callers during a recomputation share the same promise
 */
export class CapabilityCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inFlight: Promise<T> | null = null;
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private recomputations = 0;

  private readonly now: () => number;

  constructor(private readonly options: CapabilityCacheOptions<T>) {
    this.now = options.clock ?? Date.now;
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Get the cached value, recomputing it when missing or expired
   */
  async get(): Promise<T> {
    if (this.entry && !this.isExpired(this.entry)) {
      this.hits++;
      return this.entry.data;
    }

    this.misses++;
    if (this.inFlight) {
      return this.inFlight;
    }

    const pending = this.recompute(this.generation);
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      if (this.inFlight === pending) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Drop the cached value. A recomputation already running is not
   * stored when it finishes.
   */
  invalidate(): void {
    this.generation++;
    this.entry = null;
    this.inFlight = null;
  }

  getStats(): CapabilityCacheStats {
    return {
      name: this.options.name,
      ttl: this.options.ttl,
      cached: this.entry !== null && !this.isExpired(this.entry),
      age: this.entry ? this.now() - this.entry.timestamp : null,
      hits: this.hits,
      misses: this.misses,
      recomputations: this.recomputations,
    };
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.timestamp >= entry.ttl;
  }

  private async recompute(generation: number): Promise<T> {
    this.recomputations++;
    const startTime = this.now();
    const data = await this.options.resolve();

    const memoize = this.options.shouldMemoize ? this.options.shouldMemoize(data) : true;
    if (memoize && generation === this.generation) {
      this.entry = { data, timestamp: this.now(), ttl: this.options.ttl };
    }

    this.options.logger?.debug('Capability recomputed', {
      category: this.options.name,
      durationMs: this.now() - startTime,
      memoized: memoize,
    });
    return data;
  }
}
