/**
 * Bounded memoization cache
 *
 * Lives outside the engine: callers that want repeated runs served from
 * memory create a cache and pass it in. Entries are keyed by value, so two
 * structurally equal inputs hit the same entry regardless of key order.
 *
 * Eviction is insertion order: when full, the oldest entry goes first.
 */

export interface MemoStats {
  hits: number;
  misses: number;
  size: number;
  maxEntries: number;
}

export const DEFAULT_MAX_ENTRIES = 64;

/**
 * Serialize a JSON-like value with object keys sorted, so the result depends
 * only on content.
 */
export function stableKey(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableKey).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableKey(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'undefined';
}

export class MemoCache<TValue> {
  private readonly entries = new Map<string, TValue>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): TValue | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: TValue): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, value);
  }

  /**
   * Return the cached value for `key`, computing and storing it on a miss.
   * A compute that throws leaves the cache unchanged.
   */
  getOrCompute(key: string, compute: () => TValue): TValue {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }
    this.misses++;
    const value = compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): MemoStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxEntries: this.maxEntries,
    };
  }
}
