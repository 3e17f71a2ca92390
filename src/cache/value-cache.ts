// Value Cache
// Interning table for small, frequently created values

import { InvalidValueError } from "../common/errors";
import { logger } from "../common/logger";
import type { Value } from "../values/values";

export type CacheRetention = "weak" | "strong";

export interface ValueCacheOptions {
  /** Number of slots; a power of two. */
  size?: number;
  enabled?: boolean;
  /**
   * `weak` (the default) holds the table through a WeakRef, so the table can
   * be reclaimed by any collection after the current job, not only under
   * memory pressure. It is recreated on the next lookup. A host that
   * interns across many async turns and wants hits to survive them should
   * pass `strong`, which keeps the table until {@link ValueCache.clear}.
   */
  retention?: CacheRetention;
}

export interface ValueCacheStats {
  hits: number;
  misses: number;
  /** Times the table was (re)allocated. */
  allocations: number;
}

export const DEFAULT_CACHE_SIZE = 1024;

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Direct-mapped cache: each value hashes to exactly one slot and a miss
 * overwrites whatever the slot held.
 */
export class ValueCache {
  readonly size: number;
  readonly enabled: boolean;
  readonly retention: CacheRetention;

  private strongTable: (Value | undefined)[] | undefined;
  private weakTable: WeakRef<(Value | undefined)[]> | undefined;
  private hits = 0;
  private misses = 0;
  private allocations = 0;

  constructor(options: ValueCacheOptions = {}) {
    const size = options.size ?? DEFAULT_CACHE_SIZE;
    if (!isPowerOfTwo(size)) {
      throw new InvalidValueError("cache size", size);
    }
    this.size = size;
    this.enabled = options.enabled ?? true;
    this.retention = options.retention ?? "weak";
  }

  /**
   * Return the cached instance equal to `value`, or cache and return `value`.
   * A disabled cache returns its argument.
   */
  intern<T extends Value>(value: T): T {
    if (!this.enabled) {
      return value;
    }
    const table = this.table();
    const index = value.hashCode() & (this.size - 1);
    const cached = table[index];
    if (cached !== undefined && isSameValue(cached, value)) {
      this.hits++;
      return cached;
    }
    this.misses++;
    table[index] = value;
    return value;
  }

  /**
   * Drop every cached value.
   */
  clear(): void {
    this.strongTable = undefined;
    this.weakTable = undefined;
    logger.debug("value cache cleared");
  }

  stats(): ValueCacheStats {
    return { hits: this.hits, misses: this.misses, allocations: this.allocations };
  }

  private table(): (Value | undefined)[] {
    if (this.retention === "strong") {
      this.strongTable ??= this.allocate();
      return this.strongTable;
    }
    let table = this.weakTable?.deref();
    if (table === undefined) {
      table = this.allocate();
      this.weakTable = new WeakRef(table);
    }
    return table;
  }

  private allocate(): (Value | undefined)[] {
    this.allocations++;
    logger.debug(`allocating value cache table (${this.size} slots)`);
    return new Array<Value | undefined>(this.size).fill(undefined);
  }
}

function isSameValue<T extends Value>(cached: Value, value: T): cached is T {
  return cached.kind === value.kind && cached.equals(value);
}
