/**
 * Lookup Cache
 *
 * Bounded LRU of successful geocoder lookups, keyed by the normalized query.
 * The cache is an explicitly owned object: create one, hand it to the gate
 * and share it across batches as needed. Failures are never cached.
 *
 * @module geocoding/cache
 */

import { LRUCache } from 'lru-cache';
import type { GeocodeComponents } from '../schemas/geocode.js';
import { LookupCacheFileSchema } from '../schemas/geocode.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { atomicWriteJson, fileExists, readValidatedJson } from '../storage/atomic.js';

// ============================================================================
// Types
// ============================================================================

export interface LookupCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  sets: number;
  /** hits / (hits + misses), 0 when nothing was looked up */
  hitRate: number;
}

export interface LookupCacheOptions {
  /** Maximum number of entries kept (default: 5000) */
  maxEntries?: number;
}

const DEFAULT_MAX_ENTRIES = 5000;

/**
 * Cache key for a lookup query: lowercase, whitespace collapsed.
 *
 * @example
 * ```typescript
 * toCacheKey('  123 MAIN STREET,  Springfield '); // '123 main street, springfield'
 * ```
 */
export function toCacheKey(query: string): string {
  return query.toLowerCase().replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Cache
// ============================================================================

export class LookupCache {
  private readonly cache: LRUCache<string, GeocodeComponents>;
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;
  private sets = 0;

  constructor(options: LookupCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new Error('Lookup cache size must be a positive integer');
    }
    this.cache = new LRUCache<string, GeocodeComponents>({ max: this.maxEntries });
  }

  get(query: string): GeocodeComponents | undefined {
    const value = this.cache.get(toCacheKey(query));
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(query: string, components: GeocodeComponents): void {
    this.cache.set(toCacheKey(query), components);
    this.sets++;
  }

  has(query: string): boolean {
    return this.cache.has(toCacheKey(query));
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.sets = 0;
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Entries from least to most recently used, so that re-inserting them in
   * order restores the recency ranking.
   */
  entries(): Array<[string, GeocodeComponents]> {
    return Array.from(this.cache.rentries());
  }

  getStats(): LookupCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Load entries saved by {@link save}. A missing file leaves the cache as is.
   *
   * @returns Number of entries loaded
   * @throws Error if the file exists but is not a valid cache file
   */
  async load(filePath: string): Promise<number> {
    if (!(await fileExists(filePath))) {
      return 0;
    }
    const file = await readValidatedJson(filePath, LookupCacheFileSchema);
    for (const [key, components] of file.entries) {
      this.cache.set(key, components);
    }
    return file.entries.length;
  }

  async save(filePath: string): Promise<void> {
    await atomicWriteJson(filePath, {
      schemaVersion: SCHEMA_VERSIONS.lookupCache,
      savedAt: new Date().toISOString(),
      entries: this.entries(),
    });
  }
}
