/**
 * Catalog Cache
 *
 * Injected store → catalog snapshot cache with TTL expiry and explicit
 * invalidation. Hosts pass it to `recommendFromSources`; the engine itself
 * never holds catalog state between calls.
 */

import { addMilliseconds, isAfter } from "date-fns";

export type CatalogSnapshot = ReadonlyArray<unknown>;

export type CatalogLoader = (storeId: string) => Promise<CatalogSnapshot>;

export interface CatalogCacheConfig {
  ttlMs: number;
  maxEntries: number;
  /** Clock used for expiry; tests inject a fixed one. */
  now?: () => Date;
}

export interface CatalogCache {
  get(storeId: string): CatalogSnapshot | null;
  set(storeId: string, catalog: CatalogSnapshot): void;
  /** Drop one store's entry, or every entry when no id is given. */
  invalidate(storeId?: string): void;
  /**
   * Cached snapshot, or the loader's result. Concurrent calls for one store
   * share a single in-flight load; a failed load is not cached.
   */
  getOrLoad(storeId: string, loader: CatalogLoader): Promise<CatalogSnapshot>;
}

type CacheEntry = {
  catalog: CatalogSnapshot;
  expiresAt: Date;
};

export const DEFAULT_CATALOG_TTL_MS = 15 * 60 * 1000;
export const DEFAULT_CATALOG_CACHE_SIZE = 50;

/**
 * In-process cache. Entries are frozen on write so readers always see a
 * complete snapshot; the oldest entry is evicted once `maxEntries` is reached.
 */
export class InMemoryCatalogCache implements CatalogCache {
  private entries = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<CatalogSnapshot>>();
  private ttlMs: number;
  private maxEntries: number;
  private now: () => Date;

  constructor(config: Partial<CatalogCacheConfig> = {}) {
    this.ttlMs = Math.max(0, config.ttlMs ?? DEFAULT_CATALOG_TTL_MS);
    this.maxEntries = Math.max(1, config.maxEntries ?? DEFAULT_CATALOG_CACHE_SIZE);
    this.now = config.now ?? (() => new Date());
  }

  get size(): number {
    return this.entries.size;
  }

  get(storeId: string): CatalogSnapshot | null {
    const entry = this.entries.get(storeId);
    if (!entry) return null;
    if (!isAfter(entry.expiresAt, this.now())) {
      this.entries.delete(storeId);
      return null;
    }
    return entry.catalog;
  }

  set(storeId: string, catalog: CatalogSnapshot): void {
    // Re-inserting moves the key to the end of the eviction order.
    this.entries.delete(storeId);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(storeId, {
      catalog: Object.freeze([...catalog]),
      expiresAt: addMilliseconds(this.now(), this.ttlMs)
    });
  }

  invalidate(storeId?: string): void {
    if (storeId === undefined) {
      this.entries.clear();
      this.inFlight.clear();
      return;
    }
    this.entries.delete(storeId);
    this.inFlight.delete(storeId);
  }

  getOrLoad(storeId: string, loader: CatalogLoader): Promise<CatalogSnapshot> {
    const cached = this.get(storeId);
    if (cached) return Promise.resolve(cached);

    const pending = this.inFlight.get(storeId);
    if (pending) return pending;

    const load: Promise<CatalogSnapshot> = loader(storeId).then(
      (catalog) => {
        // An invalidation during the load discards its result.
        if (this.inFlight.get(storeId) !== load) return catalog;
        this.inFlight.delete(storeId);
        this.set(storeId, catalog);
        return this.get(storeId) ?? catalog;
      },
      (error: unknown) => {
        if (this.inFlight.get(storeId) === load) this.inFlight.delete(storeId);
        throw error;
      }
    );
    this.inFlight.set(storeId, load);
    return load;
  }
}

/**
 * Cache from engine configuration values.
 */
export function createCatalogCache(config: Partial<CatalogCacheConfig> = {}): CatalogCache {
  return new InMemoryCatalogCache(config);
}
