import type { CatalogCache, CatalogLoader, CatalogSnapshot } from "./catalog-cache.js";

export type LoadedCatalogs = Record<string, CatalogSnapshot | null>;

/**
 * Load every store's catalog concurrently, through the cache when one is
 * given. A store whose load fails is logged and reported as `null`, which
 * the engine treats as a missing catalog.
 */
export async function loadCatalogs(
  storeIds: readonly string[],
  loadCatalog: CatalogLoader,
  cache?: CatalogCache
): Promise<LoadedCatalogs> {
  const results = await Promise.allSettled(
    storeIds.map(async (storeId) => (cache ? cache.getOrLoad(storeId, loadCatalog) : loadCatalog(storeId)))
  );

  return Object.fromEntries(
    storeIds.map((storeId, index): [string, CatalogSnapshot | null] => {
      const result = results[index];
      if (result?.status === "fulfilled") return [storeId, result.value];
      const reason: unknown = result?.reason;
      const message = reason instanceof Error ? reason.message : String(reason);
      console.error(`[catalog-loader] Failed to load catalog for ${storeId}: ${message}`);
      return [storeId, null];
    })
  );
}
