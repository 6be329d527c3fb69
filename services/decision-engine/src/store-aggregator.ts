/**
 * Store Aggregator
 *
 * Builds one basket per in-scope store: validates the raw catalog, matches
 * every requested item against it and enforces per-item price ceilings.
 * Malformed catalog entries are excluded and counted, never thrown.
 */

import {
  productRecordSchema,
  type Location,
  type ProductRecord,
  type RequestedItem,
  type ShoppingRequest,
  type StoreDescriptor
} from "@basket/contracts";
import { MatchFailure, matchItem } from "./product-matcher.js";
import { sumPrices, toCents } from "./money.js";
import { compareText } from "./text-match.js";
import type {
  AggregateOptions,
  CatalogHealth,
  CatalogsByStore,
  ItemMatch,
  MatchOptions,
  StoreBasket
} from "./types.js";

export type ValidatedCatalog = {
  products: ProductRecord[];
  health: CatalogHealth;
};

/**
 * Validate raw catalog entries for one store. Entries failing the product
 * schema, or carrying another store's id, are excluded and reported.
 */
export function validateCatalog(storeId: string, entries: ReadonlyArray<unknown> | null | undefined): ValidatedCatalog {
  if (entries === null || entries === undefined) {
    return {
      products: [],
      health: { status: "missing", received: 0, accepted: 0, malformed: 0, issues: ["catalog not received"] }
    };
  }

  const products: ProductRecord[] = [];
  const issues: string[] = [];

  entries.forEach((entry, index) => {
    const parsed = productRecordSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      issues.push(`entry ${index}: ${path}${issue?.message ?? "invalid product record"}`);
      return;
    }
    if (parsed.data.storeId !== storeId) {
      issues.push(`entry ${index}: storeId "${parsed.data.storeId}" does not match catalog ${storeId}`);
      return;
    }
    products.push(parsed.data);
  });

  const malformed = entries.length - products.length;
  if (malformed > 0) {
    console.warn(`[store-aggregator] Excluded ${malformed} malformed record(s) from ${storeId} catalog`);
  }

  return {
    products,
    health: {
      status: malformed > 0 ? "partial" : "ok",
      received: entries.length,
      accepted: products.length,
      malformed,
      issues
    }
  };
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * A store matches when every field the request sets agrees with the store's location.
 */
export function locationMatches(wanted: Location, store: StoreDescriptor): boolean {
  const { city, state } = wanted;
  if (city === null && state === null) return true;
  if (!store.location) return false;
  if (city !== null && (store.location.city === null || !sameText(city, store.location.city))) return false;
  if (state !== null && (store.location.state === null || !sameText(state, store.location.state))) return false;
  return true;
}

/**
 * Store ids to evaluate, in lexical order: the stores with a catalog entry,
 * the known stores and the stores the request names, narrowed by
 * `request.stores` and, when descriptors are supplied, the request location.
 */
export function resolveStoreScope(
  request: ShoppingRequest,
  catalogsByStore: CatalogsByStore,
  knownStores: readonly StoreDescriptor[] = []
): string[] {
  const ids = new Set<string>([...Object.keys(catalogsByStore), ...knownStores.map((s) => s.id)]);
  let scope = [...ids];

  if (request.stores) {
    const wanted = new Set(request.stores);
    scope = [...new Set([...scope.filter((id) => wanted.has(id)), ...request.stores])];
  }

  if (request.location && knownStores.length > 0) {
    const location = request.location;
    const nearby = new Set(knownStores.filter((s) => locationMatches(location, s)).map((s) => s.id));
    scope = scope.filter((id) => nearby.has(id));
  }

  return scope.sort(compareText);
}

/** Global restrictions followed by the item's own. */
export function itemRestrictions(request: ShoppingRequest, item: RequestedItem): string[] {
  return [...request.restrictions, ...item.restrictions];
}

/** Per-item ceiling: the item's own `maxPrice`, else the request-wide `perItem`. */
export function itemCeiling(request: ShoppingRequest, item: RequestedItem): number | null {
  return item.maxPrice ?? request.budget.perItem;
}

function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

function matchWithinCeiling(
  request: ShoppingRequest,
  item: RequestedItem,
  storeId: string,
  products: readonly ProductRecord[],
  options: MatchOptions
): ItemMatch {
  const match = matchItem({ storeId, itemName: item.name, restrictions: itemRestrictions(request, item) }, products, options);
  const ceiling = itemCeiling(request, item);
  if (match.status !== "matched" || ceiling === null) return match;

  const limit = toCents(ceiling);
  if (toCents(match.best.effectivePrice) <= limit) {
    return { ...match, alternatives: match.alternatives.filter((alt) => toCents(alt.effectivePrice) <= limit) };
  }

  return {
    status: "unmatched",
    item: item.name,
    storeId,
    reason: MatchFailure.OverBudget,
    detail: `Cheapest suitable "${match.best.product.name}" costs ${formatPrice(match.best.effectivePrice)}, above the ${formatPrice(ceiling)} item ceiling`
  };
}

/**
 * Build the basket for one store from its raw catalog.
 */
export function buildBasket(
  request: ShoppingRequest,
  storeId: string,
  entries: ReadonlyArray<unknown> | null | undefined,
  options: MatchOptions = {}
): StoreBasket {
  const { products, health } = validateCatalog(storeId, entries);

  const matches = request.items.map((item): ItemMatch => {
    if (health.status === "missing") {
      return {
        status: "unmatched",
        item: item.name,
        storeId,
        reason: MatchFailure.CatalogUnavailable,
        detail: `No catalog received for ${storeId}`
      };
    }
    return matchWithinCeiling(request, item, storeId, products, options);
  });

  const matched = matches.flatMap((m) => (m.status === "matched" ? [m.best.effectivePrice] : []));

  return {
    storeId,
    matches,
    totalCost: sumPrices(matched),
    matchedCount: matched.length,
    itemCount: request.items.length,
    complete: matched.length === request.items.length,
    catalog: health
  };
}

/**
 * The raw catalog stored under `storeId`, ignoring inherited keys such as
 * "constructor" and any value that is not an array.
 */
export function catalogFor(catalogsByStore: CatalogsByStore, storeId: string): ReadonlyArray<unknown> | null {
  if (!Object.hasOwn(catalogsByStore, storeId)) return null;
  const entries: unknown = catalogsByStore[storeId];
  return Array.isArray(entries) ? entries : null;
}

/**
 * One basket per in-scope store, ordered by store id.
 */
export function aggregateBaskets(
  request: ShoppingRequest,
  catalogsByStore: CatalogsByStore,
  options: AggregateOptions = {}
): StoreBasket[] {
  const { knownStores, ...matchOptions } = options;
  return resolveStoreScope(request, catalogsByStore, knownStores).map((storeId) =>
    buildBasket(request, storeId, catalogFor(catalogsByStore, storeId), matchOptions)
  );
}
