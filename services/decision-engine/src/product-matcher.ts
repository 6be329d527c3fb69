/**
 * Product Matcher
 *
 * Finds the best product for one requested item in one store's catalog:
 * relevant by name, in stock, suitable for every restriction, then ranked
 * by effective price. Never substitutes an unsuitable product.
 */

import type { ProductRecord, UnmatchedReason } from "@basket/contracts";
import { canonicalRestrictions, evaluateSuitability } from "./dietary-rules.js";
import { toCents } from "./money.js";
import { compareText, stemmedTokens, tokenSimilarity } from "./text-match.js";
import type { ItemMatch, MatchOptions, RankedCandidate } from "./types.js";

export const MatchFailure = {
  NoRelevantProduct: "no_relevant_product",
  DietaryMismatch: "dietary_mismatch",
  OverBudget: "over_budget",
  CatalogUnavailable: "catalog_unavailable"
} as const satisfies Record<string, UnmatchedReason>;

export const DEFAULT_MAX_ALTERNATIVES = 2;

export type MatchQuery = {
  storeId: string;
  itemName: string;
  restrictions: readonly string[];
};

/**
 * Sale price when present and lower than the list price.
 */
export function effectivePrice(product: ProductRecord): { price: number; onSale: boolean } {
  if (product.salePrice !== null && product.salePrice < product.price) {
    return { price: product.salePrice, onSale: true };
  }
  return { price: product.price, onSale: false };
}

/**
 * Every stemmed token of the item name must appear in the product name.
 * "rice" matches "Organic Brown Rice"; "brown rice" does not match "Rice Cakes".
 */
export function isRelevant(itemName: string, productName: string): boolean {
  const itemTokens = stemmedTokens(itemName);
  if (itemTokens.length === 0) return false;
  const productTokens = new Set(stemmedTokens(productName));
  return itemTokens.every((token) => productTokens.has(token));
}

function tieKey(product: ProductRecord): string {
  return product.productId ?? product.link ?? "";
}

/**
 * Ranking order: cheaper first, then fewer assumed restrictions, then closer
 * name, then product name, then product id or link.
 */
export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  const byPrice = toCents(a.effectivePrice) - toCents(b.effectivePrice);
  if (byPrice !== 0) return byPrice;

  const byConfirmed = a.suitability.assumed.length - b.suitability.assumed.length;
  if (byConfirmed !== 0) return byConfirmed;

  if (a.relevance !== b.relevance) return b.relevance - a.relevance;

  const byName = compareText(a.product.name, b.product.name);
  if (byName !== 0) return byName;

  return compareText(tieKey(a.product), tieKey(b.product));
}

/**
 * Match one requested item against one store's validated catalog.
 */
export function matchItem(
  query: MatchQuery,
  catalog: readonly ProductRecord[],
  options: MatchOptions = {}
): ItemMatch {
  const { storeId, itemName } = query;
  const maxAlternatives = Math.max(0, options.maxAlternatives ?? DEFAULT_MAX_ALTERNATIVES);

  const relevant = catalog.filter(
    (product) => product.inStock && product.storeId === storeId && isRelevant(itemName, product.name)
  );

  if (relevant.length === 0) {
    return {
      status: "unmatched",
      item: itemName,
      storeId,
      reason: MatchFailure.NoRelevantProduct,
      detail: `No in-stock product matching "${itemName}" at ${storeId}`
    };
  }

  const candidates: RankedCandidate[] = relevant.map((product) => {
    const { price, onSale } = effectivePrice(product);
    return {
      product,
      effectivePrice: price,
      onSale,
      suitability: evaluateSuitability(product, query.restrictions, options),
      relevance: tokenSimilarity(itemName, product.name)
    };
  });

  const suitable = candidates.filter((c) => c.suitability.isSuitable).sort(compareCandidates);
  const [best, ...rest] = suitable;

  if (!best) {
    const restrictions = canonicalRestrictions(query.restrictions);
    return {
      status: "unmatched",
      item: itemName,
      storeId,
      reason: MatchFailure.DietaryMismatch,
      detail: `${relevant.length} relevant product${relevant.length !== 1 ? "s" : ""} at ${storeId}, none confirmed ${restrictions.join(", ")}`
    };
  }

  return {
    status: "matched",
    item: itemName,
    storeId,
    best,
    alternatives: rest.slice(0, maxAlternatives)
  };
}
