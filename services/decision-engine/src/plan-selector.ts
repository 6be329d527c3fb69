/**
 * Plan Selector
 *
 * Pure reduction over the finished basket collection. Chooses the cheapest
 * complete single-store basket or, when enabled, a cheaper per-item split
 * across stores; otherwise explains why no plan exists.
 */

import type { ShoppingRequest, UnmatchedReason } from "@basket/contracts";
import { MatchFailure } from "./product-matcher.js";
import { fromCents, sumPrices, toCents } from "./money.js";
import { compareText } from "./text-match.js";
import type {
  ItemRecommendation,
  MatchedItem,
  PlanSelection,
  SelectionOptions,
  StoreBasket
} from "./types.js";

export const PlanKind = {
  SingleStore: "single_store",
  MultiStore: "multi_store",
  Unsatisfiable: "unsatisfiable"
} as const;

export const FailureKind = {
  Unsatisfiable: "unsatisfiable",
  OverBudget: "over_budget",
  NoSingleStore: "no_single_store"
} as const;

/** Most informative reason first when an item failed everywhere. */
const REASON_PRIORITY: readonly UnmatchedReason[] = [
  MatchFailure.OverBudget,
  MatchFailure.DietaryMismatch,
  MatchFailure.NoRelevantProduct,
  MatchFailure.CatalogUnavailable
];

function byStore(a: StoreBasket, b: StoreBasket): number {
  return compareText(a.storeId, b.storeId);
}

function matchedItems(basket: StoreBasket): MatchedItem[] {
  return basket.matches.flatMap((m) => (m.status === "matched" ? [m] : []));
}

/**
 * Cheapest complete basket; ties go to the lexically smaller store id.
 */
export function cheapestCompleteBasket(baskets: readonly StoreBasket[]): StoreBasket | null {
  let best: StoreBasket | null = null;
  for (const basket of [...baskets].sort(byStore)) {
    if (!basket.complete) continue;
    if (!best || toCents(basket.totalCost) < toCents(best.totalCost)) best = basket;
  }
  return best;
}

/**
 * For each requested item, the cheapest match across every store (ties go to
 * the lexically smaller store id), or the most informative reason it failed.
 */
export function cheapestPerItem(baskets: readonly StoreBasket[], request: ShoppingRequest): ItemRecommendation[] {
  const ordered = [...baskets].sort(byStore);

  return request.items.map((item, index): ItemRecommendation => {
    let best: MatchedItem | null = null;
    for (const basket of ordered) {
      const match = basket.matches[index];
      if (match?.status !== "matched") continue;
      if (!best || toCents(match.best.effectivePrice) < toCents(best.best.effectivePrice)) best = match;
    }
    if (best) return best;

    const failures = ordered.flatMap((basket) => {
      const match = basket.matches[index];
      return match?.status === "unmatched" ? [match] : [];
    });
    for (const reason of REASON_PRIORITY) {
      const failure = failures.find((f) => f.reason === reason);
      if (failure) {
        return { status: "unmatched", item: item.name, reason, detail: failure.detail };
      }
    }
    return {
      status: "unmatched",
      item: item.name,
      reason: MatchFailure.CatalogUnavailable,
      detail: "No store catalogs were evaluated"
    };
  });
}

function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * Choose the plan for a request from its aggregated baskets.
 *
 * A multi-store split is preferred only when it covers every item, fits the
 * total budget and is strictly cheaper than the best single store after the
 * optional per-extra-store trip cost. Equal totals keep the single store.
 */
export function selectPlan(
  baskets: readonly StoreBasket[],
  request: ShoppingRequest,
  options: SelectionOptions = {}
): PlanSelection {
  const allowMultiStore = options.allowMultiStore ?? false;
  const tripCents = toCents(Math.max(0, options.tripCost ?? 0));
  const ceiling = request.budget.total;

  const perItem = cheapestPerItem(baskets, request);
  const uncovered = perItem.filter((p) => p.status === "unmatched").map((p) => p.item);

  if (uncovered.length > 0) {
    return {
      plan: {
        planType: PlanKind.Unsatisfiable,
        failure: {
          kind: FailureKind.Unsatisfiable,
          items: uncovered,
          message: `No store has a suitable match for: ${uncovered.join(", ")}`
        }
      },
      picks: perItem
    };
  }

  const fits = (cents: number) => ceiling === null || cents <= toCents(ceiling);

  const single = cheapestCompleteBasket(baskets);
  const singleCents = single ? toCents(single.totalCost) : null;
  const singleFits = singleCents !== null && fits(singleCents);

  const split = perItem.flatMap((p) => (p.status === "matched" ? [p] : []));
  const multiCents = toCents(sumPrices(split.map((p) => p.best.effectivePrice)));
  const visited = [...new Set(split.map((p) => p.storeId))].sort(compareText);
  const multiFits = allowMultiStore && fits(multiCents);
  const multiCompared = multiCents + tripCents * Math.max(0, visited.length - 1);

  if (multiFits && (!singleFits || singleCents === null || multiCompared < singleCents)) {
    return {
      plan: {
        planType: PlanKind.MultiStore,
        assignments: split.map((p) => ({ item: p.item, storeId: p.storeId })),
        stores: visited,
        totalCost: fromCents(multiCents)
      },
      picks: split
    };
  }

  if (single && singleFits) {
    return {
      plan: { planType: PlanKind.SingleStore, storeId: single.storeId, totalCost: single.totalCost },
      picks: matchedItems(single)
    };
  }

  if (ceiling !== null && (single || allowMultiStore)) {
    const cheapestCents = allowMultiStore ? multiCents : (singleCents ?? multiCents);
    const cheapestTotal = fromCents(cheapestCents);
    return {
      plan: {
        planType: PlanKind.Unsatisfiable,
        failure: {
          kind: FailureKind.OverBudget,
          items: [],
          ceiling,
          cheapestTotal,
          message: `Cheapest plan costs ${formatPrice(cheapestTotal)}, above the ${formatPrice(ceiling)} budget`
        }
      },
      picks: perItem
    };
  }

  return {
    plan: {
      planType: PlanKind.Unsatisfiable,
      failure: {
        kind: FailureKind.NoSingleStore,
        items: [],
        message: "No single store carries every item and multi-store plans are disabled"
      }
    },
    picks: perItem
  };
}
