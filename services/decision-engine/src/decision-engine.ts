/**
 * Decision Engine
 *
 * Orchestrates a recommendation: aggregate every in-scope store, select a
 * plan over the finished baskets and attach the per-store summary, catalog
 * issues and budget report. `recommend` is synchronous and pure;
 * `recommendFromSources` resolves catalogs first through an injected cache.
 */

import type { ShoppingRequest, StoreDescriptor } from "@basket/contracts";
import type { CatalogCache, CatalogLoader } from "./catalog-cache.js";
import { loadCatalogs } from "./catalog-loader.js";
import { sumPrices, surplus } from "./money.js";
import { selectPlan } from "./plan-selector.js";
import { aggregateBaskets, resolveStoreScope } from "./store-aggregator.js";
import type {
  CatalogStatus,
  CatalogsByStore,
  EngineOptions,
  ItemRecommendation,
  PlanSelection,
  RecommendationPlan,
  StoreBasket
} from "./types.js";

export type StoreSummary = {
  storeId: string;
  totalCost: number;
  matchedCount: number;
  itemCount: number;
  complete: boolean;
  catalogStatus: CatalogStatus;
};

export type CatalogIssue = {
  storeId: string;
  kind: "IncompleteCatalog";
  status: Exclude<CatalogStatus, "ok">;
  malformed: number;
  message: string;
};

export type BudgetSummary = {
  ceiling: number;
  totalCost: number;
  remaining: number;
  overBy: number;
};

export type Confidence = "full" | "reduced";

export type Recommendation = {
  plan: RecommendationPlan;
  /** One entry per requested item, in request order. */
  items: ItemRecommendation[];
  /** Every evaluated store, winners and losers, by store id. */
  storeSummary: StoreSummary[];
  catalogIssues: CatalogIssue[];
  confidence: Confidence;
  /** Present only when the request sets a total budget. */
  budget: BudgetSummary | null;
};

export type CatalogSources = {
  /** Store descriptors; their ids are the stores to load. */
  stores: readonly StoreDescriptor[];
  loadCatalog: CatalogLoader;
  cache?: CatalogCache;
};

function summarize(basket: StoreBasket): StoreSummary {
  return {
    storeId: basket.storeId,
    totalCost: basket.totalCost,
    matchedCount: basket.matchedCount,
    itemCount: basket.itemCount,
    complete: basket.complete,
    catalogStatus: basket.catalog.status
  };
}

function catalogIssue(basket: StoreBasket): CatalogIssue | null {
  const { status, malformed, received } = basket.catalog;
  if (status === "ok") return null;
  return {
    storeId: basket.storeId,
    kind: "IncompleteCatalog",
    status,
    malformed,
    message:
      status === "missing"
        ? `No catalog received for ${basket.storeId}`
        : `${malformed} of ${received} records in the ${basket.storeId} catalog were malformed and excluded`
  };
}

/**
 * The total a budget is measured against: the plan's total, the cheapest
 * achievable total for an over-budget failure, or the best-effort sum of
 * whatever items matched.
 */
export function selectionTotal(selection: PlanSelection): number {
  const { plan, picks } = selection;
  if (plan.planType !== "unsatisfiable") return plan.totalCost;
  if (plan.failure.kind === "over_budget") return plan.failure.cheapestTotal;
  return sumPrices(picks.flatMap((p) => (p.status === "matched" ? [p.best.effectivePrice] : [])));
}

function budgetSummary(request: ShoppingRequest, selection: PlanSelection): BudgetSummary | null {
  const ceiling = request.budget.total;
  if (ceiling === null) return null;
  const totalCost = selectionTotal(selection);
  return {
    ceiling,
    totalCost,
    remaining: surplus(ceiling, totalCost),
    overBy: surplus(totalCost, ceiling)
  };
}

/**
 * Recommend where to buy a request's items from already-fetched catalogs.
 * Never throws on malformed catalog data.
 */
export function recommend(
  request: ShoppingRequest,
  catalogsByStore: CatalogsByStore,
  options: EngineOptions = {}
): Recommendation {
  const baskets = aggregateBaskets(request, catalogsByStore, options);
  const selection = selectPlan(baskets, request, options);
  const catalogIssues = baskets.flatMap((basket) => {
    const issue = catalogIssue(basket);
    return issue ? [issue] : [];
  });

  return {
    plan: selection.plan,
    items: selection.picks,
    storeSummary: baskets.map(summarize),
    catalogIssues,
    confidence: catalogIssues.length > 0 ? "reduced" : "full",
    budget: budgetSummary(request, selection)
  };
}

/**
 * Resolve the in-scope stores' catalogs concurrently, then recommend.
 * A store whose load fails is evaluated as a missing catalog.
 */
export async function recommendFromSources(
  request: ShoppingRequest,
  sources: CatalogSources,
  options: Omit<EngineOptions, "knownStores"> = {}
): Promise<Recommendation> {
  const storeIds = resolveStoreScope(request, {}, sources.stores);
  const catalogs = await loadCatalogs(storeIds, sources.loadCatalog, sources.cache);
  return recommend(request, catalogs, { ...options, knownStores: sources.stores });
}
