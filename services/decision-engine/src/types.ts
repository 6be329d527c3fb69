import type { FailureKind, PlanType, ProductRecord, StoreDescriptor, UnmatchedReason } from "@basket/contracts";

export type RuleOutcome = "satisfied" | "violated" | "unknown";

export type RuleCheck = {
  outcome: RuleOutcome;
  detail: string;
};

export type SuitabilityResult = {
  isSuitable: boolean;
  /** Canonical restriction keys, sorted. */
  satisfied: string[];
  violated: string[];
  unknown: string[];
  /** Unknown restrictions accepted through `assumeSatisfiedWhenUnknown`. */
  assumed: string[];
  rationale: string[];
};

export type SuitabilityOptions = {
  /** Restriction names whose unknown outcome counts as satisfied. Default: none. */
  assumeSatisfiedWhenUnknown?: readonly string[];
};

export type RankedCandidate = {
  product: ProductRecord;
  /** Sale price when present and lower, otherwise list price. */
  effectivePrice: number;
  onSale: boolean;
  suitability: SuitabilityResult;
  /** Jaccard similarity between the requested item and the product name. */
  relevance: number;
};

export type ItemMatch =
  | {
      status: "matched";
      item: string;
      storeId: string;
      best: RankedCandidate;
      alternatives: RankedCandidate[];
    }
  | {
      status: "unmatched";
      item: string;
      storeId: string;
      reason: UnmatchedReason;
      detail: string;
    };

export type MatchedItem = Extract<ItemMatch, { status: "matched" }>;

/**
 * Per-item outcome of a whole recommendation: the chosen match, or the
 * reason no store could supply the item.
 */
export type ItemRecommendation =
  | MatchedItem
  | {
      status: "unmatched";
      item: string;
      reason: UnmatchedReason;
      detail: string;
    };

export type MatchOptions = SuitabilityOptions & {
  /** Runners-up reported next to the winner. Default: 2 */
  maxAlternatives?: number;
};

export type CatalogStatus = "ok" | "partial" | "missing";

export type CatalogHealth = {
  status: CatalogStatus;
  received: number;
  accepted: number;
  malformed: number;
  issues: string[];
};

export type StoreBasket = {
  storeId: string;
  /** One entry per requested item, in request order. */
  matches: ItemMatch[];
  totalCost: number;
  matchedCount: number;
  itemCount: number;
  complete: boolean;
  catalog: CatalogHealth;
};

/** Raw catalog entries per store; `null`/`undefined` means the catalog never arrived. */
export type CatalogsByStore = Readonly<Record<string, ReadonlyArray<unknown> | null | undefined>>;

export type AggregateOptions = MatchOptions & {
  /** Store descriptors from the host; required for location scoping. */
  knownStores?: readonly StoreDescriptor[];
};

export type SelectionOptions = {
  allowMultiStore?: boolean;
  /** Penalty per extra store visited, applied only when comparing against a single store. Default: 0 */
  tripCost?: number;
};

export type EngineOptions = AggregateOptions & SelectionOptions;

export type Failure =
  | { kind: Extract<FailureKind, "unsatisfiable">; items: string[]; message: string }
  | {
      kind: Extract<FailureKind, "over_budget">;
      items: string[];
      message: string;
      ceiling: number;
      /** Cheapest total any allowed plan could reach. */
      cheapestTotal: number;
    }
  | { kind: Extract<FailureKind, "no_single_store">; items: string[]; message: string };

export type StoreAssignment = { item: string; storeId: string };

export type RecommendationPlan =
  | { planType: Extract<PlanType, "single_store">; storeId: string; totalCost: number }
  | {
      planType: Extract<PlanType, "multi_store">;
      assignments: StoreAssignment[];
      /** Visited stores, sorted. */
      stores: string[];
      totalCost: number;
    }
  | { planType: Extract<PlanType, "unsatisfiable">; failure: Failure };

export type PlanSelection = {
  plan: RecommendationPlan;
  /** One entry per requested item, in request order. */
  picks: ItemRecommendation[];
};
