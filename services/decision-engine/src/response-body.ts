import type {
  MatchedRecommendationBody,
  RecommendationResponse,
  UnmatchedRecommendationBody
} from "@basket/contracts";
import type { Recommendation } from "./decision-engine.js";
import type { ItemRecommendation } from "./types.js";

type RecommendationBody = MatchedRecommendationBody | UnmatchedRecommendationBody;

function recommendationBody(pick: ItemRecommendation): RecommendationBody {
  if (pick.status === "unmatched") {
    return { store: null, unmatched_reason: pick.reason, detail: pick.detail };
  }
  const { product, suitability } = pick.best;
  return {
    store: pick.storeId,
    product_name: product.name,
    product_id: product.productId,
    brand: product.brand,
    price: pick.best.effectivePrice,
    on_sale: pick.best.onSale,
    is_suitable: suitability.isSuitable,
    dietary_info: {
      satisfied: suitability.satisfied,
      violated: suitability.violated,
      unknown: suitability.unknown,
      assumed: suitability.assumed,
      labels: product.labels,
      ingredients: product.ingredients,
      allergens: product.allergens
    },
    link: product.link,
    unit_size: product.unitSize,
    alternatives: pick.alternatives.map((alt) => ({
      store: alt.product.storeId,
      product_name: alt.product.name,
      price: alt.effectivePrice
    }))
  };
}

/**
 * Serialize a recommendation to the JSON response body. Keys follow request
 * item order and store id order, so equal recommendations serialize to
 * identical bytes.
 */
export function toResponseBody(recommendation: Recommendation): RecommendationResponse {
  const { plan } = recommendation;

  const recommendations: RecommendationResponse["recommendations"] = Object.fromEntries(
    recommendation.items.map((pick): [string, RecommendationBody] => [pick.item, recommendationBody(pick)])
  );

  const totalCost = Object.fromEntries(recommendation.storeSummary.map((s): [string, number] => [s.storeId, s.totalCost]));

  const assignments: [string, string][] =
    plan.planType === "multi_store"
      ? plan.assignments.map((a) => [a.item, a.storeId])
      : plan.planType === "single_store"
        ? recommendation.items.map((pick) => [pick.item, plan.storeId])
        : [];
  const storeAssignments = Object.fromEntries(assignments);

  return {
    recommendations,
    total_cost: totalCost,
    store_summary: recommendation.storeSummary.map((s) => ({
      store: s.storeId,
      total: s.totalCost,
      matched: s.matchedCount,
      items: s.itemCount,
      complete: s.complete,
      catalog_status: s.catalogStatus
    })),
    best_store: plan.planType === "single_store" ? plan.storeId : null,
    plan_type: plan.planType,
    plan_total: plan.planType === "unsatisfiable" ? null : plan.totalCost,
    store_assignments: storeAssignments,
    failure:
      plan.planType === "unsatisfiable"
        ? { kind: plan.failure.kind, message: plan.failure.message, items: plan.failure.items }
        : null,
    catalog_issues: recommendation.catalogIssues.map((issue) => ({
      store: issue.storeId,
      kind: issue.kind,
      status: issue.status,
      malformed: issue.malformed,
      message: issue.message
    })),
    confidence: recommendation.confidence,
    budget: recommendation.budget
      ? {
          ceiling: recommendation.budget.ceiling,
          total_cost: recommendation.budget.totalCost,
          remaining: recommendation.budget.remaining,
          over_by: recommendation.budget.overBy
        }
      : null
  };
}
