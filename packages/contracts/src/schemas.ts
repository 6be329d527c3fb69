import { z } from "zod";

export const planTypes = ["single_store", "multi_store", "unsatisfiable"] as const;
export const failureKinds = ["unsatisfiable", "over_budget", "no_single_store"] as const;
export const unmatchedReasons = [
  "no_relevant_product",
  "dietary_mismatch",
  "over_budget",
  "catalog_unavailable"
] as const;

export type PlanType = (typeof planTypes)[number];
export type FailureKind = (typeof failureKinds)[number];
export type UnmatchedReason = (typeof unmatchedReasons)[number];

const money = z.number().finite().nonnegative();

// ============================================================================
// INPUT SCHEMAS
// ============================================================================

export const locationSchema = z.object({
  city: z.string().trim().min(1).nullable().default(null),
  state: z.string().trim().min(1).nullable().default(null)
});

export const storeDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  location: locationSchema.nullable().default(null)
});

export const productRecordSchema = z.object({
  storeId: z.string().min(1),
  productId: z.string().min(1).nullable().default(null),
  name: z.string().trim().min(1),
  brand: z.string().nullable().default(null),
  price: money,
  salePrice: money.nullable().default(null),
  currency: z.string().min(3).max(8).default("USD"),
  /** `null` or an empty list means the ingredients are unknown. */
  ingredients: z.array(z.string()).nullable().default(null),
  labels: z.array(z.string()).default([]),
  allergens: z.union([z.string(), z.array(z.string())]).nullable().default(null),
  link: z.string().nullable().default(null),
  unitSize: z.string().nullable().default(null),
  inStock: z.boolean().default(true)
});

export const requestedItemSchema = z.object({
  name: z.string().trim().min(1),
  restrictions: z.array(z.string().trim().min(1)).default([]),
  maxPrice: money.nullable().default(null)
});

export const budgetSchema = z.object({
  total: money.nullable().default(null),
  perItem: money.nullable().default(null)
});

export const shoppingRequestSchema = z
  .object({
    items: z.array(requestedItemSchema).min(1),
    restrictions: z.array(z.string().trim().min(1)).default([]),
    budget: budgetSchema.default({}),
    location: locationSchema.nullable().default(null),
    stores: z.array(z.string().min(1)).nullable().default(null)
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    request.items.forEach((item, index) => {
      const key = item.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["items", index, "name"],
          message: `Duplicate item "${item.name}"`
        });
      }
      seen.add(key);
    });
  });

export type Location = z.infer<typeof locationSchema>;
export type StoreDescriptor = z.infer<typeof storeDescriptorSchema>;
export type ProductRecord = z.infer<typeof productRecordSchema>;
export type ProductRecordInput = z.input<typeof productRecordSchema>;
export type RequestedItem = z.infer<typeof requestedItemSchema>;
export type ShoppingRequest = z.infer<typeof shoppingRequestSchema>;
export type ShoppingRequestInput = z.input<typeof shoppingRequestSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a shopping request and freeze it. Throws `ZodError` on invalid input.
 */
export function parseShoppingRequest(input: unknown): ShoppingRequest {
  return deepFreeze(shoppingRequestSchema.parse(input));
}

// ============================================================================
// RESPONSE BODY
// ============================================================================

export const dietaryInfoSchema = z.object({
  satisfied: z.array(z.string()),
  violated: z.array(z.string()),
  unknown: z.array(z.string()),
  assumed: z.array(z.string()),
  labels: z.array(z.string()),
  ingredients: z.array(z.string()).nullable(),
  allergens: z.union([z.string(), z.array(z.string())]).nullable()
});

export const alternativeSchema = z.object({
  store: z.string(),
  product_name: z.string(),
  price: money
});

export const matchedRecommendationSchema = z.object({
  store: z.string(),
  product_name: z.string(),
  product_id: z.string().nullable(),
  brand: z.string().nullable(),
  price: money,
  on_sale: z.boolean(),
  is_suitable: z.boolean(),
  dietary_info: dietaryInfoSchema,
  link: z.string().nullable(),
  unit_size: z.string().nullable(),
  alternatives: z.array(alternativeSchema)
});

export const unmatchedRecommendationSchema = z.object({
  store: z.null(),
  unmatched_reason: z.enum(unmatchedReasons),
  detail: z.string()
});

export const storeSummarySchema = z.object({
  store: z.string(),
  total: money,
  matched: z.number().int().nonnegative(),
  items: z.number().int().nonnegative(),
  complete: z.boolean(),
  catalog_status: z.enum(["ok", "partial", "missing"])
});

export const catalogIssueSchema = z.object({
  store: z.string(),
  kind: z.literal("IncompleteCatalog"),
  status: z.enum(["partial", "missing"]),
  malformed: z.number().int().nonnegative(),
  message: z.string()
});

export const budgetSummarySchema = z.object({
  ceiling: money,
  total_cost: money,
  remaining: money,
  over_by: money
});

export const recommendationResponseSchema = z.object({
  recommendations: z.record(z.union([matchedRecommendationSchema, unmatchedRecommendationSchema])),
  total_cost: z.record(money),
  store_summary: z.array(storeSummarySchema),
  best_store: z.string().nullable(),
  plan_type: z.enum(planTypes),
  plan_total: money.nullable(),
  store_assignments: z.record(z.string()),
  failure: z
    .object({
      kind: z.enum(failureKinds),
      message: z.string(),
      items: z.array(z.string())
    })
    .nullable(),
  catalog_issues: z.array(catalogIssueSchema),
  confidence: z.enum(["full", "reduced"]),
  budget: budgetSummarySchema.nullable()
});

export type RecommendationResponse = z.infer<typeof recommendationResponseSchema>;
export type MatchedRecommendationBody = z.infer<typeof matchedRecommendationSchema>;
export type UnmatchedRecommendationBody = z.infer<typeof unmatchedRecommendationSchema>;
