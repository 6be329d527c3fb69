import { describe, expect, it } from "vitest";
import {
  parseShoppingRequest,
  productRecordSchema,
  recommendationResponseSchema,
  shoppingRequestSchema,
  storeDescriptorSchema
} from "./schemas.js";
import { isRestrictionKey, restrictionKeys } from "./restrictions.js";

describe("restrictionKeys", () => {
  it("recognizes canonical keys", () => {
    expect(isRestrictionKey("gluten-free")).toBe(true);
    expect(isRestrictionKey("non-gmo")).toBe(true);
  });

  it("rejects non-canonical spellings", () => {
    expect(isRestrictionKey("Gluten Free")).toBe(false);
    expect(isRestrictionKey("paleo")).toBe(false);
  });

  it("has no duplicates", () => {
    expect(new Set(restrictionKeys).size).toBe(restrictionKeys.length);
  });
});

// ============================================================================
// ProductRecord
// ============================================================================

describe("productRecordSchema", () => {
  const valid = {
    storeId: "walmart",
    name: "Great Value Long Grain Rice",
    price: 3.99
  };

  it("applies defaults for optional fields", () => {
    const record = productRecordSchema.parse(valid);
    expect(record.currency).toBe("USD");
    expect(record.ingredients).toBeNull();
    expect(record.labels).toEqual([]);
    expect(record.allergens).toBeNull();
    expect(record.salePrice).toBeNull();
    expect(record.inStock).toBe(true);
  });

  it("accepts a structured allergen list", () => {
    const record = productRecordSchema.parse({ ...valid, allergens: ["wheat", "soy"] });
    expect(record.allergens).toEqual(["wheat", "soy"]);
  });

  it("rejects a missing price", () => {
    expect(productRecordSchema.safeParse({ storeId: "walmart", name: "Rice" }).success).toBe(false);
  });

  it("rejects negative and non-finite prices", () => {
    expect(productRecordSchema.safeParse({ ...valid, price: -1 }).success).toBe(false);
    expect(productRecordSchema.safeParse({ ...valid, price: Number.POSITIVE_INFINITY }).success).toBe(false);
  });

  it("rejects a blank name", () => {
    expect(productRecordSchema.safeParse({ ...valid, name: "   " }).success).toBe(false);
  });
});

describe("storeDescriptorSchema", () => {
  it("defaults location to null", () => {
    expect(storeDescriptorSchema.parse({ id: "safeway", name: "Safeway" }).location).toBeNull();
  });

  it("fills missing location fields with null", () => {
    const store = storeDescriptorSchema.parse({ id: "safeway", name: "Safeway", location: { state: "California" } });
    expect(store.location).toEqual({ city: null, state: "California" });
  });
});

// ============================================================================
// ShoppingRequest
// ============================================================================

describe("shoppingRequestSchema", () => {
  it("fills budget, location and store scope defaults", () => {
    const request = shoppingRequestSchema.parse({ items: [{ name: "rice" }] });
    expect(request.budget).toEqual({ total: null, perItem: null });
    expect(request.location).toBeNull();
    expect(request.stores).toBeNull();
    expect(request.restrictions).toEqual([]);
    expect(request.items[0]).toEqual({ name: "rice", restrictions: [], maxPrice: null });
  });

  it("trims item names", () => {
    const request = shoppingRequestSchema.parse({ items: [{ name: "  bread " }] });
    expect(request.items[0]?.name).toBe("bread");
  });

  it("rejects an empty item list", () => {
    expect(shoppingRequestSchema.safeParse({ items: [] }).success).toBe(false);
  });

  it("rejects duplicate item names regardless of case", () => {
    const result = shoppingRequestSchema.safeParse({ items: [{ name: "Milk" }, { name: "milk" }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["items", 1, "name"]);
      expect(result.error.issues[0]?.message).toBe('Duplicate item "milk"');
    }
  });

  it("rejects a negative budget", () => {
    expect(shoppingRequestSchema.safeParse({ items: [{ name: "rice" }], budget: { total: -5 } }).success).toBe(false);
  });
});

describe("parseShoppingRequest", () => {
  it("returns a deeply frozen request", () => {
    const request = parseShoppingRequest({ items: [{ name: "rice", restrictions: ["gluten-free"] }] });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.items)).toBe(true);
    expect(Object.isFrozen(request.items[0]?.restrictions)).toBe(true);
    expect(Object.isFrozen(request.budget)).toBe(true);
  });

  it("throws on invalid input", () => {
    expect(() => parseShoppingRequest({ items: "rice" })).toThrow();
  });
});

// ============================================================================
// Response body
// ============================================================================

describe("recommendationResponseSchema", () => {
  const body = {
    recommendations: {
      rice: {
        store: "walmart",
        product_name: "Rice",
        product_id: null,
        brand: null,
        price: 3.99,
        on_sale: false,
        is_suitable: true,
        dietary_info: {
          satisfied: ["gluten-free"],
          violated: [],
          unknown: [],
          assumed: [],
          labels: ["gluten-free"],
          ingredients: null,
          allergens: null
        },
        link: null,
        unit_size: null,
        alternatives: []
      },
      saffron: { store: null, unmatched_reason: "no_relevant_product", detail: "nothing matched" }
    },
    total_cost: { walmart: 3.99 },
    store_summary: [
      { store: "walmart", total: 3.99, matched: 1, items: 2, complete: false, catalog_status: "ok" }
    ],
    best_store: null,
    plan_type: "unsatisfiable",
    plan_total: null,
    store_assignments: {},
    failure: { kind: "unsatisfiable", message: "No store carries saffron", items: ["saffron"] },
    catalog_issues: [],
    confidence: "full",
    budget: null
  };

  it("accepts matched and unmatched recommendations side by side", () => {
    expect(recommendationResponseSchema.safeParse(body).success).toBe(true);
  });

  it("rejects an unknown plan type", () => {
    expect(recommendationResponseSchema.safeParse({ ...body, plan_type: "cheapest" }).success).toBe(false);
  });

  it("rejects an unknown unmatched reason", () => {
    const bad = {
      ...body,
      recommendations: { saffron: { store: null, unmatched_reason: "sold_out", detail: "" } }
    };
    expect(recommendationResponseSchema.safeParse(bad).success).toBe(false);
  });
});
