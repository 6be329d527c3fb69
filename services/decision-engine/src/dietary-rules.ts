/**
 * Dietary Rule Evaluator
 *
 * One evaluator per supported restriction, registered by canonical key.
 * Each evaluator reads a product's declared labels, ingredient list and
 * allergen statement and reports satisfied, violated or unknown. Unknown is
 * never treated as satisfied unless the caller opts in per restriction.
 * Pure: no I/O, no randomness.
 */

import {
  certificationRestrictionKeys,
  exclusionRestrictionKeys,
  type CertificationRestrictionKey,
  type ExclusionRestrictionKey,
  type ProductRecord
} from "@basket/contracts";
import {
  getCertificationTerms,
  getExclusionTerms,
  resolveRestrictionAlias,
  type CertificationTerms,
  type ExclusionTerms
} from "@basket/data";
import { compareText, containsTerm, findTerm, stemmedTokens } from "./text-match.js";
import type { RuleCheck, SuitabilityOptions, SuitabilityResult } from "./types.js";

export interface RestrictionEvaluator {
  readonly key: string;
  check(product: ProductRecord): RuleCheck;
}

function hyphenate(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/**
 * Canonical restriction key: hyphenated lowercase with aliases folded
 * ("Lactose Free" → "dairy-free"). Unregistered names stay hyphenated.
 */
export function canonicalizeRestriction(name: string): string {
  const hyphenated = hyphenate(name);
  return resolveRestrictionAlias(hyphenated) ?? hyphenated;
}

/**
 * Deduplicated, sorted canonical keys.
 */
export function canonicalRestrictions(names: Iterable<string>): string[] {
  const keys = new Set<string>();
  for (const name of names) {
    const key = canonicalizeRestriction(name);
    if (key) keys.add(key);
  }
  return [...keys].sort(compareText);
}

function declaredLabel(product: ProductRecord, accepted: readonly string[]): string | null {
  const labels = new Set(product.labels.map(hyphenate));
  return accepted.find((label) => labels.has(label)) ?? null;
}

/** Non-blank ingredients, or null when the list is missing or empty. */
function knownIngredients(product: ProductRecord): string[] | null {
  const ingredients = (product.ingredients ?? []).filter((i) => i.trim().length > 0);
  return ingredients.length > 0 ? ingredients : null;
}

function allergenStatements(product: ProductRecord): string[] {
  if (product.allergens === null) return [];
  return typeof product.allergens === "string" ? [product.allergens] : product.allergens;
}

// ── Evaluators ─────────────────────────────────────────

/**
 * Free-of-X restrictions. Contradicting ingredient or allergen evidence
 * outranks a declared label.
 */
class ExclusionRule implements RestrictionEvaluator {
  constructor(
    readonly key: ExclusionRestrictionKey,
    private readonly terms: ExclusionTerms
  ) {}

  check(product: ProductRecord): RuleCheck {
    const ingredients = knownIngredients(product);
    for (const ingredient of ingredients ?? []) {
      const term = findTerm(ingredient, this.terms.ingredientTerms, this.terms.exemptPhrases);
      if (term) {
        return { outcome: "violated", detail: `${this.key}: ingredient "${ingredient}" contains ${term}` };
      }
    }

    for (const statement of allergenStatements(product)) {
      const term = findTerm(statement, this.terms.allergenTerms, this.terms.exemptPhrases);
      if (term) {
        return { outcome: "violated", detail: `${this.key}: allergen statement names ${term}` };
      }
    }

    const label = declaredLabel(product, this.terms.labels);
    if (label) return { outcome: "satisfied", detail: `${this.key}: declared label ${label}` };

    if (ingredients) {
      return {
        outcome: "satisfied",
        detail: `${this.key}: no conflicts in ${ingredients.length} ingredient${ingredients.length !== 1 ? "s" : ""}`
      };
    }

    return { outcome: "unknown", detail: `${this.key}: no ingredient list or confirming label` };
  }
}

/**
 * Certification restrictions: the declared label decides first, ingredient
 * heuristics are the fallback.
 */
class CertificationRule implements RestrictionEvaluator {
  constructor(
    readonly key: CertificationRestrictionKey,
    private readonly terms: CertificationTerms
  ) {}

  check(product: ProductRecord): RuleCheck {
    const label = declaredLabel(product, this.terms.labels);
    if (label) return { outcome: "satisfied", detail: `${this.key}: declared label ${label}` };

    const ingredients = knownIngredients(product);
    for (const ingredient of ingredients ?? []) {
      const term = findTerm(ingredient, this.terms.violatingTerms);
      if (term) {
        return { outcome: "violated", detail: `${this.key}: ingredient "${ingredient}" contains ${term}` };
      }
    }

    const marker = this.terms.ingredientMarker;
    if (marker && ingredients && ingredients.every((i) => containsTerm(stemmedTokens(i), marker))) {
      return { outcome: "satisfied", detail: `${this.key}: every ingredient is marked ${marker}` };
    }

    return { outcome: "unknown", detail: `${this.key}: no certification label` };
  }
}

/**
 * Restrictions without a registered rule: only a matching label confirms them.
 */
class DeclaredLabelRule implements RestrictionEvaluator {
  constructor(readonly key: string) {}

  check(product: ProductRecord): RuleCheck {
    if (declaredLabel(product, [this.key])) {
      return { outcome: "satisfied", detail: `${this.key}: declared label ${this.key}` };
    }
    return { outcome: "unknown", detail: `${this.key}: not declared and no rule to evaluate it` };
  }
}

const registry = new Map<string, RestrictionEvaluator>();
for (const key of exclusionRestrictionKeys) {
  registry.set(key, new ExclusionRule(key, getExclusionTerms(key)));
}
for (const key of certificationRestrictionKeys) {
  registry.set(key, new CertificationRule(key, getCertificationTerms(key)));
}

export function isRegisteredRestriction(key: string): boolean {
  return registry.has(key);
}

export function getRestrictionEvaluator(key: string): RestrictionEvaluator {
  return registry.get(key) ?? new DeclaredLabelRule(key);
}

/**
 * Evaluate a product against a set of restrictions.
 */
export function evaluateSuitability(
  product: ProductRecord,
  restrictions: Iterable<string>,
  options: SuitabilityOptions = {}
): SuitabilityResult {
  const assumable = new Set(canonicalRestrictions(options.assumeSatisfiedWhenUnknown ?? []));
  const satisfied: string[] = [];
  const violated: string[] = [];
  const unknown: string[] = [];
  const rationale: string[] = [];

  for (const key of canonicalRestrictions(restrictions)) {
    const result = getRestrictionEvaluator(key).check(product);
    rationale.push(result.detail);
    if (result.outcome === "satisfied") satisfied.push(key);
    else if (result.outcome === "violated") violated.push(key);
    else unknown.push(key);
  }

  const assumed = unknown.filter((key) => assumable.has(key));

  return {
    isSuitable: violated.length === 0 && assumed.length === unknown.length,
    satisfied,
    violated,
    unknown,
    assumed,
    rationale
  };
}
