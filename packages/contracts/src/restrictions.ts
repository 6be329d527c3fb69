export const restrictionKeys = [
  "gluten-free",
  "dairy-free",
  "nut-free",
  "egg-free",
  "soy-free",
  "shellfish-free",
  "vegan",
  "vegetarian",
  "sugar-free",
  "halal",
  "kosher",
  "organic",
  "non-gmo"
] as const;

export type RestrictionKey = (typeof restrictionKeys)[number];

/** Restrictions decided from ingredient and allergen evidence. */
export const exclusionRestrictionKeys = [
  "gluten-free",
  "dairy-free",
  "nut-free",
  "egg-free",
  "soy-free",
  "shellfish-free",
  "vegan",
  "vegetarian",
  "sugar-free"
] as const satisfies readonly RestrictionKey[];

/** Restrictions decided by a declared certification label first. */
export const certificationRestrictionKeys = [
  "halal",
  "kosher",
  "organic",
  "non-gmo"
] as const satisfies readonly RestrictionKey[];

export type ExclusionRestrictionKey = (typeof exclusionRestrictionKeys)[number];
export type CertificationRestrictionKey = (typeof certificationRestrictionKeys)[number];

export function isRestrictionKey(value: string): value is RestrictionKey {
  return (restrictionKeys as readonly string[]).includes(value);
}
