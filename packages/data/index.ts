import termData from "./dietary-terms.json" with { type: "json" };
import { z } from "zod";
import {
  certificationRestrictionKeys,
  exclusionRestrictionKeys,
  restrictionKeys,
  type CertificationRestrictionKey,
  type ExclusionRestrictionKey,
  type RestrictionKey
} from "@basket/contracts";

const termList = z.array(z.string().min(1));

const exclusionTermsSchema = z.object({
  ingredientTerms: termList,
  allergenTerms: termList,
  labels: termList,
  exemptPhrases: termList
});

const certificationTermsSchema = z.object({
  labels: termList,
  violatingTerms: termList,
  ingredientMarker: z.string().min(1).optional()
});

const dietaryTermDataSchema = z.object({
  meta: z.object({ source: z.string(), version: z.number().int().positive(), matching: z.string() }),
  aliases: z.record(z.enum(restrictionKeys), termList),
  exclusions: z.record(z.enum(exclusionRestrictionKeys), exclusionTermsSchema),
  certifications: z.record(z.enum(certificationRestrictionKeys), certificationTermsSchema)
});

export type ExclusionTerms = z.infer<typeof exclusionTermsSchema>;
export type CertificationTerms = z.infer<typeof certificationTermsSchema>;
export type DietaryTermData = z.infer<typeof dietaryTermDataSchema>;

const data = dietaryTermDataSchema.parse(termData);

const aliasIndex = new Map<string, RestrictionKey>();
for (const key of restrictionKeys) {
  aliasIndex.set(key, key);
  for (const alias of data.aliases[key] ?? []) {
    aliasIndex.set(alias, key);
  }
}

/**
 * Resolve a hyphenated, lowercased restriction name to its canonical key.
 */
export function resolveRestrictionAlias(name: string): RestrictionKey | null {
  return aliasIndex.get(name) ?? null;
}

export function getExclusionTerms(key: ExclusionRestrictionKey): ExclusionTerms {
  const entry = data.exclusions[key];
  if (!entry) throw new Error(`No exclusion terms configured for ${key}`);
  return entry;
}

export function getCertificationTerms(key: CertificationRestrictionKey): CertificationTerms {
  const entry = data.certifications[key];
  if (!entry) throw new Error(`No certification terms configured for ${key}`);
  return entry;
}

export { data as dietaryTermData };
