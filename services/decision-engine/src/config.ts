import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { DEFAULT_CATALOG_CACHE_SIZE, DEFAULT_CATALOG_TTL_MS, type CatalogCacheConfig } from "./catalog-cache.js";
import { DEFAULT_MAX_ALTERNATIVES } from "./product-matcher.js";
import type { MatchOptions, SelectionOptions } from "./types.js";

/**
 * Load the first `.env` found in the working directory or the repository
 * root. Variables already set are kept. Returns the loaded path, if any.
 */
export function bootstrapEnv(cwd: string = process.cwd()): string | null {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(cwd, ".env"),
    path.resolve(cwd, "../../.env"),
    path.resolve(here, "../../../.env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return envPath;
  }
  return null;
}

export function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
    if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  }
  return fallback;
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const envSchema = z.object({
  BASKET_ALLOW_MULTI_STORE: z
    .string()
    .optional()
    .transform((value) => parseBoolean(value, false)),
  BASKET_ASSUME_SATISFIED_WHEN_UNKNOWN: z.string().optional().transform(parseList),
  BASKET_MAX_ALTERNATIVES: z.coerce.number().int().min(0).default(DEFAULT_MAX_ALTERNATIVES),
  BASKET_TRIP_COST: z.coerce.number().finite().min(0).default(0),
  BASKET_CATALOG_TTL_MS: z.coerce.number().int().min(0).default(DEFAULT_CATALOG_TTL_MS),
  BASKET_CATALOG_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_CATALOG_CACHE_SIZE)
});

export type EngineConfig = {
  engine: Required<MatchOptions> & Required<SelectionOptions>;
  cache: Pick<CatalogCacheConfig, "ttlMs" | "maxEntries">;
};

/**
 * Engine options from environment variables. Throws `ZodError` on a
 * malformed numeric value.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.parse(env);
  return {
    engine: {
      allowMultiStore: parsed.BASKET_ALLOW_MULTI_STORE,
      assumeSatisfiedWhenUnknown: parsed.BASKET_ASSUME_SATISFIED_WHEN_UNKNOWN,
      maxAlternatives: parsed.BASKET_MAX_ALTERNATIVES,
      tripCost: parsed.BASKET_TRIP_COST
    },
    cache: {
      ttlMs: parsed.BASKET_CATALOG_TTL_MS,
      maxEntries: parsed.BASKET_CATALOG_CACHE_SIZE
    }
  };
}
