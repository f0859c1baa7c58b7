// config.ts
// Extractor configuration, validated with zod and loadable from LINEAGE_* variables

import { z } from "zod";
import { LOG_LEVELS } from "./logger";

/* --------------------------------------------------------------------------
 * EXTRACTOR CONFIGURATION
 * -------------------------------------------------------------------------- */

export const LineageConfigSchema = z.object({
  /** Catalog whose tables are named `db.table` rather than `catalog.db.table`. */
  defaultCatalog: z.string().min(1).default("spark_catalog"),

  /** Database filled in for identifiers that name none. */
  defaultDatabase: z.string().min(1).default("default"),

  /**
   * Treat permanent views as base tables instead of inlining their defining
   * plans. Temporary views and cached relations are always inlined.
   */
  skipPermanentViewParsing: z.boolean().default(false),

  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type LineageConfig = z.infer<typeof LineageConfigSchema>;
export type LineageConfigInput = z.input<typeof LineageConfigSchema>;

export const DEFAULT_CONFIG: LineageConfig = LineageConfigSchema.parse({});

export function resolveConfig(input: LineageConfigInput = {}): LineageConfig {
  return LineageConfigSchema.parse(input);
}

const EnvSchema = z.object({
  LINEAGE_DEFAULT_CATALOG: z.string().min(1).optional(),
  LINEAGE_DEFAULT_DATABASE: z.string().min(1).optional(),
  LINEAGE_SKIP_PERMANENT_VIEW: z.enum(["true", "false"]).optional(),
  LINEAGE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Read configuration from LINEAGE_* environment variables; unset variables
 * keep their defaults.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): LineageConfig {
  const vars = EnvSchema.parse(env);
  return resolveConfig({
    defaultCatalog: vars.LINEAGE_DEFAULT_CATALOG,
    defaultDatabase: vars.LINEAGE_DEFAULT_DATABASE,
    skipPermanentViewParsing:
      vars.LINEAGE_SKIP_PERMANENT_VIEW === undefined
        ? undefined
        : vars.LINEAGE_SKIP_PERMANENT_VIEW === "true",
    logLevel: vars.LINEAGE_LOG_LEVEL,
  });
}
