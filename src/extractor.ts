// extractor.ts
// Entry points: plan -> Lineage, and SQL -> plan -> Lineage through the host's planner.

import type { PlanNode } from "./planModel";
import { isStatement } from "./planModel";
import { InMemoryCacheRegistry, InMemoryCatalog } from "./catalogBridge";
import type { CacheRegistry, Catalog } from "./catalogBridge";
import { resolveConfig } from "./config";
import type { LineageConfigInput } from "./config";
import { LineageError } from "./errors";
import type { UnsupportedOperatorError } from "./errors";
import { formatLineage } from "./lineage";
import type { Lineage } from "./lineage";
import { LineagePropagator } from "./lineagePropagator";
import { Logger } from "./logger";
import { bindQuery, bindStatement } from "./targetBinder";

export interface ExtractOptions {
  catalog?: Catalog;
  cacheRegistry?: CacheRegistry;
  config?: LineageConfigInput;
  logger?: Logger;
}

export type LineageResult =
  | { success: true; lineage: Lineage; warnings: UnsupportedOperatorError[] }
  | { success: false; error: LineageError };

/** The host's parse + resolve + optimize pipeline. */
export type PlanProvider = (sql: string) => PlanNode;

/**
 * Compute the lineage of one resolved plan.
 *
 * Lineage failures (unresolved references, cyclic definitions, malformed
 * plans) come back as `{ success: false }`; anything else is a bug and is
 * thrown. Operators without a rule are listed in `warnings`.
 */
export function extractLineage(plan: PlanNode, options: ExtractOptions = {}): LineageResult {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? new Logger({ level: config.logLevel, context: "lineage" });
  const catalog = options.catalog ?? new InMemoryCatalog(config);
  const propagator = new LineagePropagator({
    catalog,
    cacheRegistry: options.cacheRegistry ?? new InMemoryCacheRegistry(),
    config,
    logger: logger.child("propagator"),
  });

  try {
    const lineage = isStatement(plan)
      ? bindStatement(plan, propagator, catalog)
      : bindQuery(propagator.propagate(plan));
    logger.debug(`${plan.kind} lineage\n${formatLineage(lineage)}`);
    return { success: true, lineage, warnings: propagator.warnings };
  } catch (error) {
    if (error instanceof LineageError) {
      logger.debug(`${plan.kind} lineage failed: ${error.message}`, { code: error.code });
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Plan `sql` with the host's planner and extract its lineage. Planner
 * failures propagate unchanged.
 */
export function extractLineageFromSql(
  sql: string,
  planner: PlanProvider,
  options: ExtractOptions = {}
): LineageResult {
  return extractLineage(planner(sql), options);
}
