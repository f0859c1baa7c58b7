// catalogBridge.ts
// Read-only catalog and cache lookups made while walking a plan
//
// - Canonical names for table identifiers.
// - Defining plans of permanent views.
// - Plans behind cached relations and temporary views.
//
// A missing entry means the leaf is a genuine base table.

import type { CacheKey, PlanNode, TableIdentifier } from "./planModel";
import { parseTableIdentifier } from "./planModel";
import type { QualifiedName } from "./lineage";
import { resolveConfig } from "./config";
import type { LineageConfig, LineageConfigInput } from "./config";

export interface Catalog {
  canonicalName(identifier: TableIdentifier): QualifiedName;
  resolveDefiningPlan(name: QualifiedName): PlanNode | undefined;
}

export interface CacheRegistry {
  lookup(key: CacheKey): PlanNode | undefined;
}

/**
 * Lowercase `db.table`, filling the default database; the catalog is kept
 * only when it is not the default one.
 */
export function canonicalTableName(
  identifier: TableIdentifier,
  config: Pick<LineageConfig, "defaultCatalog" | "defaultDatabase">
): QualifiedName {
  const database = (identifier.database ?? config.defaultDatabase).toLowerCase();
  const table = identifier.table.toLowerCase();
  const catalog = identifier.catalog?.toLowerCase();
  if (catalog && catalog !== config.defaultCatalog.toLowerCase()) {
    return `${catalog}.${database}.${table}`;
  }
  return `${database}.${table}`;
}

/* --------------------------------------------------------------------------
 * IN-MEMORY CATALOG
 * -------------------------------------------------------------------------- */

export class InMemoryCatalog implements Catalog {
  private readonly config: LineageConfig;
  private readonly views = new Map<QualifiedName, PlanNode>();

  constructor(config: LineageConfigInput = {}) {
    this.config = resolveConfig(config);
  }

  canonicalName(identifier: TableIdentifier): QualifiedName {
    return canonicalTableName(identifier, this.config);
  }

  registerView(name: string | TableIdentifier, plan: PlanNode): this {
    const identifier = typeof name === "string" ? parseTableIdentifier(name) : name;
    this.views.set(this.canonicalName(identifier), plan);
    return this;
  }

  dropView(name: string | TableIdentifier): boolean {
    const identifier = typeof name === "string" ? parseTableIdentifier(name) : name;
    return this.views.delete(this.canonicalName(identifier));
  }

  resolveDefiningPlan(name: QualifiedName): PlanNode | undefined {
    return this.views.get(name.toLowerCase());
  }
}

/* --------------------------------------------------------------------------
 * IN-MEMORY CACHE REGISTRY
 * -------------------------------------------------------------------------- */

/**
 * String keys are matched case-insensitively; symbol keys by identity, so two
 * cached plans registered under different symbols never resolve to each other.
 */
export class InMemoryCacheRegistry implements CacheRegistry {
  private readonly entries = new Map<CacheKey, PlanNode>();

  register(key: CacheKey, plan: PlanNode): this {
    this.entries.set(normalizeKey(key), plan);
    return this;
  }

  uncache(key: CacheKey): boolean {
    return this.entries.delete(normalizeKey(key));
  }

  lookup(key: CacheKey): PlanNode | undefined {
    return this.entries.get(normalizeKey(key));
  }
}

function normalizeKey(key: CacheKey): CacheKey {
  return typeof key === "string" ? key.toLowerCase() : key;
}
