// index.ts
// Package surface

export { extractLineage, extractLineageFromSql } from "./extractor";
export type { ExtractOptions, LineageResult, PlanProvider } from "./extractor";

export { Expr, Plan, describeExpression, isStatement, parseTableIdentifier } from "./planModel";
export type {
  Assignment,
  Attribute,
  CacheKey,
  ColumnId,
  CteDefinition,
  Expression,
  JoinType,
  LiteralValue,
  MergeAction,
  OutputExpr,
  PlanNode,
  QueryNode,
  SetOperator,
  StatementNode,
  TableIdentifier,
} from "./planModel";

export { createColumnId, identityOf, outputOf, resetColumnIdCounter } from "./attributeResolver";

export { LineagePropagator } from "./lineagePropagator";
export type { NodeLineage, PropagatorContext } from "./lineagePropagator";

export { bindQuery, bindStatement } from "./targetBinder";

export { InMemoryCacheRegistry, InMemoryCatalog, canonicalTableName } from "./catalogBridge";
export type { CacheRegistry, Catalog } from "./catalogBridge";

export {
  COUNT_STAR_COLUMN,
  emptyLineage,
  formatLineage,
  formatSourceRef,
  parseSourceRef,
} from "./lineage";
export type { Lineage, LineageColumn, QualifiedName, SourceColumnRef } from "./lineage";

export {
  CyclicDefinitionError,
  InvalidPlanError,
  LineageError,
  UnresolvedPlanError,
  UnsupportedOperatorError,
} from "./errors";
export type { LineageErrorCode } from "./errors";

export { DEFAULT_CONFIG, LineageConfigSchema, configFromEnv, resolveConfig } from "./config";
export type { LineageConfig, LineageConfigInput } from "./config";

export { LOG_LEVELS, Logger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
