// planModel.ts
// Resolved relational plan consumed by the lineage extractor
//
// Key ideas:
//
// - Every operator owns its children and an ordered list of output columns.
// - A column is identified by its ColumnId; display names are for people.
// - Expressions reference input columns by id, never by name.
// - Commands (CTAS, INSERT, MERGE, CREATE VIEW, ...) wrap the query whose
//   output they write, plus the destination they write it to.

import { createColumnId, outputOf } from "./attributeResolver";

/* --------------------------------------------------------------------------
 * BASIC TYPES
 * -------------------------------------------------------------------------- */

export type ColumnId = string;

export interface Attribute {
  id: ColumnId;
  name: string;
}

export interface TableIdentifier {
  catalog?: string;
  database?: string;
  table: string;
}

/** Registered name, or a symbol standing for one cached plan instance. */
export type CacheKey = string | symbol;

export type LiteralValue = string | number | boolean | null;

/* --------------------------------------------------------------------------
 * EXPRESSIONS
 * -------------------------------------------------------------------------- */

export interface CaseBranch {
  when: Expression;
  then: Expression;
}

export type Expression =
  | { kind: "AttrRef"; id: ColumnId; name: string }
  | { kind: "Literal"; value: LiteralValue }
  | { kind: "Call"; fn: string; args: Expression[] }
  | { kind: "Case"; branches: CaseBranch[]; otherwise?: Expression }
  | {
      kind: "Aggregate";
      fn: string;
      args: Expression[];
      countStar: boolean;
      distinct: boolean;
    }
  | {
      kind: "Window";
      fn: Expression;
      partitionBy: Expression[];
      orderBy: Expression[];
    }
  | { kind: "ScalarSubquery"; plan: PlanNode }
  | {
      kind: "SubqueryPredicate";
      predicate: "exists" | "in";
      negated: boolean;
      values: Expression[];
      plan: PlanNode;
      /**
       * Informational only: the subquery is referenced solely through
       * correlation. Predicate subqueries contribute no lineage either way.
       */
      correlatedOnly: boolean;
    }
  | { kind: "Unresolved"; name: string };

/** One select-list item: the expression and the column it produces. */
export interface OutputExpr {
  id: ColumnId;
  name: string;
  expr: Expression;
}

/* --------------------------------------------------------------------------
 * QUERY OPERATORS
 * -------------------------------------------------------------------------- */

export type JoinType =
  | "inner"
  | "cross"
  | "leftouter"
  | "rightouter"
  | "fullouter"
  | "leftsemi"
  | "leftanti";

export type SetOperator = "union" | "intersect" | "except";

export interface RelationNode {
  kind: "Relation";
  table: TableIdentifier;
  output: Attribute[];
}

/** Inline rows (VALUES, or the single empty row of a FROM-less SELECT). */
export interface LocalRelationNode {
  kind: "LocalRelation";
  output: Attribute[];
}

export interface CachedRelationNode {
  kind: "CachedRelation";
  key: CacheKey;
  output: Attribute[];
}

export interface CteRefNode {
  kind: "CteRef";
  cteId: string;
  output: Attribute[];
}

export interface ProjectNode {
  kind: "Project";
  projectList: OutputExpr[];
  child: PlanNode;
}

export interface FilterNode {
  kind: "Filter";
  condition: Expression;
  child: PlanNode;
}

export interface AggregateNode {
  kind: "Aggregate";
  groupingExprs: Expression[];
  aggregateList: OutputExpr[];
  child: PlanNode;
}

/** Grouping sets: one projection of the child per active grouping set. */
export interface ExpandNode {
  kind: "Expand";
  projections: Expression[][];
  output: Attribute[];
  child: PlanNode;
}

export interface JoinNode {
  kind: "Join";
  joinType: JoinType;
  condition?: Expression;
  left: PlanNode;
  right: PlanNode;
}

export interface SetOperationNode {
  kind: "SetOperation";
  op: SetOperator;
  all: boolean;
  output: Attribute[];
  children: PlanNode[];
}

export interface WindowNode {
  kind: "Window";
  windowList: OutputExpr[];
  child: PlanNode;
}

export interface SubqueryAliasNode {
  kind: "SubqueryAlias";
  alias: string;
  child: PlanNode;
}

/** Boundary left in the plan where the resolver expanded a view. */
export interface ViewNode {
  kind: "View";
  name: TableIdentifier;
  temporary: boolean;
  child: PlanNode;
}

export interface CteDefinition {
  id: string;
  name: string;
  plan: PlanNode;
}

export interface WithCteNode {
  kind: "WithCte";
  definitions: CteDefinition[];
  child: PlanNode;
}

export interface SortNode {
  kind: "Sort";
  order: Expression[];
  child: PlanNode;
}

export interface LimitNode {
  kind: "Limit";
  limit: number;
  child: PlanNode;
}

export interface DistinctNode {
  kind: "Distinct";
  child: PlanNode;
}

export interface UnresolvedRelationNode {
  kind: "UnresolvedRelation";
  name: string;
}

/** Any operator the extractor has no dedicated rule for. */
export interface GenericNode {
  kind: "Generic";
  operator: string;
  output: Attribute[];
  children: PlanNode[];
}

export type QueryNode =
  | RelationNode
  | LocalRelationNode
  | CachedRelationNode
  | CteRefNode
  | ProjectNode
  | FilterNode
  | AggregateNode
  | ExpandNode
  | JoinNode
  | SetOperationNode
  | WindowNode
  | SubqueryAliasNode
  | ViewNode
  | WithCteNode
  | SortNode
  | LimitNode
  | DistinctNode
  | UnresolvedRelationNode
  | GenericNode;

/* --------------------------------------------------------------------------
 * COMMANDS
 * -------------------------------------------------------------------------- */

export interface CreateTableAsSelectNode {
  kind: "CreateTableAsSelect";
  target: TableIdentifier;
  /** Declared column names; defaults to the query's output names. */
  columns?: string[];
  query: PlanNode;
}

export interface InsertIntoNode {
  kind: "InsertInto";
  target: TableIdentifier;
  /** Destination schema order, partition columns included. */
  targetColumns: string[];
  /** Partition columns fixed by `PARTITION(col = value)`. */
  staticPartitions: Record<string, LiteralValue>;
  overwrite: boolean;
  query: PlanNode;
}

export interface InsertIntoDirectoryNode {
  kind: "InsertIntoDirectory";
  path: string;
  overwrite: boolean;
  query: PlanNode;
}

export interface CreateViewNode {
  kind: "CreateView";
  target: TableIdentifier;
  columnAliases?: string[];
  replace: boolean;
  /** ALTER VIEW ... AS rather than CREATE VIEW. */
  alter: boolean;
  query: PlanNode;
}

export interface Assignment {
  column: string;
  value: Expression;
}

export type MergeAction =
  | { kind: "update"; condition?: Expression; assignments: Assignment[] }
  | { kind: "insert"; condition?: Expression; assignments: Assignment[] }
  | { kind: "updateStar"; condition?: Expression }
  | { kind: "insertStar"; condition?: Expression }
  | { kind: "delete"; condition?: Expression };

export interface MergeIntoNode {
  kind: "MergeInto";
  target: TableIdentifier;
  targetColumns: string[];
  source: PlanNode;
  condition: Expression;
  matched: MergeAction[];
  notMatched: MergeAction[];
}

/** CREATE TABLE with column definitions only. */
export interface CreateTableNode {
  kind: "CreateTable";
  target: TableIdentifier;
  columns: string[];
}

/** Any other statement that moves no data (DROP, SET, ...). */
export interface CommandNode {
  kind: "Command";
  name: string;
}

export type StatementNode =
  | CreateTableAsSelectNode
  | InsertIntoNode
  | InsertIntoDirectoryNode
  | CreateViewNode
  | MergeIntoNode
  | CreateTableNode
  | CommandNode;

export type PlanNode = QueryNode | StatementNode;

const STATEMENT_KINDS: ReadonlySet<string> = new Set<StatementNode["kind"]>([
  "CreateTableAsSelect",
  "InsertInto",
  "InsertIntoDirectory",
  "CreateView",
  "MergeInto",
  "CreateTable",
  "Command",
]);

export function isStatement(node: PlanNode): node is StatementNode {
  return STATEMENT_KINDS.has(node.kind);
}

/* --------------------------------------------------------------------------
 * NAMES
 * -------------------------------------------------------------------------- */

/**
 * Split `table`, `db.table` or `catalog.db.table` into an identifier.
 */
export function parseTableIdentifier(text: string): TableIdentifier {
  const parts = text.split(".").map((p) => p.trim());
  if (parts.some((p) => p.length === 0) || parts.length > 3) {
    throw new Error(`Invalid table identifier: ${text}`);
  }
  if (parts.length === 3) {
    return { catalog: parts[0], database: parts[1], table: parts[2] };
  }
  if (parts.length === 2) {
    return { database: parts[0], table: parts[1] };
  }
  return { table: parts[0] };
}

function toIdentifier(table: string | TableIdentifier): TableIdentifier {
  return typeof table === "string" ? parseTableIdentifier(table) : table;
}

const INFIX_OPERATORS = new Set([
  "+", "-", "*", "/", "%", "=", "!=", "<>", "<", "<=", ">", ">=", "<=>", "and", "or", "||",
]);

/**
 * Readable rendering of an expression, used as the default column name for
 * unaliased select-list items, e.g. `sum((hash(col1) + 1))`.
 */
export function describeExpression(expr: Expression): string {
  switch (expr.kind) {
    case "AttrRef":
      return expr.name;
    case "Literal":
      return expr.value === null ? "NULL" : String(expr.value);
    case "Call": {
      if (INFIX_OPERATORS.has(expr.fn.toLowerCase()) && expr.args.length === 2) {
        const [left, right] = expr.args;
        const op = /^(and|or)$/i.test(expr.fn) ? expr.fn.toUpperCase() : expr.fn;
        return `(${describeExpression(left)} ${op} ${describeExpression(right)})`;
      }
      return `${expr.fn}(${expr.args.map(describeExpression).join(", ")})`;
    }
    case "Case": {
      const branches = expr.branches
        .map((b) => `WHEN ${describeExpression(b.when)} THEN ${describeExpression(b.then)}`)
        .join(" ");
      const otherwise = expr.otherwise ? ` ELSE ${describeExpression(expr.otherwise)}` : "";
      return `CASE ${branches}${otherwise} END`;
    }
    case "Aggregate":
      if (expr.countStar) return "count(1)";
      return `${expr.fn}(${expr.distinct ? "DISTINCT " : ""}${expr.args.map(describeExpression).join(", ")})`;
    case "Window": {
      const spec = [
        expr.partitionBy.length
          ? `PARTITION BY ${expr.partitionBy.map(describeExpression).join(", ")}`
          : "",
        expr.orderBy.length ? `ORDER BY ${expr.orderBy.map(describeExpression).join(", ")}` : "",
      ]
        .filter((s) => s.length > 0)
        .join(" ");
      return `${describeExpression(expr.fn)} OVER (${spec})`;
    }
    case "ScalarSubquery":
      return "scalarsubquery()";
    case "SubqueryPredicate": {
      const text =
        expr.predicate === "exists"
          ? "exists()"
          : `(${expr.values.map(describeExpression).join(", ")} IN (listquery()))`;
      return expr.negated ? `(NOT ${text})` : text;
    }
    case "Unresolved":
      return `'${expr.name}`;
  }
}

/* --------------------------------------------------------------------------
 * EXPRESSION BUILDERS
 * -------------------------------------------------------------------------- */

export const Expr = {
  ref(attr: Attribute): Expression {
    return { kind: "AttrRef", id: attr.id, name: attr.name };
  },

  /** Reference the first output column of `node` named `name` (case-insensitive). */
  col(node: PlanNode, name: string): Expression {
    const attr = outputOf(node).find((a) => a.name.toLowerCase() === name.toLowerCase());
    if (!attr) {
      throw new Error(`Unknown column ${name} in ${node.kind} output`);
    }
    return this.ref(attr);
  },

  lit(value: LiteralValue): Expression {
    return { kind: "Literal", value };
  },

  call(fn: string, ...args: Expression[]): Expression {
    return { kind: "Call", fn, args };
  },

  caseWhen(branches: CaseBranch[], otherwise?: Expression): Expression {
    return { kind: "Case", branches, otherwise };
  },

  agg(fn: string, args: Expression[], opts: { distinct?: boolean } = {}): Expression {
    return { kind: "Aggregate", fn, args, countStar: false, distinct: opts.distinct ?? false };
  },

  countStar(): Expression {
    return { kind: "Aggregate", fn: "count", args: [], countStar: true, distinct: false };
  },

  window(
    fn: Expression,
    opts: { partitionBy?: Expression[]; orderBy?: Expression[] } = {}
  ): Expression {
    return {
      kind: "Window",
      fn,
      partitionBy: opts.partitionBy ?? [],
      orderBy: opts.orderBy ?? [],
    };
  },

  scalar(plan: PlanNode): Expression {
    return { kind: "ScalarSubquery", plan };
  },

  exists(
    plan: PlanNode,
    opts: { negated?: boolean; correlatedOnly?: boolean } = {}
  ): Expression {
    return {
      kind: "SubqueryPredicate",
      predicate: "exists",
      negated: opts.negated ?? false,
      values: [],
      plan,
      correlatedOnly: opts.correlatedOnly ?? false,
    };
  },

  inSubquery(
    values: Expression[],
    plan: PlanNode,
    opts: { negated?: boolean; correlatedOnly?: boolean } = {}
  ): Expression {
    return {
      kind: "SubqueryPredicate",
      predicate: "in",
      negated: opts.negated ?? false,
      values,
      plan,
      correlatedOnly: opts.correlatedOnly ?? false,
    };
  },

  unresolved(name: string): Expression {
    return { kind: "Unresolved", name };
  },

  /**
   * Name a select-list item. A bare column reference keeps its id (aliasing
   * only renames); anything computed gets a fresh id.
   */
  as(expr: Expression, name?: string): OutputExpr {
    const displayName = name ?? describeExpression(expr);
    if (expr.kind === "AttrRef") {
      return { id: expr.id, name: displayName, expr };
    }
    return { id: createColumnId(), name: displayName, expr };
  },
};

/* --------------------------------------------------------------------------
 * PLAN BUILDERS
 * -------------------------------------------------------------------------- */

function freshAttributes(names: string[]): Attribute[] {
  return names.map((name) => ({ id: createColumnId(), name }));
}

let cteIdCounter = 0;

export const Plan = {
  table(table: string | TableIdentifier, columns: string[]): RelationNode {
    return { kind: "Relation", table: toIdentifier(table), output: freshAttributes(columns) };
  },

  values(columns: string[]): LocalRelationNode {
    return { kind: "LocalRelation", output: freshAttributes(columns) };
  },

  oneRow(): LocalRelationNode {
    return { kind: "LocalRelation", output: [] };
  },

  cached(key: CacheKey, columns: string[]): CachedRelationNode {
    return { kind: "CachedRelation", key, output: freshAttributes(columns) };
  },

  project(child: PlanNode, projectList: OutputExpr[]): ProjectNode {
    return { kind: "Project", projectList, child };
  },

  /** Project every column of `child` under its own name. */
  select(child: PlanNode, ...names: string[]): ProjectNode {
    return this.project(
      child,
      names.map((name) => Expr.as(Expr.col(child, name)))
    );
  },

  filter(child: PlanNode, condition: Expression): FilterNode {
    return { kind: "Filter", condition, child };
  },

  aggregate(
    child: PlanNode,
    groupingExprs: Expression[],
    aggregateList: OutputExpr[]
  ): AggregateNode {
    return { kind: "Aggregate", groupingExprs, aggregateList, child };
  },

  expand(child: PlanNode, projections: Expression[][], names: string[]): ExpandNode {
    return { kind: "Expand", projections, output: freshAttributes(names), child };
  },

  join(
    left: PlanNode,
    right: PlanNode,
    joinType: JoinType = "inner",
    condition?: Expression
  ): JoinNode {
    return { kind: "Join", joinType, condition, left, right };
  },

  /** Set operation whose output reuses the first child's columns. */
  setOperation(op: SetOperator, children: PlanNode[], all: boolean = false): SetOperationNode {
    if (children.length === 0) {
      throw new Error(`${op} needs at least one child`);
    }
    return {
      kind: "SetOperation",
      op,
      all,
      output: outputOf(children[0]).map((a) => ({ ...a })),
      children,
    };
  },

  union(children: PlanNode[], all: boolean = false): SetOperationNode {
    return this.setOperation("union", children, all);
  },

  window(child: PlanNode, windowList: OutputExpr[]): WindowNode {
    return { kind: "Window", windowList, child };
  },

  alias(child: PlanNode, alias: string): SubqueryAliasNode {
    return { kind: "SubqueryAlias", alias, child };
  },

  view(name: string | TableIdentifier, child: PlanNode, temporary: boolean = false): ViewNode {
    return { kind: "View", name: toIdentifier(name), temporary, child };
  },

  cte(name: string, plan: PlanNode): CteDefinition {
    return { id: `cte_${++cteIdCounter}`, name, plan };
  },

  cteRef(definition: CteDefinition): CteRefNode {
    return {
      kind: "CteRef",
      cteId: definition.id,
      output: freshAttributes(outputOf(definition.plan).map((a) => a.name)),
    };
  },

  withCte(definitions: CteDefinition[], child: PlanNode): WithCteNode {
    return { kind: "WithCte", definitions, child };
  },

  sort(child: PlanNode, order: Expression[]): SortNode {
    return { kind: "Sort", order, child };
  },

  limit(child: PlanNode, limit: number): LimitNode {
    return { kind: "Limit", limit, child };
  },

  distinct(child: PlanNode): DistinctNode {
    return { kind: "Distinct", child };
  },

  unresolved(name: string): UnresolvedRelationNode {
    return { kind: "UnresolvedRelation", name };
  },

  generic(operator: string, children: PlanNode[], columns?: string[]): GenericNode {
    const output = columns
      ? freshAttributes(columns)
      : children.length
        ? outputOf(children[0]).map((a) => ({ ...a }))
        : [];
    return { kind: "Generic", operator, output, children };
  },

  createTableAsSelect(
    target: string | TableIdentifier,
    query: PlanNode,
    columns?: string[]
  ): CreateTableAsSelectNode {
    return { kind: "CreateTableAsSelect", target: toIdentifier(target), columns, query };
  },

  insertInto(
    target: string | TableIdentifier,
    targetColumns: string[],
    query: PlanNode,
    opts: { staticPartitions?: Record<string, LiteralValue>; overwrite?: boolean } = {}
  ): InsertIntoNode {
    return {
      kind: "InsertInto",
      target: toIdentifier(target),
      targetColumns,
      staticPartitions: opts.staticPartitions ?? {},
      overwrite: opts.overwrite ?? false,
      query,
    };
  },

  insertIntoDirectory(path: string, query: PlanNode, overwrite: boolean = true): InsertIntoDirectoryNode {
    return { kind: "InsertIntoDirectory", path, overwrite, query };
  },

  createView(
    target: string | TableIdentifier,
    query: PlanNode,
    opts: { columnAliases?: string[]; replace?: boolean; alter?: boolean } = {}
  ): CreateViewNode {
    return {
      kind: "CreateView",
      target: toIdentifier(target),
      columnAliases: opts.columnAliases,
      replace: opts.replace ?? false,
      alter: opts.alter ?? false,
      query,
    };
  },

  mergeInto(opts: {
    target: string | TableIdentifier;
    targetColumns: string[];
    source: PlanNode;
    condition: Expression;
    matched?: MergeAction[];
    notMatched?: MergeAction[];
  }): MergeIntoNode {
    return {
      kind: "MergeInto",
      target: toIdentifier(opts.target),
      targetColumns: opts.targetColumns,
      source: opts.source,
      condition: opts.condition,
      matched: opts.matched ?? [],
      notMatched: opts.notMatched ?? [],
    };
  },

  createTable(target: string | TableIdentifier, columns: string[]): CreateTableNode {
    return { kind: "CreateTable", target: toIdentifier(target), columns };
  },

  command(name: string): CommandNode {
    return { kind: "Command", name };
  },
};
