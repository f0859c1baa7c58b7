// lineagePropagator.ts
// Bottom-up column lineage over a resolved plan
//
// Key ideas:
//
// - Every operator yields a NodeLineage: its output columns, the source
//   columns behind each output id, and the tables it touched (in order).
// - Children are fully resolved before their parent (post-order).
// - Views, cached relations and CTEs are inlined where they are referenced;
//   the inlined plan's columns are renamed 1:1 to the referencing leaf's ids.
// - Subqueries in predicates are checked but contribute nothing; scalar
//   subqueries contribute their column and their tables.
// - Operators without a rule fall back to positional passthrough and are
//   reported as warnings, never as failures.

import type { Attribute, CacheKey, Expression, OutputExpr, PlanNode } from "./planModel";
import { isConstantExpression, outputOf, remapOutputs } from "./attributeResolver";
import type { CacheRegistry, Catalog } from "./catalogBridge";
import type { LineageConfig } from "./config";
import {
  COUNT_STAR_COLUMN,
  EMPTY_SOURCES,
  distinctInOrder,
  formatSourceRef,
  unionSources,
} from "./lineage";
import type { ColumnLineage, QualifiedName, SourceSet } from "./lineage";
import {
  CyclicDefinitionError,
  InvalidPlanError,
  UnresolvedPlanError,
  UnsupportedOperatorError,
} from "./errors";
import type { Logger } from "./logger";

/* --------------------------------------------------------------------------
 * TYPES
 * -------------------------------------------------------------------------- */

export interface NodeLineage {
  output: Attribute[];
  /** Source columns keyed by output column id. */
  columns: ColumnLineage;
  /** Tables read, first-seen order, no duplicates. */
  tables: QualifiedName[];
  /**
   * Tables whose rows flow into this node's output. Excludes tables read only
   * by scalar subqueries; `count(*)` binds to these.
   */
  rowTables: QualifiedName[];
}

export interface PropagatorContext {
  catalog: Catalog;
  cacheRegistry: CacheRegistry;
  config: LineageConfig;
  logger: Logger;
}

interface ExpansionFrame {
  key: string | symbol;
  label: string;
}

/**
 * Tables met while evaluating one operator's own expressions (scalar
 * subqueries). They precede the children's tables in the operator's list.
 */
type Encountered = QualifiedName[];

/* --------------------------------------------------------------------------
 * PROPAGATOR
 * -------------------------------------------------------------------------- */

export class LineagePropagator {
  private readonly ctx: PropagatorContext;
  private readonly expansionStack: ExpansionFrame[] = [];
  private readonly cteScopes: Map<string, { name: string; plan: PlanNode }>[] = [];
  private readonly memo = new WeakMap<PlanNode, NodeLineage>();
  private readonly unsupported: UnsupportedOperatorError[] = [];

  constructor(ctx: PropagatorContext) {
    this.ctx = ctx;
  }

  /** Operators that fell back to passthrough so far. */
  get warnings(): UnsupportedOperatorError[] {
    return [...this.unsupported];
  }

  propagate(node: PlanNode): NodeLineage {
    const cached = this.memo.get(node);
    if (cached) return cached;
    const result = this.visit(node);
    this.memo.set(node, result);
    return result;
  }

  /**
   * Source columns of `expr` evaluated over `input`. Tables of scalar
   * subqueries met on the way are appended to `encountered`.
   */
  sourcesOf(expr: Expression, input: NodeLineage, encountered: Encountered): SourceSet {
    switch (expr.kind) {
      case "AttrRef":
        // ids outside this scope are outer references of a correlated subquery
        return input.columns.get(expr.id) ?? EMPTY_SOURCES;
      case "Literal":
        return EMPTY_SOURCES;
      case "Call":
        return this.sourcesOfAll(expr.args, input, encountered);
      case "Case":
        return this.sourcesOfAll(
          [
            ...expr.branches.flatMap((b) => [b.when, b.then]),
            ...(expr.otherwise ? [expr.otherwise] : []),
          ],
          input,
          encountered
        );
      case "Aggregate":
        if (expr.countStar) {
          return new Set(
            input.rowTables.map((table) => formatSourceRef({ table, column: COUNT_STAR_COLUMN }))
          );
        }
        return this.sourcesOfAll(expr.args, input, encountered);
      case "Window":
        return this.sourcesOfAll(
          [expr.fn, ...expr.partitionBy, ...expr.orderBy],
          input,
          encountered
        );
      case "ScalarSubquery": {
        const sub = this.propagate(expr.plan);
        if (sub.output.length !== 1) {
          throw new InvalidPlanError(
            `Scalar subquery must produce one column, got ${sub.output.length}`
          );
        }
        encountered.push(...sub.tables);
        return sub.columns.get(sub.output[0].id) ?? EMPTY_SOURCES;
      }
      case "SubqueryPredicate":
        // resolved for well-formedness only; its tables and columns are dropped
        this.propagate(expr.plan);
        return this.sourcesOfAll(expr.values, input, encountered);
      case "Unresolved":
        throw new UnresolvedPlanError(expr.name);
    }
  }

  private sourcesOfAll(
    exprs: Expression[],
    input: NodeLineage,
    encountered: Encountered
  ): SourceSet {
    return unionSources(exprs.map((e) => this.sourcesOf(e, input, encountered)));
  }

  /** Evaluate a condition for its errors and nothing else. */
  private check(exprs: Expression[], input: NodeLineage): void {
    this.sourcesOfAll(exprs, input, []);
  }

  private visit(node: PlanNode): NodeLineage {
    switch (node.kind) {
      case "Relation": {
        const name = this.ctx.catalog.canonicalName(node.table);
        const cachedPlan = this.ctx.cacheRegistry.lookup(name);
        if (cachedPlan) {
          return this.inline(`cache:${name}`, name, cachedPlan, node.output);
        }
        if (!this.ctx.config.skipPermanentViewParsing) {
          const viewPlan = this.ctx.catalog.resolveDefiningPlan(name);
          if (viewPlan) {
            return this.inline(`view:${name}`, name, viewPlan, node.output);
          }
        }
        return baseTable(name, node.output);
      }

      case "LocalRelation":
        return {
          output: node.output,
          columns: new Map(node.output.map((a) => [a.id, EMPTY_SOURCES])),
          tables: [],
          rowTables: [],
        };

      case "CachedRelation": {
        const plan = this.ctx.cacheRegistry.lookup(node.key);
        if (!plan) {
          throw new InvalidPlanError(`No cached plan registered for ${describeKey(node.key)}`);
        }
        const key = typeof node.key === "string" ? `cache:${node.key.toLowerCase()}` : node.key;
        return this.inline(key, describeKey(node.key), plan, node.output);
      }

      case "CteRef": {
        const definition = this.lookupCte(node.cteId);
        return this.inline(`cte:${node.cteId}`, definition.name, definition.plan, node.output);
      }

      case "WithCte": {
        this.cteScopes.push(
          new Map(node.definitions.map((d) => [d.id, { name: d.name, plan: d.plan }]))
        );
        try {
          return this.propagate(node.child);
        } finally {
          this.cteScopes.pop();
        }
      }

      case "Project":
        return this.projectLike(node, node.projectList, this.propagate(node.child), false);

      case "Aggregate": {
        const input = this.propagate(node.child);
        this.check(node.groupingExprs, input);
        return this.projectLike(node, node.aggregateList, input, false);
      }

      case "Window":
        return this.projectLike(node, node.windowList, this.propagate(node.child), true);

      case "Filter": {
        const input = this.propagate(node.child);
        this.check([node.condition], input);
        return input;
      }

      case "Sort": {
        const input = this.propagate(node.child);
        this.check(node.order, input);
        return input;
      }

      case "SubqueryAlias":
      case "Limit":
      case "Distinct":
        return this.propagate(node.child);

      case "View": {
        if (this.ctx.config.skipPermanentViewParsing && !node.temporary) {
          return baseTable(this.ctx.catalog.canonicalName(node.name), outputOf(node.child));
        }
        return this.propagate(node.child);
      }

      case "Expand": {
        const input = this.propagate(node.child);
        const columns: ColumnLineage = new Map();
        node.output.forEach((attr, i) => {
          const branch = node.projections.map((p) => p[i]);
          const attributable = branch.every((e) => e !== undefined && !isConstantExpression(e));
          columns.set(
            attr.id,
            attributable ? this.sourcesOfAll(branch, input, []) : EMPTY_SOURCES
          );
        });
        return { output: node.output, columns, tables: input.tables, rowTables: input.rowTables };
      }

      case "Join": {
        const left = this.propagate(node.left);
        const right = this.propagate(node.right);
        const joined: NodeLineage = {
          output: [...left.output, ...right.output],
          columns: new Map([...left.columns, ...right.columns]),
          tables: distinctInOrder([...left.tables, ...right.tables]),
          rowTables: distinctInOrder([...left.rowTables, ...right.rowTables]),
        };
        if (node.condition) this.check([node.condition], joined);
        if (node.joinType === "leftsemi" || node.joinType === "leftanti") {
          // the right side only filters the left one, as a predicate subquery would
          return left;
        }
        return joined;
      }

      case "SetOperation": {
        const children = node.children.map((c) => this.propagate(c));
        children.forEach((child, i) => {
          if (child.output.length !== node.output.length) {
            throw new InvalidPlanError(
              `${node.op} child ${i} has ${child.output.length} columns, expected ${node.output.length}`
            );
          }
        });
        const columns: ColumnLineage = new Map();
        node.output.forEach((attr, i) => {
          columns.set(
            attr.id,
            unionSources(
              children.map((c) => c.columns.get(c.output[i].id) ?? EMPTY_SOURCES)
            )
          );
        });
        return {
          output: node.output,
          columns,
          tables: distinctInOrder(children.flatMap((c) => c.tables)),
          rowTables: distinctInOrder(children.flatMap((c) => c.rowTables)),
        };
      }

      case "UnresolvedRelation":
        throw new UnresolvedPlanError(node.name, `Unresolved relation: ${node.name}`);

      case "Generic":
        return this.fallback(node.operator, node.children, node.output);

      case "CreateTableAsSelect":
      case "InsertInto":
      case "InsertIntoDirectory":
      case "CreateView":
        return this.fallback(node.kind, [node.query], []);

      case "MergeInto":
        return this.fallback(node.kind, [node.source], []);

      case "CreateTable":
      case "Command":
        return this.fallback(node.kind, [], []);

      default: {
        const unknown: never = node;
        return this.fallback(kindOf(unknown), [], []);
      }
    }
  }

  /**
   * Project, Aggregate and Window: each list item maps its id to the sources
   * of its expression. Window keeps the child's columns in front.
   */
  private projectLike(
    node: PlanNode,
    items: OutputExpr[],
    input: NodeLineage,
    keepInput: boolean
  ): NodeLineage {
    const encountered: Encountered = [];
    const columns: ColumnLineage = keepInput ? new Map(input.columns) : new Map();
    for (const item of items) {
      columns.set(item.id, this.sourcesOf(item.expr, input, encountered));
    }
    return {
      output: outputOf(node),
      columns,
      tables: distinctInOrder([...encountered, ...input.tables]),
      rowTables: input.rowTables,
    };
  }

  private inline(
    key: string | symbol,
    label: string,
    plan: PlanNode,
    leafOutput: Attribute[]
  ): NodeLineage {
    if (this.expansionStack.some((frame) => frame.key === key)) {
      throw new CyclicDefinitionError([...this.expansionStack.map((f) => f.label), label]);
    }

    this.expansionStack.push({ key, label });
    let inner: NodeLineage;
    try {
      inner = this.propagate(plan);
    } finally {
      this.expansionStack.pop();
    }

    const mapping = remapOutputs(inner.output, leafOutput, label);
    const columns: ColumnLineage = new Map();
    for (const [innerId, outerId] of mapping) {
      columns.set(outerId, inner.columns.get(innerId) ?? EMPTY_SOURCES);
    }
    return { output: leafOutput, columns, tables: inner.tables, rowTables: inner.rowTables };
  }

  private lookupCte(cteId: string): { name: string; plan: PlanNode } {
    for (let i = this.cteScopes.length - 1; i >= 0; i--) {
      const definition = this.cteScopes[i].get(cteId);
      if (definition) return definition;
    }
    throw new InvalidPlanError(`Reference to undefined CTE ${cteId}`);
  }

  /**
   * Best effort for operators without a rule: tables of all children; columns
   * passed through by position from the first child when the arity matches,
   * otherwise unattributed.
   */
  private fallback(operator: string, children: PlanNode[], output: Attribute[]): NodeLineage {
    const warning = new UnsupportedOperatorError(operator);
    this.unsupported.push(warning);
    this.ctx.logger.warn(warning.message, { operator });

    const inputs = children.map((c) => this.propagate(c));
    const first = inputs[0];
    const passthrough = first !== undefined && first.output.length === output.length;
    const columns: ColumnLineage = new Map();
    output.forEach((attr, i) => {
      columns.set(
        attr.id,
        passthrough ? first.columns.get(first.output[i].id) ?? EMPTY_SOURCES : EMPTY_SOURCES
      );
    });
    return {
      output,
      columns,
      tables: distinctInOrder(inputs.flatMap((c) => c.tables)),
      rowTables: distinctInOrder(inputs.flatMap((c) => c.rowTables)),
    };
  }
}

/* --------------------------------------------------------------------------
 * HELPERS
 * -------------------------------------------------------------------------- */

function baseTable(name: QualifiedName, output: Attribute[]): NodeLineage {
  return {
    output,
    columns: new Map(
      output.map((a) => [a.id, new Set([formatSourceRef({ table: name, column: a.name })])])
    ),
    tables: [name],
    rowTables: [name],
  };
}

function describeKey(key: CacheKey): string {
  return typeof key === "string" ? key : key.description ?? "cached relation";
}

function kindOf(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return "unknown";
}
