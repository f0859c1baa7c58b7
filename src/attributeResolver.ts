// attributeResolver.ts
// Column identity for the lineage traversal
//
// - One ColumnId is minted per produced column; aliases keep theirs.
// - Output columns of every operator, in position order.
// - Position-wise remapping when a view, cache or CTE plan is inlined.

import type { Attribute, ColumnId, Expression, PlanNode } from "./planModel";
import { InvalidPlanError } from "./errors";

// ---------------------------------------------------------------------------
// COLUMN ID GENERATION
// ---------------------------------------------------------------------------

let columnIdCounter = 0;

/**
 * Generate a unique column ID.
 */
export function createColumnId(prefix: string = "col"): ColumnId {
  return `${prefix}#${++columnIdCounter}`;
}

/**
 * Reset the column ID counter (for testing).
 */
export function resetColumnIdCounter(): void {
  columnIdCounter = 0;
}

// ---------------------------------------------------------------------------
// OUTPUT COLUMNS
// ---------------------------------------------------------------------------

/**
 * Output columns of `node`, in position order. Statements produce no rows of
 * their own and report none.
 */
export function outputOf(node: PlanNode): Attribute[] {
  switch (node.kind) {
    case "Relation":
    case "LocalRelation":
    case "CachedRelation":
    case "CteRef":
    case "Expand":
    case "SetOperation":
    case "Generic":
      return node.output;
    case "Project":
      return node.projectList.map(({ id, name }) => ({ id, name }));
    case "Aggregate":
      return node.aggregateList.map(({ id, name }) => ({ id, name }));
    case "Window":
      return [
        ...outputOf(node.child),
        ...node.windowList.map(({ id, name }) => ({ id, name })),
      ];
    case "Join":
      if (node.joinType === "leftsemi" || node.joinType === "leftanti") {
        return outputOf(node.left);
      }
      return [...outputOf(node.left), ...outputOf(node.right)];
    case "Filter":
    case "SubqueryAlias":
    case "View":
    case "WithCte":
    case "Sort":
    case "Limit":
    case "Distinct":
      return outputOf(node.child);
    case "UnresolvedRelation":
    case "CreateTableAsSelect":
    case "InsertInto":
    case "InsertIntoDirectory":
    case "CreateView":
    case "MergeInto":
    case "CreateTable":
    case "Command":
      return [];
  }
}

export function identityOf(node: PlanNode, position: number): ColumnId {
  const attr = outputOf(node)[position];
  if (!attr) {
    throw new InvalidPlanError(
      `${node.kind} has no output column at position ${position}`
    );
  }
  return attr.id;
}

/**
 * Pair the columns of an inlined plan with the columns of the leaf that stands
 * for it, position by position. Keys are inner ids, values outer ids.
 */
export function remapOutputs(
  inner: Attribute[],
  outer: Attribute[],
  label: string
): Map<ColumnId, ColumnId> {
  if (inner.length !== outer.length) {
    throw new InvalidPlanError(
      `${label} defines ${inner.length} columns but is referenced with ${outer.length}`
    );
  }
  const mapping = new Map<ColumnId, ColumnId>();
  inner.forEach((attr, i) => mapping.set(attr.id, outer[i].id));
  return mapping;
}

// ---------------------------------------------------------------------------
// CONSTANT EXPRESSIONS
// ---------------------------------------------------------------------------

/**
 * True when the expression is built from literals alone (a null filled in by
 * a grouping set, a constant select item).
 */
export function isConstantExpression(expr: Expression): boolean {
  switch (expr.kind) {
    case "Literal":
      return true;
    case "Call":
      return expr.args.every(isConstantExpression);
    case "Case":
      return (
        expr.branches.every((b) => isConstantExpression(b.when) && isConstantExpression(b.then)) &&
        (expr.otherwise === undefined || isConstantExpression(expr.otherwise))
      );
    default:
      return false;
  }
}
