// targetBinder.ts
// Final lineage records for commands and plain queries
//
// Key ideas:
//
// - Destination columns are zipped with the query's output by position and
//   named `target.column`.
// - Static partition values fill no select-list position.
// - MERGE unions every clause that assigns a column.
// - A plain query keeps its own output names and has no targets.

import type { Expression, MergeAction, MergeIntoNode, StatementNode } from "./planModel";
import type { Catalog } from "./catalogBridge";
import type { LineagePropagator, NodeLineage } from "./lineagePropagator";
import { EMPTY_SOURCES, distinctInOrder, emptyLineage, lineageColumn, unionSources } from "./lineage";
import type { Lineage, QualifiedName, SourceSet } from "./lineage";
import { InvalidPlanError } from "./errors";

/* --------------------------------------------------------------------------
 * HELPERS
 * -------------------------------------------------------------------------- */

/** Sources behind the query's output column at `position`; `{}` past the end. */
function sourcesAt(query: NodeLineage, position: number): SourceSet {
  const attr = query.output[position];
  return attr ? query.columns.get(attr.id) ?? EMPTY_SOURCES : EMPTY_SOURCES;
}

function bindPositional(
  target: string,
  columnNames: string[],
  query: NodeLineage
): Lineage {
  return {
    sources: query.tables,
    targets: [target],
    columns: columnNames.map((name, i) => lineageColumn(`${target}.${name}`, sourcesAt(query, i))),
  };
}

/* --------------------------------------------------------------------------
 * QUERIES
 * -------------------------------------------------------------------------- */

export function bindQuery(root: NodeLineage): Lineage {
  return {
    sources: root.tables,
    targets: [],
    columns: root.output.map((attr) =>
      lineageColumn(attr.name, root.columns.get(attr.id) ?? EMPTY_SOURCES)
    ),
  };
}

/* --------------------------------------------------------------------------
 * COMMANDS
 * -------------------------------------------------------------------------- */

export function bindStatement(
  node: StatementNode,
  propagator: LineagePropagator,
  catalog: Catalog
): Lineage {
  switch (node.kind) {
    case "CreateTableAsSelect": {
      const query = propagator.propagate(node.query);
      const names = node.columns ?? query.output.map((a) => a.name);
      return bindPositional(catalog.canonicalName(node.target), names, query);
    }

    case "CreateView": {
      const query = propagator.propagate(node.query);
      const names = node.columnAliases ?? query.output.map((a) => a.name);
      return bindPositional(catalog.canonicalName(node.target), names, query);
    }

    case "InsertInto": {
      const query = propagator.propagate(node.query);
      const target = catalog.canonicalName(node.target);
      const staticColumns = new Set(
        Object.keys(node.staticPartitions).map((c) => c.toLowerCase())
      );
      const destination = node.targetColumns.length
        ? node.targetColumns
        : query.output.map((a) => a.name);

      // static partition values occupy no select-list position
      let position = 0;
      const columns = destination.map((name) => {
        if (staticColumns.has(name.toLowerCase())) {
          return lineageColumn(`${target}.${name}`, EMPTY_SOURCES);
        }
        return lineageColumn(`${target}.${name}`, sourcesAt(query, position++));
      });
      return { sources: query.tables, targets: [target], columns };
    }

    case "InsertIntoDirectory": {
      const query = propagator.propagate(node.query);
      return bindPositional(
        `\`${node.path}\``,
        query.output.map((a) => a.name),
        query
      );
    }

    case "MergeInto":
      return bindMerge(node, propagator, catalog);

    case "CreateTable":
    case "Command":
      return emptyLineage();
  }
}

/**
 * Every clause that assigns a destination column adds its sources to that
 * column. Star clauses assign the source row by position.
 */
function bindMerge(
  node: MergeIntoNode,
  propagator: LineagePropagator,
  catalog: Catalog
): Lineage {
  const target: QualifiedName = catalog.canonicalName(node.target);
  const source = propagator.propagate(node.source);
  const encountered: QualifiedName[] = [];
  const evaluate = (expr: Expression): SourceSet =>
    propagator.sourcesOf(expr, source, encountered);

  propagator.sourcesOf(node.condition, source, []);

  const positions = new Map(node.targetColumns.map((c, i) => [c.toLowerCase(), i]));
  const assigned: SourceSet[][] = node.targetColumns.map(() => []);

  const apply = (action: MergeAction): void => {
    if (action.condition) propagator.sourcesOf(action.condition, source, []);
    switch (action.kind) {
      case "update":
      case "insert":
        for (const assignment of action.assignments) {
          const position = positions.get(assignment.column.toLowerCase());
          if (position === undefined) {
            throw new InvalidPlanError(
              `MERGE assigns ${assignment.column}, which ${target} does not have`
            );
          }
          assigned[position].push(evaluate(assignment.value));
        }
        return;
      case "updateStar":
      case "insertStar":
        assigned.forEach((sets, i) => sets.push(sourcesAt(source, i)));
        return;
      case "delete":
        return;
    }
  };

  node.matched.forEach(apply);
  node.notMatched.forEach(apply);

  return {
    sources: distinctInOrder([...encountered, ...source.tables]),
    targets: [target],
    columns: node.targetColumns.map((name, i) =>
      lineageColumn(`${target}.${name}`, unionSources(assigned[i]))
    ),
  };
}
