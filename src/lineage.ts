// lineage.ts
// The lineage record and the source-column sets it is built from.

import Enumerable from "linq";
import type { ColumnId } from "./planModel";

/* --------------------------------------------------------------------------
 * SOURCE COLUMNS
 * -------------------------------------------------------------------------- */

/** Canonical table name: `db.table`, or `catalog.db.table` outside the default catalog. */
export type QualifiedName = string;

/** Marks a value derived from `count(*)`: row existence, no specific column. */
export const COUNT_STAR_COLUMN = "__count__";

export interface SourceColumnRef {
  table: QualifiedName;
  column: string;
}

/** Source columns in their `table.column` form. */
export type SourceSet = ReadonlySet<string>;

export type ColumnLineage = Map<ColumnId, SourceSet>;

export const EMPTY_SOURCES: SourceSet = new Set<string>();

export function formatSourceRef(ref: SourceColumnRef): string {
  return `${ref.table}.${ref.column}`;
}

export function parseSourceRef(text: string): SourceColumnRef {
  const dot = text.lastIndexOf(".");
  if (dot <= 0 || dot === text.length - 1) {
    throw new Error(`Invalid source column reference: ${text}`);
  }
  return { table: text.slice(0, dot), column: text.slice(dot + 1) };
}

export function unionSources(sets: SourceSet[]): SourceSet {
  if (sets.length === 0) return EMPTY_SOURCES;
  if (sets.length === 1) return sets[0];
  return new Set(
    Enumerable.from(sets)
      .selectMany((set) => Array.from(set))
      .toArray()
  );
}

/** De-duplicate keeping the first occurrence of each name. */
export function distinctInOrder(names: string[]): string[] {
  return Enumerable.from(names).distinct().toArray();
}

/* --------------------------------------------------------------------------
 * LINEAGE RECORD
 * -------------------------------------------------------------------------- */

export interface LineageColumn {
  column: string;
  /** Sorted `table.column` strings; empty when the value is constant-derived. */
  sources: string[];
}

export interface Lineage {
  sources: QualifiedName[];
  targets: QualifiedName[];
  columns: LineageColumn[];
}

export function emptyLineage(): Lineage {
  return { sources: [], targets: [], columns: [] };
}

export function lineageColumn(column: string, sources: SourceSet): LineageColumn {
  return { column, sources: Array.from(sources).sort() };
}

export function formatLineage(lineage: Lineage): string {
  const lines = [
    `sources: ${lineage.sources.join(", ") || "-"}`,
    `targets: ${lineage.targets.join(", ") || "-"}`,
    ...lineage.columns.map(
      (c) => `  ${c.column} <- ${c.sources.length ? c.sources.join(", ") : "{}"}`
    ),
  ];
  return lines.join("\n");
}
