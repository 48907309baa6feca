import { CANONICAL_FIELDS, REQUIRED_FIELDS } from "~/types/tickets";
import type { CanonicalField, RawTable } from "~/types/tickets";
import { MissingRequiredColumnsError } from "./errors.server";
import type { ColumnAliasTable } from "./vocabulary.server";

export interface NormalizedTable extends RawTable {
  /** canonical field -> original header it was taken from */
  sources: Partial<Record<CanonicalField, string>>;
}

export function normalizeColumns(table: RawTable, aliases: ColumnAliasTable): NormalizedTable {
  const claimed = new Set<string>();
  const renames = new Map<string, CanonicalField>();
  const sources: NormalizedTable["sources"] = {};

  for (const field of CANONICAL_FIELDS) {
    const match = aliases[field].find((alias) => table.columns.includes(alias) && !claimed.has(alias));
    if (!match) continue;
    claimed.add(match);
    renames.set(match, field);
    sources[field] = match;
  }

  return {
    columns: table.columns.map((column) => renames.get(column) ?? column),
    rows: table.rows,
    meta: table.meta,
    sources
  };
}

export function presentFields(table: NormalizedTable): CanonicalField[] {
  return CANONICAL_FIELDS.filter((field) => table.columns.includes(field));
}

export function assertRequiredColumns(table: NormalizedTable) {
  const missing = REQUIRED_FIELDS.filter((field) => !table.columns.includes(field));
  if (missing.length) {
    throw new MissingRequiredColumnsError(missing);
  }
}

export function columnValues(table: NormalizedTable, field: CanonicalField) {
  const index = table.columns.indexOf(field);
  if (index === -1) return null;
  return table.rows.map((row) => row[index] ?? null);
}
