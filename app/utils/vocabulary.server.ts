import columnAliases from "~/config/column-aliases.json";
import type { CanonicalField } from "~/types/tickets";

export type ColumnAliasTable = Readonly<Record<CanonicalField, readonly string[]>>;

export interface TypeKeywords {
  incident: readonly string[];
  request: readonly string[];
}

/**
 * Immutable lookup tables shared by the import and analysis steps. Components
 * receive the pieces they need as arguments; this object is only the default.
 */
export interface AnalysisVocabulary {
  columnAliases: ColumnAliasTable;
  closedStatuses: ReadonlySet<string>;
  typeKeywords: TypeKeywords;
  unspecifiedApplication: string;
}

const COLUMN_ALIASES: ColumnAliasTable = columnAliases;

export const CLOSED_STATUSES: ReadonlySet<string> = new Set([
  "Resolvido",
  "Fechada",
  "Concluído",
  "Cancelado",
  "Closed",
  "Done",
  "Resolved",
  "Canceled",
  "Cancelled",
  "Completed"
]);

export const TYPE_KEYWORDS: TypeKeywords = {
  incident: ["incident", "incidente"],
  request: ["request", "solicita", "requisição", "requisicao", "service request"]
};

export const DEFAULT_VOCABULARY: AnalysisVocabulary = Object.freeze({
  columnAliases: COLUMN_ALIASES,
  closedStatuses: CLOSED_STATUSES,
  typeKeywords: TYPE_KEYWORDS,
  unspecifiedApplication: "Unspecified"
});
