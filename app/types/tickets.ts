export const CANONICAL_FIELDS = [
  "analyst",
  "status",
  "created",
  "resolved",
  "project",
  "summary",
  "description",
  "application",
  "issueType"
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export const REQUIRED_FIELDS = ["analyst", "status", "created"] as const satisfies readonly CanonicalField[];

export type NormalizedType = "Incident" | "Request" | "Other";

export type Cell = string | null;

export interface ReadMeta {
  encoding: string;
  delimiter: string;
  tolerant: boolean;
  skippedRows: number;
  usedFallback: boolean;
}

export interface RawTable {
  columns: string[];
  rows: Cell[][];
  meta: ReadMeta;
}

export interface TicketRecord {
  analyst: string | null;
  status: string | null;
  createdAt: Date | null;
  resolvedAt: Date | null;
  project: string | null;
  issueType: string | null;
  application: string | null;
  summary: string | null;
  description: string | null;
  normalizedType: NormalizedType;
}

export interface TicketDataset {
  id: string;
  fileName: string;
  fields: CanonicalField[];
  tickets: readonly TicketRecord[];
  analysts: string[];
  statuses: string[];
  read: ReadMeta;
  loadedAt: Date;
}

export interface Period {
  start: Date;
  end: Date;
}

export type PeriodMode = "all" | "year" | "month" | "range";

export type PeriodSelection =
  | { mode: "all" }
  | { mode: "year"; year: number }
  | { mode: "month"; year: number; month: number }
  | { mode: "range"; start: Date; end: Date };

export interface AnalysisFilters {
  period: PeriodSelection;
  analyst: string;
  statuses: string[];
}

export const ALL_ANALYSTS = "All";

export const ANALYST_SUMMARY_COLUMNS = [
  "Analyst",
  "Total",
  "Closed",
  "Open",
  "MeanTimeToCloseDays",
  "MeanClosedPerBusinessDay"
] as const;

export interface AnalystSummaryRow {
  analyst: string;
  total: number;
  closed: number;
  open: number;
  meanTimeToCloseDays: number;
  meanClosedPerBusinessDay: number;
}

export interface AnalystSummaryTable {
  columns: typeof ANALYST_SUMMARY_COLUMNS;
  rows: AnalystSummaryRow[];
}

export interface SummaryKpis {
  totalUnion: number;
  requestCount: number;
  requestPct: number;
  incidentCount: number;
  incidentPct: number;
  meanTimeToCloseDays: number;
}

export interface ApplicationCount {
  application: string;
  count: number;
}

export const DETAIL_FIELDS = [
  "project",
  "analyst",
  "status",
  "issueType",
  "normalizedType",
  "application",
  "created",
  "resolved",
  "summary",
  "description"
] as const;

export type DetailField = (typeof DETAIL_FIELDS)[number];

export interface DetailTable {
  columns: DetailField[];
  rows: TicketRecord[];
}

export interface TicketAnalysis {
  period: Period;
  businessDays: number;
  analystSummary: AnalystSummaryTable;
  kpis: SummaryKpis;
  topApplications: ApplicationCount[] | null;
  details: DetailTable;
}
