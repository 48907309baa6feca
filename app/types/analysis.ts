import type {
  AnalystSummaryRow,
  ApplicationCount,
  CanonicalField,
  DetailField,
  PeriodMode,
  ReadMeta,
  SummaryKpis
} from "./tickets";

export type DetailRowView = Record<DetailField, string | null>;

export interface FilterFormState {
  mode: PeriodMode;
  year: number;
  month: number;
  start: string;
  end: string;
  analyst: string;
  statuses: string[];
}

export interface DatasetSummary {
  id: string;
  fileName: string;
  ticketCount: number;
  fields: CanonicalField[];
  analysts: string[];
  statuses: string[];
  read: ReadMeta;
}

export interface AnalysisView {
  dataset: DatasetSummary;
  filters: FilterFormState;
  period: {
    start: string;
    end: string;
    businessDays: number;
  };
  analystSummary: {
    columns: string[];
    rows: AnalystSummaryRow[];
  };
  kpis: SummaryKpis;
  topApplications: ApplicationCount[] | null;
  details: {
    columns: DetailField[];
    rows: DetailRowView[];
    total: number;
    page: number;
    pageSize: number;
    totalPages: number;
  };
}
