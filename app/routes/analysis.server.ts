import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { format, isValid, parse, startOfYear } from "date-fns";

import type { AnalysisView, DetailRowView, FilterFormState } from "~/types/analysis";
import { ALL_ANALYSTS } from "~/types/tickets";
import type {
  AnalysisFilters,
  DetailField,
  PeriodMode,
  PeriodSelection,
  TicketAnalysis,
  TicketDataset,
  TicketRecord
} from "~/types/tickets";
import { getNumericEnv } from "~/utils/env.server";
import { analyzeDataset, recallDataset } from "~/utils/ticket-dataset.server";

const PERIOD_MODES: readonly PeriodMode[] = ["all", "year", "month", "range"];
const MIN_YEAR = 2000;
const MAX_YEAR = 2100;
const DAY_FORMAT = "yyyy-MM-dd";
const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm";

export type AnalysisLoaderData = { ok: true; view: AnalysisView } | { ok: false; error: string };

function isPeriodMode(value: string | null): value is PeriodMode {
  return PERIOD_MODES.some((mode) => mode === value);
}

function intInRange(value: string | null, min: number, max: number, fallback: number) {
  const parsed = Number(value ?? "");
  return Number.isInteger(parsed) && parsed >= min && parsed <= max ? parsed : fallback;
}

function dayOrFallback(value: string | null, fallback: Date) {
  if (!value) return fallback;
  const parsed = parse(value, DAY_FORMAT, fallback);
  return isValid(parsed) ? parsed : fallback;
}

export interface AnalysisQuery {
  filters: AnalysisFilters;
  form: FilterFormState;
  page: number;
}

/**
 * Reads the filter form from the query string. Missing or invalid values fall
 * back to the current year/month, Jan 1 to today for ranges, every analyst and
 * every status present in the dataset.
 */
export function parseAnalysisQuery(
  params: URLSearchParams,
  dataset: Pick<TicketDataset, "analysts" | "statuses">,
  now = new Date()
): AnalysisQuery {
  const modeParam = params.get("mode");
  const mode: PeriodMode = isPeriodMode(modeParam) ? modeParam : "all";
  const year = intInRange(params.get("year"), MIN_YEAR, MAX_YEAR, now.getFullYear());
  const month = intInRange(params.get("month"), 1, 12, now.getMonth() + 1);
  const start = dayOrFallback(params.get("start"), startOfYear(now));
  const end = dayOrFallback(params.get("end"), now);

  const analystParam = params.get("analyst");
  const analyst = analystParam && dataset.analysts.includes(analystParam) ? analystParam : ALL_ANALYSTS;

  const requested = params.getAll("status").filter((status) => dataset.statuses.includes(status));
  const statuses = requested.length ? requested : [...dataset.statuses];

  let period: PeriodSelection;
  switch (mode) {
    case "year":
      period = { mode, year };
      break;
    case "month":
      period = { mode, year, month };
      break;
    case "range":
      period = { mode, start, end };
      break;
    default:
      period = { mode: "all" };
  }

  const pageParam = Number(params.get("page") ?? "1");
  const page = Number.isFinite(pageParam) && pageParam > 0 ? Math.floor(pageParam) : 1;

  return {
    filters: { period, analyst, statuses },
    form: {
      mode,
      year,
      month,
      start: format(start, DAY_FORMAT),
      end: format(end, DAY_FORMAT),
      analyst,
      statuses
    },
    page
  };
}

function formatStamp(value: Date | null) {
  return value ? format(value, TIMESTAMP_FORMAT) : null;
}

function detailCell(ticket: TicketRecord, field: DetailField): string | null {
  switch (field) {
    case "created":
      return formatStamp(ticket.createdAt);
    case "resolved":
      return formatStamp(ticket.resolvedAt);
    default:
      return ticket[field];
  }
}

function toDetailRow(ticket: TicketRecord, columns: DetailField[]): DetailRowView {
  const row: DetailRowView = {
    project: null,
    analyst: null,
    status: null,
    issueType: null,
    normalizedType: null,
    application: null,
    created: null,
    resolved: null,
    summary: null,
    description: null
  };
  for (const column of columns) {
    row[column] = detailCell(ticket, column);
  }
  return row;
}

export function toAnalysisView(
  dataset: TicketDataset,
  query: AnalysisQuery,
  analysis: TicketAnalysis,
  pageSize: number
): AnalysisView {
  const { details } = analysis;
  const totalPages = Math.max(1, Math.ceil(details.rows.length / pageSize));
  const page = Math.min(query.page, totalPages);
  const pageStart = (page - 1) * pageSize;

  return {
    dataset: {
      id: dataset.id,
      fileName: dataset.fileName,
      ticketCount: dataset.tickets.length,
      fields: dataset.fields,
      analysts: dataset.analysts,
      statuses: dataset.statuses,
      read: dataset.read
    },
    filters: query.form,
    period: {
      start: format(analysis.period.start, DAY_FORMAT),
      end: format(analysis.period.end, DAY_FORMAT),
      businessDays: analysis.businessDays
    },
    analystSummary: {
      columns: [...analysis.analystSummary.columns],
      rows: analysis.analystSummary.rows
    },
    kpis: analysis.kpis,
    topApplications: analysis.topApplications,
    details: {
      columns: details.columns,
      rows: details.rows.slice(pageStart, pageStart + pageSize).map((ticket) => toDetailRow(ticket, details.columns)),
      total: details.rows.length,
      page,
      pageSize,
      totalPages
    }
  };
}

export async function loader({ request }: LoaderFunctionArgs) {
  const url = new URL(request.url);
  const datasetId = url.searchParams.get("dataset");
  const dataset = datasetId ? recallDataset(datasetId) : null;

  if (!dataset) {
    return json<AnalysisLoaderData>(
      { ok: false, error: "This export is no longer loaded. Upload the file again to continue." },
      { status: 404 }
    );
  }

  try {
    const query = parseAnalysisQuery(url.searchParams, dataset);
    const analysis = analyzeDataset(dataset, query.filters);
    const view = toAnalysisView(dataset, query, analysis, getNumericEnv("DETAIL_PAGE_SIZE"));
    return json<AnalysisLoaderData>({ ok: true, view });
  } catch (error) {
    console.error(error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return json<AnalysisLoaderData>({ ok: false, error: message }, { status: 500 });
  }
}
