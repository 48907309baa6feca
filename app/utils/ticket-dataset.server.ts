import { createHash } from "node:crypto";

import { ALL_ANALYSTS } from "~/types/tickets";
import type { AnalysisFilters, CanonicalField, TicketAnalysis, TicketDataset, TicketRecord } from "~/types/tickets";
import { summarizeByAnalyst } from "./analyst-summary.server";
import { classifyTicketType } from "./classify.server";
import { assertRequiredColumns, columnValues, normalizeColumns, presentFields } from "./columns.server";
import type { NormalizedTable } from "./columns.server";
import { readFlexibleTable } from "./csv-reader.server";
import { parseMixedDates } from "./dates.server";
import { getNumericEnv, getServerEnv } from "./env.server";
import { buildDetailRows, computeSummaryKpis, topApplications } from "./kpis.server";
import { countBusinessDays, datasetBounds, filterByPeriodUnion, resolvePeriod } from "./period.server";
import { DEFAULT_VOCABULARY } from "./vocabulary.server";
import type { AnalysisVocabulary } from "./vocabulary.server";

export interface LoadOptions {
  vocabulary?: AnalysisVocabulary;
  defaultEncoding?: string;
  referenceDate?: Date;
}

const datasetCache = new Map<string, { expiresAt: number; value: TicketDataset }>();

/** Content hash of the upload plus the settings that change how it is parsed. */
export function datasetIdFor(bytes: Uint8Array, options: LoadOptions = {}) {
  const encoding = options.defaultEncoding ?? getServerEnv("TICKET_CSV_DEFAULT_ENCODING");
  return createHash("sha256")
    .update(bytes)
    .update(`\0${encoding}\0${options.referenceDate?.toISOString() ?? ""}`)
    .digest("hex")
    .slice(0, 16);
}

function distinctSorted(values: ReadonlyArray<string | null>) {
  return Array.from(new Set(values.filter((value): value is string => value !== null))).sort();
}

function textColumn(table: NormalizedTable, field: CanonicalField) {
  return columnValues(table, field) ?? table.rows.map(() => null);
}

/**
 * Reads, normalizes and enriches an uploaded export. Timestamps are parsed and
 * the ticket type classified exactly once here; the result is frozen.
 */
export function loadTicketDataset(bytes: Uint8Array, fileName: string, options: LoadOptions = {}): TicketDataset {
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
  const raw = readFlexibleTable(bytes, {
    defaultEncoding: options.defaultEncoding ?? getServerEnv("TICKET_CSV_DEFAULT_ENCODING")
  });
  const table = normalizeColumns(raw, vocabulary.columnAliases);
  assertRequiredColumns(table);

  const dateOptions = { referenceDate: options.referenceDate };
  const createdAt = parseMixedDates(textColumn(table, "created"), dateOptions);
  const resolvedAt = table.columns.includes("resolved")
    ? parseMixedDates(textColumn(table, "resolved"), dateOptions)
    : table.rows.map(() => null);

  const analyst = textColumn(table, "analyst");
  const status = textColumn(table, "status");
  const project = textColumn(table, "project");
  const issueType = textColumn(table, "issueType");
  const application = textColumn(table, "application");
  const summary = textColumn(table, "summary");
  const description = textColumn(table, "description");

  const tickets: TicketRecord[] = table.rows.map((_, index) => {
    const record = {
      analyst: analyst[index] ?? null,
      status: status[index] ?? null,
      createdAt: createdAt[index] ?? null,
      resolvedAt: resolvedAt[index] ?? null,
      project: project[index] ?? null,
      issueType: issueType[index] ?? null,
      application: application[index] ?? null,
      summary: summary[index] ?? null,
      description: description[index] ?? null
    };
    return Object.freeze({ ...record, normalizedType: classifyTicketType(record, vocabulary.typeKeywords) });
  });

  const unparsedCreated = tickets.filter((ticket) => ticket.createdAt === null).length;
  if (unparsedCreated) {
    console.warn(`${fileName}: ${unparsedCreated} of ${tickets.length} created timestamps could not be parsed`);
  }
  console.info(
    `Loaded ${tickets.length} tickets from ${fileName} (encoding=${raw.meta.encoding}, delimiter=${JSON.stringify(
      raw.meta.delimiter
    )}, skipped=${raw.meta.skippedRows}${raw.meta.usedFallback ? ", fallback" : ""})`
  );

  return Object.freeze({
    id: datasetIdFor(bytes, options),
    fileName,
    fields: presentFields(table),
    tickets: Object.freeze(tickets),
    analysts: distinctSorted(analyst),
    statuses: distinctSorted(status),
    read: raw.meta,
    loadedAt: new Date()
  });
}

function evictExpired(now: number) {
  for (const [id, entry] of datasetCache) {
    if (entry.expiresAt <= now) datasetCache.delete(id);
  }
}

export function rememberDataset(dataset: TicketDataset, ttlMs?: number) {
  evictExpired(Date.now());
  datasetCache.set(dataset.id, {
    expiresAt: Date.now() + (ttlMs ?? getNumericEnv("DATASET_TTL_MS")),
    value: dataset
  });
  return dataset;
}

export function recallDataset(id: string): TicketDataset | null {
  const cached = datasetCache.get(id);
  if (!cached) return null;
  if (cached.expiresAt <= Date.now()) {
    datasetCache.delete(id);
    return null;
  }
  return cached.value;
}

/**
 * Same bytes and settings, same dataset: parsing runs once per uploaded file.
 * A re-upload under another name keeps the parsed tickets but shows the new name.
 */
export function importTicketExport(bytes: Uint8Array, fileName: string, options: LoadOptions = {}) {
  const cached = recallDataset(datasetIdFor(bytes, options));
  if (!cached) {
    return rememberDataset(loadTicketDataset(bytes, fileName, options));
  }
  if (cached.fileName === fileName) {
    return cached;
  }
  return rememberDataset(Object.freeze({ ...cached, fileName }));
}

/**
 * One recomputation pass for a filter selection. The period is resolved once
 * and shared by the aggregator, the KPIs and the detail rows.
 */
export function analyzeDataset(
  dataset: TicketDataset,
  filters: AnalysisFilters,
  vocabulary: AnalysisVocabulary = DEFAULT_VOCABULARY
): TicketAnalysis {
  const resolved = resolvePeriod(filters.period);
  const period = filters.period.mode === "all" ? datasetBounds(dataset.tickets) ?? resolved : resolved;

  let view = filterByPeriodUnion(dataset.tickets, period);
  if (filters.analyst !== ALL_ANALYSTS) {
    view = view.filter((ticket) => ticket.analyst === filters.analyst);
  }
  if (filters.statuses.length) {
    const wanted = new Set(filters.statuses);
    view = view.filter((ticket) => ticket.status !== null && wanted.has(ticket.status));
  }

  return {
    period,
    businessDays: countBusinessDays(period),
    analystSummary: summarizeByAnalyst(view, period, vocabulary.closedStatuses),
    kpis: computeSummaryKpis(view, period, vocabulary.closedStatuses),
    topApplications: topApplications(view, dataset.fields, vocabulary.unspecifiedApplication),
    details: buildDetailRows(view, dataset.fields)
  };
}

export const __testables = {
  clearDatasetCache() {
    datasetCache.clear();
  },
  cachedDatasetIds() {
    return Array.from(datasetCache.keys());
  }
};
