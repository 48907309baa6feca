import { DETAIL_FIELDS } from "~/types/tickets";
import type {
  ApplicationCount,
  CanonicalField,
  DetailField,
  DetailTable,
  Period,
  SummaryKpis,
  TicketRecord
} from "~/types/tickets";
import { durationInDays, isClosedInPeriod } from "./analyst-summary.server";

const TOP_APPLICATIONS = 10;

function share(count: number, total: number) {
  return total ? (count / total) * 100 : 0;
}

export function meanTimeToCloseDays(tickets: readonly TicketRecord[]) {
  let sum = 0;
  let count = 0;
  for (const ticket of tickets) {
    if (!ticket.createdAt || !ticket.resolvedAt) continue;
    sum += durationInDays(ticket.createdAt, ticket.resolvedAt);
    count += 1;
  }
  return count ? sum / count : 0;
}

export function computeSummaryKpis(
  tickets: readonly TicketRecord[],
  period: Period,
  closedStatuses: ReadonlySet<string>
): SummaryKpis {
  const totalUnion = tickets.length;
  const incidentCount = tickets.filter((ticket) => ticket.normalizedType === "Incident").length;
  const requestCount = tickets.filter((ticket) => ticket.normalizedType === "Request").length;
  const closedInPeriod = tickets.filter((ticket) => isClosedInPeriod(ticket, period, closedStatuses));

  return {
    totalUnion,
    requestCount,
    requestPct: share(requestCount, totalUnion),
    incidentCount,
    incidentPct: share(incidentCount, totalUnion),
    meanTimeToCloseDays: meanTimeToCloseDays(closedInPeriod)
  };
}

export function topApplications(
  tickets: readonly TicketRecord[],
  fields: readonly CanonicalField[],
  unspecifiedLabel: string
): ApplicationCount[] | null {
  if (!fields.includes("application")) return null;

  const counts = new Map<string, number>();
  for (const ticket of tickets) {
    const key = ticket.application ?? unspecifiedLabel;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([application, count]) => ({ application, count }))
    .sort((a, b) => b.count - a.count || (a.application < b.application ? -1 : a.application > b.application ? 1 : 0))
    .slice(0, TOP_APPLICATIONS);
}

function isDisplayed(field: DetailField, fields: readonly CanonicalField[]) {
  return field === "normalizedType" || fields.some((present) => present === field);
}

function descendingNullsLast(a: Date | null, b: Date | null) {
  if (a && b) return b.getTime() - a.getTime();
  if (a) return -1;
  if (b) return 1;
  return 0;
}

export function buildDetailRows(tickets: readonly TicketRecord[], fields: readonly CanonicalField[]): DetailTable {
  const columns = DETAIL_FIELDS.filter((field) => isDisplayed(field, fields));
  const rows = [...tickets];

  if (columns.includes("created")) {
    rows.sort((a, b) => descendingNullsLast(a.createdAt, b.createdAt));
  } else if (columns.includes("resolved")) {
    rows.sort((a, b) => descendingNullsLast(a.resolvedAt, b.resolvedAt));
  }

  return { columns, rows };
}
