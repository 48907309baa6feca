import { differenceInMilliseconds } from "date-fns";

import { ANALYST_SUMMARY_COLUMNS } from "~/types/tickets";
import type { AnalystSummaryRow, AnalystSummaryTable, Period, TicketRecord } from "~/types/tickets";
import { countBusinessDays, isAfterPeriod, isWithinPeriod } from "./period.server";

const MS_PER_DAY = 86_400_000;

interface AnalystTally {
  total: number;
  closed: number;
  open: number;
  durationSumDays: number;
  durationCount: number;
}

export function durationInDays(createdAt: Date, resolvedAt: Date) {
  return differenceInMilliseconds(resolvedAt, createdAt) / MS_PER_DAY;
}

export function isClosedInPeriod(ticket: TicketRecord, period: Period, closedStatuses: ReadonlySet<string>) {
  return (
    ticket.status !== null && closedStatuses.has(ticket.status) && isWithinPeriod(ticket.resolvedAt, period)
  );
}

function isOpenAtPeriodEnd(ticket: TicketRecord, period: Period) {
  return ticket.resolvedAt === null || isAfterPeriod(ticket.resolvedAt, period);
}

function compareCodePoints(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Per-analyst volume and throughput for one period.
 *
 * The rows handed in are usually the union-filtered view, but every metric
 * re-checks its own timestamp against the period: Total and Open look at the
 * creation day, Closed at the resolution day plus a closed status. Tickets
 * without an analyst are left out of the grouping.
 */
export function summarizeByAnalyst(
  tickets: readonly TicketRecord[],
  period: Period,
  closedStatuses: ReadonlySet<string>
): AnalystSummaryTable {
  const tallies = new Map<string, AnalystTally>();
  const tallyFor = (analyst: string) => {
    let tally = tallies.get(analyst);
    if (!tally) {
      tally = { total: 0, closed: 0, open: 0, durationSumDays: 0, durationCount: 0 };
      tallies.set(analyst, tally);
    }
    return tally;
  };

  for (const ticket of tickets) {
    if (ticket.analyst === null) continue;

    const created = isWithinPeriod(ticket.createdAt, period);
    const closed = isClosedInPeriod(ticket, period, closedStatuses);
    if (!created && !closed) continue;

    const tally = tallyFor(ticket.analyst);
    if (created) {
      tally.total += 1;
      if (isOpenAtPeriodEnd(ticket, period)) tally.open += 1;
    }
    if (closed) {
      tally.closed += 1;
      if (ticket.createdAt && ticket.resolvedAt) {
        tally.durationSumDays += durationInDays(ticket.createdAt, ticket.resolvedAt);
        tally.durationCount += 1;
      }
    }
  }

  const businessDays = countBusinessDays(period);
  const rows: AnalystSummaryRow[] = Array.from(tallies.entries())
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([analyst, tally]) => ({
      analyst,
      total: tally.total,
      closed: tally.closed,
      open: tally.open,
      meanTimeToCloseDays: tally.durationCount ? tally.durationSumDays / tally.durationCount : 0,
      meanClosedPerBusinessDay: tally.closed / businessDays
    }))
    .sort((a, b) => b.total - a.total || b.closed - a.closed);

  return { columns: ANALYST_SUMMARY_COLUMNS, rows };
}
