import { addMonths, eachDayOfInterval, isWeekend, startOfDay, subDays } from "date-fns";

import type { Period, PeriodSelection, TicketRecord } from "~/types/tickets";

export const ALL_TIME_SENTINEL: Period = Object.freeze({
  start: new Date(1970, 0, 1),
  end: new Date(2100, 11, 31)
});

export function resolvePeriod(selection: PeriodSelection): Period {
  switch (selection.mode) {
    case "all":
      return { start: ALL_TIME_SENTINEL.start, end: ALL_TIME_SENTINEL.end };
    case "year":
      return { start: new Date(selection.year, 0, 1), end: new Date(selection.year, 11, 31) };
    case "month": {
      const start = new Date(selection.year, selection.month - 1, 1);
      return { start, end: subDays(addMonths(start, 1), 1) };
    }
    case "range": {
      const start = startOfDay(selection.start);
      const end = startOfDay(selection.end);
      return start.getTime() <= end.getTime() ? { start, end } : { start: end, end: start };
    }
  }
}

/** Calendar-day span covering every parsed created/resolved timestamp. */
export function datasetBounds(tickets: readonly TicketRecord[]): Period | null {
  let min: number | null = null;
  let max: number | null = null;
  for (const ticket of tickets) {
    for (const stamp of [ticket.createdAt, ticket.resolvedAt]) {
      if (!stamp) continue;
      const day = startOfDay(stamp).getTime();
      if (min === null || day < min) min = day;
      if (max === null || day > max) max = day;
    }
  }
  if (min === null || max === null) return null;
  return { start: new Date(min), end: new Date(max) };
}

export function isWithinPeriod(stamp: Date | null, period: Period) {
  if (!stamp) return false;
  const day = startOfDay(stamp).getTime();
  return day >= period.start.getTime() && day <= period.end.getTime();
}

export function isAfterPeriod(stamp: Date, period: Period) {
  return startOfDay(stamp).getTime() > period.end.getTime();
}

/** Created OR resolved inside the window. */
export function filterByPeriodUnion(tickets: readonly TicketRecord[], period: Period): TicketRecord[] {
  return tickets.filter(
    (ticket) => isWithinPeriod(ticket.createdAt, period) || isWithinPeriod(ticket.resolvedAt, period)
  );
}

/** Monday to Friday inside the window, floored at 1. */
export function countBusinessDays(period: Period) {
  if (period.end.getTime() < period.start.getTime()) return 1;
  const days = eachDayOfInterval({ start: period.start, end: period.end });
  return Math.max(days.filter((day) => !isWeekend(day)).length, 1);
}
