import { describe, expect, it } from "vitest";

import {
  ALL_TIME_SENTINEL,
  countBusinessDays,
  datasetBounds,
  filterByPeriodUnion,
  isWithinPeriod,
  resolvePeriod
} from "../period.server";
import { makeTicket } from "./ticket-factory";

describe("resolvePeriod", () => {
  it("covers a whole month", () => {
    expect(resolvePeriod({ mode: "month", year: 2025, month: 12 })).toEqual({
      start: new Date(2025, 11, 1),
      end: new Date(2025, 11, 31)
    });
  });

  it("ends February on the right day", () => {
    expect(resolvePeriod({ mode: "month", year: 2025, month: 2 }).end).toEqual(new Date(2025, 1, 28));
    expect(resolvePeriod({ mode: "month", year: 2024, month: 2 }).end).toEqual(new Date(2024, 1, 29));
  });

  it("covers a calendar year", () => {
    expect(resolvePeriod({ mode: "year", year: 2025 })).toEqual({
      start: new Date(2025, 0, 1),
      end: new Date(2025, 11, 31)
    });
  });

  it("normalizes and swaps a reversed range", () => {
    expect(resolvePeriod({ mode: "range", start: new Date(2025, 2, 10, 15, 0), end: new Date(2025, 2, 1) })).toEqual({
      start: new Date(2025, 2, 1),
      end: new Date(2025, 2, 10)
    });
  });

  it("uses the sentinel span for all time", () => {
    expect(resolvePeriod({ mode: "all" })).toEqual({ start: ALL_TIME_SENTINEL.start, end: ALL_TIME_SENTINEL.end });
  });
});

describe("countBusinessDays", () => {
  it("counts weekdays only", () => {
    expect(countBusinessDays(resolvePeriod({ mode: "month", year: 2025, month: 1 }))).toBe(23);
    expect(countBusinessDays({ start: new Date(2025, 2, 3), end: new Date(2025, 2, 9) })).toBe(5);
  });

  it("never returns less than one", () => {
    expect(countBusinessDays({ start: new Date(2025, 2, 8), end: new Date(2025, 2, 8) })).toBe(1);
    expect(countBusinessDays({ start: new Date(2025, 2, 9), end: new Date(2025, 2, 1) })).toBe(1);
  });
});

describe("period membership", () => {
  const january = resolvePeriod({ mode: "month", year: 2025, month: 1 });

  it("includes the whole last day", () => {
    expect(isWithinPeriod(new Date(2025, 0, 31, 23, 59), january)).toBe(true);
    expect(isWithinPeriod(new Date(2025, 1, 1, 0, 0), january)).toBe(false);
    expect(isWithinPeriod(null, january)).toBe(false);
  });

  it("keeps tickets created or resolved in the window", () => {
    const carriedOver = makeTicket({ createdAt: new Date(2024, 11, 20), resolvedAt: new Date(2025, 0, 3) });
    const openedInJanuary = makeTicket({ createdAt: new Date(2025, 0, 8) });
    const later = makeTicket({ createdAt: new Date(2025, 1, 2) });

    expect(filterByPeriodUnion([carriedOver, openedInJanuary, later], january)).toEqual([
      carriedOver,
      openedInJanuary
    ]);
  });

  it("spans every parsed timestamp", () => {
    const tickets = [
      makeTicket({ createdAt: new Date(2025, 0, 8, 14, 0), resolvedAt: new Date(2025, 1, 3, 9, 0) }),
      makeTicket({ createdAt: new Date(2024, 11, 20, 8, 0) })
    ];

    expect(datasetBounds(tickets)).toEqual({ start: new Date(2024, 11, 20), end: new Date(2025, 1, 3) });
    expect(datasetBounds([makeTicket()])).toBeNull();
  });
});
