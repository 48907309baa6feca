import { describe, expect, it } from "vitest";

import type { CanonicalField } from "~/types/tickets";
import { buildDetailRows, computeSummaryKpis, topApplications } from "../kpis.server";
import { resolvePeriod } from "../period.server";
import { CLOSED_STATUSES } from "../vocabulary.server";
import { makeTicket } from "./ticket-factory";

const january = resolvePeriod({ mode: "month", year: 2025, month: 1 });

describe("computeSummaryKpis", () => {
  it("computes type shares and mean time to close", () => {
    const tickets = [
      makeTicket({ normalizedType: "Incident", status: "Done", createdAt: new Date(2025, 0, 2), resolvedAt: new Date(2025, 0, 5) }),
      makeTicket({ normalizedType: "Incident", status: "Closed", createdAt: new Date(2025, 0, 6), resolvedAt: new Date(2025, 0, 7) }),
      makeTicket({ normalizedType: "Request", status: "Open", createdAt: new Date(2025, 0, 8) }),
      makeTicket({ normalizedType: "Other", status: "Done", createdAt: new Date(2025, 0, 9), resolvedAt: new Date(2025, 1, 9) })
    ];

    expect(computeSummaryKpis(tickets, january, CLOSED_STATUSES)).toEqual({
      totalUnion: 4,
      requestCount: 1,
      requestPct: 25,
      incidentCount: 2,
      incidentPct: 50,
      meanTimeToCloseDays: 2
    });
  });

  it("reports zeros for an empty view", () => {
    expect(computeSummaryKpis([], january, CLOSED_STATUSES)).toEqual({
      totalUnion: 0,
      requestCount: 0,
      requestPct: 0,
      incidentCount: 0,
      incidentPct: 0,
      meanTimeToCloseDays: 0
    });
  });
});

describe("topApplications", () => {
  const fields: CanonicalField[] = ["analyst", "status", "created", "application"];

  it("is unavailable without an application column", () => {
    expect(topApplications([makeTicket()], ["analyst", "status", "created"], "Unspecified")).toBeNull();
  });

  it("counts missing applications under the placeholder", () => {
    const tickets = ["ERP", "ERP", null, "CRM"].map((application) => makeTicket({ application }));

    expect(topApplications(tickets, fields, "Unspecified")).toEqual([
      { application: "ERP", count: 2 },
      { application: "CRM", count: 1 },
      { application: "Unspecified", count: 1 }
    ]);
  });

  it("keeps the ten most frequent", () => {
    const tickets = Array.from({ length: 12 }, (_, index) => makeTicket({ application: `App ${index + 10}` }));

    const ranked = topApplications(tickets, fields, "Unspecified");

    expect(ranked).toHaveLength(10);
    expect(ranked?.[0]).toEqual({ application: "App 10", count: 1 });
  });
});

describe("buildDetailRows", () => {
  it("shows present fields plus the category, newest first", () => {
    const older = makeTicket({ createdAt: new Date(2025, 0, 2) });
    const undated = makeTicket();
    const newer = makeTicket({ createdAt: new Date(2025, 0, 9) });

    const table = buildDetailRows([older, undated, newer], ["analyst", "status", "created"]);

    expect(table.columns).toEqual(["analyst", "status", "normalizedType", "created"]);
    expect(table.rows).toEqual([newer, older, undated]);
  });
});
