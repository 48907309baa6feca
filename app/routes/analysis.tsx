import { Form, Link, useLoaderData } from "@remix-run/react";

import AnalystTable from "~/components/analyst-table";
import ApplicationBars from "~/components/application-bars";
import MetricCard from "~/components/metric-card";
import StatusBanner from "~/components/status-banner";
import TicketTable from "~/components/ticket-table";
import type { AnalysisLoaderData } from "~/routes/analysis.server";
import { ALL_ANALYSTS } from "~/types/tickets";

export { loader } from "~/routes/analysis.server";

function formatPercentage(value: number) {
  return `${value.toFixed(1)}%`;
}

const PERIOD_OPTIONS = [
  { value: "all", label: "Whole export" },
  { value: "year", label: "Year" },
  { value: "month", label: "Month" },
  { value: "range", label: "Date range" }
] as const;

export default function AnalysisRoute() {
  const data = useLoaderData<AnalysisLoaderData>();

  if (!data.ok) {
    return (
      <main>
        <div className="dashboard-shell">
          <header>
            <h1>Ticket analysis</h1>
          </header>
          <StatusBanner message={data.error} variant="error" />
          <Link to="/" className="btn-primary">
            Upload an export
          </Link>
        </div>
      </main>
    );
  }

  const { view } = data;
  const { dataset, filters, kpis, details } = view;
  const hasPrev = details.page > 1;
  const hasNext = details.page < details.totalPages;
  const showingFrom = details.total ? (details.page - 1) * details.pageSize + 1 : 0;
  const showingTo = Math.min(details.page * details.pageSize, details.total);

  const hiddenFilterInputs = (
    <>
      <input type="hidden" name="dataset" value={dataset.id} />
      <input type="hidden" name="mode" value={filters.mode} />
      <input type="hidden" name="year" value={filters.year} />
      <input type="hidden" name="month" value={filters.month} />
      <input type="hidden" name="start" value={filters.start} />
      <input type="hidden" name="end" value={filters.end} />
      <input type="hidden" name="analyst" value={filters.analyst} />
      {filters.statuses.map((status) => (
        <input key={status} type="hidden" name="status" value={status} />
      ))}
    </>
  );

  return (
    <main>
      <div className="dashboard-shell">
        <header>
          <h1>Ticket analysis</h1>
          <p>
            {dataset.fileName}: {dataset.ticketCount.toLocaleString("en-US")} tickets, period {view.period.start} to{" "}
            {view.period.end}
          </p>
        </header>

        <div className="meta-row">
          <span>
            Read as {dataset.read.encoding}, delimiter {JSON.stringify(dataset.read.delimiter)}
          </span>
          <Link to="/">Upload another export</Link>
        </div>

        <div className="banner-stack">
          {dataset.read.skippedRows ? (
            <StatusBanner
              message={`${dataset.read.skippedRows} malformed ${dataset.read.skippedRows === 1 ? "row was" : "rows were"} skipped while reading the file.`}
              variant="warning"
            />
          ) : null}
          {dataset.read.usedFallback ? (
            <StatusBanner message="The file was read with the lossy comma fallback; check the results." variant="warning" />
          ) : null}
        </div>

        <Form method="get" className="month-filter">
          <input type="hidden" name="dataset" value={dataset.id} />
          <label>
            Period
            <select name="mode" defaultValue={filters.mode}>
              {PERIOD_OPTIONS.map((option) => (
                <option key={option.value} value={option.value}>
                  {option.label}
                </option>
              ))}
            </select>
          </label>
          <label>
            Year
            <input type="number" name="year" min={2000} max={2100} defaultValue={filters.year} />
          </label>
          <label>
            Month
            <input type="number" name="month" min={1} max={12} defaultValue={filters.month} />
          </label>
          <label>
            From
            <input type="date" name="start" defaultValue={filters.start} />
          </label>
          <label>
            To
            <input type="date" name="end" defaultValue={filters.end} />
          </label>
          <label>
            Analyst
            <select name="analyst" defaultValue={filters.analyst}>
              <option value={ALL_ANALYSTS}>All</option>
              {dataset.analysts.map((analyst) => (
                <option key={analyst} value={analyst}>
                  {analyst}
                </option>
              ))}
            </select>
          </label>
          <label>
            Status
            <select name="status" multiple defaultValue={filters.statuses}>
              {dataset.statuses.map((status) => (
                <option key={status} value={status}>
                  {status}
                </option>
              ))}
            </select>
          </label>
          <div className="month-filter__actions">
            <button type="submit" className="btn-primary">
              Update
            </button>
          </div>
        </Form>

        <AnalystTable rows={view.analystSummary.rows} businessDays={view.period.businessDays} />

        <section className="metrics-grid">
          <MetricCard label="Tickets (created or resolved)" value={kpis.totalUnion} helper="Union of both dates" />
          <MetricCard
            label="Requests"
            value={`${formatPercentage(kpis.requestPct)} (${kpis.requestCount})`}
            helper="Share of filtered tickets"
          />
          <MetricCard
            label="Incidents"
            value={`${formatPercentage(kpis.incidentPct)} (${kpis.incidentCount})`}
            helper="Share of filtered tickets"
            accent="warning"
          />
          <MetricCard
            label="Mean time to close"
            value={kpis.meanTimeToCloseDays}
            fractionDigits={2}
            helper="Days, closed inside the period"
          />
        </section>

        <ApplicationBars entries={view.topApplications} />

        <TicketTable
          title="Filtered tickets"
          columns={details.columns}
          rows={details.rows}
          emptyMessage="No tickets match the current filters."
        />

        {details.total ? (
          <div className="table-pagination">
            <span>
              Showing {showingFrom}-{showingTo} of {details.total}
            </span>
            <div className="pagination-buttons">
              <Form method="get">
                {hiddenFilterInputs}
                <input type="hidden" name="page" value={Math.max(1, details.page - 1)} />
                <button type="submit" disabled={!hasPrev}>
                  Previous
                </button>
              </Form>
              <span>
                Page {details.page} / {details.totalPages}
              </span>
              <Form method="get">
                {hiddenFilterInputs}
                <input type="hidden" name="page" value={Math.min(details.totalPages, details.page + 1)} />
                <button type="submit" disabled={!hasNext}>
                  Next
                </button>
              </Form>
            </div>
          </div>
        ) : null}
      </div>
    </main>
  );
}
