import type { AnalystSummaryRow } from "~/types/tickets";

interface AnalystTableProps {
  rows: AnalystSummaryRow[];
  businessDays: number;
  emptyMessage?: string;
}

const HEADERS = [
  "Analyst",
  "Total tickets",
  "Closed",
  "Open",
  "Mean time to close (days)",
  "Closed per business day"
];

export function AnalystTable({ rows, businessDays, emptyMessage }: AnalystTableProps) {
  return (
    <section className="tickets-panel">
      <h2>Tickets by analyst</h2>
      <p className="list-sub">
        Throughput is averaged over {businessDays} business {businessDays === 1 ? "day" : "days"}.
      </p>
      <table className="ticket-table analyst-table">
        <thead>
          <tr>
            {HEADERS.map((header) => (
              <th key={header}>{header}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.length === 0 ? (
            <tr>
              <td colSpan={HEADERS.length}>{emptyMessage ?? "No tickets in this period."}</td>
            </tr>
          ) : (
            rows.map((row) => (
              <tr key={row.analyst}>
                <td>{row.analyst}</td>
                <td>{row.total}</td>
                <td>{row.closed}</td>
                <td>{row.open}</td>
                <td>{row.meanTimeToCloseDays.toFixed(2)}</td>
                <td>{row.meanClosedPerBusinessDay.toFixed(2)}</td>
              </tr>
            ))
          )}
        </tbody>
      </table>
    </section>
  );
}

export default AnalystTable;
