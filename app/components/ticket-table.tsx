import type { DetailRowView } from "~/types/analysis";
import type { DetailField } from "~/types/tickets";

const COLUMN_LABELS: Record<DetailField, string> = {
  project: "Project",
  analyst: "Analyst",
  status: "Status",
  issueType: "Type",
  normalizedType: "Category",
  application: "Application",
  created: "Created",
  resolved: "Resolved",
  summary: "Summary",
  description: "Description"
};

interface TicketTableProps {
  title: string;
  columns: DetailField[];
  rows: DetailRowView[];
  emptyMessage?: string;
}

export function TicketTable({ title, columns, rows, emptyMessage }: TicketTableProps) {
  if (!rows.length) {
    return (
      <section className="tickets-panel">
        <h2>{title}</h2>
        <p>{emptyMessage ?? "No tickets to show."}</p>
      </section>
    );
  }

  return (
    <section className="tickets-panel">
      <h2>{title}</h2>
      <div className="table-scroll">
        <table className="ticket-table">
          <thead>
            <tr>
              {columns.map((column) => (
                <th key={column}>{COLUMN_LABELS[column]}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row, index) => (
              <tr key={`${row.created ?? row.resolved ?? "row"}-${index}`}>
                {columns.map((column) =>
                  column === "normalizedType" ? (
                    <td key={column}>
                      <span className="status-pill" data-variant={(row.normalizedType ?? "other").toLowerCase()}>
                        {row.normalizedType ?? "-"}
                      </span>
                    </td>
                  ) : (
                    <td key={column}>{row[column] ?? "-"}</td>
                  )
                )}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </section>
  );
}

export default TicketTable;
