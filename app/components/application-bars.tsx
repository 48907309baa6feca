import type { ApplicationCount } from "~/types/tickets";

interface ApplicationBarsProps {
  entries: ApplicationCount[] | null;
}

export function ApplicationBars({ entries }: ApplicationBarsProps) {
  if (entries === null) {
    return (
      <section className="tickets-panel">
        <h2>Top 10 applications</h2>
        <p>The export has no application column, so there is nothing to rank.</p>
      </section>
    );
  }

  const max = Math.max(...entries.map((entry) => entry.count), 1);

  return (
    <section className="tickets-panel">
      <h2>Top 10 applications</h2>
      {entries.length === 0 ? (
        <p>No tickets match the current filters.</p>
      ) : (
        <ul className="stat-list compact metered">
          {entries.map((entry) => (
            <li key={entry.application}>
              <div className="stat-row">
                <span>{entry.application}</span>
                <strong>{entry.count}</strong>
              </div>
              <div className="bar-track">
                <span className="bar-fill" style={{ width: `${Math.min(100, (entry.count / max) * 100)}%` }} />
              </div>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}

export default ApplicationBars;
