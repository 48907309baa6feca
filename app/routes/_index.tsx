import { Form, useActionData, useNavigation } from "@remix-run/react";

import StatusBanner from "~/components/status-banner";
import type { UploadActionData } from "~/routes/upload.server";

export { action } from "~/routes/upload.server";

export default function UploadRoute() {
  const result = useActionData<UploadActionData>();
  const navigation = useNavigation();
  const isSubmitting = navigation.state !== "idle";

  return (
    <main>
      <div className="dashboard-shell">
        <header>
          <h1>Ticket throughput analyzer</h1>
          <p>Upload a Jira or spreadsheet ticket export (CSV, any delimiter or encoding) to see per-analyst metrics.</p>
        </header>

        <div className="banner-stack">
          {isSubmitting ? <StatusBanner message="Reading export..." variant="info" /> : null}
          {result && !result.ok ? <StatusBanner message={result.error} variant="error" details={result.details} /> : null}
        </div>

        <section className="tickets-panel">
          <h2>Export file</h2>
          <Form method="post" encType="multipart/form-data" className="month-filter">
            <label>
              CSV export
              <input type="file" name="file" accept=".csv,text/csv" required />
            </label>
            <div className="month-filter__actions">
              <button type="submit" name="intent" value="upload" className="btn-primary" disabled={isSubmitting}>
                Analyze
              </button>
            </div>
          </Form>
          <Form method="post" className="month-filter">
            <div className="month-filter__actions">
              <button type="submit" name="intent" value="sample" className="btn-ghost" disabled={isSubmitting}>
                Try the sample export
              </button>
            </div>
          </Form>
        </section>

        <section className="tickets-panel">
          <h2>Expected columns</h2>
          <ul className="stat-list compact">
            <li>
              <span>Required</span>
              <strong>Responsável / Assignee, Status, Criado / Created</strong>
            </li>
            <li>
              <span>Optional</span>
              <strong>Resolvido / Resolved, Projeto, Tipo / Issue Type, Aplicação, Resumo, Descrição</strong>
            </li>
          </ul>
        </section>
      </div>
    </main>
  );
}
