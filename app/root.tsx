import type { LinksFunction, MetaFunction } from "@remix-run/node";
import {
  isRouteErrorResponse,
  Links,
  LiveReload,
  Meta,
  Outlet,
  Scripts,
  ScrollRestoration,
  useRouteError
} from "@remix-run/react";
import type { ReactNode } from "react";

import StatusBanner from "~/components/status-banner";
import stylesheet from "~/styles/app.css";

export const meta: MetaFunction = () => ([
  { title: "Ticket Throughput Analyzer" },
  {
    name: "description",
    content: "Per-analyst ticket volume, closures, backlog and throughput from a CSV export."
  }
]);

export const links: LinksFunction = () => [{ rel: "stylesheet", href: stylesheet }];

function Document({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <Meta />
        <Links />
      </head>
      <body>
        {children}
        <ScrollRestoration />
        <Scripts />
        <LiveReload />
      </body>
    </html>
  );
}

export default function App() {
  return (
    <Document>
      <Outlet />
    </Document>
  );
}

export function ErrorBoundary() {
  const error = useRouteError();
  const message = isRouteErrorResponse(error)
    ? `${error.status} ${error.statusText}`
    : error instanceof Error
      ? error.message
      : "Unexpected error";

  return (
    <Document>
      <main>
        <div className="dashboard-shell">
          <StatusBanner message={message} variant="error" />
          <a href="/">Back to upload</a>
        </div>
      </main>
    </Document>
  );
}
