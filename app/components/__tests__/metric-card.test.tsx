import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import MetricCard from "~/components/metric-card";

describe("MetricCard", () => {
  it("formats numbers with the requested precision", () => {
    render(<MetricCard label="Mean time to close" value={2.5} fractionDigits={2} helper="Days" />);
    expect(screen.getByText("2.50")).toHaveClass("value");
    expect(screen.getByText("Days")).toBeInTheDocument();
  });

  it("groups thousands and passes strings through", () => {
    render(
      <>
        <MetricCard label="Tickets" value={1234} />
        <MetricCard label="Incidents" value="50.0% (2)" accent="warning" />
      </>
    );
    expect(screen.getByText("1,234")).toBeInTheDocument();
    expect(screen.getByText("50.0% (2)").closest(".metric-card")).toHaveAttribute("data-accent", "warning");
  });
});
