import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { action } from "~/routes/upload.server";
import type { UploadActionData } from "~/routes/upload.server";
import { __testables } from "~/utils/ticket-dataset.server";

function post(formData: FormData) {
  return action({
    request: new Request("http://localhost/?index", { method: "POST", body: formData }),
    params: {},
    context: {}
  });
}

beforeEach(() => {
  __testables.clearDatasetCache();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("upload action", () => {
  it("redirects to the analysis of the sample export", async () => {
    const formData = new FormData();
    formData.set("intent", "sample");

    const response = await post(formData);

    expect(response.status).toBe(302);
    expect(response.headers.get("Location")).toMatch(/^\/analysis\?dataset=[0-9a-f]{16}$/);
  });

  it("rejects a request without a file", async () => {
    const formData = new FormData();
    formData.set("intent", "upload");

    const response = await post(formData);
    const data: UploadActionData = await response.json();

    expect(response.status).toBe(400);
    expect(data).toEqual({ ok: false, error: "Choose a CSV export to upload." });
  });

  it("lists missing required columns", async () => {
    const formData = new FormData();
    formData.set("intent", "upload");
    formData.set("file", new File(["foo,bar\n1,2\n"], "broken.csv", { type: "text/csv" }));

    const response = await post(formData);
    const data: UploadActionData = await response.json();

    expect(response.status).toBe(422);
    expect(data).toEqual({
      ok: false,
      error:
        "Missing required columns: analyst, status, created. Check the export headers or extend the column aliases.",
      details: ["Missing: analyst", "Missing: status", "Missing: created"]
    });
  });
});
