import path from "node:path";

import type { ActionFunctionArgs } from "@remix-run/node";
import { json, redirect } from "@remix-run/node";

import { getServerEnv } from "~/utils/env.server";
import { MissingRequiredColumnsError, TicketImportError } from "~/utils/errors.server";
import { loadFixtureBytes } from "~/utils/fixture.server";
import { importTicketExport } from "~/utils/ticket-dataset.server";

export type UploadActionData = { ok: false; error: string; details?: string[] };

async function readUpload(formData: FormData): Promise<{ bytes: Uint8Array; fileName: string } | null> {
  if (formData.get("intent") === "sample") {
    const samplePath = getServerEnv("SAMPLE_EXPORT_PATH");
    const bytes = await loadFixtureBytes(samplePath);
    return bytes ? { bytes, fileName: path.basename(samplePath) } : null;
  }

  const file = formData.get("file");
  if (!file || typeof file === "string" || file.size === 0) {
    return null;
  }
  return { bytes: new Uint8Array(await file.arrayBuffer()), fileName: file.name || "export.csv" };
}

export async function action({ request }: ActionFunctionArgs) {
  const upload = await readUpload(await request.formData());
  if (!upload) {
    return json<UploadActionData>({ ok: false, error: "Choose a CSV export to upload." }, { status: 400 });
  }

  try {
    const dataset = importTicketExport(upload.bytes, upload.fileName);
    return redirect(`/analysis?dataset=${encodeURIComponent(dataset.id)}`);
  } catch (error) {
    if (error instanceof MissingRequiredColumnsError) {
      return json<UploadActionData>(
        { ok: false, error: error.message, details: error.missing.map((field) => `Missing: ${field}`) },
        { status: 422 }
      );
    }
    if (error instanceof TicketImportError) {
      return json<UploadActionData>({ ok: false, error: error.message }, { status: 422 });
    }
    console.error(error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return json<UploadActionData>({ ok: false, error: message }, { status: 500 });
  }
}
