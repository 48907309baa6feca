import { describe, expect, it } from "vitest";

import type { RawTable } from "~/types/tickets";
import { assertRequiredColumns, columnValues, normalizeColumns, presentFields } from "../columns.server";
import { MissingRequiredColumnsError } from "../errors.server";
import { DEFAULT_VOCABULARY } from "../vocabulary.server";

function rawTable(columns: string[], rows: Array<Array<string | null>> = []): RawTable {
  return {
    columns,
    rows,
    meta: { encoding: "utf-8", delimiter: ",", tolerant: false, skippedRows: 0, usedFallback: false }
  };
}

const aliases = DEFAULT_VOCABULARY.columnAliases;

describe("normalizeColumns", () => {
  it("renames the first matching alias and leaves the rest alone", () => {
    const table = normalizeColumns(
      rawTable(["Chave", "Responsável", "Assignee", "Status", "Criado"], [["SUP-1", "Ana", "Bia", "Aberto", null]]),
      aliases
    );

    expect(table.columns).toEqual(["Chave", "analyst", "Assignee", "status", "created"]);
    expect(table.sources).toEqual({ analyst: "Responsável", status: "Status", created: "Criado" });
    expect(presentFields(table)).toEqual(["analyst", "status", "created"]);
    expect(columnValues(table, "analyst")).toEqual(["Ana"]);
    expect(columnValues(table, "application")).toBeNull();
  });

  it("maps English headers", () => {
    const table = normalizeColumns(rawTable(["Assignee", "Status", "Created", "Resolved", "Issue Type"]), aliases);

    expect(presentFields(table)).toEqual(["analyst", "status", "created", "resolved", "issueType"]);
  });
});

describe("assertRequiredColumns", () => {
  it("names every missing required column", () => {
    const table = normalizeColumns(rawTable(["Assignee", "Created"]), aliases);

    expect(() => assertRequiredColumns(table)).toThrow(
      "Missing required columns: status. Check the export headers or extend the column aliases."
    );
  });

  it("exposes the missing fields on the error", () => {
    const table = normalizeColumns(rawTable(["foo", "bar"]), aliases);

    try {
      assertRequiredColumns(table);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredColumnsError);
      if (error instanceof MissingRequiredColumnsError) {
        expect(error.missing).toEqual(["analyst", "status", "created"]);
      }
    }
  });
});
