import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { __testables, readFlexibleTable } from "../csv-reader.server";
import { UnparsableTableError } from "../errors.server";
import { encodeSingleByte, encodeText } from "./ticket-factory";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("read helpers", () => {
  it("orders encodings with the configured default first", () => {
    expect(__testables.encodingCandidates("UTF-8")).toEqual(["utf-8", "latin1", "windows-1252"]);
    expect(__testables.encodingCandidates("cp1252")).toEqual(["cp1252", "utf-8", "latin1", "windows-1252"]);
  });

  it("names blank headers and suffixes duplicates", () => {
    expect(__testables.buildHeader(["Status", "", "Status", " "])).toEqual([
      "Status",
      "Unnamed: 1",
      "Status.1",
      "Unnamed: 3"
    ]);
  });
});

describe("readFlexibleTable", () => {
  it("detects a semicolon export in utf-8", () => {
    const table = readFlexibleTable(encodeText("Responsável;Status;Criado\nAna;Resolvido;02/01/2025\n"));

    expect(table.columns).toEqual(["Responsável", "Status", "Criado"]);
    expect(table.rows).toEqual([["Ana", "Resolvido", "02/01/2025"]]);
    expect(table.meta).toEqual({
      encoding: "utf-8",
      delimiter: ";",
      tolerant: false,
      skippedRows: 0,
      usedFallback: false
    });
  });

  it("falls back to latin1 and skips a malformed trailing row", () => {
    const bytes = encodeSingleByte(
      "Responsável;Status;Criado\nAna;Concluído;02/01/2025\nBia;Aberto;03/01/2025;extra;more\n"
    );

    const table = readFlexibleTable(bytes);

    expect(table.meta.encoding).toBe("latin1");
    expect(table.meta.delimiter).toBe(";");
    expect(table.meta.tolerant).toBe(true);
    expect(table.meta.skippedRows).toBe(1);
    expect(table.columns).toEqual(["Responsável", "Status", "Criado"]);
    expect(table.rows).toEqual([["Ana", "Concluído", "02/01/2025"]]);
  });

  it("pads short rows and blanks whitespace cells", () => {
    const table = readFlexibleTable(encodeText("a,b,c\n1,  \n"));

    expect(table.rows).toEqual([["1", null, null]]);
  });

  it("keeps delimiters inside quoted fields", () => {
    const table = readFlexibleTable(encodeText('"Name";"Note"\n"Ana";"a;b"\n'));

    expect(table.rows).toEqual([["Ana", "a;b"]]);
  });

  it("uses the lossy comma fallback for a single-column file", () => {
    const table = readFlexibleTable(encodeText("just one column\nvalue\n"));

    expect(table.columns).toEqual(["just one column"]);
    expect(table.rows).toEqual([["value"]]);
    expect(table.meta.usedFallback).toBe(true);
    expect(table.meta.delimiter).toBe(",");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("throws when there is no record at all", () => {
    expect(() => readFlexibleTable(new Uint8Array())).toThrow(UnparsableTableError);
  });
});
