import Papa from "papaparse";

import type { Cell, RawTable, ReadMeta } from "~/types/tickets";
import { UnparsableTableError } from "./errors.server";
import { fail, runStrategyChain, succeed } from "./strategy-chain";
import type { AttemptResult, Strategy } from "./strategy-chain";

const EXPLICIT_DELIMITERS = [";", ",", "\t", "|"] as const;
const AUTO_DELIMITER = "auto";
const FALLBACK_ENCODING = "utf-8";
const FALLBACK_DELIMITER = ",";

type DelimiterChoice = (typeof EXPLICIT_DELIMITERS)[number] | typeof AUTO_DELIMITER;

interface ReadPlan {
  delimiter: DelimiterChoice;
  tolerant: boolean;
}

const READ_PLANS: ReadPlan[] = [
  { delimiter: AUTO_DELIMITER, tolerant: false },
  ...EXPLICIT_DELIMITERS.map((delimiter) => ({ delimiter, tolerant: false })),
  ...EXPLICIT_DELIMITERS.map((delimiter) => ({ delimiter, tolerant: true })),
  { delimiter: AUTO_DELIMITER, tolerant: true }
];

export interface ReadOptions {
  defaultEncoding?: string;
}

function planLabel(plan: ReadPlan) {
  const delimiter = plan.delimiter === "\t" ? "tab" : plan.delimiter;
  return plan.tolerant ? `${delimiter}+skip` : delimiter;
}

function encodingCandidates(defaultEncoding: string) {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const encoding of [defaultEncoding, "utf-8", "latin1", "windows-1252"]) {
    const key = encoding.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    ordered.push(key);
  }
  return ordered;
}

function decodeStrict(bytes: Uint8Array, encoding: string): AttemptResult<string> {
  try {
    return succeed(new TextDecoder(encoding, { fatal: true }).decode(bytes));
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }
}

function isBlankRecord(record: string[]) {
  return record.every((field) => field.trim() === "");
}

function toCell(value: string | undefined): Cell {
  if (value === undefined || value.trim() === "") return null;
  return value;
}

function buildHeader(record: string[]) {
  const counts = new Map<string, number>();
  return record.map((raw, index) => {
    const base = raw.trim() === "" ? `Unnamed: ${index}` : raw;
    const seen = counts.get(base) ?? 0;
    counts.set(base, seen + 1);
    return seen === 0 ? base : `${base}.${seen}`;
  });
}

function parseWithPlan(text: string, plan: ReadPlan, encoding: string): AttemptResult<RawTable> {
  const result = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
    delimiter: plan.delimiter === AUTO_DELIMITER ? "" : plan.delimiter,
    delimitersToGuess: [...EXPLICIT_DELIMITERS]
  });

  if (result.errors.some((error) => error.code === "UndetectableDelimiter")) {
    return fail("no delimiter could be detected");
  }

  const brokenRecords = new Set<number>();
  for (const error of result.errors) {
    if (error.type !== "Quotes") continue;
    if (!plan.tolerant) {
      return fail(`${error.code} near record ${error.row ?? "?"}`);
    }
    if (typeof error.row === "number") {
      brokenRecords.add(error.row);
    }
  }

  let columns: string[] | null = null;
  const rows: Cell[][] = [];
  let skippedRows = 0;

  for (const [index, record] of result.data.entries()) {
    if (isBlankRecord(record)) continue;

    if (!columns) {
      if (brokenRecords.has(index)) {
        return fail("header record is malformed");
      }
      columns = buildHeader(record);
      if (columns.length < 2) {
        return fail(`delimiter ${JSON.stringify(result.meta.delimiter)} does not split the header`);
      }
      continue;
    }

    if (brokenRecords.has(index) || record.length > columns.length) {
      if (!plan.tolerant) {
        return fail(`record ${index + 1} has ${record.length} fields, expected ${columns.length}`);
      }
      skippedRows += 1;
      continue;
    }

    const width = columns.length;
    rows.push(Array.from({ length: width }, (_, column) => toCell(record[column])));
  }

  if (!columns) {
    return fail("no header record");
  }

  return succeed({
    columns,
    rows,
    meta: {
      encoding,
      delimiter: result.meta.delimiter,
      tolerant: plan.tolerant,
      skippedRows,
      usedFallback: false
    }
  });
}

function readWithEncoding(bytes: Uint8Array, encoding: string): AttemptResult<RawTable> {
  const decoded = decodeStrict(bytes, encoding);
  if (!decoded.ok) {
    return fail(`decoding failed (${decoded.reason})`);
  }

  const outcome = runStrategyChain(
    decoded.value,
    READ_PLANS.map((plan) => ({
      name: planLabel(plan),
      attempt: (text: string) => parseWithPlan(text, plan, encoding)
    }))
  );

  if (outcome.winner) {
    return succeed(outcome.winner.value);
  }
  return fail(outcome.failures.map((failure) => `${failure.name}: ${failure.reason}`).join("; "));
}

/**
 * Comma-delimited, malformed records dropped, undecodable bytes replaced.
 * Only an input without a single non-blank record produces no columns.
 */
function readFallback(bytes: Uint8Array): RawTable {
  const text = new TextDecoder(FALLBACK_ENCODING).decode(bytes);
  const result = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
    delimiter: FALLBACK_DELIMITER
  });

  const brokenRecords = new Set(
    result.errors.flatMap((error) => (error.type === "Quotes" && typeof error.row === "number" ? [error.row] : []))
  );

  let columns: string[] = [];
  const rows: Cell[][] = [];
  let skippedRows = 0;

  for (const [index, record] of result.data.entries()) {
    if (isBlankRecord(record)) continue;
    if (!columns.length) {
      columns = buildHeader(record);
      continue;
    }
    if (brokenRecords.has(index) || record.length > columns.length) {
      skippedRows += 1;
      continue;
    }
    rows.push(columns.map((_, column) => toCell(record[column])));
  }

  const meta: ReadMeta = {
    encoding: FALLBACK_ENCODING,
    delimiter: FALLBACK_DELIMITER,
    tolerant: true,
    skippedRows,
    usedFallback: true
  };
  return { columns, rows, meta };
}

export function readFlexibleTable(bytes: Uint8Array, options: ReadOptions = {}): RawTable {
  const strategies: Array<Strategy<Uint8Array, RawTable>> = encodingCandidates(
    options.defaultEncoding ?? FALLBACK_ENCODING
  ).map((encoding) => ({
    name: encoding,
    attempt: (input: Uint8Array) => readWithEncoding(input, encoding)
  }));

  const outcome = runStrategyChain(bytes, strategies);
  if (outcome.winner) {
    return outcome.winner.value;
  }

  const attempts = outcome.failures.map((failure) => `[${failure.name}] ${failure.reason}`);
  console.warn(`No read strategy accepted the file; using the lossy comma fallback (${attempts.length} encodings tried)`);

  const table = readFallback(bytes);
  if (!table.columns.length) {
    throw new UnparsableTableError(attempts);
  }
  return table;
}

export const __testables = {
  encodingCandidates,
  buildHeader,
  parseWithPlan
};
