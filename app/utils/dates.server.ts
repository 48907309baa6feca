import { isValid, parse, parseISO } from "date-fns";

import { fail, runStrategyChain, succeed } from "./strategy-chain";
import type { Strategy } from "./strategy-chain";

export type MonthNameTable = ReadonlyArray<readonly [portuguese: string, english: string]>;

export const PORTUGUESE_MONTHS: MonthNameTable = [
  ["jan", "Jan"],
  ["fev", "Feb"],
  ["mar", "Mar"],
  ["abr", "Apr"],
  ["mai", "May"],
  ["jun", "Jun"],
  ["jul", "Jul"],
  ["ago", "Aug"],
  ["set", "Sep"],
  ["out", "Oct"],
  ["nov", "Nov"],
  ["dez", "Dec"],
  ["janeiro", "January"],
  ["fevereiro", "February"],
  ["março", "March"],
  ["marco", "March"],
  ["abril", "April"],
  ["maio", "May"],
  ["junho", "June"],
  ["julho", "July"],
  ["agosto", "August"],
  ["setembro", "September"],
  ["outubro", "October"],
  ["novembro", "November"],
  ["dezembro", "December"]
];

/** Day-before-month candidates for format inference, most specific first. */
const DAY_FIRST_FORMATS = [
  "dd/MM/yyyy HH:mm:ss",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy h:mm a",
  "dd/MM/yyyy",
  "dd/MM/yy HH:mm:ss",
  "dd/MM/yy HH:mm",
  "dd/MM/yy h:mm a",
  "dd/MM/yy",
  "dd/MMM/yyyy HH:mm:ss",
  "dd/MMM/yyyy h:mm a",
  "dd/MMM/yyyy HH:mm",
  "dd/MMM/yyyy",
  "dd/MMM/yy HH:mm:ss",
  "dd/MMM/yy h:mm a",
  "dd/MMM/yy HH:mm",
  "dd/MMM/yy",
  "dd-MM-yyyy HH:mm",
  "dd-MM-yyyy",
  "dd-MMM-yyyy HH:mm",
  "dd-MMM-yyyy",
  "dd.MM.yyyy HH:mm",
  "dd.MM.yyyy",
  "yyyy/MM/dd HH:mm",
  "yyyy/MM/dd",
  "d MMMM yyyy HH:mm",
  "d MMMM yyyy",
  "d MMM yyyy HH:mm",
  "d MMM yyyy",
  "MMMM d, yyyy h:mm a",
  "MMMM d, yyyy",
  "MMM d, yyyy h:mm a",
  "MMM d, yyyy HH:mm",
  "MMM d, yyyy",
  "MM/dd/yyyy HH:mm",
  "MM/dd/yyyy h:mm a",
  "MM/dd/yyyy"
] as const;

export const EXPLICIT_FORMATS = [
  "dd/MMM/yy h:mm a",
  "dd/MMM/yyyy h:mm a",
  "dd/MMM/yy HH:mm",
  "dd/MMM/yyyy HH:mm",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yy HH:mm",
  "dd/MM/yyyy",
  "dd/MM/yy",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd"
] as const;

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const MAX_DIRECT_NULL_RATE = 0.2;

export interface DateParseOptions {
  monthNames?: MonthNameTable;
  referenceDate?: Date;
}

type ParsedSeries = Array<Date | null>;

function isPlausible(date: Date) {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= 1000 && year <= 9999;
}

function parseWithFormat(value: string, format: string, referenceDate: Date): Date | null {
  const parsed = parse(value, format, referenceDate);
  return isPlausible(parsed) ? parsed : null;
}

function parseIsoLike(value: string): Date | null {
  if (!ISO_PREFIX.test(value)) return null;
  const parsed = parseISO(value);
  return isPlausible(parsed) ? parsed : null;
}

type ValueParser = (value: string) => Date | null;

function parseDayFirst(value: string, referenceDate: Date): Date | null {
  const iso = parseIsoLike(value);
  if (iso) return iso;
  for (const format of DAY_FIRST_FORMATS) {
    const hit = parseWithFormat(value, format, referenceDate);
    if (hit) return hit;
  }
  return null;
}

/** The first non-empty value decides the parser for the whole column. */
function inferParser(values: ReadonlyArray<string | null>, referenceDate: Date): ValueParser | null {
  for (const value of values) {
    if (!value) continue;
    if (parseIsoLike(value)) return parseIsoLike;
    const format = DAY_FIRST_FORMATS.find((candidate) => parseWithFormat(value, candidate, referenceDate) !== null);
    return format ? (candidate: string) => parseWithFormat(candidate, format, referenceDate) : null;
  }
  return null;
}

function directParse(values: ReadonlyArray<string | null>, referenceDate: Date): ParsedSeries {
  const parser = inferParser(values, referenceDate);
  return values.map((value) => (value && parser ? parser(value) : null));
}

function countParsed(series: ParsedSeries) {
  return series.reduce((acc, value) => (value ? acc + 1 : acc), 0);
}

function cleanValue(value: string | null | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function monthPattern(word: string) {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${word}(?![\\p{L}\\p{N}_])`, "giu");
}

export function replacePortugueseMonths(text: string, monthNames: MonthNameTable = PORTUGUESE_MONTHS) {
  return monthNames.reduce((acc, [portuguese, english]) => acc.replace(monthPattern(portuguese), english), text);
}

/**
 * Parses a column of free-form timestamps exported with mixed locales.
 * Every layer but the last applies one parser to the whole column; the last
 * resort tries each known format value by value. Never throws: values no
 * layer understands come back as null.
 */
export function parseMixedDates(
  values: ReadonlyArray<string | null | undefined>,
  options: DateParseOptions = {}
): ParsedSeries {
  if (!values.length) return [];

  const referenceDate = options.referenceDate ?? new Date();
  const monthNames = options.monthNames ?? PORTUGUESE_MONTHS;
  const raw = values.map(cleanValue);
  const substituted = raw.map((value) => (value ? replacePortugueseMonths(value, monthNames) : null));

  const layers: Array<Strategy<null, ParsedSeries>> = [
    {
      name: "direct",
      attempt: () => {
        const series = directParse(raw, referenceDate);
        const parsed = countParsed(series);
        if (!parsed) return fail("nothing parsed");
        const nullRate = (series.length - parsed) / series.length;
        return nullRate <= MAX_DIRECT_NULL_RATE ? succeed(series) : fail(`null rate ${nullRate.toFixed(2)}`);
      }
    },
    {
      name: "month-substitution",
      attempt: () => {
        const series = directParse(substituted, referenceDate);
        return countParsed(series) ? succeed(series) : fail("nothing parsed");
      }
    },
    ...EXPLICIT_FORMATS.map((format) => ({
      name: `format ${format}`,
      attempt: () => {
        const series = substituted.map((value) => (value ? parseWithFormat(value, format, referenceDate) : null));
        return countParsed(series) ? succeed(series) : fail("nothing parsed");
      }
    }))
  ];

  const outcome = runStrategyChain(null, layers);
  if (outcome.winner) {
    return outcome.winner.value;
  }

  return substituted.map((value) => (value ? parseDayFirst(value, referenceDate) : null));
}
