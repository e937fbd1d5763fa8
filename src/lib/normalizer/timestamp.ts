/**
 * Timestamp canonicalization to "YYYY-MM-DD HH:MM:SS"
 *
 * Wall-clock fields are kept as written; a trailing zone or offset is
 * dropped. Anything unreadable becomes "".
 */

import { CellValue } from "../../types/data-model.js";
import { TimestampOptions } from "./types.js";

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

type DateOrder = "year-first" | "year-last" | "day-month-year" | "day-name-year" | "name-day-year";

interface DatePattern {
  pattern: RegExp;
  order: DateOrder;
}

// Capture groups 4-7 of every pattern: hour, minute, second, AM/PM
const TIME = String.raw`(?:(?:[T ]+|,\s*)(\d{1,2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(?:\s*([AP]\.?M\.?))?)?`;
const ZONE = String.raw`(?:\s*(?:Z|UTC|GMT|[+-]\d{2}(?::?\d{2})?))?`;

function datePattern(date: string, order: DateOrder): DatePattern {
  return { pattern: new RegExp(`^${date}${TIME}${ZONE}$`, "i"), order };
}

const DATE_PATTERNS: readonly DatePattern[] = [
  // 2020-03-01, 2020/03/01T10:00:00.123Z
  datePattern(String.raw`(\d{4})[-/](\d{1,2})[-/](\d{1,2})`, "year-first"),
  // 20200301
  datePattern(String.raw`(\d{4})(\d{2})(\d{2})`, "year-first"),
  // 03/01/2020 10:00 PM
  datePattern(String.raw`(\d{1,2})[-/](\d{1,2})[-/](\d{4})`, "year-last"),
  // 01.03.2020
  datePattern(String.raw`(\d{1,2})\.(\d{1,2})\.(\d{4})`, "day-month-year"),
  // 1 Mar 2020, 01-March-2020
  datePattern(String.raw`(\d{1,2})[ -]([a-z]{3,9})\.?,?[ -](\d{4})`, "day-name-year"),
  // March 1, 2020 10:00, Mar 1st 2020
  datePattern(String.raw`([a-z]{3,9})\.? (\d{1,2})(?:st|nd|rd|th)?,? (\d{4})`, "name-day-year"),
];

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

/**
 * 1-12 for a full English month name or a prefix of at least three letters; 0 otherwise
 */
function monthFromName(name: string): number {
  const lower = name.toLowerCase();
  return MONTH_NAMES.findIndex((month) => month.startsWith(lower)) + 1;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isValid(parts: DateTimeParts): boolean {
  return (
    parts.month >= 1 &&
    parts.month <= 12 &&
    parts.day >= 1 &&
    parts.day <= daysInMonth(parts.year, parts.month) &&
    parts.hour <= 23 &&
    parts.minute <= 59 &&
    parts.second <= 59
  );
}

function toNumber(group: string | undefined): number {
  return group === undefined ? 0 : Number(group);
}

/**
 * 24-hour clock fields; undefined for a 12-hour time whose hour is not 1-12
 */
function timeParts(match: RegExpExecArray): Pick<DateTimeParts, "hour" | "minute" | "second"> | undefined {
  let hour = toNumber(match[4]);
  const meridiem = match[7]?.charAt(0).toUpperCase();
  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return undefined;
    }
    hour = (hour % 12) + (meridiem === "P" ? 12 : 0);
  }
  return { hour, minute: toNumber(match[5]), second: toNumber(match[6]) };
}

/**
 * Month first unless asked otherwise; a first field above 12 can only be a day
 */
function resolveDayMonth(first: number, second: number, dayFirst: boolean): [number, number] {
  let [day, month] = dayFirst ? [first, second] : [second, first];
  if (month > 12 && day <= 12) {
    [day, month] = [month, day];
  }
  return [day, month];
}

function dateParts(
  match: RegExpExecArray,
  order: DateOrder,
  dayFirst: boolean,
): Pick<DateTimeParts, "year" | "month" | "day"> {
  const [first, second, third] = [match[1] ?? "", match[2] ?? "", match[3] ?? ""];
  switch (order) {
    case "year-first":
      return { year: toNumber(first), month: toNumber(second), day: toNumber(third) };
    case "year-last": {
      const [day, month] = resolveDayMonth(toNumber(first), toNumber(second), dayFirst);
      return { year: toNumber(third), month, day };
    }
    case "day-month-year":
      return { year: toNumber(third), month: toNumber(second), day: toNumber(first) };
    case "day-name-year":
      return { year: toNumber(third), month: monthFromName(second), day: toNumber(first) };
    case "name-day-year":
      return { year: toNumber(third), month: monthFromName(first), day: toNumber(second) };
  }
}

export function parseTimestamp(text: string, options: TimestampOptions = {}): DateTimeParts | undefined {
  const trimmed = text.trim();

  for (const { pattern, order } of DATE_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (!match) {
      continue;
    }
    const time = timeParts(match);
    if (!time) {
      return undefined;
    }
    const parts: DateTimeParts = { ...dateParts(match, order, options.dayFirst ?? false), ...time };
    return isValid(parts) ? parts : undefined;
  }

  return undefined;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export function formatTimestamp(value: CellValue, options: TimestampOptions = {}): string {
  if (typeof value !== "string") {
    return "";
  }
  const parts = parseTimestamp(value, options);
  if (!parts) {
    return "";
  }
  return (
    `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)} ` +
    `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`
  );
}
