/**
 * Temporal Normalizer
 *
 * Rewrites free-form date and timestamp columns into one canonical text
 * form. Parsing never throws: a value that cannot be read as a date becomes
 * the absent marker (null) and the run goes on.
 *
 * Canonical forms:
 * - date:      YYYY-MM-DD
 * - timestamp: YYYY-MM-DDTHH:MM:SSZ (UTC; values without a zone are UTC)
 */

import type {
  CustomerRow,
  EventRow,
  NormalizedCustomerRow,
  NormalizedEventRow,
  NormalizedOrderRow,
  NormalizedTables,
  OrderRow,
  SourceTables,
} from "../../db/types.js";

// ============================================================================
// Types
// ============================================================================

export type ParseResult<T> = { kind: "parsed"; value: T } | { kind: "absent" };

const ABSENT: ParseResult<never> = { kind: "absent" };

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Minutes east of UTC; null when the text carried no zone */
  offsetMinutes: number | null;
}

// ============================================================================
// Patterns
// ============================================================================

const TIME =
  String.raw`(?:(?:T|\s+)(?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<second>\d{2})(?:[.,]\d+)?)?(?:\s*(?<meridiem>[ap]m))?)?`;
const ZONE = String.raw`(?:\s*(?<zone>z|utc|gmt|[+-]\d{2}(?::?\d{2})?))?`;
const WEEKDAY = String.raw`(?:[a-z]{3,9},?\s+)?`;
const ORDINAL = String.raw`(?:st|nd|rd|th)?`;

function pattern(date: string): RegExp {
  return new RegExp(`^${date}${TIME}${ZONE}$`, "i");
}

/** 2023-03-05, 2023/3/5, 2023.03.05 */
const ISO_DATE = pattern(
  String.raw`(?<year>\d{4})(?<sep>[-/.])(?<month>\d{1,2})\k<sep>(?<day>\d{1,2})`
);

/** 20230305 */
const COMPACT_DATE = pattern(
  String.raw`(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})`
);

/** 03/05/2023: month first unless the first number cannot be a month */
const NUMERIC_DATE = pattern(
  String.raw`(?<lead>\d{1,2})(?<sep>[-/.])(?<trail>\d{1,2})\k<sep>(?<year>\d{4})`
);

/** 5 March 2023, 05-Mar-2023, Sun, 05 Mar 2023 */
const DAY_MONTH_NAME = pattern(
  String.raw`${WEEKDAY}(?<day>\d{1,2})${ORDINAL}[\s-]+(?<monthName>[a-z]+)\.?,?[\s-]+(?<year>\d{4})`
);

/** March 5, 2023 / Mar 5 2023 */
const MONTH_NAME_DAY = pattern(
  String.raw`(?<monthName>[a-z]+)\.?\s+(?<day>\d{1,2})${ORDINAL},?\s+(?<year>\d{4})`
);

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

// ============================================================================
// Parsing
// ============================================================================

function monthFromName(name: string): number | null {
  const key = name.toLowerCase();
  if (key.length < 3) {
    return null;
  }
  const index = MONTH_NAMES.findIndex((month) => month.startsWith(key));
  return index === -1 ? null : index + 1;
}

function toInt(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number.parseInt(value, 10);
}

function parseZone(zone: string | undefined): number | null {
  if (zone === undefined) {
    return null;
  }
  const upper = zone.toUpperCase();
  if (upper === "Z" || upper === "UTC" || upper === "GMT") {
    return 0;
  }

  const digits = zone.slice(1).replace(":", "");
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2), 10) : 0;
  if (hours > 23 || minutes > 59) {
    return Number.NaN;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

function applyMeridiem(hour: number, meridiem: string | undefined): number {
  if (meridiem === undefined) {
    return hour;
  }
  if (hour < 1 || hour > 12) {
    return Number.NaN;
  }
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) {
    return pm ? 12 : 0;
  }
  return pm ? hour + 12 : hour;
}

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const days = [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return days[month - 1] ?? 0;
}

function isValid(parts: DateTimeParts): boolean {
  const { year, month, day, hour, minute, second, offsetMinutes } = parts;
  return (
    Number.isInteger(year) &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour >= 0 &&
    hour <= 23 &&
    minute >= 0 &&
    minute <= 59 &&
    second >= 0 &&
    second <= 59 &&
    (offsetMinutes === null || Number.isFinite(offsetMinutes))
  );
}

function fromGroups(
  groups: Record<string, string | undefined>,
  year: number,
  month: number,
  day: number
): DateTimeParts {
  return {
    year,
    month,
    day,
    hour: applyMeridiem(toInt(groups.hour, 0), groups.meridiem),
    minute: toInt(groups.minute, 0),
    second: toInt(groups.second, 0),
    offsetMinutes: parseZone(groups.zone),
  };
}

/**
 * Read date/time parts out of free-form text, or null when no known layout
 * matches.
 */
function matchParts(text: string): DateTimeParts | null {
  const iso = ISO_DATE.exec(text) ?? COMPACT_DATE.exec(text);
  if (iso?.groups !== undefined) {
    const g = iso.groups;
    return fromGroups(g, toInt(g.year, 0), toInt(g.month, 0), toInt(g.day, 0));
  }

  const numeric = NUMERIC_DATE.exec(text);
  if (numeric?.groups !== undefined) {
    const g = numeric.groups;
    const lead = toInt(g.lead, 0);
    const trail = toInt(g.trail, 0);
    const [month, day] =
      lead > 12 && trail <= 12 ? [trail, lead] : [lead, trail];
    return fromGroups(g, toInt(g.year, 0), month, day);
  }

  const named = DAY_MONTH_NAME.exec(text) ?? MONTH_NAME_DAY.exec(text);
  if (named?.groups !== undefined) {
    const g = named.groups;
    const month = monthFromName(g.monthName ?? "");
    if (month === null) {
      return null;
    }
    return fromGroups(g, toInt(g.year, 0), month, toInt(g.day, 0));
  }

  return null;
}

function partsFromDate(value: Date): DateTimeParts {
  return {
    year: value.getUTCFullYear(),
    month: value.getUTCMonth() + 1,
    day: value.getUTCDate(),
    hour: value.getUTCHours(),
    minute: value.getUTCMinutes(),
    second: value.getUTCSeconds(),
    offsetMinutes: 0,
  };
}

function readParts(value: unknown): DateTimeParts | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : partsFromDate(value);
  }

  const text = String(value).trim();
  if (text === "") {
    return null;
  }

  const parts = matchParts(text);
  return parts !== null && isValid(parts) ? parts : null;
}

// ============================================================================
// Formatting
// ============================================================================

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function toUtc(parts: DateTimeParts): Date {
  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(
    parts.hour,
    parts.minute - (parts.offsetMinutes ?? 0),
    parts.second,
    0
  );
  return date;
}

/**
 * Parse a calendar date. The wall-clock date is kept; any time or zone is
 * ignored.
 */
export function parseDate(value: unknown): ParseResult<string> {
  const parts = readParts(value);
  if (parts === null) {
    return ABSENT;
  }
  return {
    kind: "parsed",
    value: formatDate(parts.year, parts.month, parts.day),
  };
}

/**
 * Parse a date-time and express it in UTC.
 */
export function parseTimestamp(value: unknown): ParseResult<string> {
  const parts = readParts(value);
  if (parts === null) {
    return ABSENT;
  }

  const utc = toUtc(parts);
  const date = formatDate(
    utc.getUTCFullYear(),
    utc.getUTCMonth() + 1,
    utc.getUTCDate()
  );
  const time = `${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}`;
  const text = `${date}T${time}Z`;
  return { kind: "parsed", value: text };
}

/** Collapse a parse result to the value written to the graph */
export function orNull(result: ParseResult<string>): string | null {
  return result.kind === "parsed" ? result.value : null;
}

// ============================================================================
// Tables
// ============================================================================

function normalizeCustomer(row: CustomerRow): NormalizedCustomerRow {
  const { join_date: joinDate, ...rest } = row;
  return "join_date" in row
    ? { ...rest, join_date: orNull(parseDate(joinDate)) }
    : rest;
}

function normalizeOrder(row: OrderRow): NormalizedOrderRow {
  const { ts, ...rest } = row;
  return "ts" in row ? { ...rest, ts: orNull(parseTimestamp(ts)) } : rest;
}

function normalizeEvent(row: EventRow): NormalizedEventRow {
  const { ts, ...rest } = row;
  return "ts" in row ? { ...rest, ts: orNull(parseTimestamp(ts)) } : rest;
}

/**
 * Return a new snapshot with `customers.join_date`, `orders.ts` and
 * `events.ts` rewritten. The input is left untouched; missing tables and
 * columns stay missing.
 */
export function normalizeTables(tables: SourceTables): NormalizedTables {
  const result: NormalizedTables = {};

  if (tables.customers !== undefined) {
    result.customers = tables.customers.map(normalizeCustomer);
  }
  if (tables.categories !== undefined) {
    result.categories = tables.categories.map((row) => ({ ...row }));
  }
  if (tables.products !== undefined) {
    result.products = tables.products.map((row) => ({ ...row }));
  }
  if (tables.orders !== undefined) {
    result.orders = tables.orders.map(normalizeOrder);
  }
  if (tables.order_items !== undefined) {
    result.order_items = tables.order_items.map((row) => ({ ...row }));
  }
  if (tables.events !== undefined) {
    result.events = tables.events.map(normalizeEvent);
  }

  return result;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || String(value).trim() === "";
}

function countLost<S, N>(
  source: readonly S[] | undefined,
  normalized: readonly N[] | undefined,
  read: (row: S) => unknown,
  readNormalized: (row: N) => unknown
): number {
  if (source === undefined || normalized === undefined) {
    return 0;
  }
  let lost = 0;
  source.forEach((row, index) => {
    const after = normalized[index];
    if (
      !isBlank(read(row)) &&
      after !== undefined &&
      readNormalized(after) === null
    ) {
      lost++;
    }
  });
  return lost;
}

/**
 * Count values that were present in the source but came out absent, keyed
 * by `table.column`. Only non-zero counts are reported.
 */
export function countDegraded(
  source: SourceTables,
  normalized: NormalizedTables
): Record<string, number> {
  const counts: Record<string, number> = {
    "customers.join_date": countLost(
      source.customers,
      normalized.customers,
      (row) => row.join_date,
      (row) => row.join_date
    ),
    "orders.ts": countLost(
      source.orders,
      normalized.orders,
      (row) => row.ts,
      (row) => row.ts
    ),
    "events.ts": countLost(
      source.events,
      normalized.events,
      (row) => row.ts,
      (row) => row.ts
    ),
  };

  return Object.fromEntries(
    Object.entries(counts).filter(([, count]) => count > 0)
  );
}
