// ============================================================================
// Parsing Patterns
// ============================================================================

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/;
const YEAR_FIRST_SLASH_PATTERN = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;
const DAY_FIRST_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const DAY_MONTH_NAME_PATTERN = /^(\d{1,2})[\s-]+([A-Za-z]+)\.?[\s,-]+(\d{4})$/;
const MONTH_NAME_DAY_PATTERN = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/;
const MONTH_YEAR_PATTERN = /^([A-Za-z]+)\.?[\s-]+(\d{4})$/;
const YEAR_PATTERN = /^(\d{4})$/;

// eg. afghanistan-3w-operational-presence-april-june-2025.csv
const DATES_IN_FILENAME =
  /([a-zA-Z]+)[\s\-_]+(?:to)?[\s\-_]*([a-zA-Z]+)[\s\-_]+(\d{4})/;

const MONTHS = [
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

export const MIN_VALID_YEAR = 2000;

// ============================================================================
// Types
// ============================================================================

export interface DateRange {
  start: Date;
  end: Date;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Month number (1-12) from an English month name or 3+ letter abbreviation
 */
export function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  if (lower.length < 3) return null;
  const index = MONTHS.findIndex((month) => month.startsWith(lower));
  return index === -1 ? null : index + 1;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function buildDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return new Date(Date.UTC(year, month - 1, day));
}

export function endOfDay(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getUTCFullYear(),
      date.getUTCMonth(),
      date.getUTCDate(),
      23,
      59,
      59,
      999
    )
  );
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse the range of days a date label covers. "2024-03-31" covers one day,
 * "March 2024" the whole month and "2024" the whole year.
 */
export function parseDateRange(text: string): DateRange | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;

  const single = parseSingleDay(trimmed);
  if (single) return { start: single, end: endOfDay(single) };

  const monthYear = MONTH_YEAR_PATTERN.exec(trimmed);
  if (monthYear?.[1] && monthYear[2]) {
    const month = monthFromName(monthYear[1]);
    if (month === null) return null;
    const year = Number(monthYear[2]);
    const start = buildDate(year, month, 1);
    const last = buildDate(year, month, daysInMonth(year, month));
    if (!start || !last) return null;
    return { start, end: endOfDay(last) };
  }

  const yearOnly = YEAR_PATTERN.exec(trimmed);
  if (yearOnly?.[1]) {
    const year = Number(yearOnly[1]);
    return {
      start: new Date(Date.UTC(year, 0, 1)),
      end: endOfDay(new Date(Date.UTC(year, 11, 31))),
    };
  }

  return null;
}

function parseSingleDay(text: string): Date | null {
  const iso = ISO_PATTERN.exec(text) ?? YEAR_FIRST_SLASH_PATTERN.exec(text);
  if (iso?.[1] && iso[2] && iso[3]) {
    return buildDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  // Day first, as the source spreadsheets are written
  const dayFirst = DAY_FIRST_PATTERN.exec(text);
  if (dayFirst?.[1] && dayFirst[2] && dayFirst[3]) {
    return buildDate(
      Number(dayFirst[3]),
      Number(dayFirst[2]),
      Number(dayFirst[1])
    );
  }

  const dayMonth = DAY_MONTH_NAME_PATTERN.exec(text);
  if (dayMonth?.[1] && dayMonth[2] && dayMonth[3]) {
    const month = monthFromName(dayMonth[2]);
    return month === null
      ? null
      : buildDate(Number(dayMonth[3]), month, Number(dayMonth[1]));
  }

  const monthDay = MONTH_NAME_DAY_PATTERN.exec(text);
  if (monthDay?.[1] && monthDay[2] && monthDay[3]) {
    const month = monthFromName(monthDay[1]);
    return month === null
      ? null
      : buildDate(Number(monthDay[3]), month, Number(monthDay[2]));
  }

  return null;
}

/**
 * Parse a date, taking the first day of a month or year label
 */
export function parseDate(text: string): Date | null {
  return parseDateRange(text)?.start ?? null;
}

/**
 * Parse a date, taking the last moment of a month or year label
 */
export function parseEndDate(text: string): Date | null {
  return parseDateRange(text)?.end ?? null;
}

/**
 * Reference period taken from a resource name such as
 * "afghanistan-3w-april-june-2025.csv".
 * @returns `broken: true` when the name looks dated but cannot be parsed
 */
export function getDatesFromFilename(resourceName: string): {
  broken: boolean;
  period: DateRange | null;
} {
  const match = DATES_IN_FILENAME.exec(resourceName);
  if (!match?.[1] || !match[2] || !match[3]) {
    return { broken: false, period: null };
  }
  const start = parseDateRange(`${match[1]}-${match[3]}`);
  const end = parseDateRange(`${match[2]}-${match[3]}`);
  if (!start || !end) {
    return { broken: true, period: null };
  }
  return { broken: false, period: { start: start.start, end: end.end } };
}

/**
 * ISO 8601 date-time without milliseconds or zone, e.g. "2024-09-02T23:59:59"
 */
export function toIsoString(date: Date): string {
  return date.toISOString().slice(0, 19);
}
