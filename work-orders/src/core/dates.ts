import * as chrono from "chrono-node";
import { addDays, format, isValid, parse, parseISO } from "date-fns";
import { CalendarDate, DueDate } from "./dto";

export const DUE_SOON_WINDOW_DAYS = 7;

const UNKNOWN_TOKENS = new Set(["none", "nan", "n/a", "na"]);

// Two-digit years resolve within 50 years of this year: 69-99 → 19xx, 00-68 → 20xx
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1);

interface ExplicitFormat {
  pattern: string;
  // date-fns accepts short digit runs for "yyyy"; the shape pins the width
  shape: RegExp;
}

/**
 * Explicit formats tried in order. Ambiguous numeric dates such as 03/04/25
 * are resolved by whichever format appears first.
 */
export const EXPLICIT_FORMATS: readonly ExplicitFormat[] = [
  { pattern: "dd/MM/yyyy", shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: "MM/dd/yy", shape: /^\d{1,2}\/\d{1,2}\/\d{2}$/ },
  { pattern: "MM/dd/yyyy", shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: "dd-MM-yy", shape: /^\d{1,2}-\d{1,2}-\d{2}$/ },
  { pattern: "dd-MM-yyyy", shape: /^\d{1,2}-\d{1,2}-\d{4}$/ },
  { pattern: "MMM d, yyyy", shape: /^[a-z]{3} \d{1,2}, \d{4}$/i },
  { pattern: "yyyy-MM-dd", shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
];

// Four-digit years keep calendar dates ordered as plain strings
const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

export function toCalendarDate(date: Date): CalendarDate {
  return format(date, "uuuu-MM-dd");
}

function toDueDate(date: Date): DueDate {
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR ? toCalendarDate(date) : null;
}

export function addCalendarDays(day: CalendarDate, amount: number): CalendarDate {
  return toCalendarDate(addDays(parseISO(day), amount));
}

export function dueSoonHorizon(today: CalendarDate): CalendarDate {
  return addCalendarDays(today, DUE_SOON_WINDOW_DAYS);
}

export function isUnknownToken(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) return true;
  const text = raw.trim();
  return text === "" || UNKNOWN_TOKENS.has(text.toLowerCase());
}

/**
 * Normalize a free-text due date to a calendar date, or null when unknown.
 *
 * `reference` anchors relative prose ("next Friday", "tomorrow") in the
 * natural-language fallback; explicit formats never look at it. Dates outside
 * years 1000-9999 are unknown.
 */
export function normalizeDueDate(raw: string | null | undefined, reference: Date): DueDate {
  if (raw === null || raw === undefined || isUnknownToken(raw)) return null;
  const text = raw.trim();

  for (const { pattern, shape } of EXPLICIT_FORMATS) {
    if (!shape.test(text)) continue;
    const parsed = parse(text, pattern, TWO_DIGIT_YEAR_REFERENCE);
    if (isValid(parsed)) return toDueDate(parsed);
  }

  return parseProse(text, reference);
}

function parseProse(text: string, reference: Date): DueDate {
  try {
    const parsed = chrono.parseDate(text, reference);
    return parsed && isValid(parsed) ? toDueDate(parsed) : null;
  } catch {
    return null;
  }
}

/**
 * Ascending by date with unknown dates last. Equal keys compare as 0 so a
 * stable sort keeps input order.
 */
export function compareDue(a: DueDate, b: DueDate): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}
