import * as chrono from 'chrono-node';
import type { DateRange } from '../types.js';

const ISO_DATE = /^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])$/;
const ISO_SHAPE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * True for a real calendar date in YYYY-MM-DD form (rejects 2025-02-30).
 */
export function isIsoDate(input: string): boolean {
  if (!ISO_DATE.test(input)) return false;
  const d = new Date(`${input}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && normalizeDate(d) === input;
}

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): string {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  // Convert to YYYY-MM-DD in UTC
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a natural language input into YYYY-MM-DD (UTC) using chrono-node.
 * Examples: "yesterday", "last Sunday", "2025-03-07"
 */
export function parseDateNL(input: string, now: Date = new Date()): string {
  if (ISO_SHAPE.test(input)) {
    if (!isIsoDate(input)) {
      throw new Error(`Not a calendar date: ${input}`);
    }
    return input;
  }
  const parsed = chrono.parseDate(input, now, { forwardDate: false });
  if (!parsed) {
    throw new Error(
      'Could not understand the date input. Try "yesterday", "last Sunday", or a specific date like 2025-03-07.'
    );
  }
  return normalizeDate(parsed);
}

/**
 * Shift a YYYY-MM-DD date by a number of calendar days (negative goes back).
 */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${date}`);
  }
  return normalizeDate(new Date(d.getTime() + days * MS_PER_DAY));
}

/**
 * The window of `lengthDays` calendar days ending on (and including) `end`.
 */
export function windowEnding(end: string, lengthDays: number): DateRange {
  return { start: addDays(end, -(lengthDays - 1)), end };
}

/**
 * Every date from start to end inclusive, ascending.
 */
export function datesBetween(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let cur = start; cur <= end; cur = addDays(cur, 1)) {
    dates.push(cur);
  }
  return dates;
}

// YYYY-MM-DD strings order lexically
export function isWithin(date: string, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}
