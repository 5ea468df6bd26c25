/**
 * Due-date input. Each rule recognizes one shape of (lowercased) input
 * and resolves it against the start of the reference day:
 *
 *   today | tomorrow | yesterday
 *   +3d | +2w | +1m
 *   fri | friday          next occurrence, a week out when it is today
 *   jan15                 this year, or next year once passed
 *   2024-01-15            strict calendar date
 *
 * Everything is stored and compared as yyyy-MM-dd in local time.
 */

import { ValidationError } from '../errors.js';

type DateRule = (input: string, today: Date) => Date | null;

const NAMED_OFFSETS: Record<string, number> = { today: 0, tomorrow: 1, yesterday: -1 };

const WEEKDAYS: readonly string[] = [
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
];

const MONTHS: readonly string[] = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
];

/** Words that clear a due date instead of setting one */
const CLEAR_WORDS = new Set(['clear', 'none']);

const pad = (n: number) => String(n).padStart(2, '0');

/** yyyy-MM-dd in local time */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

/** A real calendar date (no 02-30) written as zero-padded yyyy-MM-dd */
export function isIsoDate(input: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]) - 1, Number(m[3])];
  const date = new Date(year, month, day);
  return date.getFullYear() === year && date.getMonth() === month && date.getDate() === day;
}

function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month, day);
  return date.getMonth() === month ? date : null;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

const named: DateRule = (input, today) => {
  const offset = NAMED_OFFSETS[input];
  return offset === undefined ? null : addDays(today, offset);
};

const relative: DateRule = (input, today) => {
  const m = /^\+(\d+)([dwm])$/.exec(input);
  if (!m) return null;
  const n = Number(m[1]);
  switch (m[2]) {
    case 'w': return addDays(today, n * 7);
    case 'm': return new Date(today.getFullYear(), today.getMonth() + n, today.getDate());
    default: return addDays(today, n);
  }
};

const weekday: DateRule = (input, today) => {
  const target = WEEKDAYS.findIndex(name => input === name || input === name.slice(0, 3));
  if (target < 0) return null;
  return addDays(today, ((target - today.getDay() + 6) % 7) + 1);
};

const monthDay: DateRule = (input, today) => {
  const m = /^([a-z]{3})(\d{1,2})$/.exec(input);
  const month = MONTHS.indexOf(m?.[1] ?? '');
  if (!m || month < 0) return null;

  const day = Number(m[2]);
  const thisYear = calendarDate(today.getFullYear(), month, day);
  if (!thisYear) return null;
  return thisYear.getTime() < today.getTime()
    ? calendarDate(today.getFullYear() + 1, month, day)
    : thisYear;
};

const iso: DateRule = (input) => {
  if (!isIsoDate(input)) return null;
  const [year, month, day] = input.split('-').map(Number);
  return new Date(year ?? 0, (month ?? 1) - 1, day ?? 1);
};

const RULES: readonly DateRule[] = [named, relative, weekday, monthDay, iso];

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/** Resolve date input to yyyy-MM-dd; null when blank or not understood */
export function parseDate(input: string | null | undefined, now: Date = new Date()): string | null {
  const text = input?.trim().toLowerCase();
  if (!text) return null;

  const today = addDays(now, 0);
  for (const rule of RULES) {
    const date = rule(text, today);
    if (date) return formatDate(date);
  }
  return null;
}

/**
 * A due-date argument as typed by a user: anything parseDate accepts,
 * or "clear"/"none" for no due date. Throws ValidationError otherwise.
 */
export function parseDueInput(input: string, now: Date = new Date()): string | null {
  if (CLEAR_WORDS.has(input.trim().toLowerCase())) return null;
  const date = parseDate(input, now);
  if (date === null) throw new ValidationError(`Invalid date '${input}'`);
  return date;
}
