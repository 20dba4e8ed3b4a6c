import { isAfter, isBefore, isValid, parseISO } from 'date-fns';

/** An inclusive [start, end] pair of UTC dates. */
export type DateWindow = {
  start: Date;
  end: Date;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OFFSET = /[T ].*([+-]\d{2}(:?\d{2})?)$/;

/** 'YYYY-MM-DD' in UTC. date-fns `format` works in local time, so it is not used here. */
export const toIsoDate = (d: Date) => d.toISOString().slice(0, 10);

export const utcDate = (year: number, monthIndex: number, day: number) =>
  new Date(Date.UTC(year, monthIndex, day));

const startOfUtcDay = (d: Date) => utcDate(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());

const daysInUtcMonth = (year: number, monthIndex: number) =>
  new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();

/**
 * Moves a date by whole calendar years, keeping month and day.
 * A day that does not exist in the target year (Feb 29) is clamped to the month's last day.
 */
export function shiftYears(date: Date, years: number): Date {
  const year = date.getUTCFullYear() + years;
  const month = date.getUTCMonth();
  const day = Math.min(date.getUTCDate(), daysInUtcMonth(year, month));
  return new Date(
    Date.UTC(
      year,
      month,
      day,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds()
    )
  );
}

/** Jan 1 – Dec 31 of the UTC year `today` falls in. */
export function defaultFiscalWindow(today: Date = new Date()): DateWindow {
  const year = today.getUTCFullYear();
  return { start: utcDate(year, 0, 1), end: utcDate(year, 11, 31) };
}

export function previousFiscalWindow(window: DateWindow): DateWindow {
  return { start: shiftYears(window.start, -1), end: shiftYears(window.end, -1) };
}

/**
 * Parses a strict 'YYYY-MM-DD' value to UTC midnight.
 * Returns null for other shapes and for impossible dates such as 2023-02-30.
 */
export function parseIsoDateUtc(value: string): Date | null {
  if (!DATE_ONLY.test(value)) return null;
  const [year, month, day] = value.split('-').map(Number);
  const date = utcDate(year, month - 1, day);
  return toIsoDate(date) === value ? date : null;
}

/**
 * Parses a payroll run's check_date. A trailing 'Z' is rewritten to '+00:00';
 * date-only values and date-times without an offset are read as UTC.
 */
export function parseCheckDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  let iso = value.trim();
  if (!iso) return null;

  iso = iso.replace(/z$/i, '+00:00');
  if (DATE_ONLY.test(iso)) {
    iso = `${iso}T00:00:00+00:00`;
  } else if (!TIME_OFFSET.test(iso)) {
    iso = `${iso}+00:00`;
  }

  const parsed = parseISO(iso);
  return isValid(parsed) ? parsed : null;
}

/** Compares on UTC calendar days; both bounds are inclusive. */
export function isWithinDayWindow(date: Date, window: DateWindow): boolean {
  const day = startOfUtcDay(date);
  return !isBefore(day, startOfUtcDay(window.start)) && !isAfter(day, startOfUtcDay(window.end));
}

export function isCheckDateInWindow(value: unknown, window: DateWindow): boolean {
  const checkDate = parseCheckDate(value);
  return checkDate !== null && isWithinDayWindow(checkDate, window);
}
