import type { CalendarDate } from '../control-plane/types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function makeCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return undefined;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  return { year, month, day };
}

/**
 * Accepts `YYYY-MM-DD`, optionally followed by a time part
 * (`2023-12-31T00:00:00`), which is ignored.
 */
export function parseCalendarDate(value: string | undefined): CalendarDate | undefined {
  if (value === undefined) return undefined;
  const datePart = value.trim().split('T')[0];
  const match = ISO_DATE.exec(datePart);
  if (!match) return undefined;
  return makeCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function formatCalendarDate(date: CalendarDate): string {
  const yyyy = String(date.year).padStart(4, '0');
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}
