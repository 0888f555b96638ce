import { formatCalendarDate, makeCalendarDate } from '../utils/calendar-date.js';

/**
 * Subset of the inline XBRL transformation registry (v1 to v5 names).
 * Formats are matched on their local name with hyphens removed, so
 * `ixt:date-day-monthname-year-en` and `ixt:datedaymonthyearen` both resolve.
 */
export type TransformOutcome =
  | { ok: true; value: string }
  | { ok: false; reason: 'unsupported' | 'invalid' };

type Transform = (text: string) => string | undefined;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function monthFromName(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

function expandYear(token: string): number {
  const year = Number(token);
  return token.length <= 2 ? 2000 + year : year;
}

function tokens(text: string): string[] {
  return text.split(/[\s.,\-/]+/).filter((t) => t.length > 0);
}

function isoDate(year: number, month: number | undefined, day: number): string | undefined {
  if (month === undefined) return undefined;
  const date = makeCalendarDate(year, month, day);
  return date ? formatCalendarDate(date) : undefined;
}

function numericDate(order: 'dmy' | 'mdy' | 'ymd'): Transform {
  return (text) => {
    const parts = text.split(/[^0-9]+/).filter((p) => p.length > 0);
    if (parts.length !== 3) return undefined;
    const [a, b, c] = parts;
    switch (order) {
      case 'dmy':
        return isoDate(expandYear(c), Number(b), Number(a));
      case 'mdy':
        return isoDate(expandYear(c), Number(a), Number(b));
      case 'ymd':
        return isoDate(expandYear(a), Number(b), Number(c));
    }
  };
}

const dayMonthNameYear: Transform = (text) => {
  const parts = tokens(text);
  if (parts.length !== 3) return undefined;
  return isoDate(expandYear(parts[2]), monthFromName(parts[1]), parseInt(parts[0], 10));
};

const monthNameDayYear: Transform = (text) => {
  const parts = tokens(text);
  if (parts.length !== 3) return undefined;
  return isoDate(expandYear(parts[2]), monthFromName(parts[0]), parseInt(parts[1], 10));
};

function decimalNumber(thousands: string, decimal: string): Transform {
  return (text) => {
    let cleaned = text.replace(/\s/g, '').split(thousands).join('');
    if (decimal !== '.') cleaned = cleaned.replace(decimal, '.');
    return /^\d+(\.\d+)?$/.test(cleaned) ? cleaned : undefined;
  };
}

const zero: Transform = () => '0';
const empty: Transform = () => '';

const TRANSFORMS: Record<string, Transform> = {
  datedaymonthnameyearen: dayMonthNameYear,
  datedaymonthyearen: dayMonthNameYear,
  datedaymonthnameyear: dayMonthNameYear,
  datelongeu: dayMonthNameYear,
  datemonthnamedayyearen: monthNameDayYear,
  datemonthdayyearen: monthNameDayYear,
  datemonthnamedayyear: monthNameDayYear,
  datelongus: monthNameDayYear,
  datedaymonthyear: numericDate('dmy'),
  dateslasheu: numericDate('dmy'),
  datedoteu: numericDate('dmy'),
  datemonthdayyear: numericDate('mdy'),
  dateslashus: numericDate('mdy'),
  datedotus: numericDate('mdy'),
  dateyearmonthday: numericDate('ymd'),
  numdotdecimal: decimalNumber(',', '.'),
  numcommadot: decimalNumber(',', '.'),
  numcommadecimal: decimalNumber('.', ','),
  numdotcomma: decimalNumber('.', ','),
  fixedzero: zero,
  zerodash: zero,
  numdash: zero,
  nocontent: empty,
  fixedempty: empty,
};

export function normalizeFormatName(format: string): string {
  const local = format.includes(':') ? format.slice(format.indexOf(':') + 1) : format;
  return local.replace(/-/g, '').toLowerCase();
}

function lookup(format: string): Transform | undefined {
  const key = normalizeFormatName(format);
  return Object.hasOwn(TRANSFORMS, key) ? TRANSFORMS[key] : undefined;
}

export function applyTransform(format: string, text: string): TransformOutcome {
  const transform = lookup(format);
  if (!transform) return { ok: false, reason: 'unsupported' };
  const value = transform(text.trim());
  return value === undefined ? { ok: false, reason: 'invalid' } : { ok: true, value };
}
