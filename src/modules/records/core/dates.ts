import type { CenturyRule, DateFormat } from './types.js';

const ISO_DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH_RE = /^(\d{4})-(\d{2})$/;

/** Card values that stand for "not recorded". */
export const MISSING_MARKERS: ReadonlySet<string> = new Set(['', '&', '9']);

export const isMissingMarker = (raw: string): boolean => MISSING_MARKERS.has(raw.trim());

interface DateParts {
  yy: number;
  month: number;
  day?: number;
}

const splitDigits = (digits: string, format: DateFormat): DateParts | null => {
  if (format === 'MDDYY') {
    if (digits.length === 5) {
      return {
        month: Number(digits.slice(0, 1)),
        day: Number(digits.slice(1, 3)),
        yy: Number(digits.slice(3, 5)),
      };
    }
    if (digits.length === 6) {
      return {
        month: Number(digits.slice(0, 2)),
        day: Number(digits.slice(2, 4)),
        yy: Number(digits.slice(4, 6)),
      };
    }
    return null;
  }

  if (digits.length === 3) {
    return { month: Number(digits.slice(0, 1)), yy: Number(digits.slice(1, 3)) };
  }
  if (digits.length === 4) {
    return { month: Number(digits.slice(0, 2)), yy: Number(digits.slice(2, 4)) };
  }
  return null;
};

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

export const isValidCalendarDate = (year: number, month: number, day: number): boolean => {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const isAlreadyNormalized = (value: string, format: DateFormat): boolean => {
  if (format === 'MDDYY') {
    const match = ISO_DAY_RE.exec(value);
    return (
      match !== null && isValidCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))
    );
  }

  const match = ISO_MONTH_RE.exec(value);
  if (match === null) return false;
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
};

/**
 * Expands a two-digit year.
 * Relative expansion places years later than the reference year in the 1800s,
 * since nobody is received before being born.
 */
export const expandYear = (
  yy: number,
  rule: CenturyRule,
  referenceYear?: number
): number | null => {
  if (rule === 'fixed-1900') {
    return 1900 + yy;
  }

  if (referenceYear === undefined) {
    return null;
  }

  return yy > referenceYear % 100 ? 1800 + yy : 1900 + yy;
};

/**
 * Normalizes a card date to `YYYY-MM-DD` (MDDYY) or `YYYY-MM` (MYY).
 *
 * Returns '' for missing markers, digit counts the format does not allow,
 * impossible calendar dates, and relative years without a reference year.
 * Values already in the target form are returned unchanged.
 */
export const normalizeDate = (
  raw: string,
  format: DateFormat,
  century: CenturyRule = 'fixed-1900',
  referenceYear?: number
): string => {
  const cleaned = raw.trim();
  if (MISSING_MARKERS.has(cleaned)) {
    return '';
  }

  if (isAlreadyNormalized(cleaned, format)) {
    return cleaned;
  }

  const parts = splitDigits(cleaned.replace(/\D/g, ''), format);
  if (parts === null) {
    return '';
  }

  const year = expandYear(parts.yy, century, referenceYear);
  if (year === null) {
    return '';
  }

  if (parts.day === undefined) {
    if (parts.month < 1 || parts.month > 12) return '';
    return `${pad(year, 4)}-${pad(parts.month, 2)}`;
  }

  if (!isValidCalendarDate(year, parts.month, parts.day)) {
    return '';
  }

  return `${pad(year, 4)}-${pad(parts.month, 2)}-${pad(parts.day, 2)}`;
};

/**
 * Year of an ISO date string, or undefined when the value is not one.
 */
export const isoYear = (value: string): number | undefined => {
  const match = /^(\d{4})-\d{2}(-\d{2})?$/.exec(value);
  return match === null ? undefined : Number(match[1]);
};
