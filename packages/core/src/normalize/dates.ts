import { AAMVA } from "../protocol-constants.js";

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Resolves an AAMVA date to ISO 8601 (YYYY-MM-DD).
 *
 * The standard leaves the layout to the issuer: US cards use MMDDCCYY,
 * Canadian cards CCYYMMDD. MMDDCCYY is tried first; CCYYMMDD only when the
 * first reading is not a real calendar date. Non-digits are ignored, so
 * "01/15/1990" resolves too. Returns undefined when neither reading holds.
 */
export function resolveDate(raw: string): string | undefined {
  const digits = raw.replace(/\D/g, "");
  if (digits.length !== AAMVA.DATE_DIGITS) return undefined;

  return (
    calendarDate(digits.slice(4, 8), digits.slice(0, 2), digits.slice(2, 4)) ??
    calendarDate(digits.slice(0, 4), digits.slice(4, 6), digits.slice(6, 8))
  );
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_DAYS[month - 1] ?? 0;
}

function calendarDate(yyyy: string, mm: string, dd: string): string | undefined {
  const year  = parseInt(yyyy, 10);
  const month = parseInt(mm, 10);
  const day   = parseInt(dd, 10);

  if (month < 1 || month > 12)                    return undefined;
  if (day < 1 || day > daysInMonth(year, month))  return undefined;

  return `${yyyy}-${mm}-${dd}`;
}
