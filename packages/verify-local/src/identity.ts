/**
 * Presentation helpers over a decoded identity.
 * None of these apply business rules; they only reshape what the card says.
 */

import { daysInMonth, type ParsedIdentity } from "idscan-core";

export interface CalendarDate {
  year:  number;
  month: number;   // 1-12
  day:   number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** "John Johnson", or "Unknown" when the card carries no name */
export function displayName(id: Pick<ParsedIdentity, "firstName" | "lastName">): string {
  return joinName([id.firstName, id.lastName]);
}

/** "John Michael Johnson" */
export function fullDisplayName(
  id: Pick<ParsedIdentity, "firstName" | "middleName" | "lastName">
): string {
  return joinName([id.firstName, id.middleName, id.lastName]);
}

/**
 * Street on the first line, "City, ST, ZIP" on the second.
 * Undefined when the card has no address elements at all.
 */
export function formattedAddress(
  id: Pick<ParsedIdentity, "streetAddress" | "city" | "state" | "zipCode">
): string | undefined {
  const lines: string[] = [];
  if (id.streetAddress) lines.push(id.streetAddress);

  const cityStateZip = [id.city, id.state, id.zipCode].filter(isPresent);
  if (cityStateZip.length > 0) lines.push(cityStateZip.join(", "));

  return lines.length > 0 ? lines.join("\n") : undefined;
}

/** MM/DD/YYYY, as printed on US cards */
export function formattedDateOfBirth(id: Pick<ParsedIdentity, "dateOfBirth">): string | undefined {
  const dob = id.dateOfBirth ? parseIsoDate(id.dateOfBirth) : undefined;
  if (!dob) return undefined;
  return `${pad(dob.month)}/${pad(dob.day)}/${dob.year}`;
}

/**
 * Completed years between `dateOfBirth` (YYYY-MM-DD) and `asOf`, on the UTC calendar.
 * Undefined when `asOf` falls before the date of birth.
 * Whoever calls this decides what age is old enough.
 */
export function ageOn(dateOfBirth: string, asOf: Date = new Date()): number | undefined {
  const dob = parseIsoDate(dateOfBirth);
  if (!dob) return undefined;

  let age = asOf.getUTCFullYear() - dob.year;
  const month = asOf.getUTCMonth() + 1;
  if (month < dob.month || (month === dob.month && asOf.getUTCDate() < dob.day)) age--;

  return age >= 0 ? age : undefined;
}

export function parseIsoDate(value: string): CalendarDate | undefined {
  const m = ISO_DATE.exec(value);
  if (!m) return undefined;

  const year  = parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const day   = parseInt(m[3], 10);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;

  return { year, month, day };
}

function joinName(parts: Array<string | undefined>): string {
  const present = parts.filter(isPresent);
  return present.length > 0 ? present.join(" ") : "Unknown";
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.length > 0;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}
