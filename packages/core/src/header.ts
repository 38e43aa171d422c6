import { AAMVA, type SubfileType } from "./protocol-constants.js";
import { AamvaError }               from "./errors.js";
import type { IssuerHeader, SubfileDesignator, ValidatedPayload } from "./types.js";

const IIN_PATTERN        = /^\d{6}$/;
// type(2) offset(4) length(4), e.g. "DL00410278"
const DESIGNATOR_PATTERN = /^([A-Z]{2})(\d{4})(\d{4})$/;
const DESIGNATOR_LENGTH  = 10;

export function isSubfileType(code: string): code is SubfileType {
  return AAMVA.SUBFILE_TYPES.some(t => t === code);
}

/**
 * Confirms the payload carries an AAMVA issuer header and returns the body that
 * follows the version fields and subfile designators.
 * Throws EMPTY_INPUT for "" and INVALID_FORMAT when no `ANSI ` + IIN starts
 * within the first HEADER_SEARCH_WINDOW characters.
 */
export function validateHeader(raw: string): ValidatedPayload {
  if (raw.length === 0) throw new AamvaError("EMPTY_INPUT");

  const markerAt = findIssuerMarker(raw);
  if (markerAt < 0) throw new AamvaError("INVALID_FORMAT");

  const iinStart = markerAt + AAMVA.ISSUER_MARKER.length;
  const iin      = raw.slice(iinStart, iinStart + AAMVA.IIN_LENGTH);
  const rest     = raw.slice(iinStart + AAMVA.IIN_LENGTH);

  const { fields, bodyStart } = readPreamble(rest);
  return { header: { iin, ...fields }, body: rest.slice(bodyStart) };
}

/**
 * Cheap pre-check for scanner loops: does this look like DL/ID data at all?
 * A true result does not mean parse() will succeed.
 */
export function isLikelyAamva(raw: string): boolean {
  return raw.startsWith(AAMVA.COMPLIANCE_INDICATOR) || findIssuerMarker(raw) >= 0;
}

function findIssuerMarker(raw: string): number {
  let at = raw.indexOf(AAMVA.ISSUER_MARKER);
  while (at >= 0 && at <= AAMVA.HEADER_SEARCH_WINDOW) {
    const iinStart = at + AAMVA.ISSUER_MARKER.length;
    if (IIN_PATTERN.test(raw.slice(iinStart, iinStart + AAMVA.IIN_LENGTH))) return at;
    at = raw.indexOf(AAMVA.ISSUER_MARKER, at + 1);
  }
  return -1;
}

// Version 01 headers carry version + entry count; later versions add a
// jurisdiction version between them. Truncated headers keep what is there.
function readPreamble(rest: string): { fields: Omit<IssuerHeader, "iin">; bodyStart: number } {
  const digits = rest.match(/^\d*/)?.[0] ?? "";
  const num    = (from: number) => parseInt(digits.slice(from, from + 2), 10);
  const fields: Omit<IssuerHeader, "iin"> = {};

  if (digits.length >= 6) {
    fields.aamvaVersion        = num(0);
    fields.jurisdictionVersion = num(2);
    fields.entries             = num(4);
  } else if (digits.length >= 4) {
    fields.aamvaVersion = num(0);
    fields.entries      = num(2);
  } else if (digits.length >= 2) {
    fields.aamvaVersion = num(0);
  }

  let at = Math.min(digits.length, 6);
  const subfiles: SubfileDesignator[] = [];
  for (let i = 0; i < (fields.entries ?? 0); i++) {
    const m = rest.slice(at, at + DESIGNATOR_LENGTH).match(DESIGNATOR_PATTERN);
    if (!m) break;
    subfiles.push({ type: m[1], offset: parseInt(m[2], 10), length: parseInt(m[3], 10) });
    at += DESIGNATOR_LENGTH;
  }
  if (subfiles.length > 0) fields.subfiles = subfiles;

  const documentType = subfiles.find(s => isSubfileType(s.type))?.type ?? rest.slice(at, at + 2);
  if (isSubfileType(documentType)) fields.documentType = documentType;

  return { fields, bodyStart: at };
}
