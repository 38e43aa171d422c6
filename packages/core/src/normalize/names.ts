import { AAMVA } from "../protocol-constants.js";

// Lower-cased only after the first word: "DE LA CRUZ" → "De la Cruz", "DE" → "De".
const PARTICLES       = new Set(["de", "la", "le", "da", "di", "du", "del", "der", "van", "von"]);
const ROMAN_SUFFIXES  = new Set(["ii", "iii", "iv"]);
const MC_PREFIX       = "mc";

export interface NameParts {
  last:    string;
  first:   string;
  middle?: string;
}

/**
 * Renders an upper-case AAMVA name in conventional mixed case.
 *   MCDONALD → McDonald, O'BRIEN → O'Brien, SMITH-JONES → Smith-Jones
 * Idempotent: normalizeName(normalizeName(x)) === normalizeName(x).
 */
export function normalizeName(raw: string): string {
  return raw
    .trim()
    .split(/\s+/)
    .filter(w => w.length > 0)
    .map((word, i) => caseWord(word, i === 0))
    .join(" ");
}

/**
 * Splits a DAA composite name. Accepts LAST,FIRST,MIDDLE and LAST,FIRST MIDDLE.
 * Returns undefined when either the last or the first name is missing.
 */
export function splitFullName(composite: string): NameParts | undefined {
  const parts = composite.split(",").map(p => p.trim());
  const [last = "", firstSegment = ""] = parts;
  let middle = parts[2] ?? "";
  let first  = firstSegment;

  if (parts.length === 2) {
    const words = firstSegment.split(/\s+/);
    first  = words[0] ?? "";
    middle = words.slice(1).join(" ");
  }

  if (!last || !first) return undefined;

  const name: NameParts = { last: normalizeName(last), first: normalizeName(first) };
  if (middle && !isNamePlaceholder(middle)) name.middle = normalizeName(middle);
  return name;
}

/** NONE / UNAVL and friends mark a field the issuer had no value for. */
export function isNamePlaceholder(value: string): boolean {
  const upper = value.trim().toUpperCase();
  return AAMVA.NAME_PLACEHOLDERS.some(p => p === upper);
}

function caseWord(word: string, leading: boolean): string {
  const lower = word.toLowerCase();
  if (!leading && PARTICLES.has(lower))      return lower;
  if (!leading && ROMAN_SUFFIXES.has(lower)) return lower.toUpperCase();

  return lower
    .split("-")
    .map(part => part.split("'").map(caseSegment).join("'"))
    .join("-");
}

function caseSegment(segment: string): string {
  if (segment.length > MC_PREFIX.length && segment.startsWith(MC_PREFIX)) {
    return "Mc" + capitalize(segment.slice(MC_PREFIX.length));
  }
  return capitalize(segment);
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
