import { validateHeader }            from "./header.js";
import { tokenize }                  from "./tokenizer.js";
import { extract }                   from "./extractor.js";
import { AamvaError, isAamvaError }  from "./errors.js";
import type { DecodeOptions, ParsedIdentity } from "./types.js";

// ── Types ────────────────────────────────────────────────────────────────────

export type SafeParseResult =
  | { ok: true;  identity: ParsedIdentity }
  | { ok: false; error:    AamvaError };

// ── Decode ───────────────────────────────────────────────────────────────────

/**
 * Decodes the text of a PDF-417 DL/ID barcode into a normalized identity.
 * Pure and synchronous: no I/O, no shared state, safe to call concurrently.
 *
 * @throws AamvaError — EMPTY_INPUT / INVALID_FORMAT for payloads that are not
 *         DL/ID data, MISSING_NAME / INVALID_DATE_OF_BIRTH for cards that are
 *         but cannot yield an identity.
 */
export function parse(raw: string, opts: DecodeOptions = {}): ParsedIdentity {
  const { header, body } = validateHeader(raw);
  const identity         = extract(tokenize(body), header, opts);

  return opts.keepRaw ? Object.freeze({ ...identity, rawData: raw }) : identity;
}

/**
 * Same as parse(), but reports decoder failures as a value.
 * Errors that are not AamvaError (bugs) still throw.
 */
export function safeParse(raw: string, opts: DecodeOptions = {}): SafeParseResult {
  try {
    return { ok: true, identity: parse(raw, opts) };
  } catch (err) {
    if (isAamvaError(err)) return { ok: false, error: err };
    throw err;
  }
}

export { validateHeader, isLikelyAamva, isSubfileType } from "./header.js";
export { tokenize }                                      from "./tokenizer.js";
export { extract }                                       from "./extractor.js";
export { AamvaError, isAamvaError }                      from "./errors.js";
export type { AamvaErrorCode }                           from "./errors.js";
export { ELEMENT_IDS, isElementId, getElement, listElements } from "./elements.js";
export type { ElementId, ElementDefinition, IdentityField }   from "./elements.js";
export { normalizeName, splitFullName, isNamePlaceholder } from "./normalize/names.js";
export type { NameParts }                                from "./normalize/names.js";
export { resolveDate, daysInMonth, isLeapYear }          from "./normalize/dates.js";
export { normalizeAddress, normalizeCity, normalizeState, normalizeZip } from "./normalize/address.js";
export { AAMVA }                                         from "./protocol-constants.js";
export type { SubfileType }                              from "./protocol-constants.js";
export type {
  RawRecord, SubfileDesignator, IssuerHeader, ValidatedPayload,
  ParsedIdentity, DecodeOptions, DateOfBirthPolicy,
} from "./types.js";
