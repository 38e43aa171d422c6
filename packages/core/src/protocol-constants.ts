/**
 * AAMVA DL/ID Card Design Standard — wire constants
 *
 * Fixed by the standard, not by configuration. Every decoder stage reads
 * these values from here so the grammar lives in one place.
 *
 * Object.freeze() keeps them from being modified at runtime.
 */

export const AAMVA = Object.freeze({
  // ── Preamble ───────────────────────────────────────────────────────────────
  /** Compliance indicator, first byte of every conforming payload. */
  COMPLIANCE_INDICATOR: "@",

  /** File type marker that opens the issuer header. */
  ISSUER_MARKER: "ANSI ",

  /**
   * How far into the payload the issuer marker may start.
   * Scanners sometimes prepend a symbology identifier or stray bytes, so the
   * marker is searched for instead of expected at a fixed offset.
   */
  HEADER_SEARCH_WINDOW: 32,

  /** Issuer Identification Number, digits immediately after the marker. */
  IIN_LENGTH: 6,

  // ── Records ────────────────────────────────────────────────────────────────
  /** Segment terminator between data element records. */
  RECORD_SEPARATOR: "\r",

  /** Data element separator; some issuers delimit records with it instead. */
  ELEMENT_SEPARATOR: "\n",

  /** Every data element record starts with a three-letter element ID. */
  ELEMENT_ID_LENGTH: 3,

  /** Subfile types that may prefix the first record of a subfile. */
  SUBFILE_TYPES: ["DL", "ID"] as const,

  // ── Values ─────────────────────────────────────────────────────────────────
  /** Dates are eight digits, MMDDCCYY (US) or CCYYMMDD (Canada). */
  DATE_DIGITS: 8,

  /** Placeholders issuers write into name fields that have no value. */
  NAME_PLACEHOLDERS: ["NONE", "UNAVL", "UNAVAILABLE"] as const,
});

export type SubfileType = typeof AAMVA.SUBFILE_TYPES[number];
