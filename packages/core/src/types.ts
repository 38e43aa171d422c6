/**
 * idscan decoder types
 * ====================
 * The decoded record handed to callers, the header metadata read on the way,
 * and the options that tune how strictly a payload is read.
 */

import type { SubfileType } from "./protocol-constants.js";
import type { ElementId }   from "./elements.js";

// ── Pipeline types ─────────────────────────────────────────────────────────────

/** One `elementId + value` record. Never escapes the pipeline. */
export interface RawRecord {
  elementId: ElementId;
  value:     string;
}

export interface SubfileDesignator {
  /** "DL", "ID", or a jurisdiction subfile such as "ZC" */
  type:   string;
  offset: number;
  length: number;
}

export interface IssuerHeader {
  /** Issuer Identification Number — six digits identifying the jurisdiction */
  iin: string;

  /** AAMVA standard version number the card was encoded against */
  aamvaVersion?: number;

  /** Jurisdiction-specific revision of the layout */
  jurisdictionVersion?: number;

  /** Number of subfile designators announced by the header */
  entries?: number;

  /** Designators that followed the version fields, in payload order */
  subfiles?: readonly SubfileDesignator[];

  /** DL or ID — the first standard subfile type found after the header */
  documentType?: SubfileType;
}

export interface ValidatedPayload {
  header: IssuerHeader;
  /** Everything after the header and subfile designators, ready for tokenizing */
  body:   string;
}

// ── Result ─────────────────────────────────────────────────────────────────────

export interface ParsedIdentity {
  readonly lastName:  string;
  readonly firstName: string;
  readonly middleName?: string;

  /** ISO 8601: YYYY-MM-DD */
  readonly dateOfBirth?: string;

  readonly streetAddress?: string;
  readonly city?:          string;
  /** Two-letter jurisdiction code, upper case */
  readonly state?:         string;
  readonly zipCode?:       string;

  /** Customer ID number (DAQ) */
  readonly licenseNumber?: string;

  readonly height?:   string;
  readonly eyeColor?: string;

  /** ISO 8601: YYYY-MM-DD */
  readonly expirationDate?: string;
  /** ISO 8601: YYYY-MM-DD */
  readonly issueDate?:      string;

  readonly issuer: Readonly<IssuerHeader>;

  /** Non-fatal notes — the identity is still usable */
  readonly warnings: readonly string[];

  /** Input payload, kept only when `keepRaw` is set */
  readonly rawData?: string;
}

// ── Options ────────────────────────────────────────────────────────────────────

/**
 * How a DBB value that resolves to no calendar date is treated.
 *   strict  — the whole decode fails with INVALID_DATE_OF_BIRTH
 *   lenient — dateOfBirth is left absent and a warning is recorded
 */
export type DateOfBirthPolicy = "strict" | "lenient";

export interface DecodeOptions {
  /** Default "strict" */
  dateOfBirth?: DateOfBirthPolicy;

  /** Copy the raw payload onto the result (debugging only — it holds PII) */
  keepRaw?: boolean;
}
