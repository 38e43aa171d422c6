import { parse, isAamvaError, type DecodeOptions, type ParsedIdentity } from "idscan-core";
import { ageOn }                                       from "./identity.js";
import {
  licenseStatus, isAcceptableStatus, describeStatus, reviewIdentity,
  type LicenseStatus, type VerificationWarning,
} from "./license-status.js";

export type StepStatus = "ok" | "fail" | "skip";

export interface VerifyOptions extends DecodeOptions {
  /** Reference instant for age and expiration; default now */
  asOf?:             Date;
  /** Default 30 */
  expiringSoonDays?: number;
  /** Progress lines on stderr */
  verbose?:          boolean;
}

export interface VerifyResult {
  success:   boolean;
  identity?: ParsedIdentity;
  age?:      number;
  status?:   LicenseStatus;
  warnings:  VerificationWarning[];
  errors:    string[];
  steps: {
    header:         StepStatus;
    decode:         StepStatus;
    date_of_birth:  StepStatus;
    license_status: StepStatus;
  };
}

/**
 * Runs a scanned payload through decoding and the document checks a
 * checkout counter needs: age from the date of birth and expiration status.
 *
 * `success` is false when a step fails — an unreadable barcode, a card
 * without a usable identity, or an expired card. What age is required is
 * left to the caller.
 */
export function verifyScan(raw: string, opts: VerifyOptions = {}): VerifyResult {
  const errors: string[] = [];
  const steps: VerifyResult["steps"] = {
    header:         "skip",
    decode:         "skip",
    date_of_birth:  "skip",
    license_status: "skip",
  };
  const log = (msg: string) => opts.verbose && process.stderr.write(`[idscan] ${msg}\n`);
  const asOf = opts.asOf ?? new Date();

  // ── STEP 1-2: Header + decode ─────────────────────────────────────────────
  log("Decoding barcode payload...");
  let identity: ParsedIdentity;
  try {
    identity = parse(raw, opts);
  } catch (err) {
    if (!isAamvaError(err)) throw err;
    errors.push(err.message);
    if (err.code === "EMPTY_INPUT" || err.code === "INVALID_FORMAT") {
      steps.header = "fail";
    } else {
      steps.header = "ok";
      steps.decode = "fail";
    }
    log(`✗ ${err.message}`);
    return { success: false, warnings: [], errors, steps };
  }
  steps.header = "ok";
  steps.decode = "ok";
  log(`✓ ${identity.issuer.documentType ?? "Document"} from issuer ${identity.issuer.iin}`);
  identity.warnings.forEach(w => log(`⚠ ${w}`));

  // ── STEP 3: Date of birth ─────────────────────────────────────────────────
  let age: number | undefined;
  if (identity.dateOfBirth) {
    age = ageOn(identity.dateOfBirth, asOf);
    steps.date_of_birth = age === undefined ? "fail" : "ok";
    if (age === undefined) errors.push("Date of birth could not be read");
    else log(`✓ Age ${age}`);
  } else {
    log("⏭ No date of birth on card");
  }

  // ── STEP 4: Expiration ────────────────────────────────────────────────────
  const statusOpts = { asOf, expiringSoonDays: opts.expiringSoonDays };
  const status     = licenseStatus(identity, statusOpts);
  if (status.kind === "unknown") {
    steps.license_status = "skip";
  } else if (isAcceptableStatus(status)) {
    steps.license_status = "ok";
  } else {
    steps.license_status = "fail";
    errors.push("Driver's license is expired");
  }
  log(`${steps.license_status === "fail" ? "✗" : "✓"} License status: ${describeStatus(status)}`);

  return {
    success:  errors.length === 0,
    identity,
    age,
    status,
    warnings: reviewIdentity(identity, statusOpts),
    errors,
    steps,
  };
}

export {
  displayName, fullDisplayName, formattedAddress, formattedDateOfBirth, ageOn, parseIsoDate,
} from "./identity.js";
export type { CalendarDate } from "./identity.js";
export { licenseStatus, isAcceptableStatus, describeStatus, reviewIdentity } from "./license-status.js";
export type {
  LicenseStatus, VerificationWarning, WarningCode, WarningSeverity, StatusOptions,
} from "./license-status.js";
