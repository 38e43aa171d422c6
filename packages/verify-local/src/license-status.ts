import type { ParsedIdentity } from "idscan-core";
import { parseIsoDate }        from "./identity.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// ── Types ─────────────────────────────────────────────────────────────────────

export type LicenseStatus =
  | { kind: "valid" }
  | { kind: "expired";      expiredOn: string }
  | { kind: "expiringSoon"; daysRemaining: number }
  | { kind: "unknown" };

export type WarningSeverity = "low" | "medium" | "high";

export type WarningCode =
  | "missingDateOfBirth"
  | "licenseExpired"
  | "licenseExpiringSoon"
  | "unknownLicenseStatus";

export interface VerificationWarning {
  code:     WarningCode;
  severity: WarningSeverity;
  message:  string;
}

export interface StatusOptions {
  /** Reference instant; default now */
  asOf?:             Date;
  /** Days before expiration that count as "expiring soon"; default 30 */
  expiringSoonDays?: number;
}

// ── Status ────────────────────────────────────────────────────────────────────

/**
 * Where the document stands relative to its expiration date.
 * A card is valid through the last day printed on it.
 */
export function licenseStatus(
  id:   Pick<ParsedIdentity, "expirationDate">,
  opts: StatusOptions = {}
): LicenseStatus {
  const expiration = id.expirationDate;
  const exp        = expiration ? parseIsoDate(expiration) : undefined;
  if (!expiration || !exp) return { kind: "unknown" };

  const asOf  = opts.asOf ?? new Date();
  const today = Date.UTC(asOf.getUTCFullYear(), asOf.getUTCMonth(), asOf.getUTCDate());
  const days  = Math.round((Date.UTC(exp.year, exp.month - 1, exp.day) - today) / DAY_MS);

  if (days < 0) return { kind: "expired", expiredOn: expiration };
  if (days <= (opts.expiringSoonDays ?? 30)) return { kind: "expiringSoon", daysRemaining: days };
  return { kind: "valid" };
}

export function isAcceptableStatus(status: LicenseStatus): boolean {
  return status.kind === "valid" || status.kind === "expiringSoon";
}

export function describeStatus(status: LicenseStatus): string {
  switch (status.kind) {
    case "valid":        return "Valid";
    case "expired":      return `Expired ${status.expiredOn}`;
    case "expiringSoon": return `Expires in ${status.daysRemaining} days`;
    case "unknown":      return "Unknown";
  }
}

// ── Review ────────────────────────────────────────────────────────────────────

/**
 * Things a clerk should look at before accepting the card.
 * Nothing here rejects the card; the caller weighs the severities.
 */
export function reviewIdentity(
  id:   Pick<ParsedIdentity, "dateOfBirth" | "expirationDate">,
  opts: StatusOptions = {}
): VerificationWarning[] {
  const warnings: VerificationWarning[] = [];

  if (!id.dateOfBirth) {
    warnings.push({ code: "missingDateOfBirth", severity: "high", message: "Date of birth not found on ID" });
  }

  const status = licenseStatus(id, opts);
  switch (status.kind) {
    case "expired":
      warnings.push({ code: "licenseExpired", severity: "medium", message: "Driver's license is expired" });
      break;
    case "expiringSoon":
      warnings.push({
        code:     "licenseExpiringSoon",
        severity: "low",
        message:  `License expires in ${status.daysRemaining} days`,
      });
      break;
    case "unknown":
      warnings.push({ code: "unknownLicenseStatus", severity: "low", message: "Could not verify license expiration" });
      break;
    case "valid":
      break;
  }

  return warnings;
}
