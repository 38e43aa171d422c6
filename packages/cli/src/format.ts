import type { ParsedIdentity } from "idscan-core";
import {
  fullDisplayName, formattedAddress, formattedDateOfBirth, describeStatus,
  type VerifyResult, type StepStatus,
} from "idscan-verify";

const LABEL_WIDTH = 14;
const INDENT      = "  ";

const ICONS: Record<StepStatus, string> = { ok: "✅", fail: "❌", skip: "⏭" };
type Step = keyof VerifyResult["steps"];

const STEP_ORDER: readonly Step[] = ["header", "decode", "date_of_birth", "license_status"];
const STEP_LABELS: Record<Step, string> = {
  header:         "Barcode header",
  decode:         "Identity fields",
  date_of_birth:  "Date of birth",
  license_status: "License expiration",
};

/**
 * Interprets \n, \r, \t, \\, \xHH and \uHHHH so a payload can be pasted as
 * one line of text. A single trailing line break (from the file) is dropped first.
 */
export function decodeEscapes(text: string): string {
  return text
    .replace(/\r?\n$/, "")
    .replace(/\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[nrt\\])/g, (_match: string, esc: string) => {
      switch (esc.charAt(0)) {
        case "u":
        case "x": return String.fromCharCode(parseInt(esc.slice(1), 16));
        case "n": return "\n";
        case "r": return "\r";
        case "t": return "\t";
        default:  return "\\";
      }
    });
}

export function row(label: string, value: string | undefined): string {
  const text = (value ?? "—").split("\n").join("\n" + " ".repeat(INDENT.length + LABEL_WIDTH));
  return `${INDENT}${`${label}:`.padEnd(LABEL_WIDTH)}${text}`;
}

export function formatIdentity(id: ParsedIdentity): string[] {
  const issuerNotes = [
    id.issuer.documentType,
    id.issuer.aamvaVersion !== undefined ? `AAMVA v${id.issuer.aamvaVersion}` : undefined,
  ].filter((n): n is string => n !== undefined);
  const issuer = issuerNotes.length > 0 ? `${id.issuer.iin} (${issuerNotes.join(", ")})` : id.issuer.iin;

  return [
    row("Name",    fullDisplayName(id)),
    row("Born",    formattedDateOfBirth(id)),
    row("Address", formattedAddress(id)),
    row("License", id.licenseNumber),
    row("Height",  id.height),
    row("Eyes",    id.eyeColor),
    row("Issued",  id.issueDate),
    row("Expires", id.expirationDate),
    row("Issuer",  issuer),
    ...id.warnings.map(w => `${INDENT}⚠ ${w}`),
  ];
}

export function formatVerifyResult(result: VerifyResult): string[] {
  const lines = ["Verification steps:"];
  for (const step of STEP_ORDER) {
    lines.push(`${INDENT}${ICONS[result.steps[step]]} ${STEP_LABELS[step]}`);
  }

  if (result.identity) {
    lines.push("", ...formatIdentity(result.identity));
    lines.push(row("Age", result.age !== undefined ? String(result.age) : undefined));
    if (result.status) lines.push(row("Status", describeStatus(result.status)));
  }

  for (const w of result.warnings) lines.push(`${INDENT}⚠ ${w.message} (${w.severity})`);
  if (result.errors.length > 0) {
    lines.push("", "❌ Verification failed:");
    result.errors.forEach(e => lines.push(`${INDENT} • ${e}`));
  }
  return lines;
}
