/**
 * idscan-cli
 * idscan <command> [options]
 *
 * Reads a DL/ID barcode payload from --file or stdin.
 */

import { parse, isAamvaError }           from "idscan-core";
import { verifyScan, parseIsoDate }      from "idscan-verify";
import { readFileSync }                  from "node:fs";
import { decodeEscapes, formatIdentity, formatVerifyResult } from "./format.js";

const args = process.argv.slice(2);
const cmd  = args[0];

function main() {
  switch (cmd) {
    case "decode": return cmdDecode();
    case "verify": return cmdVerify();
    case "help":
    default:       return cmdHelp();
  }
}

// ── decode ────────────────────────────────────────────────────────────────────

function cmdDecode() {
  const raw = readPayload();

  try {
    const identity = parse(raw, {
      dateOfBirth: args.includes("--lenient-dob") ? "lenient" : "strict",
    });

    if (args.includes("--json")) {
      console.log(JSON.stringify(identity, null, 2));
      return;
    }

    console.log("");
    console.log("🪪 Decoded ID");
    console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
    formatIdentity(identity).forEach(line => console.log(line));
    console.log("");
  } catch (e) {
    if (!isAamvaError(e)) throw e;
    console.error(`❌ ${e.message}`);
    console.error("   Re-scan the barcode and try again.");
    process.exit(1);
  }
}

// ── verify ────────────────────────────────────────────────────────────────────

function cmdVerify() {
  const raw      = readPayload();
  const asOfArg  = getArg("--as-of");
  const soonDays = parseInt(getArg("--expiring-days") ?? "30", 10);

  let asOf = new Date();
  if (asOfArg) {
    const d = parseIsoDate(asOfArg);
    if (!d) {
      console.error(`❌ --as-of must be YYYY-MM-DD, got "${asOfArg}"`);
      process.exit(1);
    }
    asOf = new Date(Date.UTC(d.year, d.month - 1, d.day));
  }
  if (Number.isNaN(soonDays) || soonDays < 0) {
    console.error("❌ --expiring-days must be a non-negative number");
    process.exit(1);
  }

  const result = verifyScan(raw, {
    asOf,
    expiringSoonDays: soonDays,
    verbose:          args.includes("--verbose"),
    dateOfBirth:      args.includes("--lenient-dob") ? "lenient" : "strict",
  });

  console.log("");
  formatVerifyResult(result).forEach(line => console.log(line));
  console.log("");

  if (!result.success) process.exit(1);
}

// ── help ──────────────────────────────────────────────────────────────────────

function cmdHelp() {
  console.log(`
idscan — AAMVA driver's license / ID barcode decoder

Commands:
  decode                   Print the identity carried by a barcode payload
  verify                   Decode, compute age and check expiration

Options:
  --file <path>            Read the payload from a file (default: stdin)
  --escaped                Payload is written with \\n, \\r, \\u001e escapes
  --lenient-dob            Leave an unreadable date of birth blank instead of failing
  --json                   (decode) Print the identity as JSON
  --as-of <YYYY-MM-DD>     (verify) Reference date, default today
  --expiring-days <n>      (verify) Days before expiration to warn, default 30
  --verbose                (verify) Progress on stderr
`);
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function readPayload(): string {
  const file = getArg("--file");
  const text = readFileSync(file ?? 0, "utf8");
  return args.includes("--escaped") ? decodeEscapes(text) : text;
}

function getArg(flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i !== -1 ? args[i + 1] : undefined;
}

try {
  main();
} catch (err) {
  console.error("❌ Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
}
