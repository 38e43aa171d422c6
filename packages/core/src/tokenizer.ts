import { AAMVA }                       from "./protocol-constants.js";
import { isElementId }                 from "./elements.js";
import { isSubfileType }               from "./header.js";
import type { RawRecord }              from "./types.js";

const ID_LENGTH      = AAMVA.ELEMENT_ID_LENGTH;
const SUBFILE_LENGTH = 2;

/**
 * Splits a payload body into element records.
 *
 * Records end at CR or LF. Candidates shorter than an element ID, or whose
 * first three characters are not in the element table, are skipped: subfile
 * designator repeats, segment terminators and vendor padding all land there.
 *
 * The result is re-iterable; each iteration rescans `body` from the start.
 */
export function tokenize(body: string): Iterable<RawRecord> {
  return { [Symbol.iterator]: () => scanRecords(body) };
}

function* scanRecords(body: string): Generator<RawRecord, void, undefined> {
  let start = 0;
  while (start < body.length) {
    let end = start;
    while (end < body.length && !isBoundary(body.charAt(end))) end++;

    const record = readRecord(body, start, end);
    if (record) yield record;

    start = end + 1;
  }
}

function isBoundary(ch: string): boolean {
  return ch === AAMVA.RECORD_SEPARATOR || ch === AAMVA.ELEMENT_SEPARATOR;
}

function readRecord(body: string, start: number, end: number): RawRecord | undefined {
  let idAt = start;

  // First record of a subfile is glued to its type: "DLDAQ1234".
  if (
    end - start >= SUBFILE_LENGTH + ID_LENGTH &&
    isSubfileType(body.slice(start, start + SUBFILE_LENGTH)) &&
    isElementId(body.slice(start + SUBFILE_LENGTH, start + SUBFILE_LENGTH + ID_LENGTH))
  ) {
    idAt = start + SUBFILE_LENGTH;
  }

  if (end - idAt < ID_LENGTH) return undefined;

  const code = body.slice(idAt, idAt + ID_LENGTH);
  if (!isElementId(code)) return undefined;

  return { elementId: code, value: body.slice(idAt + ID_LENGTH, end) };
}
