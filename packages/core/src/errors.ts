export type AamvaErrorCode =
  | "EMPTY_INPUT"
  | "INVALID_FORMAT"
  | "MISSING_NAME"
  | "INVALID_DATE_OF_BIRTH";

const MESSAGES: Record<AamvaErrorCode, string> = {
  EMPTY_INPUT:           "No barcode data provided",
  INVALID_FORMAT:        "Invalid AAMVA barcode format - missing ANSI header",
  MISSING_NAME:          "Barcode does not carry a first and last name",
  INVALID_DATE_OF_BIRTH: "Date of birth is not a valid calendar date",
};

/**
 * Typed failure of the decoder.
 * Header failures are permanent for the payload; the caller decides whether to re-scan.
 */
export class AamvaError extends Error {
  readonly code: AamvaErrorCode;

  constructor(code: AamvaErrorCode, detail?: string) {
    super(detail ? `${MESSAGES[code]}: ${detail}` : MESSAGES[code]);
    this.name = "AamvaError";
    this.code = code;
  }
}

export function isAamvaError(err: unknown): err is AamvaError {
  return err instanceof AamvaError;
}
