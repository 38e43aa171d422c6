import type { ElementId }                     from "./elements.js";
import { AamvaError }                         from "./errors.js";
import { normalizeName, splitFullName, isNamePlaceholder, type NameParts } from "./normalize/names.js";
import { resolveDate }                        from "./normalize/dates.js";
import { normalizeAddress, normalizeCity, normalizeState, normalizeZip } from "./normalize/address.js";
import type { DecodeOptions, IssuerHeader, ParsedIdentity, RawRecord } from "./types.js";

type Writable<T> = { -readonly [K in keyof T]: T[K] };

/** Field values as read from the records, before fallbacks are applied */
interface Draft {
  lastName?:        string;
  legacyLastName?:  string;
  firstName?:       string;
  legacyFirstName?: string;
  middleName?:      string;
  fullName?:        NameParts;
  dateOfBirth?:     string;
  expirationDate?:  string;
  issueDate?:       string;
  streetAddress?:   string;
  city?:            string;
  state?:           string;
  zipCode?:         string;
  licenseNumber?:   string;
  height?:          string;
  eyeColor?:        string;
}

/**
 * Maps element records onto a ParsedIdentity.
 *
 * A missing element is an absent field. Failures here:
 *   INVALID_FORMAT         no recognized record at all
 *   MISSING_NAME           no derivable first + last name
 *   INVALID_DATE_OF_BIRTH  unreadable DBB under the strict policy
 */
export function extract(
  records: Iterable<RawRecord>,
  header:  IssuerHeader,
  opts:    DecodeOptions = {}
): ParsedIdentity {
  const values = new Map<ElementId, string>();
  for (const { elementId, value } of records) values.set(elementId, value);

  if (values.size === 0) {
    throw new AamvaError("INVALID_FORMAT", "no data element records after the header");
  }

  const warnings: string[] = [];
  const draft: Draft = {};

  for (const [id, raw] of values) {
    const value = raw.trim();
    if (!value) continue;

    switch (id) {
      case "DCS": draft.lastName        = readName(value); break;
      case "DAB": draft.legacyLastName  = readName(value); break;
      case "DAC": draft.firstName       = readName(value); break;
      case "DCT": draft.legacyFirstName = readName(value); break;
      case "DAD": {
        // Several middle names are comma separated: MARY,ANN
        const names = value.split(",").map(readName).filter((n): n is string => n !== undefined);
        if (names.length > 0) draft.middleName = names.join(" ");
        break;
      }
      case "DAA": {
        const parts = splitFullName(value);
        if (parts) draft.fullName = parts;
        else warnings.push("DAA full name is not LAST,FIRST[,MIDDLE]; ignored");
        break;
      }
      case "DBB": draft.dateOfBirth    = value; break;
      case "DBA": draft.expirationDate = value; break;
      case "DBD": draft.issueDate      = value; break;
      case "DAG": draft.streetAddress  = normalizeAddress(value); break;
      case "DAI": draft.city           = normalizeCity(value); break;
      case "DAJ": draft.state          = normalizeState(value); break;
      case "DAK": draft.zipCode        = normalizeZip(value); break;
      case "DAQ": draft.licenseNumber  = value; break;
      case "DAU": draft.height         = value; break;
      case "DAY": draft.eyeColor       = value; break;
      default: {
        const unhandled: never = id;
        throw new Error(`Element ${String(unhandled)} has no field mapping`);
      }
    }
  }

  const lastName  = draft.lastName  ?? draft.legacyLastName  ?? draft.fullName?.last;
  const firstName = draft.firstName ?? draft.legacyFirstName ?? draft.fullName?.first;
  if (!lastName || !firstName) {
    throw new AamvaError("MISSING_NAME", "neither DCS/DAC nor DAA yield a first and last name");
  }

  const identity: Writable<ParsedIdentity> = {
    lastName,
    firstName,
    issuer:   freezeIssuer(header),
    warnings: [],
  };

  const middleName = draft.middleName ?? draft.fullName?.middle;
  if (middleName) identity.middleName = middleName;

  if (draft.dateOfBirth !== undefined) {
    const dob = resolveDate(draft.dateOfBirth);
    if (dob) {
      identity.dateOfBirth = dob;
    } else if ((opts.dateOfBirth ?? "strict") === "strict") {
      throw new AamvaError("INVALID_DATE_OF_BIRTH", "DBB is neither MMDDCCYY nor CCYYMMDD");
    } else {
      warnings.push("DBB is neither MMDDCCYY nor CCYYMMDD; date of birth left blank");
    }
  }

  const expirationDate = resolveOptionalDate("DBA", draft.expirationDate, warnings);
  if (expirationDate) identity.expirationDate = expirationDate;

  const issueDate = resolveOptionalDate("DBD", draft.issueDate, warnings);
  if (issueDate) identity.issueDate = issueDate;

  if (draft.streetAddress) identity.streetAddress = draft.streetAddress;
  if (draft.city)          identity.city          = draft.city;
  if (draft.state)         identity.state         = draft.state;
  if (draft.zipCode)       identity.zipCode       = draft.zipCode;
  if (draft.licenseNumber) identity.licenseNumber = draft.licenseNumber;
  if (draft.height)        identity.height        = draft.height;
  if (draft.eyeColor)      identity.eyeColor      = draft.eyeColor;

  identity.warnings = Object.freeze(warnings);
  return Object.freeze(identity);
}

function resolveOptionalDate(
  id:       ElementId,
  raw:      string | undefined,
  warnings: string[]
): string | undefined {
  if (raw === undefined) return undefined;
  const date = resolveDate(raw);
  if (!date) warnings.push(`${id} is neither MMDDCCYY nor CCYYMMDD; ignored`);
  return date;
}

/** NONE / UNAVL read as no name at all */
function readName(value: string): string | undefined {
  const name = value.trim();
  if (!name || isNamePlaceholder(name)) return undefined;
  return normalizeName(name);
}

function freezeIssuer(header: IssuerHeader): Readonly<IssuerHeader> {
  const { subfiles, ...fields } = header;
  if (!subfiles) return Object.freeze(fields);
  return Object.freeze({
    ...fields,
    subfiles: Object.freeze(subfiles.map(s => Object.freeze({ ...s }))),
  });
}
