/**
 * AAMVA Element Table
 * ===================
 * The closed set of data element IDs this decoder understands.
 * Any other three-letter ID in a payload is skipped by the tokenizer.
 *
 * To read a new element:
 *   1. Add its ID to ELEMENT_IDS
 *   2. Add a definition below
 *   3. Handle it in the extractor's switch (the compiler will insist)
 */

export const ELEMENT_IDS = [
  "DCS", "DAB", "DAC", "DCT", "DAD", "DAA",
  "DBB", "DBA", "DBD",
  "DAG", "DAI", "DAJ", "DAK",
  "DAQ", "DAU", "DAY",
] as const;

export type ElementId = typeof ELEMENT_IDS[number];

/** Semantic slot an element feeds */
export type IdentityField =
  | "lastName" | "firstName" | "middleName" | "fullName"
  | "dateOfBirth" | "expirationDate" | "issueDate"
  | "streetAddress" | "city" | "state" | "zipCode"
  | "licenseNumber" | "height" | "eyeColor";

export interface ElementDefinition {
  readonly id:          ElementId;
  readonly field:       IdentityField;
  readonly description: string;
  /** Superseded element kept for cards encoded against AAMVA 2000/2003 */
  readonly legacy?:     boolean;
}

const DEFINITIONS: ElementDefinition[] = [
  { id: "DCS", field: "lastName",       description: "Customer family name" },
  { id: "DAB", field: "lastName",       description: "Customer last name",  legacy: true },
  { id: "DAC", field: "firstName",      description: "Customer first name" },
  { id: "DCT", field: "firstName",      description: "Customer given names", legacy: true },
  { id: "DAD", field: "middleName",     description: "Customer middle name(s)" },
  { id: "DAA", field: "fullName",       description: "Customer full name — LAST,FIRST,MIDDLE" },
  { id: "DBB", field: "dateOfBirth",    description: "Date of birth" },
  { id: "DBA", field: "expirationDate", description: "Document expiration date" },
  { id: "DBD", field: "issueDate",      description: "Document issue date" },
  { id: "DAG", field: "streetAddress",  description: "Address — street 1" },
  { id: "DAI", field: "city",           description: "Address — city" },
  { id: "DAJ", field: "state",          description: "Address — jurisdiction code" },
  { id: "DAK", field: "zipCode",        description: "Address — postal code" },
  { id: "DAQ", field: "licenseNumber",  description: "Customer ID number" },
  { id: "DAU", field: "height",         description: "Physical description — height" },
  { id: "DAY", field: "eyeColor",       description: "Physical description — eye color" },
];

const TABLE: ReadonlyMap<string, ElementDefinition> = new Map<string, ElementDefinition>(
  DEFINITIONS.map(d => [d.id, Object.freeze(d)] as const)
);

// ── Public API ─────────────────────────────────────────────────────────────────

export function isElementId(code: string): code is ElementId {
  return TABLE.has(code);
}

/**
 * Definition for an element ID, or undefined for IDs outside the table.
 */
export function getElement(code: string): ElementDefinition | undefined {
  return TABLE.get(code);
}

export function listElements(): readonly ElementDefinition[] {
  return Array.from(TABLE.values());
}
