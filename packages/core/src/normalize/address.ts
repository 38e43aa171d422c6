// Street suffixes, unit designators and directionals keep their postal spelling.
const STREET_ABBREVIATIONS: Record<string, string> = {
  st: "St", ave: "Ave", blvd: "Blvd", dr: "Dr", ln: "Ln", rd: "Rd",
  ct: "Ct", pl: "Pl", cir: "Cir", pkwy: "Pkwy", hwy: "Hwy", ter: "Ter",
  apt: "Apt", ste: "Ste", fl: "Fl", po: "PO",
  n: "N", s: "S", e: "E", w: "W",
  ne: "NE", nw: "NW", se: "SE", sw: "SW",
};

const ORDINAL = /^\d+(st|nd|rd|th)$/;

/** "123 MAIN ST." → "123 Main St", "400 W 2ND AVE APT 4B" → "400 W 2nd Ave Apt 4B" */
export function normalizeAddress(raw: string): string {
  return words(raw)
    .map(word => {
      const bare = word.toLowerCase().replace(/\./g, "");
      const abbr = STREET_ABBREVIATIONS[bare];
      if (abbr)                 return abbr;
      if (ORDINAL.test(bare))   return bare;
      if (/\d/.test(bare))      return bare.toUpperCase();
      return titleCase(bare);
    })
    .filter(w => w.length > 0)
    .join(" ");
}

/** "SAN FRANCISCO" → "San Francisco", "WINSTON-SALEM" → "Winston-Salem" */
export function normalizeCity(raw: string): string {
  return words(raw).map(w => titleCase(w.toLowerCase())).join(" ");
}

export function normalizeState(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Postal codes are space-padded to a fixed width: "941100000 ".
 * Only the padding goes; digits are not reformatted.
 */
export function normalizeZip(raw: string): string {
  return raw.trim();
}

function words(raw: string): string[] {
  return raw.trim().split(/\s+/).filter(w => w.length > 0);
}

function titleCase(lower: string): string {
  return lower
    .split("-")
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join("-");
}
