import { expect } from "chai";
import { normalizeName, splitFullName, isNamePlaceholder } from "./names.js";

describe("normalizeName", function () {

  it("title-cases upper-case names", function () {
    expect(normalizeName("JOHNSON")).to.equal("Johnson");
    expect(normalizeName("  MARY   ANN ")).to.equal("Mary Ann");
    expect(normalizeName("SMITH-JONES")).to.equal("Smith-Jones");
  });

  it("capitalizes after Mc and apostrophes", function () {
    expect(normalizeName("MCDONALD")).to.equal("McDonald");
    expect(normalizeName("O'BRIEN")).to.equal("O'Brien");
    expect(normalizeName("D'ANGELO-MCKAY")).to.equal("D'Angelo-McKay");
    expect(normalizeName("MC")).to.equal("Mc");
  });

  it("lower-cases particles and keeps generational suffixes after the first word", function () {
    expect(normalizeName("DE LA CRUZ")).to.equal("De la Cruz");
    expect(normalizeName("VAN")).to.equal("Van");
    expect(normalizeName("HENRY III")).to.equal("Henry III");
  });

  it("is idempotent", function () {
    for (const raw of ["MCDONALD", "O'BRIEN", "DE LA CRUZ", "SMITH-JONES", "HENRY III", "JOHNSON"]) {
      const once = normalizeName(raw);
      expect(normalizeName(once)).to.equal(once);
    }
  });

  it("returns an empty string for blank input", function () {
    expect(normalizeName("   ")).to.equal("");
  });
});

describe("splitFullName", function () {

  it("maps LAST,FIRST,MIDDLE positionally", function () {
    expect(splitFullName("JOHNSON,JOHN,MICHAEL")).to.deep.equal({
      last: "Johnson", first: "John", middle: "Michael",
    });
  });

  it("reads LAST,FIRST MIDDLE", function () {
    expect(splitFullName("JOHNSON,JOHN MICHAEL")).to.deep.equal({
      last: "Johnson", first: "John", middle: "Michael",
    });
  });

  it("leaves the middle name absent when there is none", function () {
    expect(splitFullName("JOHNSON,JOHN")).to.deep.equal({ last: "Johnson", first: "John" });
    expect(splitFullName("JOHNSON, JOHN ,NONE")).to.deep.equal({ last: "Johnson", first: "John" });
  });

  it("gives up without a first name", function () {
    expect(splitFullName("JOHNSON")).to.equal(undefined);
    expect(splitFullName(",JOHN")).to.equal(undefined);
  });
});

describe("isNamePlaceholder", function () {
  it("matches the issuer placeholders in any case", function () {
    expect(isNamePlaceholder("NONE")).to.equal(true);
    expect(isNamePlaceholder(" unavl ")).to.equal(true);
    expect(isNamePlaceholder("NONA")).to.equal(false);
  });
});
