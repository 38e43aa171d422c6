import { expect } from "chai";
import { normalizeAddress, normalizeCity, normalizeState, normalizeZip } from "./address.js";

describe("address normalizers", function () {

  it("title-cases street words and keeps postal abbreviations", function () {
    expect(normalizeAddress("123 MAIN ST")).to.equal("123 Main St");
    expect(normalizeAddress("400 W 2ND AVE. APT 4B")).to.equal("400 W 2nd Ave Apt 4B");
    expect(normalizeAddress("PO BOX 12")).to.equal("PO Box 12");
    expect(normalizeAddress("9 OCEAN PKWY NE")).to.equal("9 Ocean Pkwy NE");
  });

  it("title-cases cities", function () {
    expect(normalizeCity("SAN FRANCISCO")).to.equal("San Francisco");
    expect(normalizeCity("WINSTON-SALEM")).to.equal("Winston-Salem");
  });

  it("upper-cases the jurisdiction code", function () {
    expect(normalizeState(" ca ")).to.equal("CA");
  });

  it("removes postal code padding without reformatting", function () {
    expect(normalizeZip("941102345 ")).to.equal("941102345");
    expect(normalizeZip("94110    ")).to.equal("94110");
    expect(normalizeZip(" K1A 0B1 ")).to.equal("K1A 0B1");
  });
});
