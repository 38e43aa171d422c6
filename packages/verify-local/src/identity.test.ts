import { expect } from "chai";
import {
  displayName, fullDisplayName, formattedAddress, formattedDateOfBirth, ageOn, parseIsoDate,
} from "./identity.js";

describe("identity helpers", function () {

  const asOf = new Date(Date.UTC(2025, 5, 15));   // 2025-06-15

  // ── Names ─────────────────────────────────────────────────────────────────

  it("joins display names", function () {
    const id = { firstName: "John", middleName: "Michael", lastName: "Johnson" };
    expect(displayName(id)).to.equal("John Johnson");
    expect(fullDisplayName(id)).to.equal("John Michael Johnson");
    expect(fullDisplayName({ firstName: "Jane", lastName: "Doe" })).to.equal("Jane Doe");
    expect(displayName({ firstName: "", lastName: "" })).to.equal("Unknown");
  });

  // ── Address ───────────────────────────────────────────────────────────────

  it("formats the address on two lines", function () {
    expect(formattedAddress({
      streetAddress: "123 Main St", city: "San Francisco", state: "CA", zipCode: "941100000",
    })).to.equal("123 Main St\nSan Francisco, CA, 941100000");
    expect(formattedAddress({ city: "Boston", state: "MA" })).to.equal("Boston, MA");
    expect(formattedAddress({})).to.equal(undefined);
  });

  // ── Dates ─────────────────────────────────────────────────────────────────

  it("formats the date of birth as printed on the card", function () {
    expect(formattedDateOfBirth({ dateOfBirth: "1990-01-15" })).to.equal("01/15/1990");
    expect(formattedDateOfBirth({})).to.equal(undefined);
  });

  it("counts completed years", function () {
    expect(ageOn("1990-01-15", asOf)).to.equal(35);
    expect(ageOn("1990-06-15", asOf)).to.equal(35);
    expect(ageOn("1990-06-16", asOf)).to.equal(34);
    expect(ageOn("2004-02-29", new Date(Date.UTC(2025, 1, 28)))).to.equal(20);
  });

  it("has no age before the date of birth", function () {
    expect(ageOn("2025-06-15", asOf)).to.equal(0);
    expect(ageOn("2025-06-16", asOf)).to.equal(undefined);
    expect(ageOn("2030-01-15", asOf)).to.equal(undefined);
  });

  it("rejects dates that are not calendar dates", function () {
    expect(ageOn("not-a-date", asOf)).to.equal(undefined);
    expect(parseIsoDate("1990-02-30")).to.equal(undefined);
    expect(parseIsoDate("2024-02-29")).to.deep.equal({ year: 2024, month: 2, day: 29 });
  });
});
