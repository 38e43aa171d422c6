import { expect } from "chai";
import { resolveDate, daysInMonth, isLeapYear } from "./dates.js";

describe("resolveDate", function () {

  it("reads MMDDCCYY first", function () {
    expect(resolveDate("12251995")).to.equal("1995-12-25");
    expect(resolveDate("01151990")).to.equal("1990-01-15");
  });

  it("falls back to CCYYMMDD when MMDDCCYY is not a date", function () {
    expect(resolveDate("19950101")).to.equal("1995-01-01");
    expect(resolveDate("20101231")).to.equal("2010-12-31");
  });

  it("checks the day against the real month length", function () {
    expect(resolveDate("02292020")).to.equal("2020-02-29");
    expect(resolveDate("02292019")).to.equal(undefined);
    expect(resolveDate("04312000")).to.equal(undefined);
  });

  it("returns undefined when neither layout holds", function () {
    expect(resolveDate("13452001")).to.equal(undefined);
    expect(resolveDate("00000000")).to.equal(undefined);
  });

  it("ignores separators but requires eight digits", function () {
    expect(resolveDate("01/15/1990")).to.equal("1990-01-15");
    expect(resolveDate("0115199")).to.equal(undefined);
    expect(resolveDate("")).to.equal(undefined);
  });
});

describe("calendar helpers", function () {
  it("follows the Gregorian leap year rule", function () {
    expect(isLeapYear(2000)).to.equal(true);
    expect(isLeapYear(1900)).to.equal(false);
    expect(isLeapYear(2024)).to.equal(true);
    expect(daysInMonth(1900, 2)).to.equal(28);
    expect(daysInMonth(2024, 2)).to.equal(29);
    expect(daysInMonth(2024, 13)).to.equal(0);
  });
});
