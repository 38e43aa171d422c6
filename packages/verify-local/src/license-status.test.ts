import { expect } from "chai";
import { licenseStatus, isAcceptableStatus, describeStatus, reviewIdentity } from "./license-status.js";

describe("licenseStatus", function () {

  const asOf = new Date(Date.UTC(2025, 5, 15, 18, 30));   // 2025-06-15 18:30 UTC

  it("is valid well before expiration", function () {
    expect(licenseStatus({ expirationDate: "2030-01-15" }, { asOf })).to.deep.equal({ kind: "valid" });
  });

  it("flags cards inside the expiring-soon window", function () {
    expect(licenseStatus({ expirationDate: "2025-06-20" }, { asOf }))
      .to.deep.equal({ kind: "expiringSoon", daysRemaining: 5 });
    expect(licenseStatus({ expirationDate: "2025-07-15" }, { asOf }))
      .to.deep.equal({ kind: "expiringSoon", daysRemaining: 30 });
    expect(licenseStatus({ expirationDate: "2025-06-20" }, { asOf, expiringSoonDays: 3 }))
      .to.deep.equal({ kind: "valid" });
  });

  it("keeps a card valid through its expiration day", function () {
    expect(licenseStatus({ expirationDate: "2025-06-15" }, { asOf }))
      .to.deep.equal({ kind: "expiringSoon", daysRemaining: 0 });
    expect(licenseStatus({ expirationDate: "2025-06-14" }, { asOf }))
      .to.deep.equal({ kind: "expired", expiredOn: "2025-06-14" });
  });

  it("is unknown without an expiration date", function () {
    expect(licenseStatus({}, { asOf })).to.deep.equal({ kind: "unknown" });
  });

  it("accepts valid and expiring-soon cards only", function () {
    expect(isAcceptableStatus({ kind: "valid" })).to.equal(true);
    expect(isAcceptableStatus({ kind: "expiringSoon", daysRemaining: 2 })).to.equal(true);
    expect(isAcceptableStatus({ kind: "expired", expiredOn: "2020-01-01" })).to.equal(false);
    expect(isAcceptableStatus({ kind: "unknown" })).to.equal(false);
  });

  it("describes each status", function () {
    expect(describeStatus({ kind: "expired", expiredOn: "2020-01-01" })).to.equal("Expired 2020-01-01");
    expect(describeStatus({ kind: "expiringSoon", daysRemaining: 2 })).to.equal("Expires in 2 days");
  });
});

describe("reviewIdentity", function () {

  const asOf = new Date(Date.UTC(2025, 5, 15));

  it("raises nothing for a complete, current card", function () {
    expect(reviewIdentity({ dateOfBirth: "1990-01-15", expirationDate: "2030-01-15" }, { asOf }))
      .to.deep.equal([]);
  });

  it("reports a missing date of birth and an unknown expiration", function () {
    expect(reviewIdentity({}, { asOf })).to.deep.equal([
      { code: "missingDateOfBirth",   severity: "high", message: "Date of birth not found on ID" },
      { code: "unknownLicenseStatus", severity: "low",  message: "Could not verify license expiration" },
    ]);
  });

  it("reports an expired card", function () {
    expect(reviewIdentity({ dateOfBirth: "1990-01-15", expirationDate: "2020-01-15" }, { asOf }))
      .to.deep.equal([{ code: "licenseExpired", severity: "medium", message: "Driver's license is expired" }]);
  });

  it("reports a card about to expire", function () {
    expect(reviewIdentity({ dateOfBirth: "1990-01-15", expirationDate: "2025-06-25" }, { asOf }))
      .to.deep.equal([{ code: "licenseExpiringSoon", severity: "low", message: "License expires in 10 days" }]);
  });
});
