import { describe, it, expect } from "vitest";
import { findBankByIfsc, supportedBanks } from "../../src/payments/banks.js";
import {
  formatCardDetails,
  isValidCredentials,
  isValidMobileNumber,
  isValidRecipient,
  isValidUpiId,
  toSessionSecrets,
  validateCredentials,
  type UserCredentials,
} from "../../src/payments/credentials.js";
import { parseUpiPaymentUrl } from "../../src/payments/upi-url.js";
import { InvalidRequestError } from "../../src/shared/errors.js";

const creds: UserCredentials = {
  upiPin: "1234",
  mobileNumber: "9876543210",
  bankName: "State Bank of India",
  bankIfsc: "SBIN0001234",
  cardLastSix: "123456",
  cardExpiryMonth: "12",
  cardExpiryYear: "28",
};

describe("validateCredentials", () => {
  it("accepts complete credentials", () => {
    expect(validateCredentials(creds)).toEqual(creds);
    expect(isValidCredentials(creds)).toBe(true);
  });

  it("names the bad field without echoing its value", () => {
    expect(() => validateCredentials({ ...creds, upiPin: "12" })).toThrow(InvalidRequestError);
    expect(() => validateCredentials({ ...creds, upiPin: "12" })).toThrow("Invalid credentials: upiPin");
  });

  it("rejects mobile numbers that cannot be Indian mobiles", () => {
    expect(isValidCredentials({ ...creds, mobileNumber: "1234567890" })).toBe(false);
  });

  it("rejects a blank bank name", () => {
    expect(() => validateCredentials({ ...creds, bankName: "  " })).toThrow("Invalid credentials: bankName");
  });
});

describe("session secrets", () => {
  it("formats card details as last six digits then MMYY", () => {
    expect(formatCardDetails(creds)).toBe("1234561228");
  });

  it("omits the PIN when asked", () => {
    expect(toSessionSecrets(creds)).toEqual({
      bankIfsc: "SBIN0001234",
      bankName: "State Bank of India",
      cardVerification: "1234561228",
      pin: "1234",
    });
    expect(toSessionSecrets(creds, { withPin: false }).pin).toBeUndefined();
  });
});

describe("recipients", () => {
  it("accepts UPI ids and mobile numbers", () => {
    expect(isValidUpiId("shop.owner@okbank")).toBe(true);
    expect(isValidUpiId("shop@ok.bank")).toBe(false);
    expect(isValidMobileNumber("6123456789")).toBe(true);
    expect(isValidMobileNumber("512345678")).toBe(false);
    expect(isValidRecipient("9876543210")).toBe(true);
    expect(isValidRecipient("hello")).toBe(false);
  });
});

describe("banks", () => {
  it("finds a bank by IFSC prefix", () => {
    expect(findBankByIfsc("hdfc0000001")).toEqual({ name: "HDFC Bank", ifscPrefix: "HDFC", shortCode: "HDFC" });
    expect(findBankByIfsc("ZZZZ0000001")).toBeUndefined();
    expect(findBankByIfsc("SB")).toBeUndefined();
  });

  it("loads the full list", () => {
    expect(supportedBanks()).toHaveLength(20);
  });
});

describe("parseUpiPaymentUrl", () => {
  it("reads payee, amount and note", () => {
    expect(parseUpiPaymentUrl("upi://pay?pa=shop@okbank&pn=Tea%20Stall&am=20.50&tn=chai")).toEqual({
      upiId: "shop@okbank",
      name: "Tea Stall",
      amount: 20.5,
      note: "chai",
    });
  });

  it("leaves the amount empty when absent or malformed", () => {
    expect(parseUpiPaymentUrl("upi://pay?pa=shop@okbank&am=abc")?.amount).toBeNull();
  });

  it("rejects other links and malformed payees", () => {
    expect(parseUpiPaymentUrl("https://example.com/pay?pa=shop@okbank")).toBeNull();
    expect(parseUpiPaymentUrl("upi://pay?pn=Someone")).toBeNull();
    expect(parseUpiPaymentUrl("upi://pay?pa=not-an-id")).toBeNull();
  });
});
