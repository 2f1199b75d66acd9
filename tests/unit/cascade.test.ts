import { describe, it, expect } from "vitest";
import { decideResponse, isAskingForPin } from "../../src/engine/cascade.js";
import { createSession, type SessionSecrets } from "../../src/engine/session.js";

const secrets: SessionSecrets = {
  bankIfsc: "SBIN0001234",
  bankName: "State Bank of India",
  cardVerification: "1234561228",
  pin: "1234",
};

const MAIN_MENU = "1. Send Money\n2. Request Money\n3. Check Balance\n4. My Profile";

describe("balance check cascade", () => {
  it("picks the balance option, then answers PIN, bank and card prompts", () => {
    const session = createSession("balance_check", secrets);
    expect(decideResponse(session, MAIN_MENU)).toEqual({ field: "menuSelected", value: "3" });
    expect(decideResponse(session, "Enter UPI PIN")).toEqual({ field: "pinSent", value: "1234" });
    expect(decideResponse(session, "Enter first 4 letters of your bank IFSC")).toEqual({
      field: "bankSent",
      value: "SBIN",
    });
    expect(decideResponse(session, "Enter last 6 digits of debit card and expiry date")).toEqual({
      field: "cardSent",
      value: "1234561228",
    });
    expect(session.step).toBe(4);
  });

  it("does not send the PIN twice when the prompt repeats", () => {
    const session = createSession("balance_check", secrets);
    decideResponse(session, "Enter UPI PIN");
    expect(decideResponse(session, "Enter UPI PIN")).toBeNull();
    expect(decideResponse(session, "Please enter your UPI PIN again")).toBeNull();
    expect(session.step).toBe(1);
  });

  it("answers a card prompt with card details even before the PIN", () => {
    const session = createSession("balance_check", secrets);
    expect(decideResponse(session, "Enter last 6 digits of debit card")).toEqual({
      field: "cardSent",
      value: "1234561228",
    });
    expect(session.progress.pinSent).toBe(false);
  });

  it("falls back to the bank name when the routing code is short", () => {
    const session = createSession("balance_check", { ...secrets, bankIfsc: "SB" });
    expect(decideResponse(session, "Enter your bank's name")).toEqual({
      field: "bankSent",
      value: "State Bank of India",
    });
  });

  it("prefers the PIN when a prompt mentions PIN and bank", () => {
    const session = createSession("balance_check", secrets);
    expect(decideResponse(session, "Enter UPI PIN for bank IFSC SBIN")?.field).toBe("pinSent");
  });

  it("ignores a menu without a balance option", () => {
    const session = createSession("balance_check", secrets);
    expect(decideResponse(session, "1. English\n2. Hindi")).toBeNull();
    expect(session.progress.menuSelected).toBe(false);
  });
});

describe("send money cascade", () => {
  it("walks menu, payment method, recipient, amount, remarks and PIN for a mobile number", () => {
    const session = createSession("send_money", secrets, { recipient: "9876543210", amount: 500.75 });
    expect(decideResponse(session, MAIN_MENU)).toEqual({ field: "menuSelected", value: "1" });
    expect(decideResponse(session, "Send Money to\n1. Mobile No.\n2. Payee Address\n3. UPI ID")).toEqual({
      field: "paymentMethodSelected",
      value: "1",
    });
    expect(decideResponse(session, "Enter Mobile No.")).toEqual({ field: "recipientSent", value: "9876543210" });
    expect(decideResponse(session, "Enter Amount in Rs.")).toEqual({ field: "amountSent", value: "500" });
    expect(decideResponse(session, "Enter a remark (optional)")).toEqual({ field: "remarksSent", value: "payment" });
    expect(decideResponse(session, "Paying Rs 500 to 9876543210. Enter UPI PIN")).toEqual({
      field: "pinSent",
      value: "1234",
    });
  });

  it("selects the UPI id branch for a UPI recipient", () => {
    const session = createSession("send_money", secrets, { recipient: "shop@okbank", amount: 20, remarks: "tea" });
    decideResponse(session, MAIN_MENU);
    expect(decideResponse(session, "Send Money to\n1. Mobile No.\n2. Payee Address\n3. UPI ID")).toEqual({
      field: "paymentMethodSelected",
      value: "3",
    });
    expect(decideResponse(session, "Enter UPI ID")).toEqual({ field: "recipientSent", value: "shop@okbank" });
  });

  it("answers nothing when the prompt already echoes the amount", () => {
    const session = createSession("send_money", secrets, { recipient: "9876543210", amount: 500 });
    session.progress.recipientSent = true;
    expect(decideResponse(session, "Enter amount to pay 500")).toBeNull();
    expect(session.progress.amountSent).toBe(false);
  });
});

describe("link bank cascade", () => {
  it("opens profile, then the change-bank submenu, then answers bank and card", () => {
    const session = createSession("link_bank", { ...secrets, pin: undefined });
    expect(decideResponse(session, MAIN_MENU)).toEqual({ field: "menuSelected", value: "4" });
    expect(decideResponse(session, "My Profile\n1. Change Language\n2. Change Bank Account\n3. UPI PIN")).toEqual({
      field: "paymentMethodSelected",
      value: "2",
    });
    expect(decideResponse(session, "Enter first 4 letters of your bank IFSC")).toEqual({
      field: "bankSent",
      value: "SBIN",
    });
    expect(decideResponse(session, "Enter last 6 digits of debit card")).toEqual({
      field: "cardSent",
      value: "1234561228",
    });
  });
});

describe("isAskingForPin", () => {
  it("does not read a UPI id prompt as a PIN prompt", () => {
    expect(isAskingForPin("enter upi id of payee (no pin)")).toBe(false);
  });
});
