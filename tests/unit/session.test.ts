import { describe, it, expect } from "vitest";
import { bankAnswer, createSession, formatAmount, markSent, toHandle } from "../../src/engine/session.js";
import { genId } from "../../src/shared/ids.js";

const secrets = { bankIfsc: "hdfc0000001", bankName: "HDFC Bank", cardVerification: "6543210130", pin: "1234" };

describe("createSession", () => {
  it("normalises transfer parameters", () => {
    const session = createSession("send_money", secrets, { recipient: " 9876543210 ", amount: 99.99 }, 1000);
    expect(session.id).toMatch(/^sess-/);
    expect(session.transfer).toEqual({ recipient: "9876543210", amount: "99", remarks: "payment" });
    expect(session.step).toBe(0);
    expect(session.startedAt).toBe(1000);
    expect(Object.values(session.progress).every((v) => v === false)).toBe(true);
    expect(toHandle(session)).toEqual({ id: session.id, kind: "send_money" });
  });

  it("copies the secrets", () => {
    const input = { ...secrets };
    const session = createSession("balance_check", input);
    input.pin = "0000";
    expect(session.secrets.pin).toBe("1234");
    expect(session.transfer).toBeUndefined();
  });
});

describe("progress", () => {
  it("counts each flag once", () => {
    const session = createSession("balance_check", secrets);
    markSent(session, "pinSent");
    markSent(session, "pinSent");
    expect(session.step).toBe(1);
  });

  it("answers bank prompts with the upper-cased routing prefix", () => {
    expect(bankAnswer(secrets)).toBe("HDFC");
    expect(formatAmount(-3.7)).toBe("-3");
  });
});

describe("genId", () => {
  it("generates unique prefixed ids", () => {
    expect(genId("txn")).toMatch(/^txn-/);
    expect(genId()).not.toBe(genId());
  });
});
