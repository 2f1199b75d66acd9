import { describe, it, expect } from "vitest";
import { isValidFormat, isValidLevel, preview, redactSecrets } from "../../src/shared/logging.js";

describe("redactSecrets", () => {
  it("masks PIN assignments", () => {
    expect(redactSecrets("upi pin=1234 accepted")).toBe("upi pin=[REDACTED] accepted");
    expect(redactSecrets("MPIN: 123456")).toBe("MPIN=[REDACTED]");
  });

  it("masks secret fields in JSON log lines", () => {
    expect(redactSecrets('{"msg":"start","pin":"1234","cardVerification":"1234561228"}')).toBe(
      '{"msg":"start","pin":"[REDACTED]","cardVerification":"[REDACTED]"}',
    );
  });

  it("masks card details in key=value form", () => {
    expect(redactSecrets("cardLastSix=123456 ok")).toBe("cardLastSix=[REDACTED] ok");
  });

  it("leaves ordinary text alone", () => {
    expect(redactSecrets("Your balance is Rs. 1,234")).toBe("Your balance is Rs. 1,234");
  });
});

describe("preview", () => {
  it("collapses whitespace and truncates", () => {
    expect(preview("Enter\n  UPI   PIN")).toBe("Enter UPI PIN");
    expect(preview("abcdefghij", 4)).toBe("abcd...");
  });
});

describe("level and format guards", () => {
  it("accepts known values only", () => {
    expect(isValidLevel("debug")).toBe(true);
    expect(isValidLevel("verbose")).toBe(false);
    expect(isValidFormat("json")).toBe(true);
    expect(isValidFormat("xml")).toBe(false);
  });
});
