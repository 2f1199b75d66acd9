import { describe, it, expect } from "vitest";
import { findMenuOption, hasNumberedOptions, parseMenu } from "../../src/engine/menu.js";

describe("parseMenu", () => {
  it("reads one option per line and skips headings", () => {
    expect(parseMenu("Welcome\n1. Send Money\n2. Request Money\n3) Check Balance")).toEqual([
      { number: "1", label: "Send Money" },
      { number: "2", label: "Request Money" },
      { number: "3", label: "Check Balance" },
    ]);
  });

  it("splits options rendered on a single line", () => {
    expect(parseMenu("1. Send Money 2. Check Balance")).toEqual([
      { number: "1", label: "Send Money" },
      { number: "2", label: "Check Balance" },
    ]);
  });
});

describe("hasNumberedOptions", () => {
  it("needs at least two options", () => {
    expect(hasNumberedOptions("1. Send Money\n2. Check Balance")).toBe(true);
    expect(hasNumberedOptions("1. Send Money")).toBe(false);
    expect(hasNumberedOptions("Enter UPI PIN")).toBe(false);
  });
});

describe("findMenuOption", () => {
  const menu = "1. Send Money\n2. Request Money\n3. Check Balance\n4. My Profile";

  it("returns the number of the first option containing a keyword", () => {
    expect(findMenuOption(menu, ["check balance", "bal enq"])).toBe("3");
    expect(findMenuOption(menu, ["profile"])).toBe("4");
  });

  it("returns null when no option matches", () => {
    expect(findMenuOption(menu, ["change bank"])).toBeNull();
  });
});
