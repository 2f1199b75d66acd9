import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createAutopilot } from "../../src/autopilot.js";
import { FakeActuator, FakeDialer, FakeScreen } from "../helpers/fake-screen.js";

const quiet = { USSD_AUTOPILOT_LOG_LEVEL: "error", USSD_AUTOPILOT_LOG_FORMAT: "json" };

describe("createAutopilot", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "ussd-autopilot-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a default config, opens the SQLite store and attaches the engine", async () => {
    const screen = new FakeScreen();
    const autopilot = await createAutopilot({
      source: screen,
      actuator: new FakeActuator(),
      dialer: new FakeDialer(),
      dataDir: dir,
      env: quiet,
    });

    expect(existsSync(path.join(dir, "config.json"))).toBe(true);
    expect(existsSync(path.join(dir, "transactions.db"))).toBe(true);
    expect(autopilot.config.shortCode).toBe("*99#");
    expect(autopilot.config.logLevel).toBe("error");
    expect(screen.listenerCount).toBe(1);
    autopilot.engine.detach();
  });

  it("uses the short code from the environment for dialing", async () => {
    const dialer = new FakeDialer();
    const autopilot = await createAutopilot({
      source: new FakeScreen(),
      actuator: new FakeActuator(),
      dialer,
      dataDir: dir,
      inMemory: true,
      env: { ...quiet, USSD_AUTOPILOT_SHORT_CODE: "*99*1#" },
    });

    await autopilot.payments.linkBank({
      upiPin: "1234",
      mobileNumber: "9876543210",
      bankName: "State Bank of India",
      bankIfsc: "SBIN0001234",
      cardLastSix: "123456",
      cardExpiryMonth: "12",
      cardExpiryYear: "28",
    });
    expect(dialer.calls).toEqual(["*99*1#"]);
    expect(existsSync(path.join(dir, "transactions.db"))).toBe(false);
    autopilot.engine.detach();
  });
});
