/**
 * Tests for loadConfig and retryConfigFrom.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, retryConfigFrom } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      DATABASE_PATH: "data/guild-ledger.db",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      TIMEZONE_OFFSET_MINUTES: 540,
      TREASURY_REFILL_AMOUNT: "1000000000",
      STORAGE_RETRY_ATTEMPTS: 5,
      ROLE_EXPIRY_INTERVAL_MS: 300_000,
      ALLOWANCE_INTERVAL_MS: 3_600_000,
      ALLOWANCE_PAYDAY: 28,
      VC_PAYOUT_INTERVAL_MS: 60_000,
      VC_DAILY_RETENTION_DAYS: 7,
      DAILY_PRUNE_INTERVAL_MS: 86_400_000,
    });
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ TIMEZONE_OFFSET_MINUTES: "0", VC_PAYOUT_INTERVAL_MS: "5000" });
    expect(config.TIMEZONE_OFFSET_MINUTES).toBe(0);
    expect(config.VC_PAYOUT_INTERVAL_MS).toBe(5000);
  });

  it("rejects a payday past the 28th", () => {
    expect(() => loadConfig({ ALLOWANCE_PAYDAY: "31" })).toThrow(ZodError);
  });

  it("rejects a fractional refill amount", () => {
    expect(() => loadConfig({ TREASURY_REFILL_AMOUNT: "1.5" })).toThrow("must be a positive whole number");
  });

  it("rejects unknown log levels and sub-second intervals", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
    expect(() => loadConfig({ ROLE_EXPIRY_INTERVAL_MS: "10" })).toThrow(ZodError);
  });
});

describe("retryConfigFrom", () => {
  it("overrides only the attempt count", () => {
    const retry = retryConfigFrom(loadConfig({ STORAGE_RETRY_ATTEMPTS: "3" }));
    expect(retry).toEqual({ maxAttempts: 3, baseDelayMs: 20, maxDelayMs: 1000, jitterMs: 20 });
  });
});
