/**
 * Runtime type guard tests for @guild-ledger/types
 */
import { describe, it, expect } from "vitest";
import { isAssetDecimals } from "../src/guards.js";

describe("isAssetDecimals", () => {
  it("accepts 0 through 8", () => {
    for (let d = 0; d <= 8; d++) {
      expect(isAssetDecimals(d)).toBe(true);
    }
  });

  it("rejects out-of-range and fractional values", () => {
    expect(isAssetDecimals(-1)).toBe(false);
    expect(isAssetDecimals(9)).toBe(false);
    expect(isAssetDecimals(1.5)).toBe(false);
    expect(isAssetDecimals("2")).toBe(false);
  });
});
