import { describe, it, expect } from "vitest";
import { addHours, dateKey, dateKeyDaysAgo, dayOfMonth, yearMonthKey } from "../src/time.js";

const NEW_YEAR_JST = new Date("2024-12-31T15:00:00.000Z");

describe("calendar keys", () => {
  it("rolls over with the offset", () => {
    expect(yearMonthKey(NEW_YEAR_JST, 540)).toBe("2025-01");
    expect(dateKey(NEW_YEAR_JST, 540)).toBe("2025-01-01");
    expect(dayOfMonth(NEW_YEAR_JST, 540)).toBe(1);
  });

  it("uses UTC at offset zero", () => {
    expect(yearMonthKey(NEW_YEAR_JST, 0)).toBe("2024-12");
    expect(dateKey(NEW_YEAR_JST, 0)).toBe("2024-12-31");
    expect(dayOfMonth(NEW_YEAR_JST, 0)).toBe(31);
  });

  it("counts days back across a leap day", () => {
    expect(dateKeyDaysAgo(new Date("2024-03-01T00:00:00.000Z"), 1, 0)).toBe("2024-02-29");
  });
});

describe("addHours", () => {
  it("adds whole hours", () => {
    expect(addHours(new Date("2024-05-01T00:00:00.000Z"), 168).toISOString()).toBe("2024-05-08T00:00:00.000Z");
  });
});
