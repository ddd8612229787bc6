import { describe, expect, it } from "vitest";
import { addDays, isIsoDate, todayIso } from "./dates";

describe("dates", () => {
  it("adds days across month and year ends", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-01-01", -1)).toBe("2023-12-31");
    expect(addDays("2024-06-10", -6)).toBe("2024-06-04");
  });

  it("rejects malformed dates", () => {
    expect(() => addDays("yesterday", 1)).toThrow("Invalid date: yesterday");
  });

  it("formats the local calendar day", () => {
    expect(todayIso(new Date(2024, 5, 9, 23, 30))).toBe("2024-06-09");
  });

  it("recognises ISO dates", () => {
    expect(isIsoDate("2024-06-09")).toBe(true);
    expect(isIsoDate("06/09/2024")).toBe(false);
  });
});
