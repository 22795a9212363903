import { describe, it, expect } from "vitest";
import { addDays, dayDiff, daysInMonth, parseDay } from "./dates.js";

describe("parseDay", () => {
  it("accepts ISO days", () => {
    expect(parseDay("2024-03-01")).toBe("2024-03-01");
    expect(parseDay(" 2024-3-1 ")).toBe("2024-03-01");
  });

  it("accepts slashed year-first and US month-first days", () => {
    expect(parseDay("2024/03/01")).toBe("2024-03-01");
    expect(parseDay("03/01/2024")).toBe("2024-03-01");
    expect(parseDay("3/1/2024")).toBe("2024-03-01");
  });

  it("rejects mixed separators", () => {
    expect(parseDay("2024-03/01")).toBeNull();
  });

  it("takes the date part of a date-time as written", () => {
    expect(parseDay("2024-03-05T23:30:00Z")).toBe("2024-03-05");
    expect(parseDay("2024-03-05T23:30:00-08:00")).toBe("2024-03-05");
    expect(parseDay("2024-03-05 07:15")).toBe("2024-03-05");
    expect(parseDay("2024-03-05T07:15:30.250Z")).toBe("2024-03-05");
  });

  it("rejects impossible days and times", () => {
    expect(parseDay("2024-02-30")).toBeNull();
    expect(parseDay("2023-02-29")).toBeNull();
    expect(parseDay("2024-13-01")).toBeNull();
    expect(parseDay("2024-03-05T24:00:00Z")).toBeNull();
  });

  it("accepts leap days", () => {
    expect(parseDay("2024-02-29")).toBe("2024-02-29");
  });

  it("returns null for empty and free text", () => {
    expect(parseDay("")).toBeNull();
    expect(parseDay("yesterday")).toBeNull();
  });
});

describe("day arithmetic", () => {
  it("adds days across month and year ends", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts whole days between two days", () => {
    expect(dayDiff("2024-03-01", "2024-03-31")).toBe(30);
    expect(dayDiff("2024-03-31", "2024-03-01")).toBe(-30);
  });

  it("knows month lengths", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 4)).toBe(30);
  });
});
