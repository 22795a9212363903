import { describe, it, expect } from "vitest";
import { ConfigError, EmptyWindowError } from "./errors.js";
import {
  applyWindow,
  dataSpan,
  eachDay,
  inWindow,
  intersectWindows,
  splitAt,
  trailingWindow,
  windowDays,
  windowFromRange,
  windowLabel,
} from "./filters.js";
import type { DataRecord, RecordSet } from "./types.js";

function makeSet(dates: string[]): RecordSet {
  const records: DataRecord[] = dates.map((date, i) => ({ row: i + 1, date, values: { status: "on_time" } }));
  return { fields: ["status"], records };
}

describe("windowFromRange", () => {
  it("normalizes both ends", () => {
    expect(windowFromRange("2024-03-01", "03/05/2024")).toEqual({ start: "2024-03-01", end: "2024-03-05" });
  });

  it("rejects an unparseable day", () => {
    expect(() => windowFromRange("soon", "2024-03-01")).toThrow(ConfigError);
    expect(() => windowFromRange("soon", "2024-03-01")).toThrow('from: "soon" is not a valid date');
  });

  it("rejects a reversed range", () => {
    expect(() => windowFromRange("2024-03-05", "2024-03-01")).toThrow("from: 2024-03-05 is after to: 2024-03-01");
  });
});

describe("trailingWindow", () => {
  it("covers exactly the given number of days", () => {
    const w = trailingWindow(30, "2024-03-31");
    expect(w).toEqual({ start: "2024-03-02", end: "2024-03-31" });
    expect(windowDays(w)).toBe(30);
  });

  it("is a single day for one day", () => {
    expect(trailingWindow(1, "2024-03-31")).toEqual({ start: "2024-03-31", end: "2024-03-31" });
  });

  it("crosses a leap day", () => {
    expect(trailingWindow(3, "2024-03-01")).toEqual({ start: "2024-02-28", end: "2024-03-01" });
  });

  it("rejects non-positive and fractional lengths", () => {
    expect(() => trailingWindow(0, "2024-03-31")).toThrow(ConfigError);
    expect(() => trailingWindow(2.5, "2024-03-31")).toThrow(ConfigError);
  });
});

describe("window helpers", () => {
  it("intersects overlapping windows", () => {
    const a = { start: "2024-03-01", end: "2024-03-10" };
    const b = { start: "2024-03-05", end: "2024-03-20" };
    expect(intersectWindows(a, b)).toEqual({ start: "2024-03-05", end: "2024-03-10" });
  });

  it("returns null for disjoint windows", () => {
    expect(intersectWindows({ start: "2024-03-01", end: "2024-03-02" }, { start: "2024-03-03", end: "2024-03-04" })).toBeNull();
  });

  it("lists every day of a window", () => {
    expect(eachDay({ start: "2024-02-28", end: "2024-03-01" })).toEqual(["2024-02-28", "2024-02-29", "2024-03-01"]);
  });

  it("includes both bounds", () => {
    const w = { start: "2024-03-01", end: "2024-03-05" };
    expect(inWindow("2024-03-01", w)).toBe(true);
    expect(inWindow("2024-03-05", w)).toBe(true);
    expect(inWindow("2024-03-06", w)).toBe(false);
  });

  it("labels ranges and single days", () => {
    expect(windowLabel({ start: "2024-03-01", end: "2024-03-05" })).toBe("2024-03-01 – 2024-03-05 (5 days)");
    expect(windowLabel({ start: "2024-03-01", end: "2024-03-01" })).toBe("2024-03-01");
  });
});

describe("applyWindow", () => {
  const set = makeSet(["2024-03-04", "2024-02-29", "2024-03-01", "2024-03-05", "2024-03-06"]);
  const window = { start: "2024-03-01", end: "2024-03-05" };

  it("keeps records inside the window in source order", () => {
    const out = applyWindow(set, window);
    expect(out.records.map((r) => r.date)).toEqual(["2024-03-04", "2024-03-01", "2024-03-05"]);
    expect(out.fields).toEqual(["status"]);
    expect(out.window).toEqual(window);
  });

  it("is idempotent", () => {
    const once = applyWindow(set, window);
    const twice = applyWindow(once, window);
    expect(twice.records).toEqual(once.records);
  });

  it("composes like the intersection of both windows", () => {
    const later = { start: "2024-03-04", end: "2024-03-10" };
    const both = intersectWindows(window, later);
    expect(both).toEqual({ start: "2024-03-04", end: "2024-03-05" });
    if (!both) return;
    const nested = applyWindow(applyWindow(set, window), later);
    expect(nested.records).toEqual(applyWindow(set, both).records);
    expect(nested.records.map((r) => r.date)).toEqual(["2024-03-04", "2024-03-05"]);
  });

  it("leaves the input untouched", () => {
    applyWindow(set, window);
    expect(set.records.length).toBe(5);
  });

  it("throws EmptyWindowError when nothing falls inside", () => {
    const empty = { start: "2025-01-01", end: "2025-01-31" };
    expect(() => applyWindow(set, empty)).toThrow(EmptyWindowError);
    expect(() => applyWindow(set, empty)).toThrow("No records between 2025-01-01 and 2025-01-31");
  });
});

describe("splitAt", () => {
  it("puts the boundary day on the after side", () => {
    const { before, after } = splitAt(makeSet(["2019-12-31", "2020-01-01", "2020-01-02"]), "2020-01-01");
    expect(before.records.map((r) => r.date)).toEqual(["2019-12-31"]);
    expect(after.records.map((r) => r.date)).toEqual(["2020-01-01", "2020-01-02"]);
  });
});

describe("dataSpan", () => {
  it("finds the earliest and latest dates in unordered records", () => {
    expect(dataSpan(makeSet(["2024-03-04", "2024-02-29", "2024-03-06"]))).toEqual({ start: "2024-02-29", end: "2024-03-06" });
  });

  it("is null for an empty set", () => {
    expect(dataSpan(makeSet([]))).toBeNull();
  });
});
