import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { UnknownMetricError } from "../errors.js";
import type { KpiCard, LoadReport, MetricValue } from "../types.js";
import { kpiLines, printBreakdown, printBreakdowns, printLoadReport, printSummary, printWarnings } from "./table.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

beforeEach(() => {
  log = vi.spyOn(console, "log").mockImplementation(() => {});
  error = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((args) => args.join(" "));
}

describe("kpiLines", () => {
  it("aligns labels and values and shows the change", () => {
    const cards: KpiCard[] = [
      { label: "Flights", value: 1234, format: "integer", delta: 34 },
      { label: "On-Time", value: 80, format: "percent" },
    ];
    expect(kpiLines(cards, 1)).toEqual(["  Flights  1,234    (+34 vs previous period)", "  On-Time  80.0%"]);
  });

  it("shows a dash for a missing value", () => {
    expect(kpiLines([{ label: "Avg Delay", value: null, format: "minutes", delta: null }], 1)).toEqual(["  Avg Delay  —"]);
  });
});

describe("printSummary", () => {
  it("prints the title, the window and the cards", () => {
    printSummary("Flight Performance Report", "2024-03-01 – 2024-03-05 (5 days)", [{ label: "Flights", value: 9, format: "integer" }], 1);
    const lines = printed(log);
    expect(lines[0]).toBe("\n  Flight Performance Report — 2024-03-01 – 2024-03-05 (5 days)\n");
    expect(lines).toContain("  Flights  9");
  });

  it("says so when there is nothing to show", () => {
    printSummary("Flight Performance Report", "no data", [], 1);
    expect(printed(log)).toContain("  No records in the selected window.\n");
  });
});

describe("printBreakdown", () => {
  it("draws bars with counts and shares", () => {
    printBreakdown("Top origins", [
      { label: "ATL", value: 3 },
      { label: "ORD", value: 1 },
    ]);
    expect(printed(log)).toEqual([
      "\n  Top origins\n",
      `  ATL    ${"█".repeat(24)}         3   75.0%`,
      `  ORD    ${"█".repeat(8)}${"░".repeat(16)}         1   25.0%`,
    ]);
  });

  it("notes the entries past the limit", () => {
    printBreakdown(
      "Top origins",
      [
        { label: "ATL", value: 3 },
        { label: "ORD", value: 2 },
        { label: "DFW", value: 1 },
      ],
      1,
    );
    expect(printed(log)).toContain(`${DIM}  … 2 more${RESET}`);
  });

  it("handles an empty breakdown", () => {
    printBreakdown("Top origins", []);
    expect(printed(log)).toEqual(["\n  Top origins\n", "  No data.\n"]);
  });
});

describe("printBreakdowns", () => {
  it("prints breakdown metrics only", () => {
    printBreakdowns(
      new Map<string, MetricValue>([
        ["total", { shape: "scalar", value: 4 }],
        ["top_origins", { shape: "breakdown", entries: [{ label: "ATL", value: 4 }] }],
      ]),
    );
    const lines = printed(log);
    expect(lines).toContain("\n  top_origins\n");
    expect(lines).not.toContain("\n  total\n");
  });
});

describe("printLoadReport", () => {
  it("summarizes kept, dropped and empty cells on stderr", () => {
    const report: LoadReport = {
      path: "flights.csv",
      rowsRead: 10,
      rowsKept: 9,
      rowsDropped: 1,
      dropped: [{ row: 7, reason: 'unparseable date "not-a-date"' }],
      missing: { delay_cause: 6 },
      invalidNumbers: { delay_minutes: 1 },
    };
    printLoadReport(report);
    expect(log).not.toHaveBeenCalled();
    expect(printed(error)).toEqual([
      `${DIM}  flights.csv: 9 of 10 rows kept${RESET}`,
      `${DIM}  dropped 1 rows without a usable date${RESET}`,
      `${DIM}    row 7: unparseable date "not-a-date"${RESET}`,
      `${DIM}  delay_minutes: 1 invalid numbers treated as missing${RESET}`,
      `${DIM}  delay_cause: 6 empty${RESET}`,
    ]);
  });
});

describe("printWarnings", () => {
  it("prints each skipped metric", () => {
    printWarnings([new UnknownMetricError("taxi", "taxi_minutes")]);
    expect(printed(error)).toEqual([`${DIM}  warning: Metric "taxi" references unknown field "taxi_minutes"${RESET}`]);
  });
});
