import { describe, it, expect } from "vitest";
import { buildChart, buildCharts, PALETTE } from "./charts.js";
import { ChartShapeError, UnknownMetricError } from "./errors.js";
import type { AggregationResult, MetricValue } from "./types.js";

const result: AggregationResult = new Map<string, MetricValue>([
  [
    "on_time_daily",
    {
      shape: "series",
      granularity: "day",
      points: [
        { date: "2024-03-01", value: 80.04 },
        { date: "2024-03-02", value: null },
      ],
    },
  ],
  [
    "damage",
    {
      shape: "breakdown",
      entries: [
        { label: "N", value: 3 },
        { label: "D", value: 1 },
      ],
    },
  ],
  ["pandemic", { shape: "comparison", boundary: "2020-01-01", before: 60, after: 40, delta: -20, change: -33.333 }],
  [
    "causes_weekly",
    {
      shape: "multiSeries",
      granularity: "week",
      dates: ["2024-02-26", "2024-03-04"],
      series: [
        { label: "weather", values: [1, 2] },
        { label: "Other", values: [0, 1] },
      ],
    },
  ],
  ["total", { shape: "scalar", value: 12 }],
]);

describe("buildChart", () => {
  it("builds a line chart from a daily series, rounding values", () => {
    const spec = buildChart(
      {
        id: "on-time-trend",
        metric: "on_time_daily",
        kind: "line",
        title: "On-time rate",
        unit: "%",
        thresholds: [{ value: 80, label: "Target 80%", color: "#ef4444" }],
      },
      result,
    );
    expect(spec).toEqual({
      id: "on-time-trend",
      title: "On-time rate",
      kind: "line",
      axes: { x: "Date", y: "" },
      series: [
        {
          name: "On-time rate",
          color: PALETTE[0],
          points: [
            { x: "2024-03-01", y: 80 },
            { x: "2024-03-02", y: null },
          ],
        },
      ],
      style: {
        colors: [PALETTE[0]],
        thresholds: [{ value: 80, label: "Target 80%", color: "#ef4444" }],
        orientation: "vertical",
        stacked: false,
        precision: 1,
        unit: "%",
      },
    });
  });

  it("keeps the aggregation values unrounded", () => {
    buildChart({ id: "c", metric: "on_time_daily", kind: "line", title: "c" }, result);
    const value = result.get("on_time_daily");
    expect(value?.shape === "series" ? value.points[0].value : undefined).toBe(80.04);
  });

  it("honors the precision option", () => {
    const spec = buildChart({ id: "c", metric: "on_time_daily", kind: "line", title: "c" }, result, { precision: 2 });
    expect(spec.series[0].points[0].y).toBe(80.04);
    expect(spec.style.precision).toBe(2);
  });

  it("applies display labels and per-category colors to a pie", () => {
    const spec = buildChart(
      {
        id: "damage-levels",
        metric: "damage",
        kind: "pie",
        title: "Damage",
        labels: { N: "None", D: "Destroyed" },
        colors: { D: "#000000" },
      },
      result,
    );
    expect(spec.series[0].points).toEqual([
      { x: "None", y: 3 },
      { x: "Destroyed", y: 1 },
    ]);
    expect(spec.style.colors).toEqual([PALETTE[0], "#000000"]);
  });

  it("draws a comparison as two named bars", () => {
    const spec = buildChart(
      {
        id: "pandemic-comparison",
        metric: "pandemic",
        kind: "bar",
        title: "Strikes before and during",
        comparisonLabels: ["Before", "During"],
        colors: { Before: "#2ecc71", During: "#e74c3c" },
      },
      result,
    );
    expect(spec.series[0].points).toEqual([
      { x: "Before", y: 60 },
      { x: "During", y: 40 },
    ]);
    expect(spec.style.colors).toEqual(["#2ecc71", "#e74c3c"]);
  });

  it("stacks weekly series keyed by ISO week", () => {
    const spec = buildChart({ id: "weekly", metric: "causes_weekly", kind: "stacked-area", title: "Causes" }, result);
    expect(spec.axes.x).toBe("Week");
    expect(spec.style.stacked).toBe(true);
    expect(spec.series.map((s) => s.name)).toEqual(["weather", "Other"]);
    expect(spec.series.map((s) => s.color)).toEqual([PALETTE[0], PALETTE[1]]);
    expect(spec.series[1].points).toEqual([
      { x: "2024-W09", y: 0 },
      { x: "2024-W10", y: 1 },
    ]);
  });

  it("rejects a kind that cannot draw the metric's shape", () => {
    const request = { id: "bad", metric: "on_time_daily", kind: "pie" as const, title: "Bad" };
    expect(() => buildChart(request, result)).toThrow(ChartShapeError);
    expect(() => buildChart(request, result)).toThrow('Chart "bad" cannot draw a pie chart from series data');
  });

  it("rejects scalars", () => {
    expect(() => buildChart({ id: "s", metric: "total", kind: "bar", title: "S" }, result)).toThrow(ChartShapeError);
  });

  it("rejects a metric that was not computed", () => {
    expect(() => buildChart({ id: "x", metric: "nope", kind: "bar", title: "X" }, result)).toThrow(UnknownMetricError);
  });
});

describe("buildCharts", () => {
  it("skips charts that cannot be built and reports them", () => {
    const { charts, errors } = buildCharts(
      [
        { id: "a", metric: "damage", kind: "bar", title: "A" },
        { id: "b", metric: "nope", kind: "bar", title: "B" },
        { id: "c", metric: "damage", kind: "line", title: "C" },
        { id: "d", metric: "pandemic", kind: "bar", title: "D" },
      ],
      result,
    );
    expect(charts.map((c) => c.id)).toEqual(["a", "d"]);
    expect(errors.map((e) => e.name)).toEqual(["UnknownMetricError", "ChartShapeError"]);
  });
});
