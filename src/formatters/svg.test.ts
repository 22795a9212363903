import { describe, it, expect } from "vitest";
import type { ChartSpec } from "../types.js";
import {
  escapeHtml,
  renderChart,
  svgBarChart,
  svgColumnChart,
  svgDonutChart,
  svgGeoScatter,
  svgLineChart,
  svgStackedAreaChart,
} from "./svg.js";

function count(svg: string, tag: string): number {
  return svg.split(`<${tag} `).length - 1;
}

function makeSpec(overrides: Partial<ChartSpec> = {}): ChartSpec {
  return {
    id: "c",
    title: "C",
    kind: "bar",
    axes: { x: "", y: "" },
    series: [{ name: "s", color: "#6366f1", points: [] }],
    style: { colors: [], thresholds: [], orientation: "vertical", stacked: false, precision: 1, unit: "" },
    ...overrides,
  };
}

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});

describe("svgBarChart", () => {
  it("renders one bar per item with escaped labels", () => {
    const svg = svgBarChart({
      items: [
        { label: "<b>TX</b>", value: 4 },
        { label: "CO", value: 2 },
      ],
      width: 600,
      barHeight: 18,
    });
    expect(count(svg, "rect")).toBe(2);
    expect(svg).toContain("&lt;b&gt;TX&lt;/b&gt;");
    expect(svg).not.toContain("<b>");
  });

  it("shows a dash for a missing value", () => {
    const svg = svgBarChart({ items: [{ label: "CO", value: null }], width: 600, barHeight: 18 });
    expect(svg).toContain(">—</text>");
  });

  it("shows an empty state with no items", () => {
    expect(svgBarChart({ items: [], width: 600, barHeight: 18 })).toContain("No data");
  });
});

describe("svgColumnChart", () => {
  it("draws threshold lines with their labels", () => {
    const svg = svgColumnChart({
      items: [{ label: "Mar", value: 72 }],
      width: 600,
      height: 260,
      thresholds: [{ value: 80, label: "Target 80%", color: "#ef4444" }],
    });
    expect(svg).toContain('stroke="#ef4444"');
    expect(svg).toContain(">Target 80%</text>");
  });
});

describe("svgLineChart", () => {
  it("breaks the line at missing values", () => {
    const svg = svgLineChart({
      labels: ["a", "b", "c"],
      series: [{ name: "s", color: "#000", values: [1, null, 3] }],
      width: 600,
      height: 240,
    });
    expect(count(svg, "polyline")).toBe(0);
    expect(count(svg, "circle")).toBe(2);
  });

  it("joins consecutive values", () => {
    const svg = svgLineChart({
      labels: ["a", "b", "c"],
      series: [{ name: "s", color: "#000", values: [1, 2, null] }],
      width: 600,
      height: 240,
    });
    expect(count(svg, "polyline")).toBe(1);
  });

  it("adds a legend for several series only", () => {
    const single = svgLineChart({ labels: ["a"], series: [{ name: "Alpha", color: "#000", values: [1] }], width: 600, height: 240 });
    const multi = svgLineChart({
      labels: ["a"],
      series: [
        { name: "Alpha", color: "#000", values: [1] },
        { name: "Beta", color: "#111", values: [2] },
      ],
      width: 600,
      height: 240,
    });
    expect(single).not.toContain(">Alpha</text>");
    expect(multi).toContain(">Alpha</text>");
    expect(multi).toContain(">Beta</text>");
  });

  it("shows an empty state with no labels", () => {
    expect(svgLineChart({ labels: [], series: [], width: 600, height: 240 })).toContain("No data");
  });
});

describe("svgStackedAreaChart", () => {
  it("draws one band per series", () => {
    const svg = svgStackedAreaChart({
      labels: ["W09", "W10"],
      series: [
        { name: "weather", color: "#000", values: [1, 2] },
        { name: "Other", color: "#111", values: [0, null] },
      ],
      width: 600,
      height: 240,
    });
    expect(count(svg, "polygon")).toBe(2);
  });
});

describe("svgDonutChart", () => {
  it("labels each segment with its share and the total in the center", () => {
    const svg = svgDonutChart({
      segments: [
        { label: "None", value: 3, color: "#000" },
        { label: "Destroyed", value: 1, color: "#111" },
      ],
      size: 200,
    });
    expect(svg).toContain(">None (75.0%)</text>");
    expect(svg).toContain(">Destroyed (25.0%)</text>");
    expect(svg).toContain('font-weight="700">4</text>');
  });
});

describe("svgGeoScatter", () => {
  it("draws a bubble per point with a tooltip", () => {
    const svg = svgGeoScatter({
      points: [
        { label: "DFW", lat: 32.9, lon: -97.04, value: 3 },
        { label: "DEN", lat: 39.86, lon: -104.67, value: 1 },
      ],
      color: "#ef4444",
      width: 720,
      height: 380,
    });
    expect(count(svg, "circle")).toBe(2);
    expect(svg).toContain("<title>DFW: 3</title>");
  });
});

describe("renderChart", () => {
  it("renders an empty chart as an empty state", () => {
    expect(renderChart(makeSpec())).toContain("No data");
  });

  it("renders a pie as a donut", () => {
    const svg = renderChart(
      makeSpec({
        kind: "pie",
        series: [{ name: "s", color: "#6366f1", points: [{ x: "N", y: 2 }, { x: "M", y: 2 }] }],
        style: { colors: ["#000", "#111"], thresholds: [], orientation: "vertical", stacked: false, precision: 1, unit: "" },
      }),
    );
    expect(svg).toContain(">N (50.0%)</text>");
    expect(svg).toContain('stroke="#111"');
  });

  it("skips map points without coordinates", () => {
    const svg = renderChart(
      makeSpec({
        kind: "geo-scatter",
        series: [
          {
            name: "s",
            color: "#ef4444",
            points: [
              { x: "DFW", y: 3, lat: 32.9, lon: -97.04 },
              { x: "ANC", y: 1 },
            ],
          },
        ],
      }),
    );
    expect(count(svg, "circle")).toBe(1);
  });

  it("draws horizontal bars for horizontal charts", () => {
    const svg = renderChart(
      makeSpec({
        series: [{ name: "s", color: "#6366f1", points: [{ x: "TX", y: 4 }] }],
        style: { colors: ["#22c55e"], thresholds: [], orientation: "horizontal", stacked: false, precision: 1, unit: "" },
      }),
    );
    expect(svg).toContain('fill="#6366f1" opacity="0.8"');
  });
});
