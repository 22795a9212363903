/**
 * Chart builder.
 * Maps one aggregation result onto a renderer-agnostic ChartSpec. This is the
 * presentation boundary: values are rounded here and nowhere earlier.
 */

import { ChartShapeError, UnknownMetricError } from "./errors.js";
import { bucketKey } from "./trends.js";
import { roundTo } from "./utils.js";
import type { AggregationResult, ChartKind, ChartPoint, ChartRequest, ChartSeries, ChartSpec, MetricShape, MetricValue } from "./types.js";

// Chart color palette
export const PALETTE = [
  "#6366f1", "#22c55e", "#eab308", "#ef4444", "#3b82f6",
  "#f97316", "#8b5cf6", "#ec4899", "#14b8a6", "#64748b",
];

export const DEFAULT_PRECISION = 1;

/** Metric shapes each chart kind can draw. */
export const ACCEPTED_SHAPES: Record<ChartKind, MetricShape[]> = {
  line: ["series", "multiSeries"],
  "stacked-area": ["series", "multiSeries"],
  bar: ["breakdown", "series", "comparison"],
  pie: ["breakdown"],
  "geo-scatter": ["geo"],
};

export interface BuildOptions {
  /** Decimal places kept in chart values. */
  precision?: number;
}

export function buildChart(request: ChartRequest, result: AggregationResult, options: BuildOptions = {}): ChartSpec {
  const value = result.get(request.metric);
  if (!value) {
    throw new UnknownMetricError(
      request.metric,
      request.metric,
      `Chart "${request.id}" needs metric "${request.metric}", which was not computed`,
    );
  }
  if (!ACCEPTED_SHAPES[request.kind].includes(value.shape)) {
    throw new ChartShapeError(request.id, request.kind, value.shape);
  }

  const precision = options.precision ?? DEFAULT_PRECISION;
  const series = toSeries(request, value, (v) => (v === null ? null : roundTo(v, precision)));

  return {
    id: request.id,
    title: request.title,
    kind: request.kind,
    axes: { x: request.xLabel ?? defaultXLabel(value), y: request.yLabel ?? "" },
    series,
    style: {
      colors: pointColors(request, value) ?? series.map((s) => s.color),
      thresholds: (request.thresholds ?? []).map((t) => ({ value: t.value, label: t.label, color: t.color })),
      orientation: request.orientation ?? "vertical",
      stacked: request.kind === "stacked-area",
      precision,
      unit: request.unit ?? "",
    },
  };
}

/**
 * Build every chart that can be built. A chart whose metric is missing or
 * whose kind doesn't fit its data is reported and skipped.
 */
export function buildCharts(
  requests: ChartRequest[],
  result: AggregationResult,
  options: BuildOptions = {},
): { charts: ChartSpec[]; errors: (ChartShapeError | UnknownMetricError)[] } {
  const charts: ChartSpec[] = [];
  const errors: (ChartShapeError | UnknownMetricError)[] = [];
  for (const request of requests) {
    try {
      charts.push(buildChart(request, result, options));
    } catch (err) {
      if (err instanceof ChartShapeError || err instanceof UnknownMetricError) {
        errors.push(err);
      } else {
        throw err;
      }
    }
  }
  return { charts, errors };
}

function toSeries(request: ChartRequest, value: MetricValue, round: (v: number | null) => number | null): ChartSeries[] {
  const label = (l: string) => request.labels?.[l] ?? l;

  switch (value.shape) {
    case "series":
      return [
        {
          name: request.yLabel ?? request.title,
          color: request.color ?? PALETTE[0],
          points: value.points.map((p) => ({ x: bucketKey(p.date, value.granularity), y: round(p.value) })),
        },
      ];

    case "multiSeries": {
      const xs = value.dates.map((d) => bucketKey(d, value.granularity));
      return value.series.map((s, i) => ({
        name: label(s.label),
        color: colorFor(request, s.label, i),
        points: xs.map((x, j) => ({ x, y: round(s.values[j] ?? null) })),
      }));
    }

    case "breakdown":
      return [
        {
          name: request.yLabel ?? request.title,
          color: request.color ?? PALETTE[0],
          points: value.entries.map((e) => ({ x: label(e.label), y: round(e.value) })),
        },
      ];

    case "comparison": {
      const [beforeName, afterName] = request.comparisonLabels ?? ["Before", "After"];
      return [
        {
          name: request.yLabel ?? request.title,
          color: request.color ?? PALETTE[0],
          points: [
            { x: beforeName, y: round(value.before) },
            { x: afterName, y: round(value.after) },
          ],
        },
      ];
    }

    case "geo":
      return [
        {
          name: request.yLabel ?? request.title,
          color: request.color ?? PALETTE[3],
          points: value.points.map((p): ChartPoint => ({ x: label(p.label), y: round(p.value), lat: p.lat, lon: p.lon })),
        },
      ];

    case "scalar":
      // Filtered out by ACCEPTED_SHAPES; scalars belong on KPI cards.
      throw new ChartShapeError(request.id, request.kind, value.shape);
  }
}

/** Color for a category or series: explicit mapping, then the request color, then the palette. */
function colorFor(request: ChartRequest, label: string, index: number): string {
  return request.colors?.[label] ?? request.color ?? PALETTE[index % PALETTE.length];
}

/** One color per point for single-series categorical charts; null otherwise. */
function pointColors(request: ChartRequest, value: MetricValue): string[] | null {
  switch (value.shape) {
    case "breakdown":
      return value.entries.map((e, i) => colorFor(request, e.label, i));
    case "comparison": {
      const names = request.comparisonLabels ?? ["Before", "After"];
      return names.map((name, i) => colorFor(request, name, i));
    }
    default:
      return null;
  }
}

function defaultXLabel(value: MetricValue): string {
  switch (value.shape) {
    case "series":
    case "multiSeries":
      return value.granularity === "day" ? "Date" : value.granularity === "week" ? "Week" : "Month";
    case "geo":
      return "Location";
    default:
      return "";
  }
}
