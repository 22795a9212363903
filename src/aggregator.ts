/**
 * Metric aggregation engine.
 * Takes a windowed RecordSet and a list of metric requests and produces an
 * AggregationResult. Requests are independent: one naming an unknown field is
 * reported and skipped while the rest are still computed.
 *
 * Nothing is rounded here. Rounding happens when charts and cards are built.
 */

import { addDays, parseDay } from "./dates.js";
import { ConfigError, UnknownMetricError } from "./errors.js";
import { dataSpan, inWindow, splitAt } from "./filters.js";
import { bucketStart, bucketsFor } from "./trends.js";
import type {
  AggregationResult,
  BreakdownRequest,
  ComparisonRequest,
  DataRecord,
  GeoPoint,
  GeoRequest,
  IsoDay,
  LabeledValue,
  Measure,
  MetricRequest,
  MetricValue,
  RecordSet,
  SeriesRequest,
  WhereClause,
  Window,
} from "./types.js";

export const OTHER_LABEL = "Other";

export interface AggregateOptions {
  /** Window the series buckets cover. Defaults to the set's window, then its data span. */
  window?: Window;
}

export interface AggregateOutcome {
  result: AggregationResult;
  errors: UnknownMetricError[];
}

/** Compute every requested metric over the set, best effort. */
export function aggregate(set: RecordSet, requests: MetricRequest[], options: AggregateOptions = {}): AggregateOutcome {
  validateRequests(requests);

  const window = options.window ?? set.window ?? dataSpan(set);
  const result = new Map<string, MetricValue>();
  const errors: UnknownMetricError[] = [];

  for (const request of requests) {
    const missing = referencedFields(request).find((f) => !set.fields.includes(f));
    if (missing !== undefined) {
      errors.push(new UnknownMetricError(request.name, missing));
      continue;
    }
    result.set(request.name, computeMetric(set.records, request, window));
  }

  return { result, errors };
}

/** Join results computed over different scopes, ordered by `order`. */
export function mergeResults(order: string[], ...results: AggregationResult[]): AggregationResult {
  const merged = new Map<string, MetricValue>();
  for (const name of order) {
    for (const result of results) {
      const value = result.get(name);
      if (value) {
        merged.set(name, value);
        break;
      }
    }
  }
  return merged;
}

/** Reject malformed requests up front: duplicate names, bad top-K, bad boundaries. */
export function validateRequests(requests: MetricRequest[]): void {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const request of requests) {
    if (seen.has(request.name)) issues.push(`metrics.${request.name}: duplicate metric name`);
    seen.add(request.name);

    if ("top" in request && request.top !== undefined && (!Number.isInteger(request.top) || request.top < 1)) {
      issues.push(`metrics.${request.name}.top: expected a positive integer, got ${request.top}`);
    }
    const measure = "measure" in request ? request.measure : undefined;
    if (measure?.op === "rate" && measure.in.length === 0) {
      issues.push(`metrics.${request.name}.measure.in: expected at least one value`);
    }
    if (request.kind === "comparison") {
      const { boundary } = request;
      if (typeof boundary === "string") {
        if (!parseDay(boundary)) issues.push(`metrics.${request.name}.boundary: "${boundary}" is not a valid date`);
      } else if (!Number.isInteger(boundary.trailingDays) || boundary.trailingDays < 1) {
        issues.push(`metrics.${request.name}.boundary.trailingDays: expected a positive integer`);
      }
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);
}

/** Every record field a request reads. */
export function referencedFields(request: MetricRequest): string[] {
  switch (request.kind) {
    case "scalar":
    case "comparison":
      return measureFields(request.measure);
    case "series":
      return [...measureFields(request.measure), ...(request.by ? [request.by] : [])];
    case "breakdown":
      return [
        request.field,
        ...(request.sum ? [request.sum] : []),
        ...(request.where ? [request.where.field] : []),
      ];
    case "geo":
      return [request.field, request.lat, request.lon];
  }
}

function measureFields(measure: Measure): string[] {
  const fields = measure.op === "count" ? [] : [measure.field];
  if (measure.where) fields.push(measure.where.field);
  return fields;
}

function computeMetric(records: readonly DataRecord[], request: MetricRequest, window: Window | null): MetricValue {
  switch (request.kind) {
    case "scalar":
      return { shape: "scalar", value: evaluate(records, request.measure) };
    case "series":
      return computeSeries(records, request, window);
    case "breakdown":
      return computeBreakdown(records, request);
    case "geo":
      return computeGeo(records, request);
    case "comparison":
      return computeComparison(records, request, window);
  }
}

// ═══════════════════════════════════════
// Measures
// ═══════════════════════════════════════

/**
 * Evaluate a measure over records. Rates are percentages (0-100); rates and
 * means are null when nothing was observed, counts and sums are 0.
 */
export function evaluate(records: readonly DataRecord[], measure: Measure): number | null {
  const rows = measure.where ? records.filter(matcher(measure.where)) : records;

  switch (measure.op) {
    case "count":
      return rows.length;

    case "rate": {
      let numerator = 0;
      let denominator = 0;
      for (const r of rows) {
        const v = r.values[measure.field];
        if (v === null || v === undefined) {
          if (measure.denominator === "all") denominator++;
          continue;
        }
        denominator++;
        if (measure.in.includes(String(v))) numerator++;
      }
      return denominator === 0 ? null : (numerator / denominator) * 100;
    }

    case "mean": {
      let sum = 0;
      let n = 0;
      for (const r of rows) {
        const v = r.values[measure.field];
        if (typeof v === "number") {
          sum += v;
          n++;
        }
      }
      return n === 0 ? null : sum / n;
    }

    case "sum": {
      let sum = 0;
      for (const r of rows) {
        const v = r.values[measure.field];
        if (typeof v === "number") sum += v;
      }
      return sum;
    }

    case "distinct": {
      const values = new Set<string>();
      for (const r of rows) {
        const v = r.values[measure.field];
        if (v !== null && v !== undefined) values.add(String(v));
      }
      return values.size;
    }
  }
}

function matcher(where: WhereClause): (r: DataRecord) => boolean {
  return (r) => {
    const v = r.values[where.field];
    return v !== null && v !== undefined && where.in.includes(String(v));
  };
}

function labelOf(record: DataRecord, field: string): string | null {
  const v = record.values[field];
  return v === null || v === undefined ? null : String(v);
}

/** Group records by a field, keeping first-seen label order. Null labels are skipped. */
function groupBy(records: readonly DataRecord[], field: string): Map<string, DataRecord[]> {
  const groups = new Map<string, DataRecord[]>();
  for (const r of records) {
    const label = labelOf(r, field);
    if (label === null) continue;
    const group = groups.get(label);
    if (group) group.push(r);
    else groups.set(label, [r]);
  }
  return groups;
}

/** Sort descending by value. The sort is stable, so ties keep first-seen order. */
function rankDescending<T extends { value: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.value - a.value);
}

// ═══════════════════════════════════════
// Series
// ═══════════════════════════════════════

function computeSeries(records: readonly DataRecord[], request: SeriesRequest, window: Window | null): MetricValue {
  const { granularity, measure } = request;
  const starts = window ? bucketsFor(window, granularity) : [];
  const inRange = window ? records.filter((r) => inWindow(r.date, window)) : [];

  const buckets = new Map<IsoDay, DataRecord[]>(starts.map((s) => [s, []]));
  for (const r of inRange) {
    buckets.get(bucketStart(r.date, granularity))?.push(r);
  }

  if (!request.by) {
    return {
      shape: "series",
      granularity,
      points: starts.map((date) => ({ date, value: evaluate(buckets.get(date) ?? [], measure) })),
    };
  }

  const by = request.by;
  const groups = groupBy(inRange, by);
  const ranked = rankDescending(
    [...groups.entries()].map(([label, rows]) => ({ label, value: evaluate(rows, measure) ?? 0 })),
  );
  const kept = request.top !== undefined ? ranked.slice(0, request.top) : ranked;
  const rest = new Set(ranked.slice(kept.length).map((c) => c.label));

  const valuesFor = (include: (label: string) => boolean) =>
    starts.map((start) => {
      const rows = (buckets.get(start) ?? []).filter((r) => {
        const label = labelOf(r, by);
        return label !== null && include(label);
      });
      return evaluate(rows, measure);
    });

  const series = kept.map((c) => ({ label: c.label, values: valuesFor((l) => l === c.label) }));
  if (request.other && rest.size > 0) {
    series.push({ label: OTHER_LABEL, values: valuesFor((l) => rest.has(l)) });
  }

  return { shape: "multiSeries", granularity, dates: starts, series };
}

// ═══════════════════════════════════════
// Breakdowns
// ═══════════════════════════════════════

function computeBreakdown(records: readonly DataRecord[], request: BreakdownRequest): MetricValue {
  const rows = request.where ? records.filter(matcher(request.where)) : records;
  const sumField = request.sum;

  const totals = new Map<string, number>();
  for (const r of rows) {
    const label = labelOf(r, request.field);
    if (label === null) continue;
    let amount = 1;
    if (sumField) {
      const v = r.values[sumField];
      amount = typeof v === "number" ? v : 0;
    }
    totals.set(label, (totals.get(label) ?? 0) + amount);
  }

  const ranked = rankDescending([...totals.entries()].map(([label, value]) => ({ label, value })));
  const grandTotal = ranked.reduce((s, e) => s + e.value, 0);

  let entries: LabeledValue[] = ranked;
  if (request.top !== undefined && ranked.length > request.top) {
    entries = ranked.slice(0, request.top);
    const restTotal = ranked.slice(request.top).reduce((s, e) => s + e.value, 0);
    if (request.other && restTotal > 0) {
      const existing = entries.find((e) => e.label === OTHER_LABEL);
      entries = existing
        ? entries.map((e) => (e === existing ? { label: e.label, value: e.value + restTotal } : e))
        : [...entries, { label: OTHER_LABEL, value: restTotal }];
    }
  }

  if (request.percent) {
    entries = entries.map((e) => ({ label: e.label, value: grandTotal === 0 ? 0 : (e.value / grandTotal) * 100 }));
  }

  return { shape: "breakdown", entries };
}

function computeGeo(records: readonly DataRecord[], request: GeoRequest): MetricValue {
  const points = new Map<string, GeoPoint>();
  for (const r of records) {
    const label = labelOf(r, request.field);
    const lat = r.values[request.lat];
    const lon = r.values[request.lon];
    if (label === null || typeof lat !== "number" || typeof lon !== "number") continue;
    const existing = points.get(label);
    if (existing) existing.value++;
    else points.set(label, { label, lat, lon, value: 1 });
  }

  const ranked = rankDescending([...points.values()]);
  return { shape: "geo", points: request.top !== undefined ? ranked.slice(0, request.top) : ranked };
}

// ═══════════════════════════════════════
// Comparisons
// ═══════════════════════════════════════

/**
 * Split the records into two disjoint sub-windows at a boundary and compare
 * the measure on each side. Both sides are evaluated from the raw records.
 */
function computeComparison(records: readonly DataRecord[], request: ComparisonRequest, window: Window | null): MetricValue {
  let boundary: IsoDay;
  let beforeRows: readonly DataRecord[];
  let afterRows: readonly DataRecord[];

  if (typeof request.boundary === "string") {
    boundary = parseDay(request.boundary) ?? request.boundary;
    const { before, after } = splitAt({ fields: [], records }, boundary);
    beforeRows = before.records;
    afterRows = after.records;
  } else {
    const days = request.boundary.trailingDays;
    if (!window) {
      return { shape: "comparison", boundary: "", before: null, after: null, delta: null, change: null };
    }
    boundary = addDays(window.end, -(days - 1));
    const afterWindow = { start: boundary, end: window.end };
    const beforeWindow = { start: addDays(boundary, -days), end: addDays(boundary, -1) };
    afterRows = records.filter((r) => inWindow(r.date, afterWindow));
    beforeRows = records.filter((r) => inWindow(r.date, beforeWindow));
  }

  const before = evaluate(beforeRows, request.measure);
  const after = evaluate(afterRows, request.measure);
  return { shape: "comparison", boundary, before, after, ...compare(before, after) };
}

/** Absolute and percent change from `before` to `after`. */
export function compare(before: number | null, after: number | null): { delta: number | null; change: number | null } {
  if (before === null || after === null) return { delta: null, change: null };
  return {
    delta: after - before,
    change: before === 0 ? null : ((after - before) / before) * 100,
  };
}
