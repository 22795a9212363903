/**
 * CSV export of windowed records and computed metrics.
 */

import type { AggregationResult, FieldValue, RecordSet } from "../types.js";

export const METRIC_COLUMNS = ["metric", "shape", "group", "key", "value", "lat", "lon"] as const;

export type MetricRow = Record<(typeof METRIC_COLUMNS)[number], FieldValue>;

function escapeCell(value: FieldValue): string {
  if (value === null) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Header line plus one line per row; missing and null cells are empty. */
export function toCsv<K extends string>(rows: Partial<Record<K, FieldValue>>[], columns: readonly K[]): string {
  const header = columns.map((c) => escapeCell(c)).join(",");
  const body = rows.map((row) => columns.map((c) => escapeCell(row[c] ?? null)).join(","));
  return [header, ...body].join("\n") + "\n";
}

/** One line per record: source row, date, then every loaded field. */
export function recordsToCsv(set: RecordSet): string {
  const columns = ["row", "date", ...set.fields];
  const rows = set.records.map((r) => {
    const row: Record<string, FieldValue> = { row: r.row, date: r.date };
    for (const field of set.fields) row[field] = r.values[field] ?? null;
    return row;
  });
  return toCsv(rows, columns);
}

/**
 * Flatten an aggregation result into long form. `group` holds the series
 * label of a split series or the boundary of a comparison; `key` holds the
 * bucket date, category label or comparison side.
 */
export function metricRows(result: AggregationResult): MetricRow[] {
  const rows: MetricRow[] = [];
  const push = (metric: string, shape: string, group: string, key: string, value: number | null, lat: number | null = null, lon: number | null = null) =>
    rows.push({ metric, shape, group, key, value, lat, lon });

  for (const [name, value] of result) {
    switch (value.shape) {
      case "scalar":
        push(name, value.shape, "", "", value.value);
        break;
      case "series":
        for (const p of value.points) push(name, value.shape, "", p.date, p.value);
        break;
      case "multiSeries":
        for (const s of value.series) {
          value.dates.forEach((date, i) => push(name, value.shape, s.label, date, s.values[i] ?? null));
        }
        break;
      case "breakdown":
        for (const e of value.entries) push(name, value.shape, "", e.label, e.value);
        break;
      case "geo":
        for (const p of value.points) push(name, value.shape, "", p.label, p.value, p.lat, p.lon);
        break;
      case "comparison":
        push(name, value.shape, value.boundary, "before", value.before);
        push(name, value.shape, value.boundary, "after", value.after);
        push(name, value.shape, value.boundary, "delta", value.delta);
        push(name, value.shape, value.boundary, "change", value.change);
        break;
    }
  }

  return rows;
}
