/**
 * SVG chart generators.
 * Pure functions that return inline SVG markup strings.
 */

import type { ChartSpec, Threshold } from "../types.js";
import { formatNum } from "../utils.js";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function noData(width: number, height: number): string {
  return `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">
      <text x="${width / 2}" y="${height / 2}" text-anchor="middle" fill="var(--fg2)" font-size="12">No data</text>
    </svg>`;
}

/** Render a chart spec with the matching generator. */
export function renderChart(spec: ChartSpec): string {
  const first = spec.series[0];
  const items = (first?.points ?? []).map((p, i) => ({
    label: p.x,
    value: p.y,
    color: spec.style.colors[i] ?? first.color,
  }));

  switch (spec.kind) {
    case "line":
    case "stacked-area": {
      const opts: LineChartOptions = {
        labels: (first?.points ?? []).map(p => p.x),
        series: spec.series.map(s => ({ name: s.name, color: s.color, values: s.points.map(p => p.y) })),
        width: 600,
        height: 240,
        thresholds: spec.style.thresholds,
      };
      return spec.style.stacked ? svgStackedAreaChart(opts) : svgLineChart(opts);
    }
    case "bar":
      if (spec.series.length === 1 && items.length > 0 && spec.style.colors.length === 1) {
        // Time-series bars share one color.
        for (const item of items) item.color = first.color;
      }
      return spec.style.orientation === "horizontal"
        ? svgBarChart({ items, width: 600, barHeight: 18 })
        : svgColumnChart({ items, width: 600, height: 260, thresholds: spec.style.thresholds });
    case "pie":
      return svgDonutChart({
        segments: items.map(i => ({ label: i.label, value: i.value ?? 0, color: i.color })),
        size: 200,
      });
    case "geo-scatter":
      return svgGeoScatter({
        points: (first?.points ?? []).flatMap(p =>
          p.lat === undefined || p.lon === undefined ? [] : [{ label: p.x, lat: p.lat, lon: p.lon, value: p.y ?? 0 }],
        ),
        color: first?.color ?? "#ef4444",
        width: 720,
        height: 380,
      });
  }
}

// ═══════════════════════════════════════
// Horizontal Bar Chart
// ═══════════════════════════════════════

export interface BarChartOptions {
  items: { label: string; value: number | null; color?: string }[];
  width: number;
  barHeight: number;
  labelWidth?: number;
}

export function svgBarChart(opts: BarChartOptions): string {
  const { items, width, barHeight } = opts;
  if (items.length === 0) return noData(width, 40);

  const labelWidth = opts.labelWidth ?? Math.min(170, Math.max(80, ...items.map(i => i.label.length * 7.5)));
  const barAreaWidth = width - labelWidth - 80; // space for value label
  const gap = 6;
  const maxValue = Math.max(...items.map(i => i.value ?? 0));
  const totalHeight = items.length * (barHeight + gap) + 10;

  let rects = "";
  items.forEach((item, i) => {
    const y = i * (barHeight + gap) + 5;
    const value = item.value ?? 0;
    const barW = maxValue > 0 ? Math.max(2, (value / maxValue) * barAreaWidth) : 0;
    const color = item.color ?? "var(--accent)";

    rects += `  <text x="${labelWidth - 8}" y="${y + barHeight * 0.72}" text-anchor="end" fill="var(--fg)" font-size="12">${escapeHtml(item.label)}</text>\n`;
    rects += `  <rect x="${labelWidth}" y="${y}" width="${barW}" height="${barHeight}" rx="3" fill="${color}" opacity="0.8"/>\n`;
    rects += `  <text x="${labelWidth + barW + 8}" y="${y + barHeight * 0.72}" fill="var(--fg2)" font-size="11">${item.value === null ? "—" : formatNum(item.value)}</text>\n`;
  });

  return `<svg viewBox="0 0 ${width} ${totalHeight}" width="100%" height="${totalHeight}">\n${rects}</svg>`;
}

// ═══════════════════════════════════════
// Vertical Column Chart
// ═══════════════════════════════════════

export interface ColumnChartOptions {
  items: { label: string; value: number | null; color?: string }[];
  width: number;
  height: number;
  thresholds?: Threshold[];
}

export function svgColumnChart(opts: ColumnChartOptions): string {
  const { items, width, height } = opts;
  if (items.length === 0) return noData(width, height);

  const pad = { top: 25, right: 20, bottom: 40, left: 55 };
  const chartW = width - pad.left - pad.right;
  const chartH = height - pad.top - pad.bottom;
  const thresholds = opts.thresholds ?? [];
  const { ticks, yMax } = yAxis(Math.max(...items.map(i => i.value ?? 0), ...thresholds.map(t => t.value)));
  const py = (v: number) => pad.top + chartH - (v / yMax) * chartH;

  const slot = chartW / items.length;
  const barW = Math.max(2, slot * 0.7);
  const labelEvery = Math.ceil(items.length / 12);

  let svg = `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n`;
  svg += gridLines(ticks, py, pad.left, width - pad.right);

  items.forEach((item, i) => {
    const x = pad.left + i * slot + (slot - barW) / 2;
    const value = item.value ?? 0;
    const y = py(value);
    svg += `  <rect x="${x}" y="${y}" width="${barW}" height="${py(0) - y}" rx="2" fill="${item.color ?? "var(--accent)"}" opacity="0.85"/>\n`;
    if (items.length <= 12) {
      svg += `  <text x="${x + barW / 2}" y="${y - 6}" text-anchor="middle" fill="var(--fg)" font-size="10" font-weight="600">${item.value === null ? "—" : formatNum(item.value)}</text>\n`;
    }
    if (i % labelEvery === 0) {
      svg += `  <text x="${x + barW / 2}" y="${py(0) + 16}" text-anchor="middle" fill="var(--fg2)" font-size="10">${escapeHtml(item.label)}</text>\n`;
    }
  });

  svg += thresholdLines(thresholds, py, pad.left, width - pad.right);
  svg += `</svg>`;
  return svg;
}

// ═══════════════════════════════════════
// Line / Area Chart
// ═══════════════════════════════════════

export interface LineChartOptions {
  labels: string[];
  series: { name: string; color: string; values: (number | null)[] }[];
  width: number;
  height: number;
  fill?: boolean;
  thresholds?: Threshold[];
}

export function svgLineChart(opts: LineChartOptions): string {
  const { labels, series, width, height } = opts;
  if (labels.length === 0 || series.length === 0) return noData(width, height);

  const fill = opts.fill ?? series.length === 1;
  const thresholds = opts.thresholds ?? [];
  const pad = { top: 25, right: 20, bottom: 30, left: 55 };
  const chartW = width - pad.left - pad.right;
  const chartH = height - pad.top - pad.bottom;
  const all = series.flatMap(s => s.values.filter((v): v is number => v !== null));
  const { ticks, yMax } = yAxis(Math.max(0, ...all, ...thresholds.map(t => t.value)));

  const px = (i: number) => (labels.length === 1 ? pad.left + chartW / 2 : pad.left + (i / (labels.length - 1)) * chartW);
  const py = (v: number) => pad.top + chartH - (v / yMax) * chartH;

  let svg = `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n`;
  svg += gridLines(ticks, py, pad.left, width - pad.right);

  for (const s of series) {
    // Nulls break the line into separate runs.
    for (const run of runs(s.values)) {
      const pts = run.map(([i, v]) => `${px(i)},${py(v)}`).join(" ");
      if (fill && run.length > 1) {
        const base = `${px(run[run.length - 1][0])},${py(0)} ${px(run[0][0])},${py(0)}`;
        svg += `  <polygon points="${pts} ${base}" fill="${s.color}" opacity="0.1"/>\n`;
      }
      if (run.length > 1) {
        svg += `  <polyline points="${pts}" fill="none" stroke="${s.color}" stroke-width="2.5" stroke-linejoin="round"/>\n`;
      }
      if (labels.length <= 31) {
        for (const [i, v] of run) svg += `  <circle cx="${px(i)}" cy="${py(v)}" r="3" fill="${s.color}"/>\n`;
      }
    }
  }

  // Value labels above points, single short series only
  if (series.length === 1 && labels.length <= 12) {
    series[0].values.forEach((v, i) => {
      if (v === null) return;
      svg += `  <text x="${px(i)}" y="${py(v) - 8}" text-anchor="middle" fill="var(--fg)" font-size="10" font-weight="600">${formatNum(v)}</text>\n`;
    });
  }

  svg += xLabels(labels, px, py(0) + 18);
  svg += thresholdLines(thresholds, py, pad.left, width - pad.right);
  svg += legend(series, pad.left, 12);
  svg += `</svg>`;
  return svg;
}

// ═══════════════════════════════════════
// Stacked Area Chart
// ═══════════════════════════════════════

export function svgStackedAreaChart(opts: LineChartOptions): string {
  const { labels, series, width, height } = opts;
  if (labels.length === 0 || series.length === 0) return noData(width, height);

  const pad = { top: 25, right: 20, bottom: 30, left: 55 };
  const chartW = width - pad.left - pad.right;
  const chartH = height - pad.top - pad.bottom;

  // Cumulative tops per series; missing values stack as zero.
  const tops: number[][] = [];
  let running = labels.map(() => 0);
  for (const s of series) {
    running = running.map((base, i) => base + (s.values[i] ?? 0));
    tops.push(running);
  }
  const { ticks, yMax } = yAxis(Math.max(...running, ...(opts.thresholds ?? []).map(t => t.value)));

  const px = (i: number) => (labels.length === 1 ? pad.left + chartW / 2 : pad.left + (i / (labels.length - 1)) * chartW);
  const py = (v: number) => pad.top + chartH - (v / yMax) * chartH;

  let svg = `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n`;
  svg += gridLines(ticks, py, pad.left, width - pad.right);

  series.forEach((s, k) => {
    const upper = tops[k];
    const lower = k === 0 ? labels.map(() => 0) : tops[k - 1];
    const top = upper.map((v, i) => `${px(i)},${py(v)}`).join(" ");
    const bottom = lower
      .map((v, i) => `${px(i)},${py(v)}`)
      .reverse()
      .join(" ");
    svg += `  <polygon points="${top} ${bottom}" fill="${s.color}" opacity="0.7"/>\n`;
    svg += `  <polyline points="${top}" fill="none" stroke="${s.color}" stroke-width="1.5"/>\n`;
  });

  svg += xLabels(labels, px, py(0) + 18);
  svg += thresholdLines(opts.thresholds ?? [], py, pad.left, width - pad.right);
  svg += legend(series, pad.left, 12);
  svg += `</svg>`;
  return svg;
}

// ═══════════════════════════════════════
// Donut / Pie Chart
// ═══════════════════════════════════════

export interface DonutChartOptions {
  segments: { label: string; value: number; color: string }[];
  size: number;
  centerLabel?: string;
  centerSub?: string;
  strokeWidth?: number;
}

export function svgDonutChart(opts: DonutChartOptions): string {
  const { segments, size, centerLabel, centerSub, strokeWidth = 28 } = opts;
  if (segments.length === 0) return noData(size, size);

  const cx = size / 2;
  const cy = size / 2;
  const r = (size - strokeWidth) / 2 - 4;
  const circumference = 2 * Math.PI * r;
  const total = segments.reduce((s, seg) => s + seg.value, 0);
  const legendWidth = 220;

  let svg = `<svg viewBox="0 0 ${size + legendWidth} ${size}" width="100%" height="${size}">\n`;

  let offset = 0;
  for (const seg of segments) {
    const segLen = total > 0 ? (seg.value / total) * circumference : 0;
    const gapLen = circumference - segLen;
    svg += `  <circle cx="${cx}" cy="${cy}" r="${r}" fill="none" stroke="${seg.color}" stroke-width="${strokeWidth}" `;
    svg += `stroke-dasharray="${segLen} ${gapLen}" stroke-dashoffset="${-offset}" transform="rotate(-90 ${cx} ${cy})"/>\n`;
    offset += segLen;
  }

  const center = centerLabel ?? formatNum(total);
  svg += `  <text x="${cx}" y="${cy - 2}" text-anchor="middle" fill="var(--fg)" font-size="14" font-weight="700">${escapeHtml(center)}</text>\n`;
  if (centerSub) {
    svg += `  <text x="${cx}" y="${cy + 14}" text-anchor="middle" fill="var(--fg2)" font-size="10">${escapeHtml(centerSub)}</text>\n`;
  }

  // Legend with shares
  segments.slice(0, 10).forEach((seg, i) => {
    const y = 20 + i * 18;
    const share = total > 0 ? ((seg.value / total) * 100).toFixed(1) : "0.0";
    svg += `  <rect x="${size + 16}" y="${y - 9}" width="10" height="10" rx="2" fill="${seg.color}"/>\n`;
    svg += `  <text x="${size + 32}" y="${y}" fill="var(--fg)" font-size="11">${escapeHtml(seg.label)} (${share}%)</text>\n`;
  });

  svg += `</svg>`;
  return svg;
}

// ═══════════════════════════════════════
// Geographic Scatter
// ═══════════════════════════════════════

export interface GeoScatterOptions {
  points: { label: string; lat: number; lon: number; value: number }[];
  color: string;
  width: number;
  height: number;
}

/** Bubble map on an equirectangular projection fitted to the points. */
export function svgGeoScatter(opts: GeoScatterOptions): string {
  const { points, color, width, height } = opts;
  if (points.length === 0) return noData(width, height);

  const pad = 20;
  let minLat = Math.min(...points.map(p => p.lat)) - 2;
  let maxLat = Math.max(...points.map(p => p.lat)) + 2;
  let minLon = Math.min(...points.map(p => p.lon)) - 2;
  let maxLon = Math.max(...points.map(p => p.lon)) + 2;
  // Keep at least a 10° span so a single airport isn't blown up.
  if (maxLat - minLat < 10) [minLat, maxLat] = [(minLat + maxLat) / 2 - 5, (minLat + maxLat) / 2 + 5];
  if (maxLon - minLon < 10) [minLon, maxLon] = [(minLon + maxLon) / 2 - 5, (minLon + maxLon) / 2 + 5];

  const px = (lon: number) => pad + ((lon - minLon) / (maxLon - minLon)) * (width - 2 * pad);
  const py = (lat: number) => pad + ((maxLat - lat) / (maxLat - minLat)) * (height - 2 * pad);
  const maxValue = Math.max(...points.map(p => p.value), 1);

  let svg = `<svg viewBox="0 0 ${width} ${height}" width="100%" height="${height}">\n`;
  svg += `  <rect x="${pad}" y="${pad}" width="${width - 2 * pad}" height="${height - 2 * pad}" fill="var(--bg)" stroke="var(--border)"/>\n`;

  // Graticule every 10°
  for (let lon = Math.ceil(minLon / 10) * 10; lon <= maxLon; lon += 10) {
    svg += `  <line x1="${px(lon)}" y1="${pad}" x2="${px(lon)}" y2="${height - pad}" stroke="var(--border)" stroke-width="0.5" stroke-dasharray="4"/>\n`;
    svg += `  <text x="${px(lon)}" y="${height - pad + 14}" text-anchor="middle" fill="var(--fg2)" font-size="9">${lon}°</text>\n`;
  }
  for (let lat = Math.ceil(minLat / 10) * 10; lat <= maxLat; lat += 10) {
    svg += `  <line x1="${pad}" y1="${py(lat)}" x2="${width - pad}" y2="${py(lat)}" stroke="var(--border)" stroke-width="0.5" stroke-dasharray="4"/>\n`;
    svg += `  <text x="${pad - 4}" y="${py(lat) + 3}" text-anchor="end" fill="var(--fg2)" font-size="9">${lat}°</text>\n`;
  }

  // Largest first so small bubbles stay visible on top
  const ordered = [...points].sort((a, b) => b.value - a.value);
  for (const p of ordered) {
    const r = 3 + 17 * Math.sqrt(p.value / maxValue);
    svg += `  <circle cx="${px(p.lon)}" cy="${py(p.lat)}" r="${r}" fill="${color}" fill-opacity="0.45" stroke="${color}"><title>${escapeHtml(p.label)}: ${formatNum(p.value)}</title></circle>\n`;
  }
  for (const p of ordered.slice(0, 5)) {
    svg += `  <text x="${px(p.lon)}" y="${py(p.lat) - 6}" text-anchor="middle" fill="var(--fg)" font-size="10" font-weight="600">${escapeHtml(p.label)}</text>\n`;
  }

  svg += `</svg>`;
  return svg;
}

// ═══════════════════════════════════════
// Helpers
// ═══════════════════════════════════════

function yAxis(maxVal: number): { ticks: number[]; yMax: number } {
  const top = Math.max(maxVal, 1);
  const step = niceStep(top, 4);
  const yMax = Math.ceil(top / step) * step;
  const ticks: number[] = [];
  for (let v = 0; v <= yMax + step / 2; v += step) ticks.push(v);
  return { ticks, yMax };
}

function gridLines(ticks: number[], py: (v: number) => number, left: number, right: number): string {
  let svg = "";
  for (const tick of ticks) {
    const y = py(tick);
    svg += `  <line x1="${left}" y1="${y}" x2="${right}" y2="${y}" stroke="var(--border)" stroke-width="0.5" stroke-dasharray="${tick === 0 ? "0" : "4"}"/>\n`;
    svg += `  <text x="${left - 8}" y="${y + 4}" text-anchor="end" fill="var(--fg2)" font-size="10">${formatNum(tick)}</text>\n`;
  }
  return svg;
}

function thresholdLines(thresholds: Threshold[], py: (v: number) => number, left: number, right: number): string {
  let svg = "";
  for (const t of thresholds) {
    const y = py(t.value);
    svg += `  <line x1="${left}" y1="${y}" x2="${right}" y2="${y}" stroke="${t.color}" stroke-width="1.5" stroke-dasharray="6 4"/>\n`;
    svg += `  <text x="${right}" y="${y - 4}" text-anchor="end" fill="${t.color}" font-size="10">${escapeHtml(t.label)}</text>\n`;
  }
  return svg;
}

function xLabels(labels: string[], px: (i: number) => number, y: number): string {
  const every = Math.ceil(labels.length / 8);
  let svg = "";
  labels.forEach((label, i) => {
    if (i % every !== 0 && i !== labels.length - 1) return;
    svg += `  <text x="${px(i)}" y="${y}" text-anchor="middle" fill="var(--fg2)" font-size="10">${escapeHtml(label)}</text>\n`;
  });
  return svg;
}

function legend(series: { name: string; color: string }[], x: number, y: number): string {
  if (series.length < 2) return "";
  let svg = "";
  let cursor = x;
  for (const s of series) {
    svg += `  <rect x="${cursor}" y="${y - 8}" width="10" height="10" rx="2" fill="${s.color}"/>\n`;
    svg += `  <text x="${cursor + 14}" y="${y + 1}" fill="var(--fg2)" font-size="10">${escapeHtml(s.name)}</text>\n`;
    cursor += 24 + s.name.length * 6;
  }
  return svg;
}

/** Consecutive runs of non-null values, as [index, value] pairs. */
function runs(values: (number | null)[]): [number, number][][] {
  const out: [number, number][][] = [];
  let current: [number, number][] = [];
  values.forEach((v, i) => {
    if (v === null) {
      if (current.length > 0) out.push(current);
      current = [];
    } else {
      current.push([i, v]);
    }
  });
  if (current.length > 0) out.push(current);
  return out;
}

function niceStep(maxVal: number, targetTicks: number): number {
  const rough = maxVal / targetTicks;
  const mag = Math.pow(10, Math.floor(Math.log10(rough)));
  const residual = rough / mag;
  let nice: number;
  if (residual <= 1.5) nice = 1;
  else if (residual <= 3) nice = 2;
  else if (residual <= 7) nice = 5;
  else nice = 10;
  return nice * mag;
}
