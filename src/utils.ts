/**
 * Utility functions for rounding, formatting and display.
 */

import type { KpiFormat } from "./types.js";

/**
 * Round to a fixed number of decimals, half away from zero.
 * Only used at presentation boundaries.
 */
export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
  return rounded === 0 ? 0 : rounded; // no -0
}

/** Format a number compactly (12.3K, 1.2M). */
export function formatNum(n: number): string {
  const abs = Math.abs(n);
  if (abs >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (abs >= 10_000) return `${(n / 1_000).toFixed(1)}K`;
  return n.toLocaleString("en-US", { maximumFractionDigits: 2 });
}

/** Format a value for a KPI card. Null means there was nothing to measure. */
export function formatKpi(value: number | null, format: KpiFormat, precision: number): string {
  if (value === null) return "—";
  switch (format) {
    case "integer":
      return Math.round(value).toLocaleString("en-US");
    case "decimal":
      return roundTo(value, precision).toFixed(precision);
    case "percent":
      return `${roundTo(value, precision).toFixed(precision)}%`;
    case "minutes":
      return `${roundTo(value, precision).toFixed(precision)} min`;
  }
}

/** Format a signed change for a KPI card ("+1.5%", "-3 min"). */
export function formatDelta(delta: number, format: KpiFormat, precision: number): string {
  const rounded = format === "integer" ? Math.round(delta) : roundTo(delta, precision);
  const sign = rounded > 0 ? "+" : "";
  return `${sign}${formatKpi(rounded, format, precision)}`;
}

/** Format a percentage of a total. */
export function formatPct(value: number, total: number): string {
  if (total === 0) return "0.0%";
  return `${((value / total) * 100).toFixed(1)}%`;
}

/** Pad a string to a given width. */
export function padRight(s: string, width: number): string {
  return s.length >= width ? s : s + " ".repeat(width - s.length);
}

/** Pad a string on the left to a given width. */
export function padLeft(s: string, width: number): string {
  return s.length >= width ? s : " ".repeat(width - s.length) + s;
}

/** Create a simple horizontal bar using block characters. */
export function bar(value: number, max: number, width: number = 30): string {
  if (max === 0) return "░".repeat(width);
  const filled = Math.max(0, Math.min(width, Math.round((value / max) * width)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}
