/**
 * Terminal table formatter.
 * Hand-rolled, no dependencies.
 */

import type { AggregationResult, KpiCard, LabeledValue, LoadReport } from "../types.js";
import { bar, formatDelta, formatKpi, formatNum, formatPct, padLeft, padRight } from "../utils.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

/** KPI lines, one per card: label, value and the change against the previous period. */
export function kpiLines(cards: KpiCard[], precision: number): string[] {
  const labelWidth = Math.max(4, ...cards.map((c) => c.label.length));
  const values = cards.map((c) => formatKpi(c.value, c.format, precision));
  const valueWidth = Math.max(...values.map((v) => v.length), 1);

  return cards.map((card, i) => {
    let line = `  ${padRight(card.label, labelWidth)}  ${padLeft(values[i], valueWidth)}`;
    if (card.delta !== undefined && card.delta !== null) {
      line += `    (${formatDelta(card.delta, card.format, precision)} vs previous period)`;
    }
    return line;
  });
}

/** Print the KPI summary. */
export function printSummary(title: string, subtitle: string, cards: KpiCard[], precision: number): void {
  console.log(`\n  ${title} — ${subtitle}\n`);
  console.log(`  ${"─".repeat(60)}`);

  if (cards.length === 0) {
    console.log("  No records in the selected window.\n");
    return;
  }

  for (const line of kpiLines(cards, precision)) console.log(line);
  console.log();
}

/** Print one breakdown as a bar table with shares of the total. */
export function printBreakdown(title: string, entries: LabeledValue[], limit: number = 10): void {
  console.log(`\n  ${title}\n`);
  if (entries.length === 0) {
    console.log("  No data.\n");
    return;
  }

  const shown = entries.slice(0, limit);
  const total = entries.reduce((s, e) => s + e.value, 0);
  const max = Math.max(...shown.map((e) => e.value));
  const nameWidth = Math.max(5, ...shown.map((e) => e.label.length));

  for (const e of shown) {
    console.log(`  ${padRight(e.label, nameWidth)}  ${bar(e.value, max, 24)}  ${padLeft(formatNum(e.value), 8)}  ${padLeft(formatPct(e.value, total), 6)}`);
  }
  if (entries.length > limit) {
    console.log(`${DIM}  … ${entries.length - limit} more${RESET}`);
  }
}

/** Print every breakdown metric in a result. */
export function printBreakdowns(result: AggregationResult, limit: number = 10): void {
  for (const [name, value] of result) {
    if (value.shape === "breakdown") printBreakdown(name, value.entries, limit);
  }
  console.log();
}

/** Print what the loader kept and dropped, dimmed. */
export function printLoadReport(report: LoadReport): void {
  const lines = [`  ${report.path}: ${formatNum(report.rowsKept)} of ${formatNum(report.rowsRead)} rows kept`];
  if (report.rowsDropped > 0) {
    lines.push(`  dropped ${formatNum(report.rowsDropped)} rows without a usable date`);
    for (const d of report.dropped) lines.push(`    row ${d.row}: ${d.reason}`);
    if (report.dropped.length < report.rowsDropped) {
      lines.push(`    … ${report.rowsDropped - report.dropped.length} more`);
    }
  }
  for (const [column, count] of Object.entries(report.invalidNumbers)) {
    lines.push(`  ${column}: ${formatNum(count)} invalid numbers treated as missing`);
  }
  for (const [column, count] of Object.entries(report.missing)) {
    lines.push(`  ${column}: ${formatNum(count)} empty`);
  }
  for (const line of lines) console.error(`${DIM}${line}${RESET}`);
}

/** Print non-fatal problems (skipped metrics and charts) to stderr. */
export function printWarnings(errors: Error[]): void {
  for (const err of errors) console.error(`${DIM}  warning: ${err.message}${RESET}`);
}
