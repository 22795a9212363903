/**
 * Self-contained HTML report generator.
 * Produces a single-file report with inline CSS, pre-rendered SVG charts,
 * and the chart data embedded once as plain JSON for client-side CSV export.
 */

import { renameSync, unlinkSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { DEFAULT_PRECISION } from "../charts.js";
import { AssemblyError, SerializationError } from "../errors.js";
import { windowLabel } from "../filters.js";
import { formatDelta, formatKpi } from "../utils.js";
import { deserializeCharts, toScriptJson } from "./json.js";
import { escapeHtml, renderChart } from "./svg.js";
import type { ChartSpec, KpiCard, ReportDocument, ReportSectionSpec, ReportTemplate, Window } from "../types.js";

export const NO_DATA_MESSAGE = "No records in the selected window";

export interface AssembleInput {
  /** Output of serializeCharts. */
  chartsJson: string;
  summary: KpiCard[];
  sections: ReportSectionSpec[];
  template: ReportTemplate;
  window: Window | null;
  generatedAt: string;
  noData?: boolean;
  precision?: number;
}

// ═══════════════════════════════════════
// Assemble
// ═══════════════════════════════════════

function readCharts(chartsJson: string): ChartSpec[] {
  try {
    return deserializeCharts(chartsJson);
  } catch (err) {
    if (err instanceof SerializationError) {
      throw new AssemblyError(`Chart data does not match the report: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

export function assembleReport(input: AssembleInput): ReportDocument {
  const precision = input.precision ?? DEFAULT_PRECISION;
  const noData = input.noData ?? false;
  const charts = readCharts(input.chartsJson);

  const byId = new Map<string, ChartSpec>();
  for (const chart of charts) {
    if (byId.has(chart.id)) throw new AssemblyError(`Duplicate chart id "${chart.id}"`);
    byId.set(chart.id, chart);
  }

  for (const card of input.summary) {
    if (card.value !== null && !Number.isFinite(card.value)) {
      throw new AssemblyError(`KPI "${card.label}" has a non-finite value`);
    }
    if (card.delta !== undefined && card.delta !== null && !Number.isFinite(card.delta)) {
      throw new AssemblyError(`KPI "${card.label}" has a non-finite delta`);
    }
  }

  const sections = noData
    ? []
    : input.sections.map(section => {
        if (section.charts.length === 0) throw new AssemblyError(`Section "${section.title}" has no charts`);
        return Object.freeze({
          title: section.title,
          charts: Object.freeze(
            section.charts.map(id => {
              const chart = byId.get(id);
              if (!chart) throw new AssemblyError(`Section "${section.title}" references unknown chart "${id}"`);
              return chart;
            }),
          ),
        });
      });

  const html = renderHtml({
    template: input.template,
    window: input.window,
    generatedAt: input.generatedAt,
    summary: input.summary,
    sections,
    chartsJson: input.chartsJson,
    noData,
    precision,
  });

  return Object.freeze({
    title: input.template.title,
    subtitle: input.template.subtitle,
    generatedAt: input.generatedAt,
    window: input.window,
    summary: Object.freeze([...input.summary]),
    sections: Object.freeze(sections),
    template: input.template,
    noData,
    html,
  });
}

/**
 * Write the report next to its target, then rename it into place.
 * The previous file at `path` stays intact if anything fails.
 */
export function writeReport(path: string, html: string): void {
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  writeFileSync(tmp, html, "utf-8");
  try {
    renameSync(tmp, path);
  } catch (err) {
    unlinkSync(tmp);
    throw err;
  }
}

// ═══════════════════════════════════════
// Generate HTML
// ═══════════════════════════════════════

interface RenderInput {
  template: ReportTemplate;
  window: Window | null;
  generatedAt: string;
  summary: KpiCard[];
  sections: readonly { title: string; charts: readonly ChartSpec[] }[];
  chartsJson: string;
  noData: boolean;
  precision: number;
}

function renderHtml(r: RenderInput): string {
  const { template } = r;
  const subtitle = [template.subtitle, r.window ? windowLabel(r.window) : "", `Generated ${formatGenerated(r.generatedAt)}`]
    .filter(s => s !== "")
    .map(escapeHtml)
    .join(" · ");

  const cards = r.summary.map(card => kpiCard(card, r.precision)).join("\n");

  const body = r.noData
    ? `<div class="section empty-state" id="no-data">
  <h2>${NO_DATA_MESSAGE}</h2>
  <p class="dim">Widen the window or check the input file.</p>
</div>`
    : r.sections.map(section).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<meta name="generated" content="${escapeHtml(r.generatedAt)}">
<title>${escapeHtml(template.title)}</title>
<style>
${CSS.replace("__ACCENT__", safeColor(template.accent))}
</style>
</head>
<body>

<header>
  <h1>${escapeHtml(template.title)}</h1>
  <p class="subtitle" id="subtitle">${subtitle}</p>
</header>

${cards ? `<div class="cards" id="cards">\n${cards}\n</div>\n` : ""}
${body}

<footer>${escapeHtml(template.footer)}</footer>

<script type="application/json" id="report-data">${toScriptJson(r.chartsJson)}</script>
<script>
${CLIENT_SCRIPT}
</script>

</body>
</html>
`;
}

function kpiCard(card: KpiCard, precision: number): string {
  let sub = "";
  if (card.delta !== undefined && card.delta !== null) {
    const text = formatDelta(card.delta, card.format, precision);
    sub = `\n    <div class="card-sub delta ${deltaClass(card, text)}">${escapeHtml(text)} vs previous period</div>`;
  }
  return `  <div class="card">
    <div class="card-label">${escapeHtml(card.label)}</div>
    <div class="card-value">${escapeHtml(formatKpi(card.value, card.format, precision))}</div>${sub}
  </div>`;
}

/** good/bad follows the card's direction; a change that rounds to zero is flat. */
function deltaClass(card: KpiCard, shown: string): "good" | "bad" | "flat" {
  if (!shown.startsWith("+") && !shown.startsWith("-")) return "flat";
  const up = shown.startsWith("+");
  return up === (card.higherIsBetter ?? true) ? "good" : "bad";
}

function section(s: { title: string; charts: readonly ChartSpec[] }): string {
  const charts = s.charts
    .map(
      chart => `  <figure class="chart" id="chart-${escapeHtml(chart.id)}">
    <figcaption>${escapeHtml(chart.title)}<button type="button" class="csv" data-chart="${escapeHtml(chart.id)}">CSV</button></figcaption>
    <div class="chart-container">${renderChart(chart)}</div>
  </figure>`,
    )
    .join("\n");
  return `<div class="section">
  <h2>${escapeHtml(s.title)}</h2>
${charts}
</div>`;
}

// ═══════════════════════════════════════
// Helpers
// ═══════════════════════════════════════

function formatGenerated(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return d.toLocaleDateString("en-US", { month: "short", day: "numeric", year: "numeric", timeZone: "UTC" });
}

/** Only hex colors reach the stylesheet. */
function safeColor(color: string): string {
  return /^#[0-9a-f]{3,8}$/i.test(color) ? color : "#6366f1";
}

// ═══════════════════════════════════════
// Client script: per-chart CSV download
// ═══════════════════════════════════════

const CLIENT_SCRIPT = `
const CHARTS = JSON.parse(document.getElementById('report-data').textContent);

function csvCell(v) {
  if (v === null || v === undefined) return '';
  const s = String(v);
  return /[",\\n]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s;
}

function chartCsv(chart) {
  const geo = chart.kind === 'geo-scatter';
  const rows = [geo ? ['series', 'label', 'value', 'lat', 'lon'] : ['series', chart.axes.x || 'x', chart.axes.y || 'y']];
  chart.series.forEach(s => s.points.forEach(p => {
    rows.push(geo ? [s.name, p.x, p.y, p.lat, p.lon] : [s.name, p.x, p.y]);
  }));
  return rows.map(r => r.map(csvCell).join(',')).join('\\n') + '\\n';
}

document.querySelectorAll('button.csv').forEach(btn => {
  btn.addEventListener('click', () => {
    const chart = CHARTS.find(c => c.id === btn.dataset.chart);
    if (!chart) return;
    const url = URL.createObjectURL(new Blob([chartCsv(chart)], { type: 'text/csv' }));
    const a = document.createElement('a');
    a.href = url;
    a.download = chart.id + '.csv';
    a.click();
    URL.revokeObjectURL(url);
  });
});
`;

// ═══════════════════════════════════════
// Inline CSS
// ═══════════════════════════════════════

const CSS = `
:root {
  --bg: #fafafa; --bg2: #fff; --fg: #1a1a2e; --fg2: #555;
  --border: #e0e0e0; --accent: __ACCENT__;
  --green: #22c55e; --yellow: #eab308; --red: #ef4444; --blue: #3b82f6;
  --card-shadow: 0 1px 3px rgba(0,0,0,0.08);
  --radius: 8px;
}
@media (prefers-color-scheme: dark) {
  :root {
    --bg: #0f0f1a; --bg2: #1a1a2e; --fg: #e4e4e7; --fg2: #a1a1aa;
    --border: #2a2a3e;
    --card-shadow: 0 1px 3px rgba(0,0,0,0.3);
  }
}
* { box-sizing: border-box; margin: 0; padding: 0; }
body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif;
  background: var(--bg); color: var(--fg); line-height: 1.6; padding: 2rem; max-width: 1100px; margin: 0 auto; }
header { margin-bottom: 2rem; }
h1 { font-size: 1.5rem; font-weight: 600; }
h2 { font-size: 1.1rem; font-weight: 600; margin-bottom: 1rem; }
.subtitle { color: var(--fg2); font-size: 0.875rem; }

.cards { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 1rem; margin-bottom: 2rem; }
.card { background: var(--bg2); border: 1px solid var(--border); border-radius: var(--radius);
  padding: 1.25rem; box-shadow: var(--card-shadow); }
.card-label { font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.05em; color: var(--fg2); }
.card-value { font-size: 1.75rem; font-weight: 700; color: var(--accent); }
.card-sub { font-size: 0.75rem; color: var(--fg2); }
.delta.good { color: var(--green); }
.delta.bad { color: var(--red); }

.section { background: var(--bg2); border: 1px solid var(--border); border-radius: var(--radius);
  padding: 1.5rem; margin-bottom: 1.5rem; box-shadow: var(--card-shadow); }
.chart { margin-bottom: 1.5rem; }
.chart:last-child { margin-bottom: 0; }
figcaption { display: flex; justify-content: space-between; align-items: center;
  font-size: 0.9rem; font-weight: 500; margin-bottom: 0.5rem; }
.chart-container { overflow-x: auto; }
button.csv { font-size: 0.7rem; padding: 0.15rem 0.5rem; border: 1px solid var(--border);
  border-radius: var(--radius); background: var(--bg); color: var(--fg2); cursor: pointer; }
button.csv:hover { color: var(--accent); }
.empty-state { text-align: center; padding: 3rem 1.5rem; }
.dim { color: var(--fg2); }

footer { text-align: center; color: var(--fg2); font-size: 0.75rem; margin-top: 2rem; padding: 1rem 0; }

svg text { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif; }

@media print { body { padding: 1rem; } .section { break-inside: avoid; } button.csv { display: none; } }
@media (max-width: 640px) { body { padding: 1rem; } }
`;
