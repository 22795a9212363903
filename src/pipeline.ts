/**
 * End-to-end runs: load → window → aggregate → chart → serialize → assemble → write.
 * Every stage gets a fresh value from the one before. Fatal failures surface as
 * PipelineError tagged with the failing stage, and nothing is written.
 */

import { aggregate, mergeResults, validateRequests } from "./aggregator.js";
import { buildCharts } from "./charts.js";
import { parseConfig, type ReportConfig } from "./config.js";
import { AirstatError, ChartShapeError, EmptyWindowError, PipelineError, UnknownMetricError, type Stage } from "./errors.js";
import { applyWindow, dataSpan, trailingWindow, windowFromRange } from "./filters.js";
import { METRIC_COLUMNS, metricRows, recordsToCsv, toCsv } from "./formatters/csv.js";
import { assembleReport, writeReport } from "./formatters/html.js";
import { serializeCharts } from "./formatters/json.js";
import { loadRecords } from "./parser.js";
import { getPreset, type KpiSpec, type Preset, type WindowMode } from "./presets.js";
import type { AggregationResult, ChartRequest, KpiCard, LoadReport, RecordSet, ReportDocument, ReportSectionSpec, Window } from "./types.js";

export interface RunOptions {
  /** CSV file to read. */
  input: string;
  config: ReportConfig;
}

export interface ReportOptions extends RunOptions {
  output: string;
  /** Clock for the generated-at stamp. */
  now?: () => Date;
}

export interface ReportOutcome {
  document: ReportDocument;
  load: LoadReport;
  metricErrors: UnknownMetricError[];
  chartErrors: (ChartShapeError | UnknownMetricError)[];
  outputPath: string;
}

export interface ExportOptions extends RunOptions {
  what: "records" | "metrics";
  /** Written atomically when given; the CSV is only returned otherwise. */
  output?: string;
}

export interface ExportOutcome {
  csv: string;
  rows: number;
  load: LoadReport;
  window: Window | null;
  metricErrors: UnknownMetricError[];
  outputPath?: string;
}

export interface Windows {
  history: Window;
  analysis: Window;
}

export interface SummaryOutcome {
  cards: KpiCard[];
  result: AggregationResult;
  load: LoadReport;
  window: Window | null;
  metricErrors: UnknownMetricError[];
}

// ═══════════════════════════════════════
// Runs
// ═══════════════════════════════════════

export function runReport(options: ReportOptions): ReportOutcome {
  const config = step("config", () => parseConfig(options.config));
  const preset = getPreset(config.preset, config);
  const { records, report: load } = step("load", () => loadRecords(options.input, preset.schema));
  const computed = compute(records, preset, config);

  const requests = computed.empty ? [] : selectCharts(preset, computed.selected);
  const built = step("chart", () => buildCharts(requests, computed.result, { precision: config.precision }));
  const chartsJson = step("serialize", () => serializeCharts(built.charts));
  const builtIds = new Set(built.charts.map((c) => c.id));

  const document = step("assemble", () =>
    assembleReport({
      chartsJson,
      summary: computed.empty ? [] : buildKpis(selectKpis(preset, computed.selected), computed.result),
      sections: keepSections(preset.sections, builtIds),
      template: preset.template,
      window: computed.window,
      generatedAt: (options.now?.() ?? new Date()).toISOString(),
      noData: computed.empty,
      precision: config.precision,
    }),
  );

  step("write", () => writeReport(options.output, document.html));

  return {
    document,
    load,
    metricErrors: computed.errors,
    chartErrors: built.errors,
    outputPath: options.output,
  };
}

export function runExport(options: ExportOptions): ExportOutcome {
  const config = step("config", () => parseConfig(options.config));
  const preset = getPreset(config.preset, config);
  const { records, report: load } = step("load", () => loadRecords(options.input, preset.schema));
  const computed = compute(records, preset, config);

  let csv: string;
  let rows: number;
  if (options.what === "records") {
    const set = computed.analysisSet ?? { fields: records.fields, records: [] };
    csv = recordsToCsv(set);
    rows = set.records.length;
  } else {
    const long = metricRows(computed.result);
    csv = toCsv(long, METRIC_COLUMNS);
    rows = long.length;
  }

  const outputPath = options.output;
  if (outputPath !== undefined) step("write", () => writeReport(outputPath, csv));

  return { csv, rows, load, window: computed.window, metricErrors: computed.errors, outputPath };
}

/** KPI cards for the terminal, without building charts or writing anything. */
export function runSummary(options: RunOptions): SummaryOutcome {
  const config = step("config", () => parseConfig(options.config));
  const preset = getPreset(config.preset, config);
  const { records, report: load } = step("load", () => loadRecords(options.input, preset.schema));
  const computed = compute(records, preset, config);
  return {
    cards: computed.empty ? [] : buildKpis(selectKpis(preset, computed.selected), computed.result),
    result: computed.result,
    load,
    window: computed.window,
    metricErrors: computed.errors,
  };
}

// ═══════════════════════════════════════
// Windows
// ═══════════════════════════════════════

/**
 * History window: the explicit range, or `historyDays` ending at `to` (else
 * the last record). Analysis window: the same explicit range, or the trailing
 * `periodDays` of the history window. In `span` mode both windows run from
 * the first record to the end day instead.
 */
export function resolveWindows(set: RecordSet, config: ReportConfig, mode: WindowMode = "trailing"): Windows | null {
  const span = dataSpan(set);
  if (config.from) {
    const end = config.to ?? (span && span.end > config.from ? span.end : config.from);
    const range = windowFromRange(config.from, end);
    return { history: range, analysis: range };
  }
  const anchor = config.to ?? span?.end;
  if (!anchor) return null;
  if (mode === "span") {
    const range = { start: span && span.start < anchor ? span.start : anchor, end: anchor };
    return { history: range, analysis: range };
  }
  return {
    history: trailingWindow(config.historyDays, anchor),
    analysis: trailingWindow(config.periodDays, anchor),
  };
}

// ═══════════════════════════════════════
// Aggregation
// ═══════════════════════════════════════

interface Computed {
  /** Metric names the run computes. */
  selected: Set<string>;
  result: AggregationResult;
  errors: UnknownMetricError[];
  window: Window | null;
  analysisSet: RecordSet | null;
  /** Nothing fell inside the analysis window. */
  empty: boolean;
}

function compute(records: RecordSet, preset: Preset, config: ReportConfig): Computed {
  const selected = new Set(config.metrics ?? preset.metrics.map((m) => m.name));
  const requests = preset.metrics.filter((m) => selected.has(m.name));
  step("aggregate", () => validateRequests(requests));

  const windows = step("window", () => resolveWindows(records, config, preset.window));
  const empty: Computed = {
    selected,
    result: new Map(),
    errors: [],
    window: windows?.analysis ?? null,
    analysisSet: null,
    empty: true,
  };
  if (!windows) return empty;

  let historySet: RecordSet;
  let analysisSet: RecordSet;
  try {
    historySet = applyWindow(records, windows.history);
    analysisSet = applyWindow(historySet, windows.analysis);
  } catch (err) {
    if (err instanceof EmptyWindowError) return empty;
    throw wrap("window", err);
  }

  const history = step("aggregate", () =>
    aggregate(historySet, requests.filter((r) => r.scope === "history"), { window: windows.history }),
  );
  const analysis = step("aggregate", () =>
    aggregate(analysisSet, requests.filter((r) => r.scope !== "history"), { window: windows.analysis }),
  );

  const order = requests.map((r) => r.name);
  const errorIndex = (e: UnknownMetricError) => order.indexOf(e.metric);
  return {
    selected,
    result: mergeResults(order, history.result, analysis.result),
    errors: [...history.errors, ...analysis.errors].sort((a, b) => errorIndex(a) - errorIndex(b)),
    window: windows.analysis,
    analysisSet,
    empty: false,
  };
}

// ═══════════════════════════════════════
// KPI cards and sections
// ═══════════════════════════════════════

/** Read KPI card values out of the computed metrics. A missing metric shows as an empty card. */
export function buildKpis(specs: KpiSpec[], result: AggregationResult): KpiCard[] {
  return specs.map((spec) => {
    const card: KpiCard = { label: spec.label, value: null, format: spec.format, higherIsBetter: spec.higherIsBetter };
    const value = result.get(spec.metric);
    if (!value) return card;

    if (value.shape === "scalar") return { ...card, value: value.value };
    if (value.shape !== "comparison") return card;
    switch (spec.pick ?? "after") {
      case "before":
        return { ...card, value: value.before };
      case "change":
        return { ...card, value: value.change };
      case "after":
        return { ...card, value: value.after, delta: value.delta };
    }
  });
}

function selectCharts(preset: Preset, selected: Set<string>): ChartRequest[] {
  return preset.charts.filter((c) => selected.has(c.metric));
}

function selectKpis(preset: Preset, selected: Set<string>): KpiSpec[] {
  return preset.kpis.filter((k) => selected.has(k.metric));
}

/** Drop charts that weren't built, then sections left with nothing in them. */
export function keepSections(sections: ReportSectionSpec[], built: Set<string>): ReportSectionSpec[] {
  return sections
    .map((s) => ({ title: s.title, charts: s.charts.filter((id) => built.has(id)) }))
    .filter((s) => s.charts.length > 0);
}

// ═══════════════════════════════════════
// Errors
// ═══════════════════════════════════════

function step<T>(stage: Stage, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw wrap(stage, err);
  }
}

function wrap(stage: Stage, err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof AirstatError) return new PipelineError(err.stage, err);
  return new PipelineError(stage, err instanceof Error ? err : new Error(String(err)));
}
