#!/usr/bin/env node

/**
 * airstat: KPI and chart reports for aviation operational records.
 */

import { Command } from "commander";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, type ReportConfig } from "./config.js";
import { today } from "./dates.js";
import { AirstatError, ConfigError, PipelineError } from "./errors.js";
import { windowLabel } from "./filters.js";
import { writeReport } from "./formatters/html.js";
import { printBreakdowns, printLoadReport, printSummary, printWarnings } from "./formatters/table.js";
import { runExport, runReport, runSummary } from "./pipeline.js";
import { getPreset, PRESET_NAMES } from "./presets.js";
import { generateSample } from "./sample.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const program = new Command();

program
  .name("airstat")
  .description("KPI and chart reports for flight-performance and wildlife-strike records")
  .version("0.1.0");

// Shared options
function addCommonOptions(cmd: Command): Command {
  return cmd
    .requiredOption("-i, --input <csv>", "Input CSV file")
    .option("--preset <name>", `Report preset: ${PRESET_NAMES.join(", ")}`)
    .option("--history-days <n>", "Days of history to load (30-365, default 90)")
    .option("--period-days <n>", "Days in the current period (7-90, default 30)")
    .option("--from <date>", "Start date (YYYY-MM-DD), overrides the trailing windows")
    .option("--to <date>", "End date (YYYY-MM-DD), defaults to the last record")
    .option("--top <n>", "Categories kept in top-K breakdowns (1-50, default 10)")
    .option("--precision <n>", "Decimal places in charts and cards (0-4, default 1)")
    .option("--metrics <names>", "Comma-separated metric names to compute (default: all)")
    .option("--config <path>", "JSON config file; flags override its values");
}

interface CommonOpts {
  input: string;
  preset?: string;
  historyDays?: string;
  periodDays?: string;
  from?: string;
  to?: string;
  top?: string;
  precision?: string;
  metrics?: string;
  config?: string;
}

function buildConfig(opts: CommonOpts): ReportConfig {
  return loadConfig(
    {
      preset: opts.preset,
      historyDays: opts.historyDays,
      periodDays: opts.periodDays,
      from: opts.from,
      to: opts.to,
      topK: opts.top,
      precision: opts.precision,
      metrics: opts.metrics,
    },
    opts.config,
  );
}

/** Run a command body; report failures as `error [stage]: message` and exit 1. */
function run(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (err instanceof AirstatError) {
      const cause = err instanceof PipelineError && err.cause instanceof Error ? err.cause : err;
      console.error(`error [${err.stage}]: ${cause.message}`);
    } else {
      console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = 1;
  }
}

// report (HTML)
addCommonOptions(
  program
    .command("report")
    .description("Generate a self-contained HTML report")
    .option("-o, --output <path>", "Output file path (default: temp file)"),
).action((opts: CommonOpts & { output?: string }) =>
  run(() => {
    const config = buildConfig(opts);
    const output = opts.output ?? join(tmpdir(), `airstat-report-${Date.now()}.html`);
    const outcome = runReport({ input: opts.input, config, output });

    printLoadReport(outcome.load);
    printWarnings([...outcome.metricErrors, ...outcome.chartErrors]);
    if (outcome.document.noData) console.error(`${DIM}  no records in the selected window${RESET}`);
    console.log(`Report written to ${outcome.outputPath}`);
  }),
);

// summary (terminal)
addCommonOptions(
  program
    .command("summary", { isDefault: true })
    .description("KPI summary and breakdowns in the terminal"),
).action((opts: CommonOpts) =>
  run(() => {
    const config = buildConfig(opts);
    const outcome = runSummary({ input: opts.input, config });
    const preset = getPreset(config.preset, config);

    printLoadReport(outcome.load);
    printWarnings(outcome.metricErrors);
    printSummary(preset.template.title, outcome.window ? windowLabel(outcome.window) : "no data", outcome.cards, config.precision);
    printBreakdowns(outcome.result, config.topK);
  }),
);

// export (CSV)
addCommonOptions(
  program
    .command("export")
    .description("Export windowed records or computed metrics as CSV")
    .option("--what <what>", "records or metrics", "records")
    .option("-o, --output <path>", "Output file path (default: stdout)"),
).action((opts: CommonOpts & { what: string; output?: string }) =>
  run(() => {
    const config = buildConfig(opts);
    const what = opts.what === "metrics" ? "metrics" : opts.what === "records" ? "records" : null;
    if (!what) throw new ConfigError([`what: expected records or metrics, got "${opts.what}"`]);

    const outcome = runExport({ input: opts.input, config, what, output: opts.output });
    printWarnings(outcome.metricErrors);
    if (outcome.outputPath) {
      console.error(`${DIM}  ${outcome.rows} rows written to ${outcome.outputPath}${RESET}`);
    } else {
      process.stdout.write(outcome.csv);
    }
  }),
);

// sample (synthetic data)
program
  .command("sample")
  .description("Generate seeded synthetic records")
  .option("--preset <name>", `Record kind: ${PRESET_NAMES.join(", ")}`, "flights")
  .option("--days <n>", "Days to cover", "90")
  .option("--seed <n>", "Random seed", "42")
  .option("--end <date>", "Last day to cover (YYYY-MM-DD, default today)")
  .option("-o, --output <path>", "Output file path (default: stdout)")
  .action((opts: { preset: string; days: string; seed: string; end?: string; output?: string }) =>
    run(() => {
      // Reuse config validation for the preset name and end date.
      const { preset, to } = loadConfig({ preset: opts.preset, to: opts.end });
      const csv = generateSample({ preset, days: Number(opts.days), seed: Number(opts.seed), end: to ?? today() });
      if (opts.output) {
        writeReport(opts.output, csv);
        console.error(`${DIM}  sample written to ${opts.output}${RESET}`);
      } else {
        process.stdout.write(csv);
      }
    }),
  );

program.parse();
