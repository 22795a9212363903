/**
 * Error taxonomy. Every error names the pipeline stage it came from so the
 * CLI can report `error [stage]: message` without inspecting the type.
 */

import type { ChartKind, MetricShape, Window } from "./types.js";

export type Stage = "config" | "load" | "window" | "aggregate" | "chart" | "serialize" | "assemble" | "write";

export class AirstatError extends Error {
  readonly stage: Stage;

  constructor(stage: Stage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class ConfigError extends AirstatError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class LoadError extends AirstatError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("load", `Cannot load ${path}: ${reason}`, options);
    this.path = path;
  }
}

/** No records fall inside the window. Recoverable: rendered as a "no data" state. */
export class EmptyWindowError extends AirstatError {
  readonly window: Window;

  constructor(window: Window) {
    super("window", `No records between ${window.start} and ${window.end}`);
    this.window = window;
  }
}

export class UnknownMetricError extends AirstatError {
  readonly metric: string;
  readonly field: string;

  constructor(metric: string, field: string, detail?: string) {
    super("aggregate", detail ?? `Metric "${metric}" references unknown field "${field}"`);
    this.metric = metric;
    this.field = field;
  }
}

export class ChartShapeError extends AirstatError {
  readonly chart: string;
  readonly kind: ChartKind;
  readonly shape: MetricShape;

  constructor(chart: string, kind: ChartKind, shape: MetricShape) {
    super("chart", `Chart "${chart}" cannot draw a ${kind} chart from ${shape} data`);
    this.chart = chart;
    this.kind = kind;
    this.shape = shape;
  }
}

export class SerializationError extends AirstatError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("serialize", `Cannot serialize ${path}: ${reason}`);
    this.path = path;
  }
}

export class AssemblyError extends AirstatError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("assemble", reason, options);
  }
}

/** A fatal error wrapped with the stage that failed. No artifact was written. */
export class PipelineError extends AirstatError {
  constructor(stage: Stage, cause: Error) {
    super(stage, `${stage} failed: ${cause.message}`, { cause });
  }
}
