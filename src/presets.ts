/**
 * Report presets: which metrics to compute, how to chart them, and which
 * numbers go on the KPI cards, per record schema.
 */

import { FLIGHTS_SCHEMA, STRIKES_SCHEMA } from "./schemas.js";
import type {
  ChartRequest,
  KpiFormat,
  MetricRequest,
  RecordSchema,
  ReportSectionSpec,
  ReportTemplate,
} from "./types.js";

export const PRESET_NAMES = ["flights", "strikes"] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

export interface KpiSpec {
  label: string;
  metric: string;
  format: KpiFormat;
  /**
   * Side of a comparison metric to show. "after" also shows the change
   * against "before" as the card's delta.
   */
  pick?: "before" | "after" | "change";
  higherIsBetter?: boolean;
}

/**
 * How a run picks its windows when no start date is given. `trailing` counts
 * back from the end day; `span` starts at the first record.
 */
export type WindowMode = "trailing" | "span";

export interface Preset {
  name: PresetName;
  schema: RecordSchema;
  window: WindowMode;
  template: ReportTemplate;
  metrics: MetricRequest[];
  charts: ChartRequest[];
  sections: ReportSectionSpec[];
  kpis: KpiSpec[];
}

export interface PresetOptions {
  /** Length of the current period, for trailing comparisons. */
  periodDays: number;
  /** Categories kept in top-K breakdowns. */
  topK: number;
}

export function getPreset(name: PresetName, options: PresetOptions): Preset {
  switch (name) {
    case "flights":
      return flightsPreset(options);
    case "strikes":
      return strikesPreset(options);
  }
}

// ═══════════════════════════════════════
// Flights
// ═══════════════════════════════════════

const STATUS_LABELS: Record<string, string> = {
  on_time: "On-Time",
  delayed: "Delayed",
  cancelled: "Cancelled",
  diverted: "Diverted",
};

const STATUS_COLORS: Record<string, string> = {
  on_time: "#22c55e",
  delayed: "#eab308",
  cancelled: "#ef4444",
  diverted: "#3b82f6",
};

const CAUSE_LABELS: Record<string, string> = {
  carrier: "Carrier",
  weather: "Weather",
  nas: "Air Traffic (NAS)",
  security: "Security",
  late_aircraft: "Late Aircraft",
};

function flightsPreset({ periodDays, topK }: PresetOptions): Preset {
  const trailing = { trailingDays: periodDays };
  const delayed = { field: "status", in: ["delayed"] };

  return {
    name: "flights",
    schema: FLIGHTS_SCHEMA,
    window: "trailing",
    template: {
      title: "Flight Performance Report",
      subtitle: "On-time performance, delays and cancellations",
      footer: "Generated by airstat",
      accent: "#6366f1",
    },
    metrics: [
      { name: "flights_trend", kind: "comparison", scope: "history", boundary: trailing, measure: { op: "count" } },
      {
        name: "on_time_trend",
        kind: "comparison",
        scope: "history",
        boundary: trailing,
        measure: { op: "rate", field: "status", in: ["on_time"] },
      },
      {
        name: "delay_trend",
        kind: "comparison",
        scope: "history",
        boundary: trailing,
        measure: { op: "mean", field: "delay_minutes", where: delayed },
      },
      {
        name: "cancellation_trend",
        kind: "comparison",
        scope: "history",
        boundary: trailing,
        measure: { op: "rate", field: "status", in: ["cancelled"] },
      },
      { name: "delayed_flights", kind: "scalar", measure: { op: "count", where: delayed } },
      { name: "cancelled_flights", kind: "scalar", measure: { op: "count", where: { field: "status", in: ["cancelled"] } } },
      { name: "delay_rate", kind: "scalar", measure: { op: "rate", field: "status", in: ["delayed"] } },
      { name: "diverted_flights", kind: "scalar", measure: { op: "count", where: { field: "status", in: ["diverted"] } } },
      {
        name: "on_time_daily",
        kind: "series",
        granularity: "day",
        measure: { op: "rate", field: "status", in: ["on_time"] },
      },
      {
        name: "delay_daily",
        kind: "series",
        granularity: "day",
        measure: { op: "mean", field: "delay_minutes", where: delayed },
      },
      { name: "status_daily", kind: "series", granularity: "day", by: "status", measure: { op: "count" } },
      { name: "status_mix", kind: "breakdown", field: "status" },
      { name: "delay_causes", kind: "breakdown", field: "delay_cause", where: delayed, top: topK, other: true },
      {
        name: "causes_weekly",
        kind: "series",
        granularity: "week",
        by: "delay_cause",
        top: 5,
        other: true,
        measure: { op: "count", where: delayed },
      },
      { name: "top_origins", kind: "breakdown", field: "origin", top: topK },
    ],
    charts: [
      {
        id: "on-time-trend",
        metric: "on_time_daily",
        kind: "line",
        title: "On-Time Performance Trend",
        yLabel: "On-Time %",
        unit: "%",
        color: "#22c55e",
        thresholds: [{ value: 80, label: "Target 80%", color: "#ef4444" }],
      },
      {
        id: "delay-trend",
        metric: "delay_daily",
        kind: "line",
        title: "Average Delay",
        yLabel: "Minutes",
        unit: "min",
        color: "#eab308",
      },
      {
        id: "daily-operations",
        metric: "status_daily",
        kind: "line",
        title: "Daily Operations by Status",
        yLabel: "Flights",
        labels: STATUS_LABELS,
        colors: STATUS_COLORS,
      },
      {
        id: "status-distribution",
        metric: "status_mix",
        kind: "pie",
        title: "Flight Status Distribution",
        labels: STATUS_LABELS,
        colors: STATUS_COLORS,
      },
      {
        id: "delay-causes",
        metric: "delay_causes",
        kind: "bar",
        title: "Delays by Cause",
        yLabel: "Delayed flights",
        orientation: "horizontal",
        labels: CAUSE_LABELS,
      },
      {
        id: "delay-causes-weekly",
        metric: "causes_weekly",
        kind: "stacked-area",
        title: "Delay Causes over Time",
        yLabel: "Delayed flights",
        labels: CAUSE_LABELS,
      },
      {
        id: "top-origins",
        metric: "top_origins",
        kind: "bar",
        title: "Busiest Origin Airports",
        yLabel: "Flights",
        orientation: "horizontal",
        color: "#6366f1",
      },
    ],
    sections: [
      { title: "Performance", charts: ["on-time-trend", "delay-trend"] },
      { title: "Operations", charts: ["daily-operations", "status-distribution"] },
      { title: "Delays", charts: ["delay-causes", "delay-causes-weekly"] },
      { title: "Airports", charts: ["top-origins"] },
    ],
    kpis: [
      { label: "Total Flights", metric: "flights_trend", format: "integer", pick: "after" },
      { label: "On-Time", metric: "on_time_trend", format: "percent", pick: "after" },
      { label: "Avg Delay", metric: "delay_trend", format: "minutes", pick: "after", higherIsBetter: false },
      { label: "Cancellation Rate", metric: "cancellation_trend", format: "percent", pick: "after", higherIsBetter: false },
      { label: "Delayed", metric: "delayed_flights", format: "integer" },
      { label: "Cancelled", metric: "cancelled_flights", format: "integer" },
      { label: "Delay Rate", metric: "delay_rate", format: "percent" },
      { label: "Diverted", metric: "diverted_flights", format: "integer" },
    ],
  };
}

// ═══════════════════════════════════════
// Wildlife strikes
// ═══════════════════════════════════════

/** Start of the pandemic period. */
export const PANDEMIC_START = "2020-01-01";

const DAMAGE_LABELS: Record<string, string> = {
  N: "None",
  M: "Minor",
  "M?": "Uncertain",
  S: "Substantial",
  D: "Destroyed",
};

function strikesPreset({ topK }: PresetOptions): Preset {
  const top = (name: string, field: string): MetricRequest => ({ name, kind: "breakdown", field, top: topK });

  return {
    name: "strikes",
    schema: STRIKES_SCHEMA,
    // Both sides of PANDEMIC_START
    window: "span",
    template: {
      title: "Wildlife Strike Report",
      subtitle: "Reported wildlife strikes before and during the pandemic",
      footer: "Generated by airstat",
      accent: "#14b8a6",
    },
    metrics: [
      { name: "total_strikes", kind: "scalar", measure: { op: "count" } },
      { name: "pandemic", kind: "comparison", boundary: PANDEMIC_START, measure: { op: "count" } },
      { name: "states", kind: "scalar", measure: { op: "distinct", field: "state" } },
      { name: "species_count", kind: "scalar", measure: { op: "distinct", field: "species" } },
      { name: "aircraft_count", kind: "scalar", measure: { op: "distinct", field: "aircraft" } },
      { name: "airport_count", kind: "scalar", measure: { op: "distinct", field: "airport" } },
      { name: "monthly", kind: "series", granularity: "month", measure: { op: "count" } },
      {
        name: "airports",
        kind: "geo",
        field: "airport",
        lat: "airport_latitude",
        lon: "airport_longitude",
        top: 100,
      },
      top("top_states", "state"),
      { name: "time_of_day", kind: "breakdown", field: "time_of_day" },
      top("top_species", "species"),
      { name: "damage", kind: "breakdown", field: "damage_level" },
      top("top_aircraft", "aircraft"),
      top("top_operators", "operator"),
      { name: "phase", kind: "breakdown", field: "phase_of_flight" },
    ],
    charts: [
      {
        id: "pandemic-comparison",
        metric: "pandemic",
        kind: "bar",
        title: "Wildlife Strikes: Before vs During Pandemic",
        yLabel: "Strikes",
        comparisonLabels: ["Before", "During"],
        colors: { Before: "#2ecc71", During: "#e74c3c" },
      },
      { id: "monthly-strikes", metric: "monthly", kind: "line", title: "Monthly Wildlife Strikes", yLabel: "Strikes" },
      { id: "strike-map", metric: "airports", kind: "geo-scatter", title: "Geographic Distribution of Strikes", yLabel: "Strikes" },
      { id: "top-states", metric: "top_states", kind: "bar", title: "Top States", yLabel: "Strikes", orientation: "horizontal" },
      { id: "time-of-day", metric: "time_of_day", kind: "pie", title: "Strikes by Time of Day" },
      { id: "top-species", metric: "top_species", kind: "bar", title: "Top Species", yLabel: "Strikes", orientation: "horizontal" },
      {
        id: "damage-levels",
        metric: "damage",
        kind: "bar",
        title: "Damage Levels",
        yLabel: "Strikes",
        labels: DAMAGE_LABELS,
      },
      { id: "top-aircraft", metric: "top_aircraft", kind: "bar", title: "Top Aircraft Types", yLabel: "Strikes", orientation: "horizontal" },
      { id: "top-operators", metric: "top_operators", kind: "bar", title: "Top Operators", yLabel: "Strikes", orientation: "horizontal" },
      { id: "flight-phase", metric: "phase", kind: "bar", title: "Strikes by Phase of Flight", yLabel: "Strikes" },
    ],
    sections: [
      { title: "Pandemic Impact", charts: ["pandemic-comparison", "monthly-strikes"] },
      { title: "Where", charts: ["strike-map", "top-states"] },
      { title: "What", charts: ["top-species", "damage-levels", "time-of-day"] },
      { title: "Who", charts: ["top-aircraft", "top-operators", "flight-phase"] },
    ],
    kpis: [
      { label: "Total Strikes", metric: "total_strikes", format: "integer" },
      { label: "Before Pandemic", metric: "pandemic", format: "integer", pick: "before" },
      { label: "During Pandemic", metric: "pandemic", format: "integer", pick: "after", higherIsBetter: false },
      { label: "Change", metric: "pandemic", format: "percent", pick: "change" },
      { label: "States", metric: "states", format: "integer" },
      { label: "Species", metric: "species_count", format: "integer" },
      { label: "Aircraft Types", metric: "aircraft_count", format: "integer" },
      { label: "Airports", metric: "airport_count", format: "integer" },
    ],
  };
}
