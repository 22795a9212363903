/**
 * Column schemas for the two supported record types.
 */

import type { RecordSchema } from "./types.js";

/** One row per flight. */
export const FLIGHTS_SCHEMA: RecordSchema = {
  name: "flights",
  dateColumn: "date",
  columns: [
    { name: "date", type: "date", required: true, aliases: ["flight_date", "fl_date"] },
    { name: "carrier", type: "category", aliases: ["airline", "op_carrier"] },
    { name: "origin", type: "category" },
    { name: "dest", type: "category", aliases: ["destination"] },
    { name: "state", type: "category", aliases: ["origin_state"] },
    { name: "status", type: "category", required: true },
    { name: "delay_minutes", type: "number", aliases: ["arr_delay", "delay"] },
    { name: "delay_cause", type: "category", aliases: ["cause"] },
    { name: "distance", type: "number" },
  ],
};

/** One row per reported wildlife strike. */
export const STRIKES_SCHEMA: RecordSchema = {
  name: "strikes",
  dateColumn: "date",
  columns: [
    { name: "date", type: "date", required: true, aliases: ["incident_date"] },
    { name: "state", type: "category" },
    { name: "airport", type: "category" },
    { name: "airport_latitude", type: "number", signed: true },
    { name: "airport_longitude", type: "number", signed: true },
    { name: "species", type: "category" },
    { name: "operator", type: "category" },
    { name: "aircraft", type: "category" },
    { name: "phase_of_flight", type: "category", aliases: ["phase"] },
    { name: "damage_level", type: "category", aliases: ["damage"] },
    { name: "time_of_day", type: "category" },
    { name: "cost", type: "number", aliases: ["cost_repairs"] },
  ],
};

/** Normalize a header for matching: lowercase, no spaces, dashes, underscores or brackets. */
export function normalizeHeader(value: string): string {
  return value.toLowerCase().replace(/[\s_\-()/]+/g, "").trim();
}
