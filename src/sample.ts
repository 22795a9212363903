/**
 * Seeded synthetic records for demos and tests.
 * The same seed, preset, day count and end date always produce the same CSV.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { addDays } from "./dates.js";
import { ConfigError } from "./errors.js";
import { toCsv } from "./formatters/csv.js";
import type { PresetName } from "./presets.js";
import { FLIGHTS_SCHEMA, STRIKES_SCHEMA } from "./schemas.js";
import type { FieldValue, IsoDay } from "./types.js";

/**
 * Deterministic random source (mulberry32).
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1). */
  random(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max]. */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  weightedPick<T>(items: readonly T[], weights: readonly number[]): T {
    const total = weights.reduce((sum, w) => sum + w, 0);
    let r = this.random() * total;
    for (let i = 0; i < items.length; i++) {
      r -= weights[i];
      if (r <= 0) return items[i];
    }
    return items[items.length - 1];
  }
}

const Airport = z.object({ code: z.string(), state: z.string(), lat: z.number(), lon: z.number() });

const VocabSchema = z.object({
  airports: z.array(Airport).min(2),
  carriers: z.array(z.string()).min(1),
  delayCauses: z.array(z.string()).min(1),
  delayCauseWeights: z.array(z.number()),
  species: z.array(z.string()).min(1),
  operators: z.array(z.string()).min(1),
  aircraft: z.array(z.string()).min(1),
  phases: z.array(z.string()).min(1),
  phaseWeights: z.array(z.number()),
  damageLevels: z.array(z.string()).min(1),
  damageWeights: z.array(z.number()),
  timesOfDay: z.array(z.string()).min(1),
  timeOfDayWeights: z.array(z.number()),
});

type Vocab = z.infer<typeof VocabSchema>;

let vocab: Vocab | undefined;

function loadVocab(): Vocab {
  vocab ??= VocabSchema.parse(JSON.parse(readFileSync(new URL("../data/sample-vocab.json", import.meta.url), "utf-8")));
  return vocab;
}

export interface SampleOptions {
  preset: PresetName;
  /** Number of days to cover, ending at `end`. */
  days: number;
  seed: number;
  end: IsoDay;
}

export function generateSample(options: SampleOptions): string {
  if (!Number.isInteger(options.days) || options.days < 1 || options.days > 3650) {
    throw new ConfigError([`days: expected a whole number between 1 and 3650, got ${options.days}`]);
  }
  if (!Number.isInteger(options.seed)) {
    throw new ConfigError([`seed: expected an integer, got ${options.seed}`]);
  }

  const rng = new SeededRNG(options.seed);
  const words = loadVocab();
  const start = addDays(options.end, -(options.days - 1));
  const schema = options.preset === "flights" ? FLIGHTS_SCHEMA : STRIKES_SCHEMA;
  const rows: Record<string, FieldValue>[] = [];

  for (let day = start; day <= options.end; day = addDays(day, 1)) {
    if (options.preset === "flights") rows.push(...flightsFor(day, rng, words));
    else rows.push(...strikesFor(day, rng, words));
  }

  return toCsv(rows, schema.columns.map((c) => c.name));
}

const STATUSES = ["on_time", "delayed", "cancelled", "diverted"];

function flightsFor(day: IsoDay, rng: SeededRNG, words: Vocab): Record<string, FieldValue>[] {
  // Slow seasonal drift in punctuality
  const month = Number(day.slice(5, 7));
  const winter = month === 12 || month <= 2;
  const weights = winter ? [70, 21, 7, 2] : [80, 15, 3, 2];

  const rows: Record<string, FieldValue>[] = [];
  const count = rng.int(20, 40);
  for (let i = 0; i < count; i++) {
    const origin = rng.pick(words.airports);
    let dest = rng.pick(words.airports);
    while (dest.code === origin.code) dest = rng.pick(words.airports);
    const status = rng.weightedPick(STATUSES, weights);

    let delay: number | null = null;
    let cause: string | null = null;
    if (status === "delayed") {
      delay = rng.int(15, 180);
      cause = rng.weightedPick(words.delayCauses, words.delayCauseWeights);
    } else if (status === "on_time") {
      delay = rng.int(0, 14);
    }

    rows.push({
      date: day,
      carrier: rng.pick(words.carriers),
      origin: origin.code,
      dest: dest.code,
      state: origin.state,
      status,
      delay_minutes: delay,
      delay_cause: cause,
      distance: rng.int(150, 2700),
    });
  }
  return rows;
}

function strikesFor(day: IsoDay, rng: SeededRNG, words: Vocab): Record<string, FieldValue>[] {
  // Traffic collapsed in spring 2020, so did strikes.
  const lockdown = day >= "2020-03-15" && day < "2020-07-01";
  const count = lockdown ? rng.int(0, 2) : rng.int(0, 6);

  const rows: Record<string, FieldValue>[] = [];
  for (let i = 0; i < count; i++) {
    const airport = rng.pick(words.airports);
    const damage = rng.weightedPick(words.damageLevels, words.damageWeights);
    rows.push({
      date: day,
      state: airport.state,
      airport: airport.code,
      airport_latitude: airport.lat,
      airport_longitude: airport.lon,
      species: rng.pick(words.species),
      operator: rng.pick(words.operators),
      aircraft: rng.pick(words.aircraft),
      phase_of_flight: rng.weightedPick(words.phases, words.phaseWeights),
      damage_level: damage,
      time_of_day: rng.weightedPick(words.timesOfDay, words.timeOfDayWeights),
      cost: damage === "N" ? null : rng.int(500, damage === "D" ? 2_000_000 : 150_000),
    });
  }
  return rows;
}
