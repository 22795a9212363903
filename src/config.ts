/**
 * Report configuration.
 * Values come from an optional JSON file, overridden by command-line flags,
 * and are validated before anything is read from disk.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { parseDay } from "./dates.js";
import { ConfigError } from "./errors.js";
import { getPreset, PRESET_NAMES } from "./presets.js";

const Day = z.string().transform((value, ctx) => {
  const day = parseDay(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date`, fatal: true });
    return z.NEVER;
  }
  return day;
});

const MetricList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((s) => s.trim())
          .filter((s) => s !== "")
      : value,
  z.array(z.string().min(1)).min(1),
);

export const ConfigSchema = z
  .object({
    preset: z.enum(PRESET_NAMES).default("flights"),
    historyDays: z.coerce.number().int().min(30).max(365).default(90),
    periodDays: z.coerce.number().int().min(7).max(90).default(30),
    from: Day.optional(),
    to: Day.optional(),
    topK: z.coerce.number().int().min(1).max(50).default(10),
    precision: z.coerce.number().int().min(0).max(4).default(1),
    metrics: MetricList.optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.periodDays > config.historyDays) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["periodDays"],
        message: `must not exceed historyDays (${config.historyDays})`,
      });
    }
    if (config.from && config.to && config.from > config.to) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["from"], message: `${config.from} is after to (${config.to})` });
    }
    if (config.metrics) {
      const known = new Set(getPreset(config.preset, config).metrics.map((m) => m.name));
      for (const name of config.metrics) {
        if (!known.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["metrics"],
            message: `unknown metric "${name}" for preset ${config.preset}`,
          });
        }
      }
    }
  });

export type ReportConfig = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Validate raw configuration values. Every problem is reported as `path: message`. */
export function parseConfig(raw: unknown): ReportConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Merge a JSON config file with flag overrides and validate the result.
 * Overrides left undefined don't mask file values.
 */
export function loadConfig(overrides: Record<string, unknown>, file?: string): ReportConfig {
  const base = file ? readConfigFile(file) : {};
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return parseConfig(merged);
}

function readConfigFile(file: string): Record<string, unknown> {
  if (!existsSync(file)) throw new ConfigError([`config: file not found: ${file}`]);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`config: ${file} is not valid JSON (${reason})`]);
  }
  const parsed = z.record(z.unknown()).safeParse(raw);
  if (!parsed.success) throw new ConfigError([`config: ${file} must hold a JSON object`]);
  return parsed.data;
}
