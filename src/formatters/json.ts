/**
 * Chart serializer.
 * Chart specs are written as plain JSON text: strings, finite numbers,
 * booleans, null, arrays and plain objects only. Anything else, and anything
 * that smuggles binary data (base64 data URIs, typed-array encodings), is
 * rejected rather than dropped.
 */

import { z } from "zod";
import { SerializationError } from "../errors.js";
import type { ChartSpec } from "../types.js";

const DATA_URI_BASE64 = /^data:[^,]*;base64,/i;

const ThresholdSchema = z.object({ value: z.number(), label: z.string(), color: z.string() }).strict();

const ChartPointSchema = z
  .object({
    x: z.string(),
    y: z.number().nullable(),
    lat: z.number().optional(),
    lon: z.number().optional(),
  })
  .strict();

export const ChartSpecSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    kind: z.enum(["line", "bar", "pie", "stacked-area", "geo-scatter"]),
    axes: z.object({ x: z.string(), y: z.string() }).strict(),
    series: z.array(
      z.object({ name: z.string(), color: z.string(), points: z.array(ChartPointSchema) }).strict(),
    ),
    style: z
      .object({
        colors: z.array(z.string()),
        thresholds: z.array(ThresholdSchema),
        orientation: z.enum(["vertical", "horizontal"]),
        stacked: z.boolean(),
        precision: z.number().int().min(0),
        unit: z.string(),
      })
      .strict(),
  })
  .strict();

const ChartListSchema = z.array(ChartSpecSchema);

/** Serialize chart specs to JSON text, after checking every value is plain data. */
export function serializeCharts(charts: readonly ChartSpec[]): string {
  assertPlain(charts, "charts");
  return JSON.stringify(charts);
}

/** Parse serialized charts back into specs. */
export function deserializeCharts(text: string): ChartSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SerializationError("charts", `not valid JSON (${reason})`);
  }
  const parsed = ChartListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = ["charts", ...issue.path].map((p, i) => (typeof p === "number" ? `[${p}]` : i === 0 ? p : `.${p}`)).join("");
    throw new SerializationError(path, issue.message);
  }
  return parsed.data;
}

/**
 * Check that a value is representable as plain JSON without loss.
 * Throws SerializationError naming the first offending path.
 */
export function assertPlain(value: unknown, path: string): void {
  switch (typeof value) {
    case "string":
      if (DATA_URI_BASE64.test(value)) throw new SerializationError(path, "base64 data URI payload");
      return;
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) throw new SerializationError(path, `non-finite number ${value}`);
      return;
    case "undefined":
      throw new SerializationError(path, "undefined value");
    case "bigint":
    case "function":
    case "symbol":
      throw new SerializationError(path, `${typeof value} value`);
  }

  if (value === null || typeof value !== "object") return;

  if (Array.isArray(value)) {
    value.forEach((item, i) => assertPlain(item, `${path}[${i}]`));
    return;
  }

  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    throw new SerializationError(path, "binary buffer");
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    const name = value instanceof Date ? "Date" : value instanceof Map ? "Map" : value instanceof Set ? "Set" : "class instance";
    throw new SerializationError(path, `${name} is not plain data`);
  }

  const entries = Object.entries(value);
  if (entries.some(([key]) => key === "bdata") && entries.some(([key]) => key === "dtype")) {
    throw new SerializationError(path, "binary-encoded array (bdata/dtype)");
  }
  for (const [key, item] of entries) {
    assertPlain(item, `${path}.${key}`);
  }
}

/**
 * Make JSON safe to inline in a <script> element: no `</script>`,
 * no HTML comment openers, no raw line separators.
 */
export function toScriptJson(json: string): string {
  return json
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}
