import { describe, it, expect } from "vitest";
import { SerializationError } from "../errors.js";
import type { ChartSpec } from "../types.js";
import { assertPlain, deserializeCharts, serializeCharts, toScriptJson } from "./json.js";

function makeChart(overrides: Partial<ChartSpec> = {}): ChartSpec {
  return {
    id: "top-states",
    title: "Top states",
    kind: "bar",
    axes: { x: "", y: "Strikes" },
    series: [
      {
        name: "Strikes",
        color: "#6366f1",
        points: [
          { x: "TX", y: 4 },
          { x: "CO", y: null },
        ],
      },
    ],
    style: {
      colors: ["#6366f1", "#22c55e"],
      thresholds: [],
      orientation: "horizontal",
      stacked: false,
      precision: 1,
      unit: "",
    },
    ...overrides,
  };
}

describe("serializeCharts", () => {
  it("round-trips chart specs", () => {
    const charts = [makeChart(), makeChart({ id: "map", kind: "geo-scatter" })];
    expect(deserializeCharts(serializeCharts(charts))).toEqual(charts);
  });

  it("keeps geo coordinates", () => {
    const chart = makeChart({
      kind: "geo-scatter",
      series: [{ name: "Airports", color: "#ef4444", points: [{ x: "DFW", y: 3, lat: 32.9, lon: -97.04 }] }],
    });
    const text = serializeCharts([chart]);
    expect(text).toContain('{"x":"DFW","y":3,"lat":32.9,"lon":-97.04}');
  });

  it("rejects non-finite numbers with their path", () => {
    const chart = makeChart({ series: [{ name: "s", color: "#000", points: [{ x: "a", y: Number.NaN }] }] });
    expect(() => serializeCharts([chart])).toThrow(SerializationError);
    expect(() => serializeCharts([chart])).toThrow("Cannot serialize charts[0].series[0].points[0].y: non-finite number NaN");
  });

  it("rejects base64 data URIs", () => {
    const chart = makeChart({ title: "data:image/png;base64,AAAA" });
    expect(() => serializeCharts([chart])).toThrow("Cannot serialize charts[0].title: base64 data URI payload");
  });
});

describe("deserializeCharts", () => {
  it("rejects text that is not JSON", () => {
    expect(() => deserializeCharts("{nope")).toThrow(SerializationError);
  });

  it("rejects unknown keys and names the path", () => {
    const text = JSON.stringify([{ ...makeChart(), extra: true }]);
    expect(() => deserializeCharts(text)).toThrow("Cannot serialize charts[0]:");
  });

  it("rejects an unknown chart kind", () => {
    const text = JSON.stringify([{ ...makeChart(), kind: "radar" }]);
    expect(() => deserializeCharts(text)).toThrow("Cannot serialize charts[0].kind:");
  });
});

describe("assertPlain", () => {
  it("accepts plain data", () => {
    expect(() => assertPlain({ a: [1, "b", null, true], c: { d: 2 } }, "v")).not.toThrow();
  });

  it("rejects dates, maps and class instances", () => {
    expect(() => assertPlain({ at: new Date(0) }, "v")).toThrow("Cannot serialize v.at: Date is not plain data");
    expect(() => assertPlain([new Map()], "v")).toThrow("Cannot serialize v[0]: Map is not plain data");
    class Point {
      x = 1;
    }
    expect(() => assertPlain(new Point(), "v")).toThrow("Cannot serialize v: class instance is not plain data");
  });

  it("rejects binary payloads", () => {
    expect(() => assertPlain({ y: new Float64Array(2) }, "v")).toThrow("Cannot serialize v.y: binary buffer");
    expect(() => assertPlain({ y: { bdata: "AAAA", dtype: "f8" } }, "v")).toThrow("Cannot serialize v.y: binary-encoded array (bdata/dtype)");
  });

  it("rejects undefined values", () => {
    expect(() => assertPlain({ y: undefined }, "v")).toThrow("Cannot serialize v.y: undefined value");
  });
});

describe("toScriptJson", () => {
  it("escapes sequences that could close a script element", () => {
    expect(toScriptJson('{"t":"</script><!--"}')).toBe('{"t":"\\u003c/script\\u003e\\u003c!--"}');
  });

  it("still parses to the same value", () => {
    const json = JSON.stringify({ t: "a < b && c > d" });
    expect(JSON.parse(toScriptJson(json))).toEqual({ t: "a < b && c > d" });
  });
});
