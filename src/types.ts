/**
 * Core types for the record → window → metrics → charts → report pipeline.
 * Every stage returns a fresh value; nothing here is mutated after construction.
 */

// --- Records ---

/** A calendar day in `YYYY-MM-DD` form. */
export type IsoDay = string;

export type FieldValue = string | number | null;

export type ColumnType = "date" | "number" | "category";

export interface ColumnSpec {
  name: string;
  type: ColumnType;
  required?: boolean;
  /** Numbers may be negative (coordinates). Other numeric columns reject negatives. */
  signed?: boolean;
  /** Alternative header spellings, matched after normalization. */
  aliases?: string[];
}

export interface RecordSchema {
  name: string;
  /** Name of the single date column. */
  dateColumn: string;
  columns: ColumnSpec[];
}

export interface DataRecord {
  /** 1-based data row in the source file. */
  readonly row: number;
  readonly date: IsoDay;
  readonly values: Readonly<Record<string, FieldValue>>;
}

export interface RecordSet {
  /** Schema columns present in the input header. */
  readonly fields: readonly string[];
  readonly records: readonly DataRecord[];
  /** Set when the set is the output of a window filter. */
  readonly window?: Window;
}

export interface LoadReport {
  path: string;
  rowsRead: number;
  rowsKept: number;
  rowsDropped: number;
  /** First dropped rows with the reason (capped). */
  dropped: { row: number; reason: string }[];
  /** Empty cells per column. */
  missing: Record<string, number>;
  /** Non-numeric or negative values per numeric column, treated as missing. */
  invalidNumbers: Record<string, number>;
}

// --- Windows ---

export interface Window {
  readonly start: IsoDay;
  readonly end: IsoDay;
}

// --- Metrics ---

export type Granularity = "day" | "week" | "month";

export interface WhereClause {
  field: string;
  in: string[];
}

export type Measure =
  | { op: "count"; where?: WhereClause }
  | { op: "rate"; field: string; in: string[]; denominator?: "present" | "all"; where?: WhereClause }
  | { op: "mean"; field: string; where?: WhereClause }
  | { op: "sum"; field: string; where?: WhereClause }
  | { op: "distinct"; field: string; where?: WhereClause };

export type MetricScope = "analysis" | "history";

interface MetricRequestBase {
  name: string;
  scope?: MetricScope;
}

export interface ScalarRequest extends MetricRequestBase {
  kind: "scalar";
  measure: Measure;
}

export interface SeriesRequest extends MetricRequestBase {
  kind: "series";
  measure: Measure;
  granularity: Granularity;
  /** Split into one series per category of this field. */
  by?: string;
  top?: number;
  other?: boolean;
}

export interface BreakdownRequest extends MetricRequestBase {
  kind: "breakdown";
  field: string;
  /** Numeric field to sum instead of counting records. */
  sum?: string;
  top?: number;
  other?: boolean;
  /** Express each value as a share of the total (0-100). */
  percent?: boolean;
  where?: WhereClause;
}

export interface GeoRequest extends MetricRequestBase {
  kind: "geo";
  field: string;
  lat: string;
  lon: string;
  top?: number;
}

export type ComparisonBoundary = IsoDay | { trailingDays: number };

export interface ComparisonRequest extends MetricRequestBase {
  kind: "comparison";
  measure: Measure;
  boundary: ComparisonBoundary;
}

export type MetricRequest = ScalarRequest | SeriesRequest | BreakdownRequest | GeoRequest | ComparisonRequest;

export interface SeriesPoint {
  date: IsoDay;
  value: number | null;
}

export interface LabeledValue {
  label: string;
  value: number;
}

export interface GeoPoint {
  label: string;
  lat: number;
  lon: number;
  value: number;
}

export type MetricValue =
  | { shape: "scalar"; value: number | null }
  | { shape: "series"; granularity: Granularity; points: SeriesPoint[] }
  | {
      shape: "multiSeries";
      granularity: Granularity;
      dates: IsoDay[];
      series: { label: string; values: (number | null)[] }[];
    }
  | { shape: "breakdown"; entries: LabeledValue[] }
  | { shape: "geo"; points: GeoPoint[] }
  | {
      shape: "comparison";
      boundary: IsoDay;
      before: number | null;
      after: number | null;
      delta: number | null;
      change: number | null;
    };

export type MetricShape = MetricValue["shape"];

export type AggregationResult = ReadonlyMap<string, MetricValue>;

// --- Charts ---

export type ChartKind = "line" | "bar" | "pie" | "stacked-area" | "geo-scatter";

export interface Threshold {
  value: number;
  label: string;
  color: string;
}

export interface ChartRequest {
  id: string;
  metric: string;
  kind: ChartKind;
  title: string;
  xLabel?: string;
  yLabel?: string;
  unit?: string;
  color?: string;
  colors?: Record<string, string>;
  thresholds?: Threshold[];
  orientation?: "vertical" | "horizontal";
  /** Display names for category labels. */
  labels?: Record<string, string>;
  /** Names for the two sides of a comparison. */
  comparisonLabels?: [string, string];
}

export interface ChartPoint {
  x: string;
  y: number | null;
  lat?: number;
  lon?: number;
}

export interface ChartSeries {
  name: string;
  color: string;
  points: ChartPoint[];
}

export interface ChartSpec {
  id: string;
  title: string;
  kind: ChartKind;
  axes: { x: string; y: string };
  series: ChartSeries[];
  style: {
    colors: string[];
    thresholds: Threshold[];
    orientation: "vertical" | "horizontal";
    stacked: boolean;
    precision: number;
    unit: string;
  };
}

// --- Report ---

export type KpiFormat = "integer" | "decimal" | "percent" | "minutes";

export interface KpiCard {
  label: string;
  value: number | null;
  format: KpiFormat;
  /** Change against the previous period, in the same unit as the value. */
  delta?: number | null;
  /** Whether an increase is good (green) or bad (red). */
  higherIsBetter?: boolean;
}

export interface ReportSectionSpec {
  title: string;
  charts: string[];
}

export interface ReportTemplate {
  title: string;
  subtitle: string;
  footer: string;
  accent: string;
}

export interface ReportDocument {
  readonly title: string;
  readonly subtitle: string;
  readonly generatedAt: string;
  readonly window: Window | null;
  readonly summary: readonly KpiCard[];
  readonly sections: readonly { title: string; charts: readonly ChartSpec[] }[];
  readonly template: ReportTemplate;
  readonly noData: boolean;
  readonly html: string;
}
