/**
 * Delimited-text record loader.
 * Reads a CSV file once, matches its header against a column schema and
 * coerces every cell to the column's type.
 */

import { readFileSync, existsSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { ACCEPTED_DATE_FORMATS, parseDay } from "./dates.js";
import { LoadError } from "./errors.js";
import { normalizeHeader } from "./schemas.js";
import type { ColumnSpec, DataRecord, FieldValue, LoadReport, RecordSchema, RecordSet } from "./types.js";

const MAX_DROPPED_DETAILS = 20;
const NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export interface LoadResult {
  records: RecordSet;
  report: LoadReport;
}

/** Load and validate a CSV file against a schema. */
export function loadRecords(path: string, schema: RecordSchema): LoadResult {
  if (!existsSync(path)) throw new LoadError(path, "file not found");

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new LoadError(path, "file could not be read", { cause: err });
  }
  return parseRecords(text, schema, path);
}

/** Parse CSV text that has already been read. `source` names it in errors and the report. */
export function parseRecords(text: string, schema: RecordSchema, source: string = "<input>"): LoadResult {
  const rows = parseCsv(text, source);
  if (rows.length === 0) throw new LoadError(source, "file is empty");

  const [header, ...dataRows] = rows;
  if (dataRows.length === 0) throw new LoadError(source, "no data rows after the header");

  const columns = resolveColumns(header, schema, source);
  const dateIndex = columns.get(schema.dateColumn);
  if (dateIndex === undefined) {
    throw new LoadError(source, `missing date column "${schema.dateColumn}"`);
  }

  const valueColumns = schema.columns.filter((c) => c.name !== schema.dateColumn && columns.has(c.name));
  const report: LoadReport = {
    path: source,
    rowsRead: dataRows.length,
    rowsKept: 0,
    rowsDropped: 0,
    dropped: [],
    missing: {},
    invalidNumbers: {},
  };

  const records: DataRecord[] = [];
  dataRows.forEach((cells, i) => {
    const row = i + 1;
    const rawDate = cells[dateIndex] ?? "";
    const date = parseDay(rawDate);
    if (!date) {
      report.rowsDropped++;
      if (report.dropped.length < MAX_DROPPED_DETAILS) {
        report.dropped.push({ row, reason: rawDate ? `unparseable date "${rawDate}"` : "missing date" });
      }
      return;
    }

    const values: Record<string, FieldValue> = {};
    for (const column of valueColumns) {
      const index = columns.get(column.name);
      const cell = index === undefined ? "" : (cells[index] ?? "");
      values[column.name] = coerceCell(cell, column, report);
    }

    records.push(Object.freeze({ row, date, values: Object.freeze(values) }));
  });

  report.rowsKept = records.length;
  if (records.length === 0) {
    throw new LoadError(
      source,
      `no rows with a parseable date (accepted formats: ${ACCEPTED_DATE_FORMATS.join(", ")})`,
    );
  }

  return {
    records: Object.freeze({
      fields: Object.freeze(valueColumns.map((c) => c.name)),
      records: Object.freeze(records),
    }),
    report,
  };
}

function parseCsv(text: string, source: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoadError(source, `malformed CSV: ${reason}`, { cause: err });
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isStringRow);
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === "string");
}

/** Map each schema column found in the header to its index. */
export function resolveColumns(header: string[], schema: RecordSchema, source: string = "<input>"): Map<string, number> {
  const normalized = header.map(normalizeHeader);
  const found = new Map<string, number>();
  const missing: string[] = [];

  for (const column of schema.columns) {
    const candidates = [column.name, ...(column.aliases ?? [])].map(normalizeHeader);
    const index = normalized.findIndex((h) => candidates.includes(h));
    if (index >= 0) {
      found.set(column.name, index);
    } else if (column.required || column.name === schema.dateColumn) {
      missing.push(column.name);
    }
  }

  if (missing.length > 0) {
    const list = missing.map((m) => `"${m}"`).join(", ");
    throw new LoadError(source, `missing required column${missing.length > 1 ? "s" : ""} ${list}`);
  }
  return found;
}

function coerceCell(cell: string, column: ColumnSpec, report: LoadReport): FieldValue {
  if (cell === "") {
    report.missing[column.name] = (report.missing[column.name] ?? 0) + 1;
    return null;
  }
  if (column.type !== "number") return cell;

  const value = parseNumber(cell, column.signed ?? false);
  if (value === null) {
    report.invalidNumbers[column.name] = (report.invalidNumbers[column.name] ?? 0) + 1;
  }
  return value;
}

/** Parse a number, allowing thousands separators. Negative values are rejected unless `signed`. */
export function parseNumber(cell: string, signed: boolean): number | null {
  const cleaned = cell.replace(/,/g, "");
  if (!NUMBER.test(cleaned)) return null;
  const value = Number(cleaned);
  if (!Number.isFinite(value)) return null;
  if (!signed && value < 0) return null;
  return value;
}
