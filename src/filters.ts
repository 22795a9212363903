/**
 * Date windows and window filtering for record sets.
 */

import { addDays, dayDiff, parseDay } from "./dates.js";
import { ConfigError, EmptyWindowError } from "./errors.js";
import type { IsoDay, RecordSet, Window } from "./types.js";

/** Build a window from two day strings (any accepted date format). */
export function windowFromRange(start: string, end: string): Window {
  const from = parseDay(start);
  const to = parseDay(end);
  const issues: string[] = [];
  if (!from) issues.push(`from: "${start}" is not a valid date`);
  if (!to) issues.push(`to: "${end}" is not a valid date`);
  if (!from || !to) throw new ConfigError(issues);
  if (from > to) throw new ConfigError([`from: ${from} is after to: ${to}`]);
  return { start: from, end: to };
}

/** Window of exactly `days` calendar days ending at `anchor`, inclusive. */
export function trailingWindow(days: number, anchor: IsoDay): Window {
  if (!Number.isInteger(days) || days < 1) {
    throw new ConfigError([`days: expected a positive whole number of days, got ${days}`]);
  }
  return { start: addDays(anchor, -(days - 1)), end: anchor };
}

export function intersectWindows(a: Window, b: Window): Window | null {
  const start = a.start > b.start ? a.start : b.start;
  const end = a.end < b.end ? a.end : b.end;
  return start <= end ? { start, end } : null;
}

export function windowDays(w: Window): number {
  return dayDiff(w.start, w.end) + 1;
}

/** Every day of the window, in order. */
export function eachDay(w: Window): IsoDay[] {
  const days: IsoDay[] = [];
  for (let d = w.start; d <= w.end; d = addDays(d, 1)) days.push(d);
  return days;
}

export function inWindow(day: IsoDay, w: Window): boolean {
  return day >= w.start && day <= w.end;
}

/** Keep the records dated inside the window (both bounds inclusive), in source order. */
export function applyWindow(set: RecordSet, window: Window): RecordSet {
  const records = set.records.filter((r) => inWindow(r.date, window));
  if (records.length === 0) throw new EmptyWindowError(window);
  return Object.freeze({
    fields: set.fields,
    records: Object.freeze(records),
    window: Object.freeze({ start: window.start, end: window.end }),
  });
}

/** Partition into records before `boundary` and records on or after it. */
export function splitAt(set: RecordSet, boundary: IsoDay): { before: RecordSet; after: RecordSet } {
  const before = set.records.filter((r) => r.date < boundary);
  const after = set.records.filter((r) => r.date >= boundary);
  return {
    before: Object.freeze({ fields: set.fields, records: Object.freeze(before) }),
    after: Object.freeze({ fields: set.fields, records: Object.freeze(after) }),
  };
}

/** Window from the earliest to the latest record date, or null for an empty set. */
export function dataSpan(set: RecordSet): Window | null {
  if (set.records.length === 0) return null;
  let start = set.records[0].date;
  let end = start;
  for (const r of set.records) {
    if (r.date < start) start = r.date;
    if (r.date > end) end = r.date;
  }
  return { start, end };
}

/** Human-readable window label. */
export function windowLabel(w: Window): string {
  const days = windowDays(w);
  return w.start === w.end ? w.start : `${w.start} – ${w.end} (${days} days)`;
}
