/**
 * Calendar-day parsing and arithmetic.
 * Days are carried as `YYYY-MM-DD` strings and computed in UTC, so comparisons
 * are plain string comparisons and no local timezone leaks in.
 */

import type { IsoDay } from "./types.js";

const MS_PER_DAY = 86_400_000;

const YMD = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/;
const MDY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/** Accepted input formats, for error messages and docs. */
export const ACCEPTED_DATE_FORMATS = [
  "YYYY-MM-DD",
  "YYYY/MM/DD",
  "MM/DD/YYYY",
  "YYYY-MM-DDTHH:mm[:ss][Z|±hh:mm]",
  "YYYY-MM-DD HH:mm[:ss]",
];

/** Parse a date in one of the accepted formats. Returns null if it doesn't parse or isn't a real day. */
export function parseDay(input: string): IsoDay | null {
  const s = input.trim();
  if (!s) return null;

  let m = YMD.exec(s);
  if (m) return makeDay(Number(m[1]), Number(m[3]), Number(m[4]));

  m = MDY.exec(s);
  if (m) return makeDay(Number(m[3]), Number(m[1]), Number(m[2]));

  m = DATETIME.exec(s);
  if (m) {
    const hour = Number(m[4]);
    const minute = Number(m[5]);
    const second = m[6] ? Number(m[6]) : 0;
    if (hour > 23 || minute > 59 || second > 59) return null;
    // Date part as written; the offset describes the clock, not the day.
    return makeDay(Number(m[1]), Number(m[2]), Number(m[3]));
  }

  return null;
}

function makeDay(year: number, month: number, day: number): IsoDay | null {
  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** UTC midnight of a day. */
export function toUtcDate(day: IsoDay): Date {
  const [y, m, d] = day.split("-").map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

export function fromUtcDate(date: Date): IsoDay {
  return date.toISOString().slice(0, 10);
}

export function addDays(day: IsoDay, n: number): IsoDay {
  return fromUtcDate(new Date(toUtcDate(day).getTime() + n * MS_PER_DAY));
}

/** Whole days from `a` to `b` (negative when `b` is earlier). */
export function dayDiff(a: IsoDay, b: IsoDay): number {
  return Math.round((toUtcDate(b).getTime() - toUtcDate(a).getTime()) / MS_PER_DAY);
}

/** Today's date in UTC. */
export function today(): IsoDay {
  return fromUtcDate(new Date());
}
