/**
 * Time bucketing for series metrics.
 * Buckets are keyed by their start day; every bucket overlapping the window
 * is emitted so the date axis has no gaps.
 */

import { addDays, fromUtcDate, toUtcDate } from "./dates.js";
import type { Granularity, IsoDay, Window } from "./types.js";

/** Start day of the bucket containing `day`. Weeks start on Monday. */
export function bucketStart(day: IsoDay, size: Granularity): IsoDay {
  switch (size) {
    case "day":
      return day;
    case "week": {
      const weekday = toUtcDate(day).getUTCDay();
      const diff = weekday === 0 ? 6 : weekday - 1; // Monday start
      return addDays(day, -diff);
    }
    case "month":
      return `${day.slice(0, 7)}-01`;
  }
}

/** Start day of the bucket after the one starting at `start`. */
export function nextBucket(start: IsoDay, size: Granularity): IsoDay {
  switch (size) {
    case "day":
      return addDays(start, 1);
    case "week":
      return addDays(start, 7);
    case "month": {
      const d = toUtcDate(start);
      return fromUtcDate(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1)));
    }
  }
}

/** Bucket start days covering the window, in order. */
export function bucketsFor(window: Window, size: Granularity): IsoDay[] {
  const starts: IsoDay[] = [];
  for (let b = bucketStart(window.start, size); b <= window.end; b = nextBucket(b, size)) {
    starts.push(b);
  }
  return starts;
}

/** Stable axis key for a bucket: `2026-02-10`, `2026-W07` or `2026-02`. */
export function bucketKey(start: IsoDay, size: Granularity): string {
  switch (size) {
    case "day":
      return start;
    case "week": {
      // ISO week number
      const d = toUtcDate(start);
      d.setUTCDate(d.getUTCDate() + 4 - (d.getUTCDay() || 7));
      const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
      const weekNo = Math.ceil(((d.getTime() - yearStart.getTime()) / 86400000 + 1) / 7);
      return `${d.getUTCFullYear()}-W${String(weekNo).padStart(2, "0")}`;
    }
    case "month":
      return start.slice(0, 7);
  }
}
