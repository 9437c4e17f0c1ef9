import type { TimeRange } from '../spec/types.js';

/**
 * Returns a copy ordered by start time (then end time). Stable, so equal
 * ranges keep their declaration order.
 */
export function sortByStart<T extends TimeRange>(ranges: readonly T[]): T[] {
  return [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
}

/**
 * True when the two ranges share more than `tolerance` seconds.
 * Ranges that only touch do not overlap.
 */
export function rangesOverlap(a: TimeRange, b: TimeRange, tolerance = 0): boolean {
  return a.start < b.end - tolerance && b.start < a.end - tolerance;
}

/**
 * Intersects a range with `bounds`. Returns undefined when nothing longer
 * than `tolerance` remains.
 */
export function clipRange(range: TimeRange, bounds: TimeRange, tolerance = 0): TimeRange | undefined {
  const start = Math.max(range.start, bounds.start);
  const end = Math.min(range.end, bounds.end);
  if (end - start <= tolerance) {
    return undefined;
  }
  return { start, end };
}

/**
 * Merges overlapping ranges, and ranges whose gap is within `tolerance`,
 * into a minimal sorted set of disjoint ranges.
 */
export function mergeRanges(ranges: readonly TimeRange[], tolerance = 0): TimeRange[] {
  const merged: TimeRange[] = [];
  for (const range of sortByStart(ranges)) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + tolerance) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ start: range.start, end: range.end });
    }
  }
  return merged;
}

/**
 * Rounds a time to whole microseconds so float noise never leaks into
 * emitted plans.
 */
export function roundTime(seconds: number): number {
  const rounded = Math.round(seconds * 1_000_000) / 1_000_000;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function formatRange(range: TimeRange): string {
  return `[${range.start}, ${range.end}]`;
}
