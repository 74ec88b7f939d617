/**
 * Interval helpers
 */

import { saturatingAdd } from './domain';
import type { Interval } from './types';

export function interval(start: number, end: number): Interval {
  return { start, end };
}

/**
 * Builds `[start, start + length)`, clamped to the identifier domain.
 */
export function intervalFromLength(start: number, length: number): Interval {
  return { start, end: saturatingAdd(start, length) };
}

export function intervalLength(range: Interval): number {
  return Math.max(0, range.end - range.start);
}

export function isEmptyInterval(range: Interval): boolean {
  return range.start >= range.end;
}

export function totalLength(ranges: Iterable<Interval>): number {
  let total = 0;
  for (const range of ranges) {
    total += intervalLength(range);
  }
  return total;
}

/**
 * Lowest `start` among the non-empty intervals, or null if there are none.
 */
export function lowestStart(ranges: Iterable<Interval>): number | null {
  let lowest: number | null = null;
  for (const range of ranges) {
    if (isEmptyInterval(range)) {
      continue;
    }
    if (lowest === null || range.start < lowest) {
      lowest = range.start;
    }
  }
  return lowest;
}

export function formatInterval(range: Interval): string {
  return `[${range.start}, ${range.end})`;
}
