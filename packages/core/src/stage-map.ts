/**
 * StageMap - one translation stage
 *
 * Segments are kept in ascending `sourceStart` order; segments sharing a
 * start keep the order they were supplied in. Values no segment covers pass
 * through unchanged.
 *
 * Segments are expected to be disjoint. This is not enforced here: when two
 * segments overlap, the one with the lower `sourceStart` (then the earlier
 * supplied) wins for scalar lookups. Use `findOverlaps()` to detect such data.
 */

import { saturatingAdd } from './domain';
import { Segment } from './segment';
import type { Interval, SegmentSpec } from './types';

export class StageMap {
  readonly name: string;
  private readonly entries: readonly Segment[];

  constructor(segments: Iterable<Segment | SegmentSpec>, name = '') {
    this.name = name;
    this.entries = orderedSegments(segments);
  }

  get segments(): readonly Segment[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Scalar lookup: first covering segment by ascending `sourceStart`, else identity.
   */
  translate(value: number): number {
    for (const segment of this.entries) {
      if (segment.covers(value)) {
        return segment.translate(value);
      }
    }
    return value;
  }

  /**
   * Range lookup. Sweeps a cursor from `range.start` to `range.end` across the
   * ordered segments, emitting unmapped gaps unchanged and mapped pieces
   * translated, in the order they are discovered.
   *
   * Empty and inverted ranges yield no intervals.
   */
  translateRange(range: Interval): Interval[] {
    const { end } = range;
    const result: Interval[] = [];

    let current = range.start;
    let index = 0;

    while (current < end) {
      const segment = index < this.entries.length ? this.entries[index] : undefined;

      // Already swept past this one
      if (segment !== undefined && segment.sourceEnd <= current) {
        index++;
        continue;
      }

      // Nothing left that starts inside the range
      if (segment === undefined || segment.sourceStart >= end) {
        result.push({ start: current, end });
        break;
      }

      if (current < segment.sourceStart) {
        result.push({ start: current, end: segment.sourceStart });
        current = segment.sourceStart;
      }

      const covered = Math.min(segment.sourceEnd, end) - current;
      const start = segment.translate(current);
      result.push({ start, end: saturatingAdd(start, covered) });
      current += covered;
    }

    return result;
  }

  /**
   * Every pair of segments whose source ranges intersect.
   */
  findOverlaps(): Array<[Segment, Segment]> {
    const overlaps: Array<[Segment, Segment]> = [];
    for (let i = 0; i < this.entries.length; i++) {
      const left = this.entries[i];
      for (let j = i + 1; j < this.entries.length; j++) {
        const right = this.entries[j];
        // Sorted by start: nothing further right can reach back into `left`
        if (right.sourceStart >= left.sourceEnd) {
          break;
        }
        overlaps.push([left, right]);
      }
    }
    return overlaps;
  }
}

/**
 * Stable sort by `sourceStart`. Only exact duplicates (same triple) collapse;
 * distinct segments sharing a start are both kept.
 */
function orderedSegments(segments: Iterable<Segment | SegmentSpec>): Segment[] {
  const seen = new Set<string>();
  const result: Segment[] = [];
  for (const item of segments) {
    const segment = item instanceof Segment ? item : new Segment(item);
    const key = segment.toString();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(segment);
    }
  }
  return result.sort(Segment.compare);
}
