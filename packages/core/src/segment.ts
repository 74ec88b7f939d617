import { saturatingAdd } from './domain';
import type { SegmentSpec } from './types';

/**
 * A contiguous source range bound to a contiguous destination range with a
 * fixed offset.
 */
export class Segment {
  readonly sourceStart: number;
  readonly destinationStart: number;
  readonly length: number;
  /** Exclusive end of the source range, clamped to the identifier domain */
  readonly sourceEnd: number;

  constructor(spec: SegmentSpec) {
    this.sourceStart = spec.sourceStart;
    this.destinationStart = spec.destinationStart;
    this.length = spec.length;
    this.sourceEnd = saturatingAdd(spec.sourceStart, spec.length);
  }

  covers(value: number): boolean {
    return value >= this.sourceStart && value < this.sourceEnd;
  }

  /**
   * Unchecked: callers must test `covers(value)` first.
   */
  translate(value: number): number {
    return saturatingAdd(value - this.sourceStart, this.destinationStart);
  }

  overlaps(other: Segment): boolean {
    return this.sourceStart < other.sourceEnd && other.sourceStart < this.sourceEnd;
  }

  static compare(a: Segment, b: Segment): number {
    return a.sourceStart - b.sourceStart;
  }

  toString(): string {
    return `${this.destinationStart} ${this.sourceStart} ${this.length}`;
  }
}
