import { intervalFromLength, lowestStart, type Interval } from '@rangefold/core';
import { MalformedAlmanacError, type RemapPipeline } from '@rangefold/pipeline';

/**
 * Lowest final value over independently translated seeds.
 */
export function lowestLocation(pipeline: RemapPipeline, seeds: readonly number[]): number | null {
  let lowest: number | null = null;
  for (const seed of seeds) {
    const location = pipeline.translate(seed);
    if (lowest === null || location < lowest) {
      lowest = location;
    }
  }
  return lowest;
}

/**
 * Reads seeds as consecutive `(start, length)` pairs.
 */
export function seedRanges(seeds: readonly number[]): Interval[] {
  if (seeds.length % 2 !== 0) {
    throw new MalformedAlmanacError(`Seed ranges need start/length pairs, got ${seeds.length} numbers`);
  }
  const ranges: Interval[] = [];
  for (let i = 0; i < seeds.length; i += 2) {
    ranges.push(intervalFromLength(seeds[i], seeds[i + 1]));
  }
  return ranges;
}

export function lowestLocationFromRanges(pipeline: RemapPipeline, ranges: readonly Interval[]): number | null {
  return lowestStart(pipeline.translateRanges(ranges));
}
