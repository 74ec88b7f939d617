import {
  createPipeline,
  parseAlmanac,
  type Almanac,
  type AlmanacParseOptions,
  type PipelineConfig,
  type RemapPipeline,
} from '@rangefold/pipeline';
import { lowestLocation, lowestLocationFromRanges, seedRanges } from './queries.js';
import type { Solution } from './types.js';

/**
 * Seed-to-location lookup over an almanac's chained maps.
 *
 * Part one translates each seed; part two treats the seeds as ranges and
 * rejects an unpaired seed list.
 */
export class AlmanacSolution implements Solution {
  readonly day = 5;
  private readonly pipeline: RemapPipeline;
  private readonly seeds: readonly number[];

  constructor(almanac: Almanac, config: PipelineConfig = {}) {
    this.pipeline = createPipeline(almanac, config);
    this.seeds = almanac.seeds;
  }

  static fromInput(input: string, options: AlmanacParseOptions = {}): AlmanacSolution {
    return new AlmanacSolution(parseAlmanac(input, options));
  }

  partOne(): string {
    return `Lowest location: ${formatAnswer(lowestLocation(this.pipeline, this.seeds))}`;
  }

  partTwo(): string {
    return `Lowest location across ranges: ${formatAnswer(lowestLocationFromRanges(this.pipeline, seedRanges(this.seeds)))}`;
  }
}

function formatAnswer(value: number | null): string {
  return value === null ? 'none' : String(value);
}
