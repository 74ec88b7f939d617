/**
 * Stage definition parsing
 *
 * Each line is `destination_start source_start length`. Any line that is not
 * exactly three non-negative integers in the identifier domain, with a
 * positive length, rejects the whole stage.
 */

import { SegmentSpecSchema, StageMap, type SegmentSpec } from '@rangefold/core';
import { MalformedStageError, OverlappingSegmentsError } from './errors';

export interface StageBuildOptions {
  /** Display name carried by the resulting StageMap */
  name?: string;
  /** Throw instead of accepting segments whose source ranges intersect */
  rejectOverlaps?: boolean;
}

const DEFAULT_BUILD_OPTIONS: Required<StageBuildOptions> = {
  name: '',
  rejectOverlaps: false,
};

const NUMBER_TOKEN = /^\d+$/;

export function parseSegmentLine(line: string, lineNumber = 1): SegmentSpec {
  const tokens = line.trim().split(/\s+/).filter(token => token.length > 0);
  if (tokens.length !== 3) {
    throw new MalformedStageError(line, lineNumber, `expected 3 numbers, found ${tokens.length}`);
  }

  const bad = tokens.find(token => !NUMBER_TOKEN.test(token));
  if (bad !== undefined) {
    throw new MalformedStageError(line, lineNumber, `"${bad}" is not a non-negative integer`);
  }

  const [destinationStart, sourceStart, length] = tokens.map(Number);
  const parsed = SegmentSpecSchema.safeParse({ destinationStart, sourceStart, length });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedStageError(line, lineNumber, `${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Builds one stage from its definition lines. Blank lines are skipped but
 * still counted for error positions.
 */
export function buildStageMap(lines: Iterable<string>, options: StageBuildOptions = {}): StageMap {
  const config = { ...DEFAULT_BUILD_OPTIONS, ...options };
  const specs: SegmentSpec[] = [];

  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    if (line.trim() === '') {
      continue;
    }
    specs.push(parseSegmentLine(line, lineNumber));
  }

  const stage = new StageMap(specs, config.name);

  if (config.rejectOverlaps) {
    const overlaps = stage.findOverlaps();
    if (overlaps.length > 0) {
      throw new OverlappingSegmentsError(
        config.name,
        overlaps.map(([a, b]) => [a.toString(), b.toString()] as const)
      );
    }
  }

  return stage;
}
