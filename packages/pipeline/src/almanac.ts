/**
 * Almanac - the text dataset that feeds a pipeline
 *
 *   seeds: 79 14 55 13
 *
 *   seed-to-soil map:
 *   50 98 2
 *   52 50 48
 *
 * Sections are separated by blank lines. Every map's destination category must
 * be the next map's source category.
 */

import type { StageMap } from '@rangefold/core';
import { IdentifierSchema } from '@rangefold/core';
import { buildStageMap } from './parser';
import { MalformedAlmanacError, MalformedStageError } from './errors';
import { RemapPipeline, type PipelineConfig } from './pipeline';

export interface AlmanacStage {
  source: string;
  destination: string;
  map: StageMap;
}

export interface Almanac {
  seeds: number[];
  stages: AlmanacStage[];
}

export interface AlmanacParseOptions {
  /** Forwarded to every stage build */
  rejectOverlaps?: boolean;
}

const SEEDS_LINE = /^seeds:(.*)$/;
const MAP_HEADER = /^([a-z]+)-to-([a-z]+) map:$/;

export function parseAlmanac(text: string, options: AlmanacParseOptions = {}): Almanac {
  const sections = text
    .replaceAll('\r\n', '\n')
    .trim()
    .split(/\n\s*\n/)
    .map(section => section.split('\n').map(line => line.trim()));

  const [seedSection, ...mapSections] = sections;
  const seeds = parseSeeds(seedSection);

  const stages = mapSections.map(lines => parseStageSection(lines, options));
  if (stages.length === 0) {
    throw new MalformedAlmanacError('Almanac defines no maps');
  }

  for (let i = 1; i < stages.length; i++) {
    const previous = stages[i - 1];
    const current = stages[i];
    if (previous.destination !== current.source) {
      throw new MalformedAlmanacError(
        `Map ${current.source}-to-${current.destination} does not continue from ${previous.source}-to-${previous.destination}`
      );
    }
  }

  return { seeds, stages };
}

export function createPipeline(almanac: Almanac, config: PipelineConfig = {}): RemapPipeline {
  return new RemapPipeline(
    almanac.stages.map(stage => stage.map),
    config
  );
}

function parseSeeds(lines: string[]): number[] {
  const match = lines.length === 1 ? SEEDS_LINE.exec(lines[0]) : null;
  if (!match) {
    throw new MalformedAlmanacError('Almanac must start with a single "seeds:" line');
  }

  const tokens = match[1].trim().split(/\s+/).filter(token => token.length > 0);
  return tokens.map(token => {
    const parsed = IdentifierSchema.safeParse(/^\d+$/.test(token) ? Number(token) : NaN);
    if (!parsed.success) {
      throw new MalformedAlmanacError(`Invalid seed "${token}"`);
    }
    return parsed.data;
  });
}

function parseStageSection(lines: string[], options: AlmanacParseOptions): AlmanacStage {
  const [header, ...body] = lines;
  const match = MAP_HEADER.exec(header);
  if (!match) {
    throw new MalformedAlmanacError(`Unrecognised section header "${header}"`);
  }

  const [, source, destination] = match;
  const name = `${source}-to-${destination}`;
  if (body.length === 0) {
    throw new MalformedAlmanacError(`Map ${name} has no entries`);
  }

  try {
    const map = buildStageMap(body, { name, rejectOverlaps: options.rejectOverlaps ?? false });
    return { source, destination, map };
  } catch (error) {
    if (error instanceof MalformedStageError) {
      throw new MalformedAlmanacError(`Map ${name}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
