import { describe, it, expect } from 'vitest';
import { parseAlmanac, createPipeline } from '../almanac';
import { MalformedAlmanacError, MalformedStageError, OverlappingSegmentsError } from '../errors';

const ALMANAC = `seeds: 3 5 40 2

alpha-to-beta map:
100 0 10
20 30 15

beta-to-gamma map:
0 100 5
7 20 10
`;

describe('parseAlmanac', () => {
  it('reads seeds and named stages in order', () => {
    const almanac = parseAlmanac(ALMANAC);
    expect(almanac.seeds).toEqual([3, 5, 40, 2]);
    expect(almanac.stages.map(s => [s.source, s.destination, s.map.name])).toEqual([
      ['alpha', 'beta', 'alpha-to-beta'],
      ['beta', 'gamma', 'beta-to-gamma'],
    ]);
    expect(almanac.stages[1].map.segments.map(s => s.sourceStart)).toEqual([20, 100]);
  });

  it('normalises Windows line endings', () => {
    expect(parseAlmanac(ALMANAC.replaceAll('\n', '\r\n'))).toEqual(parseAlmanac(ALMANAC));
  });

  it('builds a pipeline over every stage', () => {
    const pipeline = createPipeline(parseAlmanac(ALMANAC));
    expect(pipeline.stageNames).toEqual(['alpha-to-beta', 'beta-to-gamma']);
    expect([3, 5, 40, 2].map(seed => pipeline.translate(seed))).toEqual([3, 105, 30, 2]);
  });

  it('requires a seeds line', () => {
    expect(() => parseAlmanac('alpha-to-beta map:\n1 2 3')).toThrow(MalformedAlmanacError);
    expect(() => parseAlmanac('')).toThrow('Almanac must start with a single "seeds:" line');
  });

  it('rejects invalid seeds', () => {
    expect(() => parseAlmanac('seeds: 1 two\n\na-to-b map:\n1 2 3')).toThrow('Invalid seed "two"');
  });

  it('requires at least one map', () => {
    expect(() => parseAlmanac('seeds: 1 2')).toThrow('Almanac defines no maps');
  });

  it('rejects unknown section headers', () => {
    expect(() => parseAlmanac('seeds: 1\n\nnot a header\n1 2 3')).toThrow('Unrecognised section header "not a header"');
  });

  it('rejects empty maps', () => {
    expect(() => parseAlmanac('seeds: 1\n\na-to-b map:')).toThrow('Map a-to-b has no entries');
  });

  it('rejects a broken category chain', () => {
    const text = 'seeds: 1\n\na-to-b map:\n1 2 3\n\nc-to-d map:\n1 2 3';
    expect(() => parseAlmanac(text)).toThrow('Map c-to-d does not continue from a-to-b');
  });

  it('wraps malformed stage lines with the map name', () => {
    let caught: unknown;
    try {
      parseAlmanac('seeds: 1\n\na-to-b map:\n1 2 3\n4 5');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MalformedAlmanacError);
    if (caught instanceof MalformedAlmanacError) {
      expect(caught.message).toBe('Map a-to-b: Malformed stage line 2 ("4 5"): expected 3 numbers, found 2');
      expect(caught.cause).toBeInstanceOf(MalformedStageError);
    }
  });

  it('forwards the overlap policy to every stage', () => {
    const text = 'seeds: 1\n\na-to-b map:\n500 10 10\n900 15 10';
    expect(parseAlmanac(text).stages[0].map.size).toBe(2);
    expect(() => parseAlmanac(text, { rejectOverlaps: true })).toThrow(OverlappingSegmentsError);
  });
});
