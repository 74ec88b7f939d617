/**
 * rangefold <day> [inputPath] [--strict]
 *
 * Reads the puzzle input (default "in.txt"), runs both parts of the day's
 * solution and prints answers with timings. `--strict` rejects stages whose
 * segments overlap.
 */

import { readFileSync } from 'fs';
import { MalformedAlmanacError, OverlappingSegmentsError } from '@rangefold/pipeline';
import { SolutionRunner } from './runner.js';
import { SOLUTIONS } from './solutions.js';
import type { SolutionFactory } from './types.js';

export interface CliDeps {
  readInput: (path: string) => string;
  solutions: ReadonlyMap<number, SolutionFactory>;
}

const DEFAULT_DEPS: CliDeps = {
  readInput: path => readFileSync(path, { encoding: 'utf8' }),
  solutions: SOLUTIONS,
};

/**
 * Returns the process exit code.
 */
export function runCli(args: readonly string[], deps: Partial<CliDeps> = {}): number {
  const { readInput, solutions } = { ...DEFAULT_DEPS, ...deps };
  const strict = args.includes('--strict');
  const [dayArg, inputPath = 'in.txt'] = args.filter(arg => arg !== '--strict');

  const day = Number(dayArg);
  const factory = Number.isInteger(day) ? solutions.get(day) : undefined;
  if (!factory) {
    const known = [...solutions.keys()].join(', ');
    console.error(`[rangefold] Unknown day "${dayArg ?? ''}" (available: ${known})`);
    return 1;
  }

  let input: string;
  try {
    input = readInput(inputPath);
  } catch (error) {
    console.error(`[rangefold] Cannot read ${inputPath}:`, error instanceof Error ? error.message : error);
    return 1;
  }

  try {
    const solution = factory(input, { strict });
    new SolutionRunner({ log: true }).register(solution).run(day);
    return 0;
  } catch (error) {
    if (error instanceof MalformedAlmanacError || error instanceof OverlappingSegmentsError) {
      console.error(`[rangefold] Rejected ${inputPath}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
