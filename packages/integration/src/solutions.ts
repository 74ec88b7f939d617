import { AlmanacSolution } from './almanac-solution.js';
import type { SolutionFactory, SolutionOptions } from './types.js';

export const SOLUTIONS: ReadonlyMap<number, SolutionFactory> = new Map([
  [5, (input: string, options: SolutionOptions) => AlmanacSolution.fromInput(input, { rejectOverlaps: options.strict })],
]);
