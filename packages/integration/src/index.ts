/**
 * @rangefold/integration - Query drivers and solution runner
 *
 * Components:
 * - queries: scalar and range minimums over a RemapPipeline
 * - AlmanacSolution: both parts of the almanac lookup
 * - SolutionRunner: day-keyed registry with timing
 * - runCli: command-line entry
 */

export { lowestLocation, lowestLocationFromRanges, seedRanges } from './queries.js';
export { AlmanacSolution } from './almanac-solution.js';
export { SolutionRunner } from './runner.js';
export { SOLUTIONS } from './solutions.js';
export { runCli, type CliDeps } from './cli.js';
export type {
  Solution,
  SolutionFactory,
  SolutionOptions,
  PartReport,
  SolutionReport,
  SolutionRunnerConfig,
} from './types.js';
