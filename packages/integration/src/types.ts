export interface Solution {
  readonly day: number;
  partOne(): string;
  partTwo(): string;
}

export interface SolutionOptions {
  /** Reject stages whose segments overlap */
  strict?: boolean;
}

/** Builds a solution from the raw puzzle input */
export type SolutionFactory = (input: string, options: SolutionOptions) => Solution;

export interface PartReport {
  part: 1 | 2;
  answer: string;
  durationMs: number;
}

export interface SolutionReport {
  day: number;
  parts: PartReport[];
  totalDurationMs: number;
}

export interface SolutionRunnerConfig {
  /** Print answers and timings */
  log?: boolean;
  onPartComplete?: (day: number, part: PartReport) => void;
}
