import type { PartReport, Solution, SolutionReport, SolutionRunnerConfig } from './types.js';

const DEFAULT_CONFIG: Required<SolutionRunnerConfig> = {
  log: false,
  onPartComplete: () => {},
};

/**
 * Day-keyed solution registry with per-part timing hooks
 */
export class SolutionRunner {
  private solutions = new Map<number, Solution>();
  private config: Required<SolutionRunnerConfig>;

  constructor(config: SolutionRunnerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  register(solution: Solution): this {
    this.solutions.set(solution.day, solution);
    return this;
  }

  days(): number[] {
    return [...this.solutions.keys()].sort((a, b) => a - b);
  }

  run(day: number): SolutionReport | null {
    const solution = this.solutions.get(day);
    if (!solution) {
      return null;
    }

    const startTime = Date.now();
    const parts = [
      this.runPart(day, 1, () => solution.partOne()),
      this.runPart(day, 2, () => solution.partTwo()),
    ];
    const totalDurationMs = Date.now() - startTime;

    if (this.config.log) {
      console.log(`[SolutionRunner] Day ${day} done in ${totalDurationMs}ms`);
    }

    return { day, parts, totalDurationMs };
  }

  private runPart(day: number, part: 1 | 2, solve: () => string): PartReport {
    const partStart = Date.now();
    const answer = solve();
    const report: PartReport = { part, answer, durationMs: Date.now() - partStart };

    if (this.config.log) {
      console.log(`[SolutionRunner] ${day}:${part} ${answer}`);
      console.log(`[SolutionRunner] Part ${part} in ${report.durationMs}ms`);
    }
    this.config.onPartComplete(day, report);

    return report;
  }
}
