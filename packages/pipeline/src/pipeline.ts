/**
 * RemapPipeline - chains StageMaps
 *
 * The output of stage i is the input of stage i+1, for single values and for
 * whole interval sets alike. The interval working set may grow at every stage
 * (one extra piece per segment boundary crossed) but never depends on the
 * magnitude of the values involved.
 */

import type { Interval, StageMap } from '@rangefold/core';

// =============================================================================
// Pipeline Configuration
// =============================================================================

export interface StageTraceEntry {
  stage: string;
  index: number;
  intervalsIn: number;
  intervalsOut: number;
  durationMs: number;
}

export interface PipelineConfig {
  /** Log each stage's working-set sizes */
  trace?: boolean;
  /** Called once per stage of every range fold */
  onStageComplete?: (entry: StageTraceEntry) => void;
}

const DEFAULT_CONFIG: Required<PipelineConfig> = {
  trace: false,
  onStageComplete: () => {},
};

// =============================================================================
// Fold Result
// =============================================================================

export interface FoldResult {
  intervals: Interval[];
  stages: StageTraceEntry[];
  totalDurationMs: number;
}

// =============================================================================
// RemapPipeline Class
// =============================================================================

export class RemapPipeline {
  private readonly stages: readonly StageMap[];
  private readonly config: Required<PipelineConfig>;

  constructor(stages: Iterable<StageMap>, config: PipelineConfig = {}) {
    this.stages = [...stages];
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get length(): number {
    return this.stages.length;
  }

  get stageNames(): string[] {
    return this.stages.map((stage, index) => stageName(stage, index));
  }

  /**
   * Scalar fold through every stage.
   */
  translate(value: number): number {
    return this.stages.reduce((current, stage) => stage.translate(current), value);
  }

  /**
   * Range fold through every stage.
   */
  translateRanges(intervals: Iterable<Interval>): Interval[] {
    return this.run(intervals).intervals;
  }

  /**
   * Range fold that also reports per-stage working-set sizes and timings.
   */
  run(intervals: Iterable<Interval>): FoldResult {
    const startTime = Date.now();
    const trace: StageTraceEntry[] = [];

    let working = [...intervals];
    this.stages.forEach((stage, index) => {
      const stageStart = Date.now();
      const next = working.flatMap(range => stage.translateRange(range));

      const entry: StageTraceEntry = {
        stage: stageName(stage, index),
        index,
        intervalsIn: working.length,
        intervalsOut: next.length,
        durationMs: Date.now() - stageStart,
      };
      trace.push(entry);

      if (this.config.trace) {
        console.debug(
          `[RemapPipeline] ${entry.stage}: ${entry.intervalsIn} -> ${entry.intervalsOut} intervals (${entry.durationMs}ms)`
        );
      }
      this.config.onStageComplete(entry);

      working = next;
    });

    return {
      intervals: working,
      stages: trace,
      totalDurationMs: Date.now() - startTime,
    };
  }
}

function stageName(stage: StageMap, index: number): string {
  return stage.name || `stage-${index}`;
}
