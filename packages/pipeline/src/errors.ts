/**
 * Build-time faults raised while loading stage definitions
 */

export class MalformedStageError extends Error {
  readonly line: string;
  /** 1-based position within the stage's lines */
  readonly lineNumber: number;

  constructor(line: string, lineNumber: number, reason: string) {
    super(`Malformed stage line ${lineNumber} ("${line}"): ${reason}`);
    this.name = 'MalformedStageError';
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

export class OverlappingSegmentsError extends Error {
  readonly stage: string;

  constructor(stage: string, pairs: ReadonlyArray<readonly [string, string]>) {
    const listed = pairs.map(([a, b]) => `"${a}" / "${b}"`).join(', ');
    super(`Stage ${stage || '(unnamed)'} has overlapping segments: ${listed}`);
    this.name = 'OverlappingSegmentsError';
    this.stage = stage;
  }
}

export class MalformedAlmanacError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedAlmanacError';
  }
}
