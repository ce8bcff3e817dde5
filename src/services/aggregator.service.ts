import { DuplicateFrameOutcomeError, NoFramesProcessedError } from '../utils/errors.js';
import type { FrameOutcome, Report } from '../types/detection.types.js';

export interface AggregateOptions {
  /** Frames the run sampled; defaults to the number of outcomes */
  totalFrames?: number;
  /** Run was cancelled before every frame was processed */
  partial?: boolean;
}

/**
 * Fold frame outcomes into a report.
 *
 * Pure: no I/O, no clock, input left untouched. Failed frames add nothing to
 * the detection total but still count toward the average's denominator.
 *
 * @throws NoFramesProcessedError when outcomes is empty
 * @throws DuplicateFrameOutcomeError when two outcomes share an index
 */
export function aggregate(outcomes: readonly FrameOutcome[], options: AggregateOptions = {}): Report {
  if (outcomes.length === 0) {
    throw new NoFramesProcessedError();
  }

  const ordered = [...outcomes].sort((a, b) => a.index - b.index);
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].index === ordered[i - 1].index) {
      throw new DuplicateFrameOutcomeError(ordered[i].index);
    }
  }

  let successfulFrames = 0;
  let totalDetections = 0;
  for (const outcome of ordered) {
    if (outcome.status === 'success') {
      successfulFrames++;
      totalDetections += outcome.count;
    }
  }

  return Object.freeze({
    totalFrames: Math.max(options.totalFrames ?? ordered.length, ordered.length),
    framesProcessed: ordered.length,
    successfulFrames,
    failedFrameCount: ordered.length - successfulFrames,
    totalDetections,
    averagePerFrame: totalDetections / ordered.length,
    partial: options.partial ?? false,
    outcomes: Object.freeze(ordered),
  });
}
