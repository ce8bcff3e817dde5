import { createChildLogger } from './logger.js';
import type { FrameOutcome } from '../types/detection.types.js';

const logger = createChildLogger({ service: 'timer' });

export type PipelineStep = 'sample' | 'dispatch' | 'aggregate';

/** How a frame's dispatch ended; abandoned frames were cut off by cancellation */
export type FrameTimingStatus = FrameOutcome['status'] | 'abandoned';

interface FrameTiming {
  name: string;
  durationMs: number;
  attempts: number;
  status: FrameTimingStatus;
}

export interface FrameTimingSummary {
  timed: number;
  failed: number;
  abandoned: number;
  /** Frames that needed more than one attempt */
  retried: number;
  totalAttempts: number;
  avgMs: number;
  slowest: { name: string; durationMs: number } | null;
}

export interface RunTimingSummary {
  runId: string;
  totalDurationMs: number;
  steps: Partial<Record<PipelineStep, number>>;
  frames: FrameTimingSummary;
}

/**
 * Wall-clock timing for one pipeline run: the three steps, and each frame's
 * dispatch including its retries.
 */
export class PipelineTimer {
  private readonly startedAt = Date.now();
  private current: { step: PipelineStep; startedAt: number } | null = null;
  private readonly steps: Partial<Record<PipelineStep, number>> = {};
  private readonly frames: FrameTiming[] = [];

  constructor(private readonly runId: string) {}

  /** Starts a step, closing the one in progress */
  startStep(step: PipelineStep): void {
    this.endStep();
    this.current = { step, startedAt: Date.now() };
  }

  endStep(): void {
    if (!this.current) return;

    const { step, startedAt } = this.current;
    const durationMs = Date.now() - startedAt;
    this.steps[step] = durationMs;
    this.current = null;

    logger.debug({ runId: this.runId, step, durationMs }, `Step completed: ${step}`);
  }

  /**
   * Start the clock for one frame. Call the returned function once the frame
   * is settled, with its final status and the attempts it took.
   */
  startFrame(name: string): (status: FrameTimingStatus, attempts: number) => void {
    const startedAt = Date.now();
    return (status, attempts) => {
      this.frames.push({ name, durationMs: Date.now() - startedAt, attempts, status });
    };
  }

  getSummary(): RunTimingSummary {
    this.endStep();

    let slowest: FrameTiming | null = null;
    let totalMs = 0;
    for (const frame of this.frames) {
      totalMs += frame.durationMs;
      if (!slowest || frame.durationMs > slowest.durationMs) {
        slowest = frame;
      }
    }

    return {
      runId: this.runId,
      totalDurationMs: Date.now() - this.startedAt,
      steps: { ...this.steps },
      frames: {
        timed: this.frames.length,
        failed: this.frames.filter((f) => f.status === 'failed').length,
        abandoned: this.frames.filter((f) => f.status === 'abandoned').length,
        retried: this.frames.filter((f) => f.attempts > 1).length,
        totalAttempts: this.frames.reduce((sum, f) => sum + f.attempts, 0),
        avgMs: this.frames.length > 0 ? Math.round(totalMs / this.frames.length) : 0,
        slowest: slowest ? { name: slowest.name, durationMs: slowest.durationMs } : null,
      },
    };
  }

  logSummary(): void {
    const summary = this.getSummary();
    logger.info(summary, `Run finished in ${summary.totalDurationMs}ms`);
  }
}
