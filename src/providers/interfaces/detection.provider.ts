import type { Frame, FrameOutcome } from '../../types/detection.types.js';

export interface DetectOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * DetectionProvider Interface
 *
 * Implementations: HttpDetectionProvider
 *
 * Sends one frame to a detection worker and classifies the answer. A single
 * call is one attempt; retry policy belongs to the caller.
 */
export interface DetectionProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Score one frame
   * @param frame - Frame to send
   * @param endpoint - Worker URL
   * @returns Outcome with attempts set to 1
   */
  detect(frame: Frame, endpoint: string, options: DetectOptions): Promise<FrameOutcome>;
}
