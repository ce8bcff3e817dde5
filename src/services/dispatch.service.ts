import { createChildLogger } from '../utils/logger.js';
import { isParallelError, parallelMap } from '../utils/parallel.js';
import { withRetry } from '../utils/retry.js';
import { AllFramesFailedError, InvalidConfigurationError } from '../utils/errors.js';
import type { PipelineTimer } from '../utils/timer.js';
import { httpDetectionProvider } from '../providers/implementations/http-detection.provider.js';
import type { DetectionProvider } from '../providers/interfaces/detection.provider.js';
import { FrameErrorKind, type Frame, type FrameOutcome } from '../types/detection.types.js';

const logger = createChildLogger({ service: 'dispatch' });

/** Maximum allowed concurrency to prevent resource exhaustion */
export const MAX_CONCURRENCY = 50;

export interface DispatchOptions {
  endpoint: string;
  /** Requests in flight at once (default: 2) */
  concurrency?: number;
  /** Additional attempts on WORKER_UNREACHABLE (default: 2) */
  maxRetries?: number;
  /** Base backoff delay, doubled per attempt (default: 500) */
  retryDelayMs?: number;
  /** Per-attempt timeout (default: 30000) */
  timeoutMs?: number;
  /** Throw AllFramesFailedError when every frame failed (default: false) */
  failOnTotalFailure?: boolean;
  /** Stops new dispatches and attempts; in-flight requests are abandoned */
  signal?: AbortSignal;
  timer?: PipelineTimer;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface DispatchResult {
  /** One outcome per processed frame, ordered by index */
  outcomes: FrameOutcome[];
  /** True when the signal stopped the run before every frame was processed */
  cancelled: boolean;
  /** Worker requests issued across all frames */
  totalAttempts: number;
}

/**
 * Whether a failed outcome is worth another attempt
 */
export function isRetryableOutcome(outcome: FrameOutcome): boolean {
  return outcome.status === 'failed' && outcome.error.kind === FrameErrorKind.WORKER_UNREACHABLE;
}

/**
 * DispatchService - fans frames out to the detection worker under a bounded pool
 */
export class DispatchService {
  constructor(private readonly detector: DetectionProvider = httpDetectionProvider) {}

  /**
   * Dispatch every frame and collect one outcome per frame.
   *
   * Each pool task writes only the results slot of its own frame index, so
   * the returned order is frame order whatever the completion order.
   * A frame whose request was abandoned by cancellation has no outcome.
   */
  async run(frames: readonly Frame[], options: DispatchOptions): Promise<DispatchResult> {
    const {
      endpoint,
      concurrency = 2,
      maxRetries = 2,
      retryDelayMs = 500,
      timeoutMs = 30000,
      failOnTotalFailure = false,
      signal,
      timer,
      sleep,
    } = options;

    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      throw new InvalidConfigurationError(`Concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new InvalidConfigurationError('maxRetries must be a non-negative integer');
    }

    let totalAttempts = 0;

    const dispatchFrame = async (frame: Frame): Promise<FrameOutcome | null> => {
      const endFrame = timer?.startFrame(frame.name);

      const { result, attempts } = await withRetry(
        () => {
          totalAttempts++;
          return this.detector.detect(frame, endpoint, { timeoutMs, signal });
        },
        {
          maxRetries,
          baseDelayMs: retryDelayMs,
          shouldRetry: isRetryableOutcome,
          signal,
          sleep,
          onRetry: ({ attempt, delayMs, result: failed }) => {
            logger.warn(
              {
                frame: frame.name,
                attempt,
                delayMs,
                error: failed.status === 'failed' ? failed.error.message : undefined,
              },
              'Worker unreachable, retrying frame'
            );
          },
        }
      );

      if (signal?.aborted && result.status === 'failed') {
        endFrame?.('abandoned', attempts);
        logger.debug({ frame: frame.name }, 'Frame abandoned after cancellation');
        return null;
      }

      endFrame?.(result.status, attempts);
      return { ...result, attempts };
    };

    const { results, skippedCount } = await parallelMap(frames, dispatchFrame, {
      concurrency,
      signal,
    });

    const outcomes: FrameOutcome[] = [];
    for (const result of results) {
      if (isParallelError(result)) {
        // detect() reports failures as outcomes, so a throw here is a bug
        throw result;
      }
      if (result) {
        outcomes.push(result);
      }
    }

    const cancelled = outcomes.length < frames.length;
    const failed = outcomes.filter((o) => o.status === 'failed').length;

    logger.info(
      {
        frames: frames.length,
        processed: outcomes.length,
        failed,
        skipped: skippedCount,
        totalAttempts,
        cancelled,
      },
      cancelled ? 'Dispatch cancelled' : 'Dispatch completed'
    );

    if (failOnTotalFailure && !cancelled && outcomes.length > 0 && failed === outcomes.length) {
      throw new AllFramesFailedError(outcomes.length);
    }

    return { outcomes, cancelled, totalAttempts };
  }
}

export const dispatchService = new DispatchService();
