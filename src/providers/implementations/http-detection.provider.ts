import { createChildLogger } from '../../utils/logger.js';
import { getConfig } from '../../config/index.js';
import {
  FrameErrorKind,
  workerErrorSchema,
  type Frame,
  type FrameOutcome,
} from '../../types/detection.types.js';
import type { DetectionProvider, DetectOptions } from '../interfaces/detection.provider.js';

const logger = createChildLogger({ service: 'detection-client' });

/** Longest slice of a worker body quoted in an error message */
const MAX_BODY_EXCERPT = 200;

export interface HttpDetectionProviderOptions {
  /** JSON field carrying the count in a success response */
  countField?: string;
}

/**
 * Classified result of one worker exchange
 */
type WorkerAnswer =
  | { ok: true; count: number }
  | { ok: false; kind: FrameErrorKind; message: string };

/**
 * HTTP Detection Provider
 *
 * Posts one base64-encoded frame to a worker and turns the reply into a
 * FrameOutcome. Never retries and never coerces an unreadable reply to zero.
 */
export class HttpDetectionProvider implements DetectionProvider {
  readonly providerId = 'http-worker';
  private readonly countField: string;

  constructor(options: HttpDetectionProviderOptions = {}) {
    this.countField = options.countField ?? getConfig().detection.countField;
  }

  async detect(frame: Frame, endpoint: string, options: DetectOptions): Promise<FrameOutcome> {
    const answer = await this.exchange(frame, endpoint, options);

    const base = {
      index: frame.index,
      name: frame.name,
      timestamp: frame.timestamp,
      attempts: 1,
    };

    if (answer.ok) {
      return { ...base, status: 'success', count: answer.count };
    }

    logger.debug({ frame: frame.name, kind: answer.kind, error: answer.message }, 'Frame detection failed');
    return { ...base, status: 'failed', error: { kind: answer.kind, message: answer.message } };
  }

  private async exchange(frame: Frame, endpoint: string, options: DetectOptions): Promise<WorkerAnswer> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    let text: string;

    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify({
          image_data: frame.data.toString('base64'),
          filename: frame.name,
        }),
        signal,
      });
      text = await response.text();
    } catch (error) {
      return {
        ok: false,
        kind: FrameErrorKind.WORKER_UNREACHABLE,
        message: describeNetworkError(error, options.timeoutMs, timeout.aborted),
      };
    }

    return this.classify(response.status, text);
  }

  /**
   * Map a worker status and body onto an answer
   */
  classify(status: number, text: string): WorkerAnswer {
    let body: unknown;
    let parsed = true;
    try {
      body = JSON.parse(text);
    } catch {
      parsed = false;
    }

    if (parsed) {
      const workerError = workerErrorSchema.safeParse(body);
      if (workerError.success) {
        return {
          ok: false,
          kind: FrameErrorKind.WORKER_REJECTED_FRAME,
          message: workerError.data.error,
        };
      }
    }

    if (status === 429 || status >= 500) {
      return {
        ok: false,
        kind: FrameErrorKind.WORKER_UNREACHABLE,
        message: `Worker returned HTTP ${status}`,
      };
    }

    if (status < 200 || status >= 300) {
      return {
        ok: false,
        kind: FrameErrorKind.MALFORMED_WORKER_RESPONSE,
        message: `Unexpected HTTP ${status}: ${excerpt(text)}`,
      };
    }

    if (!parsed) {
      return {
        ok: false,
        kind: FrameErrorKind.MALFORMED_WORKER_RESPONSE,
        message: `Non-JSON response from worker: ${excerpt(text)}`,
      };
    }

    const count = readField(body, this.countField);
    if (typeof count === 'number' && Number.isInteger(count) && count >= 0) {
      return { ok: true, count };
    }

    return {
      ok: false,
      kind: FrameErrorKind.MALFORMED_WORKER_RESPONSE,
      message: `Response field '${this.countField}' is not a non-negative integer: ${excerpt(text)}`,
    };
  }
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined;
  }
  return Object.entries(body).find(([key]) => key === field)?.[1];
}

function excerpt(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    return '<empty body>';
  }
  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
}

function describeNetworkError(error: unknown, timeoutMs: number, timedOut: boolean): string {
  if (timedOut) {
    return `Worker did not respond within ${timeoutMs}ms`;
  }
  if (!(error instanceof Error)) {
    return `Request failed: ${String(error)}`;
  }
  // undici wraps the socket error (ECONNREFUSED, ENOTFOUND) in cause
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return `Request failed: ${error.message}${cause}`;
}

export const httpDetectionProvider = new HttpDetectionProvider();
