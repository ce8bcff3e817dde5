import { z } from 'zod';

/**
 * Frame-level failure kinds
 */
export const FrameErrorKind = {
  /** Network failure, timeout or transport-level worker error. Retried. */
  WORKER_UNREACHABLE: 'WORKER_UNREACHABLE',
  /** Worker returned a well-formed error payload. Not retried. */
  WORKER_REJECTED_FRAME: 'WORKER_REJECTED_FRAME',
  /** Worker response could not be read as a count. Not retried. */
  MALFORMED_WORKER_RESPONSE: 'MALFORMED_WORKER_RESPONSE',
} as const;

export type FrameErrorKind = (typeof FrameErrorKind)[keyof typeof FrameErrorKind];

/**
 * Handle to a video on disk, owned by a single pipeline run
 */
export interface VideoSource {
  path: string;
  sizeBytes: number;
}

/**
 * Sampling configuration schema
 */
export const sampleSpecSchema = z.object({
  intervalSeconds: z.number().finite().positive(),
  maxFrames: z.number().int().positive().optional(),
});

export type SampleSpec = z.infer<typeof sampleSpecSchema>;

/**
 * One sampled still image
 */
export interface Frame {
  /** 1-based, dense */
  readonly index: number;
  /** Approximate source timestamp in seconds */
  readonly timestamp: number;
  /** Display name, e.g. frame_00001.jpg */
  readonly name: string;
  readonly data: Buffer;
}

export interface FrameError {
  kind: FrameErrorKind;
  message: string;
}

interface FrameOutcomeBase {
  index: number;
  name: string;
  timestamp: number;
  /** Number of detection attempts made for this frame */
  attempts: number;
}

export interface FrameSuccess extends FrameOutcomeBase {
  status: 'success';
  count: number;
}

export interface FrameFailure extends FrameOutcomeBase {
  status: 'failed';
  error: FrameError;
}

/**
 * Result of dispatching one frame: a count or a terminal error
 */
export type FrameOutcome = FrameSuccess | FrameFailure;

/**
 * Aggregated result of one pipeline run
 */
export interface Report {
  readonly totalFrames: number;
  readonly framesProcessed: number;
  readonly successfulFrames: number;
  readonly failedFrameCount: number;
  readonly totalDetections: number;
  readonly averagePerFrame: number;
  /** True when the run was cancelled before every frame was processed */
  readonly partial: boolean;
  /** Ordered by frame index */
  readonly outcomes: readonly FrameOutcome[];
}

/**
 * Pipeline entrypoint request schema.
 * Dispatch settings fall back to configuration when omitted.
 */
export const pipelineRequestSchema = z.object({
  videoPath: z.string().min(1),
  intervalSeconds: z.number().finite().positive(),
  maxFrames: z.number().int().positive().optional(),
  endpoint: z.string().url().optional(),
  concurrency: z.number().int().positive().max(50).optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  retryDelayMs: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional(),
  runTimeoutMs: z.number().int().positive().optional(),
  failOnTotalFailure: z.boolean().optional(),
});

export type PipelineRequest = z.infer<typeof pipelineRequestSchema>;

/**
 * Worker protocol request body
 */
export const detectRequestSchema = z.object({
  image_data: z.string().min(1),
  filename: z.string().min(1).default('unknown'),
});

export type DetectRequest = z.infer<typeof detectRequestSchema>;

/**
 * Worker protocol error body
 */
export const workerErrorSchema = z.object({
  error: z.string(),
  filename: z.string().optional(),
});

export interface DetectSuccessResponse {
  count: number;
  filename: string;
  message: string;
}

export interface DetectErrorResponse {
  error: string;
  filename?: string;
}
