import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import os from 'os';
import path from 'path';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import {
  InvalidConfigurationError,
  NoFramesProducedError,
  SourceNotFoundError,
} from '../utils/errors.js';
import { ffmpegFrameExtractionProvider } from '../providers/implementations/ffmpeg-frame-extraction.provider.js';
import type { FrameExtractionProvider } from '../providers/interfaces/frame-extraction.provider.js';
import { sampleSpecSchema, type Frame, type SampleSpec, type VideoSource } from '../types/detection.types.js';

const logger = createChildLogger({ service: 'frame-sampler' });

/** Absorbs float error in duration / interval, e.g. 0.3 / 0.1 */
const ROUNDING_EPSILON = 1e-9;

/**
 * Frames of one sampling run plus the scratch directory backing them.
 * The holder must call release() once done; further calls are no-ops.
 */
export interface SampledFrames {
  frames: readonly Frame[];
  scratchDir: string;
  release(): Promise<void>;
}

export interface FrameSamplerOptions {
  /** Parent directory for scratch dirs (default: os.tmpdir()) */
  tempRoot?: string;
}

/**
 * Display name for a frame index, e.g. 7 -> frame_00007.jpg
 */
export function frameName(index: number): string {
  return `frame_${String(index).padStart(5, '0')}.jpg`;
}

/**
 * Number of sample points in a video: floor(duration / interval)
 */
export function expectedFrameCount(durationSeconds: number, intervalSeconds: number): number {
  return Math.floor(durationSeconds / intervalSeconds + ROUNDING_EPSILON);
}

/**
 * Timestamp of a 1-based frame index, rounded to the millisecond
 */
export function frameTimestamp(index: number, intervalSeconds: number): number {
  return Math.round((index - 1) * intervalSeconds * 1000) / 1000;
}

/**
 * Validate a sampling spec
 * @throws InvalidConfigurationError
 */
export function validateSampleSpec(spec: unknown): SampleSpec {
  const result = sampleSpecSchema.safeParse(spec);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new InvalidConfigurationError(`Invalid sampling configuration: ${fields}`, result.error.format());
  }
  return result.data;
}

/**
 * Open a video on disk
 * @throws SourceNotFoundError when the path is missing or not a regular file
 */
export async function openVideoSource(videoPath: string): Promise<VideoSource> {
  try {
    const stats = await stat(videoPath);
    if (!stats.isFile()) {
      throw new SourceNotFoundError(videoPath, `Video source is not a file: ${videoPath}`);
    }
    return { path: videoPath, sizeBytes: stats.size };
  } catch (error) {
    if (error instanceof SourceNotFoundError) {
      throw error;
    }
    throw new SourceNotFoundError(videoPath);
  }
}

/**
 * FrameSamplerService - turns a video into an ordered list of frames
 */
export class FrameSamplerService {
  constructor(
    private readonly extractor: FrameExtractionProvider = ffmpegFrameExtractionProvider,
    private readonly options: FrameSamplerOptions = {}
  ) {}

  /**
   * Sample one frame per interval.
   *
   * Frame n sits at (n - 1) * interval. The count is floor(duration / interval),
   * further capped by maxFrames (earliest kept). On failure the scratch
   * directory is removed before the error propagates.
   */
  async sample(video: VideoSource, spec: SampleSpec): Promise<SampledFrames> {
    const { intervalSeconds, maxFrames } = validateSampleSpec(spec);
    await openVideoSource(video.path);

    const duration = await this.extractor.probeDuration(video.path);
    let expected: number | undefined;

    if (duration !== null) {
      expected = expectedFrameCount(duration, intervalSeconds);
      if (expected === 0) {
        throw new NoFramesProducedError(
          `Video duration ${duration}s is shorter than the ${intervalSeconds}s sampling interval`
        );
      }
    }

    const frameLimit = minDefined(expected, maxFrames);

    const tempRoot = this.options.tempRoot ?? os.tmpdir();
    const scratchDir = await mkdtemp(path.join(tempRoot, `${getConfig().ffmpeg.tempDirName}-`));
    const release = releaseOnce(scratchDir);

    try {
      const paths = await this.extractor.extractFrames(video.path, scratchDir, {
        intervalSeconds,
        frameLimit,
      });

      const kept = frameLimit === undefined ? paths : paths.slice(0, frameLimit);
      if (kept.length === 0) {
        throw new NoFramesProducedError(
          `No frames extracted. Video too short or invalid interval ${intervalSeconds}s`
        );
      }

      const frames = await Promise.all(
        kept.map(async (framePath, i): Promise<Frame> => {
          const index = i + 1;
          return Object.freeze({
            index,
            timestamp: frameTimestamp(index, intervalSeconds),
            name: frameName(index),
            data: await readFile(framePath),
          });
        })
      );

      logger.info(
        {
          video: path.basename(video.path),
          sizeBytes: video.sizeBytes,
          duration,
          intervalSeconds,
          produced: paths.length,
          kept: frames.length,
        },
        'Video sampled'
      );

      return { frames: Object.freeze(frames), scratchDir, release };
    } catch (error) {
      await release();
      throw error;
    }
  }

  /**
   * Sample, hand the frames to fn, and release scratch storage whatever fn does
   */
  async withSampledFrames<T>(
    video: VideoSource,
    spec: SampleSpec,
    fn: (frames: readonly Frame[]) => Promise<T>
  ): Promise<T> {
    const sampled = await this.sample(video, spec);
    try {
      return await fn(sampled.frames);
    } finally {
      await sampled.release();
    }
  }
}

function minDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

/**
 * Build an idempotent remover for a scratch directory
 */
function releaseOnce(dir: string): () => Promise<void> {
  let pending: Promise<void> | null = null;

  return () => {
    if (!pending) {
      pending = rm(dir, { recursive: true, force: true }).then(
        () => {
          logger.debug({ dir }, 'Scratch directory released');
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn({ dir, error: message }, 'Failed to release scratch directory');
        }
      );
    }
    return pending;
  };
}

export const frameSamplerService = new FrameSamplerService();
