import { spawn } from 'child_process';
import { mkdir, readdir } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { ExtractionFailedError } from '../utils/errors.js';

const logger = createChildLogger({ service: 'video' });

/** Output pattern handed to ffmpeg; the index is 1-based and zero-padded */
export const FRAME_FILE_PATTERN = 'frame_%05d.jpg';
const FRAME_FILE_REGEX = /^frame_(\d{5,})\.jpg$/;

export interface IntervalExtractionOptions {
  intervalSeconds: number;
  /** Passed to ffmpeg as -frames:v */
  frameLimit?: number;
  /** JPEG quality scale, 2 is near-lossless (default: 2) */
  quality?: number;
}

const ffprobeOutputSchema = z.object({
  streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
});

/**
 * 1-based frame index from a file name written with FRAME_FILE_PATTERN
 */
export function frameIndexFromName(filename: string): number {
  const match = FRAME_FILE_REGEX.exec(filename);
  return match ? parseInt(match[1], 10) : NaN;
}

/**
 * Build the ffmpeg argument list for interval sampling.
 * fps=1/N keeps the nearest source frame to each sample point.
 */
export function buildIntervalExtractionArgs(
  videoPath: string,
  outputDir: string,
  options: IntervalExtractionOptions
): string[] {
  const { intervalSeconds, frameLimit, quality = 2 } = options;

  const args = [
    '-hide_banner',
    '-loglevel', 'error',
    '-y',
    '-i', videoPath,
    '-vf', `fps=1/${intervalSeconds}`,
    '-q:v', quality.toString(),
  ];

  if (frameLimit !== undefined) {
    args.push('-frames:v', frameLimit.toString());
  }

  args.push(path.join(outputDir, FRAME_FILE_PATTERN));
  return args;
}

/**
 * VideoService - ffmpeg/ffprobe helpers for interval sampling
 */
export class VideoService {
  /**
   * Read the container duration with ffprobe.
   * Resolves null when the container does not report one.
   */
  async getDuration(videoPath: string): Promise<number | null> {
    const config = getConfig();

    return new Promise((resolve, reject) => {
      const args = [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        videoPath,
      ];

      const ffprobe = spawn(config.ffmpeg.ffprobePath, args);
      let stdout = '';
      let stderr = '';

      ffprobe.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      ffprobe.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffprobe.on('close', (code: number | null) => {
        if (code !== 0) {
          reject(new ExtractionFailedError(`ffprobe failed: ${stderr}`, code));
          return;
        }

        let data: z.infer<typeof ffprobeOutputSchema>;
        try {
          data = ffprobeOutputSchema.parse(JSON.parse(stdout));
        } catch (e) {
          reject(new ExtractionFailedError(`Failed to parse ffprobe output: ${e instanceof Error ? e.message : String(e)}`));
          return;
        }

        if (!data.streams.some((s) => s.codec_type === 'video')) {
          reject(new ExtractionFailedError('No video stream found'));
          return;
        }

        const duration = parseFloat(data.format?.duration ?? '');

        resolve(Number.isFinite(duration) ? duration : null);
      });

      ffprobe.on('error', (err: Error) => {
        reject(new ExtractionFailedError(`ffprobe not found. Is ffmpeg installed? ${err.message}`));
      });
    });
  }

  /**
   * Extract one still per interval into outputDir.
   * Returns the written frame paths in index order.
   */
  async extractFramesAtInterval(
    videoPath: string,
    outputDir: string,
    options: IntervalExtractionOptions
  ): Promise<string[]> {
    const config = getConfig();

    await mkdir(outputDir, { recursive: true });

    const args = buildIntervalExtractionArgs(videoPath, outputDir, options);

    await new Promise<void>((resolve, reject) => {
      logger.info(
        { intervalSeconds: options.intervalSeconds, frameLimit: options.frameLimit },
        'Extracting frames'
      );
      const ffmpeg = spawn(config.ffmpeg.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stderr = '';
      ffmpeg.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffmpeg.on('close', (code: number | null) => {
        if (code !== 0) {
          reject(new ExtractionFailedError(`ffmpeg extraction failed: ${stderr.trim()}`, code));
          return;
        }
        resolve();
      });

      ffmpeg.on('error', (err: Error) => {
        reject(new ExtractionFailedError(`ffmpeg not found. Is ffmpeg installed? ${err.message}`));
      });
    });

    const files = await readdir(outputDir);
    // %05d widens past 99999, so order by the number rather than the name
    const frames = files
      .filter((f) => FRAME_FILE_REGEX.test(f))
      .sort((a, b) => frameIndexFromName(a) - frameIndexFromName(b))
      .map((f) => path.join(outputDir, f));

    logger.info({ count: frames.length }, 'Frames extracted');
    return frames;
  }

  /**
   * Check if ffmpeg is available by running -version
   */
  async checkFfmpegInstalled(): Promise<{ available: boolean; ffmpegVersion?: string; ffprobeVersion?: string; error?: string }> {
    const config = getConfig();

    const checkVersion = (cmd: string): Promise<string> => {
      return new Promise((resolve, reject) => {
        const proc = spawn(cmd, ['-version'], { stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        proc.stdout?.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
        proc.on('close', (code: number | null) => {
          if (code === 0) {
            // First line reads "ffmpeg version 6.0 ..."
            const match = stdout.match(/version\s+([^\s]+)/);
            resolve(match?.[1] || 'unknown');
          } else {
            reject(new Error(`${cmd} exited with code ${code}`));
          }
        });
        proc.on('error', reject);
      });
    };

    try {
      const [ffmpegVersion, ffprobeVersion] = await Promise.all([
        checkVersion(config.ffmpeg.ffmpegPath),
        checkVersion(config.ffmpeg.ffprobePath),
      ]);
      return { available: true, ffmpegVersion, ffprobeVersion };
    } catch (error) {
      return { available: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}

export const videoService = new VideoService();
