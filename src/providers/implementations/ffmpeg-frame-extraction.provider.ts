import { createChildLogger } from '../../utils/logger.js';
import { videoService, type VideoService } from '../../services/video.service.js';
import type {
  FrameExtractionProvider,
  FrameExtractionOptions,
} from '../interfaces/frame-extraction.provider.js';

const logger = createChildLogger({ service: 'ffmpeg-extraction' });

/**
 * FFmpeg Frame Extraction Provider
 *
 * Uses ffprobe for the duration and ffmpeg's fps filter for sampling.
 */
export class FFmpegFrameExtractionProvider implements FrameExtractionProvider {
  readonly providerId = 'ffmpeg';

  constructor(private readonly video: VideoService = videoService) {}

  async probeDuration(videoPath: string): Promise<number | null> {
    return this.video.getDuration(videoPath);
  }

  async extractFrames(
    videoPath: string,
    outputDir: string,
    options: FrameExtractionOptions
  ): Promise<string[]> {
    return this.video.extractFramesAtInterval(videoPath, outputDir, {
      intervalSeconds: options.intervalSeconds,
      frameLimit: options.frameLimit,
    });
  }

  async isAvailable(): Promise<boolean> {
    const status = await this.video.checkFfmpegInstalled();
    if (status.available) {
      logger.debug({ ffmpeg: status.ffmpegVersion, ffprobe: status.ffprobeVersion }, 'ffmpeg available');
    } else {
      logger.warn({ error: status.error }, 'ffmpeg not available');
    }
    return status.available;
  }
}

export const ffmpegFrameExtractionProvider = new FFmpegFrameExtractionProvider();
