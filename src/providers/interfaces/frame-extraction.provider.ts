/**
 * Frame extraction options
 */
export interface FrameExtractionOptions {
  /** Seconds between samples */
  intervalSeconds: number;
  /** Upper bound on frames written */
  frameLimit?: number;
}

/**
 * FrameExtractionProvider Interface
 *
 * Implementations: FFmpegFrameExtractionProvider
 *
 * Wraps the external decode tool: probes duration and writes one still per
 * sample point into an output directory.
 */
export interface FrameExtractionProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Video duration in seconds, or null when the container does not report it
   * @param videoPath - Path to video file
   */
  probeDuration(videoPath: string): Promise<number | null>;

  /**
   * Extract frames at a fixed interval
   * @param videoPath - Path to video file
   * @param outputDir - Directory for extracted frames
   * @returns Written frame paths, earliest first
   */
  extractFrames(
    videoPath: string,
    outputDir: string,
    options: FrameExtractionOptions
  ): Promise<string[]>;

  /**
   * Check if the tool is installed
   */
  isAvailable(): Promise<boolean>;
}
