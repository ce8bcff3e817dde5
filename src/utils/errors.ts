/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Sampling interval, frame cap or dispatch settings are invalid.
 * A configuration error, raised before any work starts.
 */
export class InvalidConfigurationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 400, 'INVALID_CONFIGURATION');
    this.details = details;
  }
}

/**
 * Video source cannot be opened
 */
export class SourceNotFoundError extends AppError {
  public readonly sourcePath: string;

  constructor(sourcePath: string, message = `Video source not found: ${sourcePath}`) {
    super(message, 404, 'SOURCE_NOT_FOUND');
    this.sourcePath = sourcePath;
  }
}

/**
 * External frame extraction tool exited non-zero or could not be started
 */
export class ExtractionFailedError extends AppError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message, 500, 'EXTRACTION_FAILED');
    this.exitCode = exitCode;
  }
}

/**
 * Extraction produced zero frames (video shorter than one interval)
 */
export class NoFramesProducedError extends AppError {
  constructor(message = 'No frames produced from video') {
    super(message, 422, 'NO_FRAMES_PRODUCED');
  }
}

/**
 * Aggregation was asked to summarise an empty outcome set
 */
export class NoFramesProcessedError extends AppError {
  constructor(message = 'No frames were processed') {
    super(message, 422, 'NO_FRAMES_PROCESSED');
  }
}

/**
 * Every dispatched frame failed and fail-fast on total failure is enabled
 */
export class AllFramesFailedError extends AppError {
  public readonly frameCount: number;

  constructor(frameCount: number) {
    super(`All ${frameCount} frames failed detection`, 502, 'ALL_FRAMES_FAILED');
    this.frameCount = frameCount;
  }
}

/**
 * Two outcomes were recorded for one frame index
 */
export class DuplicateFrameOutcomeError extends AppError {
  public readonly frameIndex: number;

  constructor(frameIndex: number) {
    super(`Duplicate outcome for frame ${frameIndex}`, 500, 'DUPLICATE_FRAME_OUTCOME', false);
    this.frameIndex = frameIndex;
  }
}

/**
 * Worker-side detector could not score an image
 */
export class DetectorFailedError extends AppError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message, 422, 'DETECTOR_FAILED');
    this.exitCode = exitCode;
  }
}
