import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
  };
  logging: {
    level: string;
  };
  ffmpeg: {
    ffmpegPath: string;
    ffprobePath: string;
    tempDirName: string;
  };
  detection: {
    workerUrl: string;
    countField: string;
    concurrency: number;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    failOnTotalFailure: boolean;
  };
  detector: {
    maxImageBytes: number;
    command: string;
    args: string[];
    timeoutMs: number;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    ffmpeg: {
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
      tempDirName: env.TEMP_DIR_NAME,
    },
    detection: {
      workerUrl: env.WORKER_URL,
      countField: env.WORKER_COUNT_FIELD,
      concurrency: env.DETECTION_CONCURRENCY,
      timeoutMs: env.DETECTION_TIMEOUT_MS,
      maxRetries: env.DETECTION_MAX_RETRIES,
      retryDelayMs: env.DETECTION_RETRY_DELAY_MS,
      failOnTotalFailure: env.FAIL_ON_TOTAL_FAILURE,
    },
    detector: {
      maxImageBytes: env.MAX_IMAGE_BYTES,
      command: env.DETECTOR_COMMAND,
      args: env.DETECTOR_ARGS,
      timeoutMs: env.DETECTOR_TIMEOUT_MS,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
