import { z } from 'zod';

/**
 * Parse a comma/space separated argument list.
 * Empty input yields an empty list.
 */
const splitArgs = (val: string): string[] =>
  val
    .split(/[\s,]+/)
    .map((a) => a.trim())
    .filter(Boolean);

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8001),
  HOST: z.string().default('0.0.0.0'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // FFmpeg
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  TEMP_DIR_NAME: z.string().default('frame-count'),

  // Detection worker (client side)
  WORKER_URL: z.string().url().default('http://127.0.0.1:8001/'),
  WORKER_COUNT_FIELD: z.string().min(1).default('count'),
  DETECTION_CONCURRENCY: z.coerce.number().int().positive().max(50).default(2),
  DETECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000), // per attempt
  DETECTION_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  DETECTION_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  FAIL_ON_TOTAL_FAILURE: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((val) => val === 'true' || val === '1'),

  // Detection worker (server side)
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  DETECTOR_COMMAND: z.string().default('count-objects'),
  DETECTOR_ARGS: z.string().default('').transform(splitArgs),
  DETECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
