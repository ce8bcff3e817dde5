import pino, { type Logger } from 'pino';
import { getConfig } from '../config/index.js';

let logger: Logger | null = null;

/**
 * Create or get the application logger.
 *
 * Base64 frame payloads are redacted so a logged worker request never dumps
 * an image into the log stream.
 */
export function getLogger(): Logger {
  if (logger) {
    return logger;
  }

  const config = getConfig();
  const isDev = config.server.env === 'development';

  logger = pino({
    level: config.logging.level,
    redact: {
      paths: ['image_data', '*.image_data', 'body.image_data'],
      censor: '[base64]',
    },
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: 'frame-count',
      env: config.server.env,
    },
  });

  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return getLogger().child(context);
}
