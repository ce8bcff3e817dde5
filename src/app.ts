import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';

import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { errorHandler } from './middleware/error.middleware.js';
import { healthRoutes } from './routes/health.routes.js';
import { detectRoutes } from './routes/detect.routes.js';
import type { ObjectDetector } from './providers/interfaces/object-detector.provider.js';

/** Room for the JSON envelope around the base64 payload */
const BODY_OVERHEAD_BYTES = 64 * 1024;

export interface WorkerAppOptions {
  detector: ObjectDetector;
  /** Largest decoded image accepted (default: MAX_IMAGE_BYTES) */
  maxImageBytes?: number;
}

/**
 * Build and configure the detection worker
 */
export async function buildWorkerApp(options: WorkerAppOptions): Promise<FastifyInstance> {
  const config = getConfig();
  const logger = getLogger();
  const maxImageBytes = options.maxImageBytes ?? config.detector.maxImageBytes;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    // base64 inflates by 4/3
    bodyLimit: Math.ceil((maxImageBytes * 4) / 3) + BODY_OVERHEAD_BYTES,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  app.setErrorHandler(errorHandler);

  await app.register(healthRoutes, { detectorId: options.detector.detectorId });
  await app.register(detectRoutes, { detector: options.detector, maxImageBytes });

  return app;
}
