import type { FastifyInstance, FastifyReply } from 'fastify';
import { createChildLogger } from '../utils/logger.js';
import type { ObjectDetector } from '../providers/interfaces/object-detector.provider.js';
import {
  detectRequestSchema,
  type DetectErrorResponse,
  type DetectSuccessResponse,
} from '../types/detection.types.js';

const logger = createChildLogger({ service: 'detect-route' });

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

export interface DetectRoutesOptions {
  detector: ObjectDetector;
  /** Largest decoded image accepted */
  maxImageBytes: number;
}

/**
 * Decode a base64 image payload, tolerating a data URL prefix and whitespace.
 * Returns null when the payload is not valid base64.
 */
export function decodeImageData(imageData: string): Buffer | null {
  const compact = imageData.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return null;
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Worker protocol routes: one image in, one count out
 */
export async function detectRoutes(fastify: FastifyInstance, options: DetectRoutesOptions): Promise<void> {
  const { detector, maxImageBytes } = options;

  const fail = (reply: FastifyReply, statusCode: number, body: DetectErrorResponse): FastifyReply =>
    reply.status(statusCode).send(body);

  const handler = async (body: unknown, reply: FastifyReply): Promise<FastifyReply> => {
    const parsed = detectRequestSchema.safeParse(body);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'body').join(', ');
      return fail(reply, 400, { error: `Invalid request: ${fields}` });
    }

    const { image_data, filename } = parsed.data;

    const image = decodeImageData(image_data);
    if (!image) {
      return fail(reply, 400, { error: 'Invalid base64 image data', filename });
    }

    if (image.length > maxImageBytes) {
      return fail(reply, 413, {
        error: `Image is ${image.length} bytes, limit is ${maxImageBytes}`,
        filename,
      });
    }

    let count: number;
    try {
      count = await detector.countObjects(image, filename);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ filename, detector: detector.detectorId, error: message }, 'Prediction failed');
      return fail(reply, 422, { error: `Prediction failed: ${message}`, filename });
    }

    logger.debug({ filename, count }, 'Frame scored');

    return reply.send({
      count,
      filename,
      message: 'Detection completed successfully',
    } satisfies DetectSuccessResponse);
  };

  fastify.post('/', async (request, reply) => handler(request.body, reply));
  fastify.post('/detect', async (request, reply) => handler(request.body, reply));
}
