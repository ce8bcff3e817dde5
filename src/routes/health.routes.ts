import type { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok';
  timestamp: string;
  detector: string;
}

export interface HealthRoutesOptions {
  detectorId: string;
}

/**
 * Health check routes
 */
export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  /**
   * Liveness probe - is the worker running?
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
              detector: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        detector: options.detectorId,
      });
    }
  );
}
