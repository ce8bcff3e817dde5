import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { buildWorkerApp } from './app.js';
import { CommandObjectDetector } from './providers/implementations/command-object-detector.provider.js';

/**
 * Detection worker entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  const detector = new CommandObjectDetector();
  logger.info(
    { env: config.server.env, detector: detector.detectorId, args: config.detector.args },
    'Starting detection worker'
  );

  const app = await buildWorkerApp({ detector });

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Worker started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start worker');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
