/**
 * API Server Entry Point
 *
 * Fastify server exposing the segmentation engine over HTTP.
 */

import { loadApiConfig, loadEnv } from './config/index.js';
import { createApiLogger } from './lib/logger.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  loadEnv();
  const config = loadApiConfig();
  const logger = createApiLogger(config);

  try {
    const server = await createServer({ config });

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
      process.once(signal, () => {
        logger.info({ signal }, 'Received shutdown signal');

        server.close().then(
          () => {
            logger.info('Server closed gracefully');
            process.exit(0);
          },
          (err: unknown) => {
            logger.error({ err }, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      inputRoot: config.inputRoot,
      outputRoot: config.outputRoot,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Failed to load configuration:', err instanceof Error ? err.message : err);
  process.exit(1);
});
