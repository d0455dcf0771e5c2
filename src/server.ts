// Load environment variables from .env file
import 'dotenv/config';

import { config } from './config/env';
import { logger, errorMessage } from './utils/logger';
import { createApp } from './app';
import { createAppContext } from './context';

async function main(): Promise<void> {
  const context = await createAppContext(config);
  await context.init();

  const app = createApp(context);

  const server = app.listen(config.port, () => {
    logger.info('Integration hub listening', { port: config.port, store: context.store.backend });
  });

  // A full sync fan-out may legitimately take up to the run timeout
  server.setTimeout(config.sync.runTimeoutMs + 10_000);
  server.keepAliveTimeout = 65_000; // Slightly above typical LB timeout (60s)
  server.headersTimeout = 70_000;   // Must be > keepAliveTimeout

  server.on('clientError', (err: NodeJS.ErrnoException, socket) => {
    logger.debug('client connection error', { error: err.message, code: err.code });
    if (!socket.destroyed) {
      socket.end('HTTP/1.1 400 Bad Request\r\n\r\n');
    }
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('shutting down service', { signal });

    // Force exit after 30s to prevent hanging on stuck connections
    const forceExitTimer = setTimeout(() => {
      logger.error('graceful shutdown timed out after 30s, forcing exit');
      process.exit(1);
    }, 30_000);
    forceExitTimer.unref();

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('HTTP server closed, connections drained');
    } catch (error: unknown) {
      logger.error('HTTP server close failed', { error: errorMessage(error) });
    }

    try {
      await context.shutdown();
    } catch (error: unknown) {
      logger.error('context shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    }

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('service failed to start', { error: errorMessage(error) });
  process.exit(1);
});
