/**
 * HTTP entry point.
 * Loads the registry before accepting traffic, serves the express app and
 * shuts down on SIGINT/SIGTERM.
 */

import { pathToFileURL } from 'node:url';
import { loadConfig } from './config.js';
import { getProductionContainer } from './container.production.js';
import { createRouter } from './api/router.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const container = getProductionContainer(config);
  const logger = container.logProvider;
  const router = createRouter(container);

  await container.registry.initialize();
  container.registry.start();

  const server = createApp(router, logger).listen(config.port, () => {
    logger.info('query-mesh listening', { port: config.port, backend: config.classifierBackend });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    container.registry.stop();
    server.close(() => {
      void container.eventPublisher
        .disconnect()
        .then(() => logger.flush())
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
