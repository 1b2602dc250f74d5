// Load environment variables FIRST: imports are evaluated in order
import 'dotenv/config';

import { existsSync } from 'node:fs';
import { createApp } from '@/app';
import { loadConfig } from '@/config/app.config';
import { buildPipeline } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { errorMessage } from '@/stability/errors';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

async function startServer(): Promise<void> {
  const config = loadConfig();
  const pipeline = buildPipeline(config);
  onShutdown(() => pipeline.close());

  if (existsSync(config.indexPath)) {
    const chunks = await pipeline.store.load(config.indexPath);
    logger.info('server:index_loaded', { path: config.indexPath, chunks });
  } else {
    logger.warn('server:index_missing', { path: config.indexPath, hint: 'run npm run ingest -- <dir>' });
  }

  const app = createApp(config, {
    supervisor: pipeline.supervisor,
    indexedChunks: () => pipeline.store.count(),
  });

  const server = app.listen(config.server.port, '0.0.0.0', () => {
    logger.info('server:listening', {
      port: config.server.port,
      environment: config.server.nodeEnv,
      health: `http://localhost:${config.server.port}/health`,
    });
  });
  setServerInstance(server);
}

startServer().catch((error: unknown) => {
  logger.fatal('server:start_failed', { error: errorMessage(error) });
  process.exit(1);
});
