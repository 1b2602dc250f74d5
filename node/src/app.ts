// node/src/app.ts: Express application, without listening

import compression from 'compression';
import cors from 'cors';
import express, { type Express } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import morgan from 'morgan';
import type { SupervisorGraph } from '@/agent/supervisor-graph';
import type { AppConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createChatRouter } from '@/routes/chat';
import { logger } from '@/services/logger';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppDeps {
  supervisor: Pick<SupervisorGraph, 'handleTurn'>;
  /** Number of indexed chunks, reported by /health. */
  indexedChunks: () => Promise<number>;
}

export function createApp(config: AppConfig, deps: AppDeps): Express {
  const { server } = config;
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: server.corsOrigins, credentials: true }));

  // Rate limiting stays off in development.
  if (server.nodeEnv !== 'development') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(requestTimeout(server.requestTimeoutMs));
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());

  if (server.nodeEnv !== 'test') {
    const stream = { write: (line: string) => logger.info('http:access', { line: line.trim() }) };
    app.use(morgan(server.nodeEnv === 'development' ? 'dev' : 'combined', { stream }));
  }

  app.get('/health', (_req, res, next) => {
    deps
      .indexedChunks()
      .then((indexedChunks) =>
        res.status(200).json({
          status: 'OK',
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
          environment: server.nodeEnv,
          indexedChunks,
        }),
      )
      .catch(next);
  });

  app.use('/chat', createChatRouter(deps.supervisor));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
