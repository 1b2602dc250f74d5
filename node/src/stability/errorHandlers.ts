// Process-level error handlers, graceful shutdown and the request timeout middleware

import type { Server } from 'node:http';
import type { NextFunction, Request } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

const SHUTDOWN_GRACE_MS = 15000;

let serverInstance: Server | null = null;
const cleanupTasks: Array<() => Promise<void>> = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registered tasks run once on shutdown, after the server stops accepting requests. */
export function onShutdown(task: () => Promise<void>): void {
  cleanupTasks.push(task);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // Production keeps serving; elsewhere fail fast.
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) {
        logger.warn('process:server_close_failed', { error: error.message });
      } else {
        logger.info('process:server_closed');
      }
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown_started', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_forced', { afterMs: SHUTDOWN_GRACE_MS });
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forced.unref();

  try {
    if (serverInstance) {
      await closeServer(serverInstance);
    }
    await Promise.all(cleanupTasks.map((task) => task()));
    logger.info('process:shutdown_done');
    clearTimeout(forced);
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(forced);
    process.exit(1);
  }
}

/** Response surface the timeout middleware needs; express's Response satisfies it. */
export interface DeadlineResponse {
  headersSent: boolean;
  locals: Record<string, unknown>;
  status(code: number): { json(body: unknown): unknown };
  on(event: 'finish' | 'close', listener: () => void): unknown;
}

/** Aborted when the request times out; handlers pass it down to the work they start. */
export function requestAbortController(res: Pick<DeadlineResponse, 'locals'>): AbortController | undefined {
  const value: unknown = res.locals.requestAbort;
  return value instanceof AbortController ? value : undefined;
}

/**
 * Answers 408 when a handler has not responded within `timeoutMs`, and aborts the
 * request's controller so that work still running for it stops.
 */
export function requestTimeout(timeoutMs: number = 15000) {
  return (req: Pick<Request, 'method' | 'path'>, res: DeadlineResponse, next: NextFunction): void => {
    const controller = new AbortController();
    res.locals.requestAbort = controller;

    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        logger.warn('http:request_timeout', { method: req.method, path: req.path, timeoutMs });
        res
          .status(408)
          .json(createErrorResponse(`Request exceeded ${timeoutMs}ms timeout`, undefined, 'REQUEST_TIMEOUT'));
      }
      controller.abort();
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));
    next();
  };
}
