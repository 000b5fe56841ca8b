// Process-level error handlers, graceful shutdown and request timeouts

import { Server } from 'http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '@/utils/logger';

let serverInstance: Server | null = null;
const cleanupTasks: Array<() => void> = [];

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registers work to run once the HTTP server stops, e.g. closing the database. */
export function onShutdown(task: () => void): void {
  cleanupTasks.push(task);
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // keep serving in production, fail fast elsewhere
    if (nodeEnv !== 'production') {
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

  signals.forEach(signal => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  logger.info('process:shutdown', { reason });

  // ongoing requests get 15 seconds
  const shutdownTimeout = setTimeout(() => {
    logger.error('process:shutdown_forced');
    process.exit(1);
  }, 15000);

  try {
    if (serverInstance) {
      const server = serverInstance;
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('process:http_closed');
    }

    for (const task of cleanupTasks) {
      task();
    }

    clearTimeout(shutdownTimeout);
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

/**
 * Answers 408 when a request runs longer than `timeoutMs`.
 */
export function requestTimeout(timeoutMs: number = 15000): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(408).json({
          detail: `Request exceeded ${timeoutMs}ms timeout`,
          code: 'request_timeout',
        });
      }
    }, timeoutMs);

    // Clear timeout when response is sent
    res.on('finish', () => {
      clearTimeout(timeout);
    });

    res.on('close', () => {
      clearTimeout(timeout);
    });

    next();
  };
}
