import http from 'http';
import type { Server } from 'http';
import type { Pool } from 'pg';
import { loadConfig } from './core/config';
import { createPool, getPoolStatus } from './core/db';
import { createDatabase } from './db';
import { createApp } from './app';
import { runStartupTasks } from './loaders/startup';
import { logger } from './core/logger';
import { getErrorMessage } from './utils/errorUtils';

let isShuttingDown = false;
let httpServer: Server | null = null;
let dbPool: Pool | null = null;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception', { error });
  if (error.message?.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: getErrorMessage(reason) });
});

process.on('SIGTERM', () => {
  logger.info('[Process] Received SIGTERM signal');
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  logger.info('[Process] Received SIGINT signal');
  void gracefulShutdown('SIGINT');
});

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        setTimeout(resolve, 5000);
      });
    }

    if (dbPool) {
      logger.info('[Shutdown] Closing database pool', { extra: getPoolStatus(dbPool) });
      await dbPool.end();
    }

    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error: getErrorMessage(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

async function main() {
  const config = loadConfig();
  logger.info(`[Startup] Environment: ${config.env}`);

  const pool = createPool(config);
  dbPool = pool;
  const db = createDatabase(pool);

  await runStartupTasks(db);

  const app = createApp({ config, db, sessionPool: pool });
  const server = http.createServer(app);
  httpServer = server;

  server.on('error', (err: unknown) => {
    logger.error('[Startup] Server failed to start', { error: getErrorMessage(err) });
    process.exit(1);
  });

  server.listen(config.port, '0.0.0.0', () => {
    logger.info(`[Startup] HTTP server listening on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  logger.error('[Startup] Initialization failed', { error: err instanceof Error ? err : getErrorMessage(err) });
  process.exit(1);
});
