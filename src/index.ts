// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { createApp } from './app';
import { loadConfig } from './config/app.config';
import { openDatabase } from './db';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';
import { configureLogger, logger } from './utils/logger';

const startServer = (): void => {
  try {
    const config = loadConfig(process.env);
    configureLogger(config.logLevel);

    setupUnhandledRejectionHandler(config.nodeEnv);
    setupUncaughtExceptionHandler();
    setupGracefulShutdown();

    const database = openDatabase(config.databasePath);
    onShutdown(() => database.close());

    const { app } = createApp({ config, db: database.db });

    const server = app.listen(config.port, '0.0.0.0', () => {
      logger.info('server:listening', {
        port: config.port,
        environment: config.nodeEnv,
        shopService: config.shopService.url,
      });
    });
    setServerInstance(server);
  } catch (error) {
    logger.fatal('server:start_failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
};

startServer();
