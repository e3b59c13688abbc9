import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import connectDatabase, { disconnectDatabase } from './config/database';
import logger, { errorMeta } from './config/logger';
import { loadSettings } from './config/settings';
import { MongoDataStore } from './repositories/mongo';
import { createServices } from './services';

const startServer = async () => {
  try {
    const settings = loadSettings();

    await connectDatabase(settings.mongoUri);

    const app = createApp(createServices(new MongoDataStore(), settings), settings);

    const server = app.listen(settings.port, () => {
      logger.info(`Server running in ${settings.environment} mode on port ${settings.port}`);
      logger.info(`Health check: http://localhost:${settings.port}/health`);
      logger.info(`API documentation: http://localhost:${settings.port}/docs`);
    });

    let shuttingDown = false;
    const gracefulShutdown = (exitCode: number) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Shutting down gracefully...');
      server.close(() => {
        logger.info('HTTP server closed');
        disconnectDatabase()
          .catch((error) => logger.error('Failed to close MongoDB connection', errorMeta(error)))
          .finally(() => process.exit(exitCode));
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown(0));
    process.on('SIGINT', () => gracefulShutdown(0));

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Promise Rejection', errorMeta(reason));
      gracefulShutdown(1);
    });

    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception', errorMeta(err));
      gracefulShutdown(1);
    });
  } catch (error) {
    logger.error('Failed to start server', errorMeta(error));
    process.exit(1);
  }
};

void startServer();
