import { initTracing, shutdownTracing } from './observability/tracing';

// Tracing must hook modules before express and mongoose load
initTracing();

import mongoose from 'mongoose';

import { createApp } from './app';
import { config } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { logger } from './observability/logger';
import { MongoAtomicScope, createMongoRepositories } from './repositories/mongo';

const startServer = async (): Promise<void> => {
  try {
    // Connect to database
    await connectDatabase();

    const app = createApp({
      repositories: createMongoRepositories(),
      scope: new MongoAtomicScope(mongoose.connection),
    });

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, env: config.nodeEnv, health: `http://localhost:${config.port}/health` },
        'Server started'
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        Promise.all([disconnectDatabase(), shutdownTracing()])
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
