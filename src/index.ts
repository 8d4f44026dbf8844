import config from './config';
import { Server } from 'http';
import { createLogger } from './utils/logger';
import { createApp } from './app';
import { db } from './database/connection';
import { InMemoryPostStore, postDAO, PostStore, PostWriter } from './database/dao';
import { seedSamplePosts } from './database/seed';

const logger = createLogger('Main');

const SHUTDOWN_TIMEOUT_MS = 10000;

const createStore = async (): Promise<PostStore & PostWriter> => {
  if (config.postStore === 'memory') {
    logger.info('Using in-memory post store');
    return new InMemoryPostStore();
  }

  await db.connect();
  await postDAO.ensureSchema();
  return postDAO;
};

const start = async (): Promise<Server> => {
  const store = await createStore();

  if (config.seedSampleData) {
    await seedSamplePosts(store);
  }

  const app = createApp({ store, storeName: config.postStore });

  return app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`📝 Environment: ${config.nodeEnv}, log level: ${config.logLevel}`);
    logger.info(`🔗 Health check: http://localhost:${config.port}/health`);
  });
};

const registerShutdown = (server: Server): void => {
  const gracefulShutdown = (signal: string): void => {
    logger.info(`📊 Received ${signal}. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('✅ HTTP server closed');
      db.disconnect()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error while closing database pool', { error });
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('❌ Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

start()
  .then(registerShutdown)
  .catch(async (error: unknown) => {
    logger.error('Failed to start server', { error });
    await db.disconnect();
    process.exit(1);
  });
