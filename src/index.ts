import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, pool, PgUnitOfWork } from './connections';
import { LocalMediaStorage } from './modules/upload/localStorage.service';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info('Connecting to database...');
  await connectDatabase();

  const storage = new LocalMediaStorage(appConfig.uploadDir);
  const app = createApp({ uow: new PgUnitOfWork(pool), storage, mediaDir: storage.directory });

  app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
