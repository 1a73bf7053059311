import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase } from './connections';
import { logger } from './utils/logging';

const PORT = appConfig.port;

const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
};

void startServer();
