import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { disconnectRedis, getRedisClient, isRedisEnabled } from './redis';
import { createServices } from './services';
import { closeSweepQueue, createSweepProcessor, setupSweepWorker } from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    const services = createServices();

    // Background sweeps only run when Redis is configured
    let worker: ReturnType<typeof setupSweepWorker> | null = null;
    if (isRedisEnabled()) {
      // Trigger Redis connection (for early logging and availability check)
      getRedisClient();

      worker = setupSweepWorker(createSweepProcessor(services));
      logger.info('👷 Sweep worker initialized');
    } else {
      logger.info('Redis not configured: progress mirror and sweep queue disabled');
    }

    const app = createApp(services);

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 LEDGER RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        const closeAll = async (): Promise<void> => {
          // Close BullMQ worker and queue before the shared Redis connection
          if (worker) {
            await worker.close();
          }
          await closeSweepQueue();
          await disconnectRedis();
        };

        closeAll()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((closeError: unknown) => {
            logger.error('Error while closing connections:', closeError);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
