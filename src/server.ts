import { createServer } from 'http';

import { createApp } from './app.js';
import { config } from './config/index.js';
import { createProductionContainer } from './container.js';
import { connectDatabase, disconnectDatabase } from './database/client.js';
import { connectRedis, disconnectRedis } from './database/redis.js';
import { closeQueues, scheduleMaintenanceJobs } from './jobs/queue.js';
import { initializeWorkers, stopWorkers } from './jobs/workers/index.js';
import { logger } from './utils/logger.js';

const container = createProductionContainer();
const app = createApp(container);
const httpServer = createServer(app);

// ==================== GRACEFUL SHUTDOWN ====================

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, starting graceful shutdown...`);

  // Stop accepting new connections
  httpServer.close(() => {
    logger.info('HTTP server closed');
  });

  try {
    // Stop workers first; closing waits for active jobs
    await stopWorkers();

    await Promise.all([
      disconnectDatabase(),
      disconnectRedis(),
      closeQueues(),
    ]);

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// ==================== START SERVER ====================

async function main(): Promise<void> {
  try {
    await connectDatabase();

    await connectRedis();

    initializeWorkers(container);
    await scheduleMaintenanceJobs();

    httpServer.listen(config.server.port, () => {
      logger.info('Sync service listening', {
        port: config.server.port,
        environment: config.env,
        providers: container.providers.listConfigured(),
      });
    });
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

void main();
