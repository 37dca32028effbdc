/**
 * Workers Index
 * Registers and initializes all job workers
 */

import type { Container } from '../../container.js';
import { toErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { MaintenanceWorker } from './MaintenanceWorker.js';
import { SyncWorker } from './SyncWorker.js';

export { BaseWorker } from './BaseWorker.js';
export { MaintenanceWorker } from './MaintenanceWorker.js';
export { SyncWorker } from './SyncWorker.js';

// Collection of all initialized workers
const workers: Array<{ stop(): Promise<void> }> = [];

/**
 * Initialize all workers and attach them to their respective queues
 */
export function initializeWorkers(container: Container): void {
  logger.info('Initializing job workers...');

  const syncWorker = new SyncWorker(container.engine);
  syncWorker.initialize();
  workers.push(syncWorker);
  logger.debug('SyncWorker initialized');

  const maintenanceWorker = new MaintenanceWorker(container.engine, container.oauth);
  maintenanceWorker.initialize(1);
  workers.push(maintenanceWorker);
  logger.debug('MaintenanceWorker initialized');

  logger.info('All job workers initialized', { count: workers.length });
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(): Promise<void> {
  logger.info('Stopping job workers...');

  await Promise.all(
    workers.map(async (worker) => {
      try {
        await worker.stop();
      } catch (error) {
        logger.error('Error stopping worker', { error: toErrorMessage(error) });
      }
    })
  );
  workers.length = 0;

  logger.info('All job workers stopped');
}
