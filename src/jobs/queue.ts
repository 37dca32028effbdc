import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { config } from '../config/index.js';
import type { SyncDispatcher } from '../integrations/common/SyncEngine.js';
import { logger } from '../utils/logger.js';
import type { MaintenanceJobData, MaintenanceTask, SyncRunJobData } from './types.js';

export const SYNC_QUEUE = 'sync';
export const MAINTENANCE_QUEUE = 'maintenance';

// Redis connection for BullMQ
export function redisConnection(url: string = config.redis.url): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379'),
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    maxRetriesPerRequest: null,
  };
}

// ==================== QUEUE DEFINITIONS ====================

let syncQueue: Queue<SyncRunJobData> | null = null;
let maintenanceQueue: Queue<MaintenanceJobData> | null = null;

export function getSyncQueue(): Queue<SyncRunJobData> {
  if (!syncQueue) {
    syncQueue = new Queue<SyncRunJobData>(SYNC_QUEUE, { connection: redisConnection() });
  }
  return syncQueue;
}

export function getMaintenanceQueue(): Queue<MaintenanceJobData> {
  if (!maintenanceQueue) {
    maintenanceQueue = new Queue<MaintenanceJobData>(MAINTENANCE_QUEUE, { connection: redisConnection() });
  }
  return maintenanceQueue;
}

// ==================== JOB OPTIONS ====================

/**
 * Sync runs are attempted once: retries and backoff happen inside the job.
 */
export const syncJobOptions = {
  attempts: 1,
  removeOnComplete: {
    age: 7 * 24 * 3600, // Keep completed jobs for 7 days
    count: 1000,
  },
  removeOnFail: {
    age: 30 * 24 * 3600, // Keep failed jobs for 30 days
  },
};

export const maintenanceJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential' as const,
    delay: 60000,
  },
  removeOnComplete: { count: 100 },
  removeOnFail: { count: 500 },
};

// ==================== WORKER FACTORY ====================

export function createWorker<T>(
  queueName: string,
  processor: (job: Job<T>) => Promise<unknown>,
  concurrency: number = config.sync.workerConcurrency
): Worker<T> {
  const worker = new Worker<T>(queueName, processor, {
    connection: redisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.debug(`Job ${job.id} completed in queue ${queueName}`);
  });

  worker.on('failed', (job, error) => {
    logger.error(`Job ${job?.id} failed in queue ${queueName}`, {
      error: error.message,
      jobData: job?.data,
    });
  });

  return worker;
}

// ==================== DISPATCH ====================

/**
 * Enqueues claimed sync jobs; the BullMQ job id is the sync job id, so a
 * duplicate dispatch is a no-op.
 */
export class QueueSyncDispatcher implements SyncDispatcher {
  async dispatch(jobId: string): Promise<void> {
    await getSyncQueue().add(
      'run-sync',
      { syncJobId: jobId, triggeredAt: new Date().toISOString() },
      { ...syncJobOptions, jobId }
    );
    logger.debug('Sync job enqueued', { jobId });
  }
}

// ==================== JOB SCHEDULING ====================

const MAINTENANCE_SCHEDULE: Array<{ task: MaintenanceTask; pattern: string }> = [
  { task: 'schedule-syncs', pattern: config.sync.scheduleCron },
  { task: 'purge-oauth-states', pattern: '*/15 * * * *' },
  { task: 'reap-stale-jobs', pattern: '*/5 * * * *' },
];

/**
 * Schedule maintenance jobs
 */
export async function scheduleMaintenanceJobs(): Promise<void> {
  const queue = getMaintenanceQueue();

  for (const { task, pattern } of MAINTENANCE_SCHEDULE) {
    await queue.add(
      task,
      { task, triggeredAt: new Date().toISOString() },
      {
        ...maintenanceJobOptions,
        repeat: { pattern },
        jobId: `maintenance-${task}`,
      }
    );
  }

  logger.info('Maintenance jobs scheduled', {
    tasks: MAINTENANCE_SCHEDULE.map(({ task, pattern }) => `${task} (${pattern})`),
  });
}

// ==================== QUEUE MANAGEMENT ====================

/**
 * Close all queues gracefully
 */
export async function closeQueues(): Promise<void> {
  await Promise.all([syncQueue?.close(), maintenanceQueue?.close()]);
  syncQueue = null;
  maintenanceQueue = null;

  logger.info('All job queues closed');
}
