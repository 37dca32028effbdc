/**
 * SyncWorker
 * Runs claimed sync jobs to a terminal state
 */

import type { SyncEngine } from '../../integrations/common/SyncEngine.js';
import { SYNC_QUEUE } from '../queue.js';
import type { JobExecutionContext, JobLike, JobResult, SyncRunJobData } from '../types.js';
import { BaseWorker } from './BaseWorker.js';

export class SyncWorker extends BaseWorker<SyncRunJobData> {
  protected readonly queueName = SYNC_QUEUE;

  constructor(private readonly engine: SyncEngine) {
    super();
  }

  /**
   * A failed sync is a recorded outcome, not a queue failure; only errors
   * the engine could not record reach BullMQ.
   */
  protected async execute(job: JobLike<SyncRunJobData>, _context: JobExecutionContext): Promise<JobResult> {
    const syncJob = await this.engine.runJob(job.data.syncJobId);

    return {
      success: syncJob.status === 'COMPLETED',
      message: syncJob.errorMessage ?? undefined,
      data: {
        syncJobId: syncJob.id,
        status: syncJob.status,
        recordsFetched: syncJob.recordsFetched,
        recordsProcessed: syncJob.recordsProcessed,
        recordsFailed: syncJob.recordsFailed,
      },
    };
  }
}
