/**
 * MaintenanceWorker
 * Periodic housekeeping: scheduled syncs, OAuth state cleanup, stale job reaping
 */

import type { OAuthManager } from '../../integrations/common/OAuthManager.js';
import type { SyncEngine } from '../../integrations/common/SyncEngine.js';
import { MAINTENANCE_QUEUE } from '../queue.js';
import type { JobExecutionContext, JobLike, JobResult, MaintenanceJobData } from '../types.js';
import { BaseWorker } from './BaseWorker.js';

export class MaintenanceWorker extends BaseWorker<MaintenanceJobData> {
  protected readonly queueName = MAINTENANCE_QUEUE;

  constructor(
    private readonly engine: SyncEngine,
    private readonly oauth: OAuthManager
  ) {
    super();
  }

  protected async execute(job: JobLike<MaintenanceJobData>, _context: JobExecutionContext): Promise<JobResult> {
    switch (job.data.task) {
      case 'schedule-syncs': {
        const triggered = await this.engine.syncDueIntegrations();
        return { success: true, data: { triggered } };
      }
      case 'purge-oauth-states': {
        const purged = await this.oauth.purgeExpiredStates();
        return { success: true, data: { purged } };
      }
      case 'reap-stale-jobs': {
        const reaped = await this.engine.reapStaleJobs();
        return { success: true, data: { reaped } };
      }
    }
  }
}
