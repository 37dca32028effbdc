/**
 * Job Types
 * Payloads and results of the background queues
 */

// ============================================================================
// Base Job Types
// ============================================================================

export interface BaseJobData {
  triggeredAt: string;
}

export interface JobExecutionContext {
  jobId: string;
  startTime: Date;
}

/**
 * The subset of a BullMQ job the workers read.
 */
export interface JobLike<T> {
  id?: string;
  name: string;
  data: T;
}

// ============================================================================
// Specific Job Data Types
// ============================================================================

export interface SyncRunJobData extends BaseJobData {
  syncJobId: string;
}

export type MaintenanceTask = 'schedule-syncs' | 'purge-oauth-states' | 'reap-stale-jobs';

export interface MaintenanceJobData extends BaseJobData {
  task: MaintenanceTask;
}

// ============================================================================
// Results
// ============================================================================

export interface JobResult {
  success: boolean;
  message?: string;
  data?: Record<string, unknown>;
}

// ============================================================================
// Errors
// ============================================================================

export enum JobErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INTEGRATION_ERROR = 'INTEGRATION_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export class JobError extends Error {
  constructor(
    public code: JobErrorCode,
    message: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'JobError';
  }
}
