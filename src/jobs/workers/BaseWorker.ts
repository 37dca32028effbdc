/**
 * BaseWorker
 * Abstract base class for all job workers providing common functionality:
 * - Execution context and duration logging
 * - Error categorization for BullMQ retries
 */

import type { Job, Worker } from 'bullmq';
import { AppError, toErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createWorker } from '../queue.js';
import type { BaseJobData, JobExecutionContext, JobLike, JobResult } from '../types.js';
import { JobError, JobErrorCode } from '../types.js';

// ============================================================================
// BaseWorker Abstract Class
// ============================================================================

export abstract class BaseWorker<T extends BaseJobData> {
  protected abstract readonly queueName: string;
  protected worker: Worker<T> | null = null;

  /**
   * Main execution method - subclasses must implement this
   */
  protected abstract execute(job: JobLike<T>, context: JobExecutionContext): Promise<JobResult>;

  /**
   * Initialize the worker with the queue connection
   */
  initialize(concurrency?: number): Worker<T> {
    this.worker = createWorker<T>(this.queueName, (job: Job<T>) => this.processJob(job), concurrency);
    return this.worker;
  }

  /**
   * Main job processing method with hooks
   */
  async processJob(job: JobLike<T>): Promise<JobResult> {
    const context = this.beforeExecute(job);

    try {
      const result = await this.execute(job, context);
      this.afterExecute(job, context, result);
      return result;
    } catch (error) {
      const jobError = this.categorizeError(error);
      logger.error(`Job ${context.jobId} failed in queue ${this.queueName}`, {
        jobName: job.name,
        code: jobError.code,
        retryable: jobError.retryable,
        error: jobError.message,
        durationMs: Date.now() - context.startTime.getTime(),
      });
      throw jobError;
    }
  }

  protected beforeExecute(job: JobLike<T>): JobExecutionContext {
    return {
      jobId: job.id ?? 'unknown',
      startTime: new Date(),
    };
  }

  protected afterExecute(job: JobLike<T>, context: JobExecutionContext, result: JobResult): void {
    logger.debug(`Job ${context.jobId} finished in queue ${this.queueName}`, {
      jobName: job.name,
      success: result.success,
      durationMs: Date.now() - context.startTime.getTime(),
    });
  }

  /**
   * Categorize error for appropriate handling
   */
  protected categorizeError(error: unknown): JobError {
    if (error instanceof JobError) {
      return error;
    }

    if (error instanceof AppError) {
      const code = error.code === 'NOT_FOUND' ? JobErrorCode.NOT_FOUND : JobErrorCode.INTEGRATION_ERROR;
      return new JobError(code, error.message, error.retryable);
    }

    return new JobError(JobErrorCode.UNKNOWN, toErrorMessage(error), true);
  }

  /**
   * Stop the worker gracefully
   */
  async stop(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
  }
}
