/**
 * SyncEngine
 * Exclusive, cancellable, rate-governed sync jobs per integration
 */

import { config } from '../../config/index.js';
import type { SyncJobCounters, SyncJobRepository } from '../../repositories/SyncJobRepository.js';
import type { SyncedRecordRepository } from '../../repositories/SyncedRecordRepository.js';
import type { AuditService } from '../../services/AuditService.js';
import { CredentialsUnreadableError } from '../../services/EncryptionService.js';
import {
  AppError,
  ConflictError,
  NotFoundError,
  ProviderTransientError,
  ProviderUnauthorizedError,
  ProviderUnavailableError,
  RateLimitExceededError,
  RefreshFailedError,
  SyncAlreadyInProgressError,
  SyncCancelledError,
  SyncNotCancellableError,
  SyncTimeoutError,
  toErrorMessage,
} from '../../utils/errors.js';
import { sleep as defaultSleep } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { FetchPageResult, ProviderAdapter } from '../providers/types.js';
import type { CircuitBreakerRegistry } from './CircuitBreaker.js';
import type { CredentialStore } from './CredentialStore.js';
import type { RateGovernor } from './RateGovernor.js';
import type { TokenRefresher } from './TokenRefresher.js';
import type {
  AuditContext,
  Integration,
  IntegrationErrorKind,
  SyncErrorDetails,
  SyncJob,
  SyncJobKind,
  SyncJobParams,
} from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Hands a claimed job to whatever executes it (the BullMQ queue in production).
 */
export interface SyncDispatcher {
  dispatch(jobId: string): Promise<void>;
}

export interface SyncEngineDependencies {
  jobs: SyncJobRepository;
  records: SyncedRecordRepository;
  credentials: CredentialStore;
  refresher: TokenRefresher;
  governor: RateGovernor;
  breakers: CircuitBreakerRegistry;
  providers: ProviderRegistry;
  audit: AuditService;
  dispatcher: SyncDispatcher;
}

export interface SyncEngineOptions {
  jobTimeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  minIntervalMs: number;
  now?: () => Date;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TriggerSyncInput {
  integrationId: string;
  kind: SyncJobKind;
  params?: SyncJobParams;
  triggeredBy?: string | null;
}

interface JobRun {
  job: SyncJob;
  signal: AbortSignal;
  deadline: number;
  counters: SyncJobCounters;
  attempts: number;
}

const USER_FACING_PREFIX: Record<IntegrationErrorKind, string> = {
  RECONNECT_REQUIRED: 'Reconnection required',
  TRANSIENT: 'Sync failed, will retry on next trigger',
  PERMANENT: 'Sync failed, check data',
  TIMEOUT: 'Sync timed out',
};

/** How long past its deadline a RUNNING job must be before it is reaped */
const REAP_GRACE_MS = 60_000;

// ============================================================================
// SyncEngine Class
// ============================================================================

export class SyncEngine {
  private readonly controllers = new Map<string, AbortController>();
  private readonly now: () => Date;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly deps: SyncEngineDependencies,
    private readonly options: SyncEngineOptions = {
      jobTimeoutMs: config.sync.jobTimeoutMs,
      maxRetries: config.sync.maxRetries,
      backoffBaseMs: config.sync.backoffBaseMs,
      backoffMaxMs: config.sync.backoffMaxMs,
      minIntervalMs: config.sync.minIntervalMs,
    }
  ) {
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  // ==========================================================================
  // Triggering
  // ==========================================================================

  /**
   * Claim the integration for a new job and hand it to the dispatcher.
   * Fails synchronously when a job is already PENDING or RUNNING.
   */
  async triggerSync(input: TriggerSyncInput, context: AuditContext = {}): Promise<SyncJob> {
    const integration = await this.deps.credentials.requireById(input.integrationId);
    if (!integration.isActive) {
      throw new ConflictError('Integration is disconnected', { integrationId: integration.id });
    }

    const job = await this.deps.jobs.createIfIdle({
      integrationId: integration.id,
      kind: input.kind,
      params: input.params ?? {},
      triggeredBy: input.triggeredBy ?? null,
      createdAt: this.now(),
    });

    if (!job) {
      throw new SyncAlreadyInProgressError(integration.id);
    }

    logger.info('Sync job created', { jobId: job.id, integrationId: integration.id, kind: job.kind });

    await this.deps.audit.record(
      {
        action: 'sync_triggered',
        resourceType: 'sync_job',
        resourceId: job.id,
        details: { integrationId: integration.id, kind: job.kind, params: job.params },
      },
      { ...context, tenantId: integration.tenantId }
    );

    try {
      await this.deps.dispatcher.dispatch(job.id);
    } catch (error) {
      // Release the claim; a stuck PENDING job would block every later trigger
      await this.deps.jobs.transition(job.id, ['PENDING'], 'FAILED', {
        completedAt: this.now(),
        errorMessage: 'Failed to enqueue sync job',
        errorDetails: {
          kind: 'TRANSIENT',
          code: 'DISPATCH_FAILED',
          message: toErrorMessage(error),
        },
      });
      throw error;
    }

    return job;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Execute a claimed job to a terminal state. A job that is no longer
   * PENDING (cancelled, or picked up elsewhere) is returned untouched.
   */
  async runJob(jobId: string): Promise<SyncJob> {
    const startedAt = this.now();
    const job = await this.deps.jobs.transition(jobId, ['PENDING'], 'RUNNING', { startedAt });
    if (!job) {
      const current = await this.getJob(jobId);
      logger.info('Sync job not runnable, skipping', { jobId, status: current.status });
      return current;
    }

    const controller = new AbortController();
    this.controllers.set(jobId, controller);

    const timer = setTimeout(() => {
      controller.abort(
        new SyncTimeoutError('Sync job exceeded its time limit', { jobId, timeoutMs: this.options.jobTimeoutMs })
      );
    }, this.options.jobTimeoutMs);

    const run: JobRun = {
      job,
      signal: controller.signal,
      deadline: startedAt.getTime() + this.options.jobTimeoutMs,
      counters: { recordsFetched: 0, recordsProcessed: 0, recordsFailed: 0 },
      attempts: 0,
    };

    logger.info('Sync job started', { jobId, integrationId: job.integrationId, kind: job.kind });

    try {
      const integration = await this.deps.credentials.mutate(job.integrationId, (current) =>
        current.isActive ? { syncStatus: 'SYNCING' } : null
      );
      if (!integration.isActive) {
        throw new RefreshFailedError(integration.id, 'Integration is disconnected');
      }

      const syncToken = await this.pullAllPages(run, integration);
      return await this.complete(run, syncToken);
    } catch (error) {
      if (error instanceof SyncCancelledError) {
        return await this.finishCancelled(run);
      }
      return await this.fail(run, error);
    } finally {
      clearTimeout(timer);
      this.controllers.delete(jobId);
    }
  }

  /**
   * Cancel a PENDING or RUNNING job. A running job stops at its next
   * checkpoint, after any page it is writing has been fully stored.
   */
  async cancelSync(jobId: string, context: AuditContext = {}): Promise<SyncJob> {
    const job = await this.getJob(jobId);
    if (job.status !== 'PENDING' && job.status !== 'RUNNING') {
      throw new SyncNotCancellableError(jobId, job.status);
    }

    const cancelled = await this.deps.jobs.transition(jobId, ['PENDING', 'RUNNING'], 'CANCELLED', {
      completedAt: this.now(),
    });
    if (!cancelled) {
      const current = await this.getJob(jobId);
      throw new SyncNotCancellableError(jobId, current.status);
    }

    this.controllers.get(jobId)?.abort(new SyncCancelledError(jobId));

    const integration = await this.deps.credentials.findById(job.integrationId);
    logger.info('Sync job cancelled', { jobId, integrationId: job.integrationId, previousStatus: job.status });

    await this.deps.audit.record(
      {
        action: 'sync_cancelled',
        resourceType: 'sync_job',
        resourceId: jobId,
        details: { integrationId: job.integrationId, previousStatus: job.status },
      },
      { ...context, tenantId: integration?.tenantId ?? null }
    );

    return cancelled;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async getJob(jobId: string): Promise<SyncJob> {
    const job = await this.deps.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError('Sync job', jobId);
    }
    return job;
  }

  async listJobs(integrationId: string, limit: number = 20): Promise<SyncJob[]> {
    return this.deps.jobs.listByIntegration(integrationId, limit);
  }

  async findActiveJob(integrationId: string): Promise<SyncJob | null> {
    return this.deps.jobs.findActiveByIntegration(integrationId);
  }

  isRunningLocally(jobId: string): boolean {
    return this.controllers.has(jobId);
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Fail RUNNING jobs whose worker died: anything started longer ago than the
   * job timeout (plus a grace period) and not running in this process.
   */
  async reapStaleJobs(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.options.jobTimeoutMs - REAP_GRACE_MS);
    const stale = await this.deps.jobs.listRunningStartedBefore(cutoff);
    let reaped = 0;

    for (const job of stale) {
      if (this.controllers.has(job.id)) {
        continue;
      }

      const message = 'Sync job exceeded its time limit without completing';
      const failed = await this.deps.jobs.transition(job.id, ['RUNNING'], 'FAILED', {
        completedAt: this.now(),
        errorMessage: message,
        errorDetails: { kind: 'TIMEOUT', code: 'SYNC_TIMEOUT', message, reaped: true },
      });
      if (!failed) {
        continue;
      }

      reaped++;
      const integration = await this.markIntegrationFailed(job.integrationId, 'TIMEOUT', message);
      logger.warn('Reaped stale sync job', { jobId: job.id, integrationId: job.integrationId });

      await this.deps.audit.record(
        {
          action: 'sync_failed',
          resourceType: 'sync_job',
          resourceId: job.id,
          details: { integrationId: job.integrationId, kind: 'TIMEOUT', reaped: true },
        },
        { tenantId: integration?.tenantId ?? null }
      );
    }

    return reaped;
  }

  /**
   * Trigger scheduled syncs for active integrations not synced within the
   * minimum interval. Integrations that need reconnecting are left alone.
   */
  async syncDueIntegrations(): Promise<number> {
    const integrations = await this.deps.credentials.listActive();
    const now = this.now().getTime();
    let triggered = 0;

    for (const integration of integrations) {
      const due =
        !integration.lastSyncedAt || now - integration.lastSyncedAt.getTime() >= this.options.minIntervalMs;
      if (
        !due ||
        integration.syncStatus === 'SYNCING' ||
        integration.lastErrorKind === 'RECONNECT_REQUIRED' ||
        !this.deps.providers.isConfigured(integration.provider)
      ) {
        continue;
      }

      try {
        await this.triggerSync({
          integrationId: integration.id,
          kind: integration.lastSyncedAt ? 'INCREMENTAL' : 'FULL',
          triggeredBy: 'scheduler',
        });
        triggered++;
      } catch (error) {
        if (error instanceof SyncAlreadyInProgressError) {
          continue;
        }
        logger.error('Scheduled sync trigger failed', { integrationId: integration.id, error });
      }
    }

    if (triggered > 0) {
      logger.info('Scheduled syncs triggered', { triggered });
    }
    return triggered;
  }

  // ==========================================================================
  // Private Methods: page loop
  // ==========================================================================

  private async pullAllPages(run: JobRun, start: Integration): Promise<string | undefined> {
    const adapter = this.deps.providers.get(start.provider);
    const previousSyncToken = run.job.kind === 'INCREMENTAL' ? start.metadata.syncToken : undefined;

    let integration = start;
    let cursor: string | undefined;
    let latestSyncToken: string | undefined;

    do {
      await this.checkpoint(run);

      const fetched = await this.fetchPageWithRetry(run, adapter, integration, cursor, previousSyncToken);
      integration = fetched.integration;
      const page = fetched.page;

      run.counters.recordsFetched += page.records.length;
      await this.storePage(run, page);

      cursor = page.nextCursor;
      latestSyncToken = page.syncToken ?? latestSyncToken;
    } while (cursor);

    return latestSyncToken;
  }

  private async fetchPageWithRetry(
    run: JobRun,
    adapter: ProviderAdapter,
    start: Integration,
    cursor: string | undefined,
    syncToken: string | undefined
  ): Promise<{ page: FetchPageResult; integration: Integration }> {
    let integration = start;
    let retries = 0;
    let reauthorized = false;
    let forceRefresh = false;
    const breaker = this.deps.breakers.get(adapter.provider);

    for (;;) {
      await this.checkpoint(run);

      try {
        breaker.assertCallable();
        integration = await this.deps.refresher.ensureFreshToken(integration, { force: forceRefresh });
        forceRefresh = false;
        const tokens = await this.deps.credentials.getDecryptedTokens(integration);
        await this.acquireBudget(run, adapter, integration);

        run.attempts++;
        const page = await adapter.fetchPage({
          accessToken: tokens.accessToken,
          externalAccountId: integration.externalAccountId,
          cursor,
          params: run.job.params,
          syncToken,
          signal: run.signal,
        });
        breaker.recordSuccess();
        return { page, integration };
      } catch (error) {
        if (run.signal.aborted) {
          throw run.signal.reason;
        }

        if (error instanceof ProviderUnauthorizedError) {
          if (reauthorized) {
            throw new RefreshFailedError(integration.id, 'Provider rejected the refreshed access token');
          }
          reauthorized = true;
          forceRefresh = true;
          continue;
        }

        if (!(error instanceof ProviderTransientError)) {
          throw error;
        }
        breaker.recordFailure();
        if (retries >= this.options.maxRetries) {
          throw error;
        }

        const delay = this.backoffDelay(retries, error.retryAfterMs);
        retries++;
        logger.warn('Transient provider error, retrying', {
          jobId: run.job.id,
          integrationId: integration.id,
          retry: retries,
          delayMs: delay,
          error: error.message,
        });
        await this.sleepWithinDeadline(run, delay);
      }
    }
  }

  /**
   * Wait for rate budget, sleeping until the window resets whenever it is spent.
   */
  private async acquireBudget(run: JobRun, adapter: ProviderAdapter, integration: Integration): Promise<void> {
    for (;;) {
      try {
        await this.deps.governor.acquire(integration.id, adapter.rateLimit);
        return;
      } catch (error) {
        if (!(error instanceof RateLimitExceededError)) {
          throw error;
        }
        logger.debug('Waiting for rate window', { jobId: run.job.id, waitMs: error.retryAfterMs });
        await this.sleepWithinDeadline(run, Math.max(error.retryAfterMs, 1));
        await this.checkpoint(run);
      }
    }
  }

  /**
   * A page is written in one statement and never interrupted; cancellation
   * is only observed at the next checkpoint.
   */
  private async storePage(run: JobRun, page: FetchPageResult): Promise<void> {
    try {
      run.counters.recordsProcessed += await this.deps.records.upsertPage(run.job.integrationId, page.records);
    } catch (error) {
      run.counters.recordsFailed += page.records.length;
      throw error;
    } finally {
      await this.deps.jobs.updateCounters(run.job.id, run.counters);
    }
  }

  /**
   * Throw if the job has been cancelled (locally or by another instance)
   * or has hit its deadline.
   */
  private async checkpoint(run: JobRun): Promise<void> {
    if (run.signal.aborted) {
      throw run.signal.reason;
    }
    const current = await this.deps.jobs.findById(run.job.id);
    if (current?.status === 'CANCELLED') {
      throw new SyncCancelledError(run.job.id);
    }
  }

  /**
   * min(base * 2^retry, cap) plus up to 25% jitter, never less than the
   * provider's Retry-After.
   */
  private backoffDelay(retry: number, retryAfterMs?: number): number {
    const capped = Math.min(this.options.backoffBaseMs * Math.pow(2, retry), this.options.backoffMaxMs);
    const jitter = capped * 0.25 * this.random();
    return Math.max(Math.round(capped + jitter), retryAfterMs ?? 0);
  }

  private async sleepWithinDeadline(run: JobRun, ms: number): Promise<void> {
    if (this.now().getTime() + ms > run.deadline) {
      throw new SyncTimeoutError('Sync job would exceed its time limit while waiting', {
        jobId: run.job.id,
        waitMs: ms,
      });
    }
    await this.sleep(ms, run.signal);
  }

  // ==========================================================================
  // Private Methods: terminal states
  // ==========================================================================

  private async complete(run: JobRun, syncToken: string | undefined): Promise<SyncJob> {
    const completedAt = this.now();
    const completed = await this.deps.jobs.transition(run.job.id, ['RUNNING'], 'COMPLETED', {
      completedAt,
      ...run.counters,
    });
    if (!completed) {
      return this.finishCancelled(run);
    }

    // A bounded backfill does not move the incremental marker
    const nextSyncToken = run.job.params.until
      ? undefined
      : syncToken ?? run.job.startedAt?.toISOString();

    const integration = await this.deps.credentials.mutate(run.job.integrationId, (current) =>
      current.isActive
        ? {
            syncStatus: 'IDLE',
            lastSyncedAt: completedAt,
            lastError: null,
            lastErrorKind: null,
            metadata: nextSyncToken
              ? { ...current.metadata, syncToken: nextSyncToken, syncTokenUpdatedAt: completedAt.toISOString() }
              : current.metadata,
          }
        : null
    );

    logger.info('Sync job completed', { jobId: run.job.id, integrationId: integration.id, ...run.counters });

    await this.deps.audit.record(
      {
        action: 'sync_completed',
        resourceType: 'sync_job',
        resourceId: run.job.id,
        details: { integrationId: integration.id, ...run.counters },
      },
      { tenantId: integration.tenantId }
    );

    return completed;
  }

  private async finishCancelled(run: JobRun): Promise<SyncJob> {
    await this.deps.jobs.transition(run.job.id, ['RUNNING'], 'CANCELLED', { completedAt: this.now() });
    await this.deps.jobs.updateCounters(run.job.id, run.counters);

    await this.deps.credentials.mutate(run.job.integrationId, (current) =>
      current.syncStatus === 'SYNCING' ? { syncStatus: 'IDLE' } : null
    );

    logger.info('Sync job stopped after cancellation', { jobId: run.job.id, ...run.counters });
    return this.getJob(run.job.id);
  }

  private async fail(run: JobRun, error: unknown): Promise<SyncJob> {
    const details = this.describeFailure(error, run.attempts);
    const errorMessage = `${USER_FACING_PREFIX[details.kind]}: ${details.message}`;

    const failed = await this.deps.jobs.transition(run.job.id, ['RUNNING'], 'FAILED', {
      completedAt: this.now(),
      ...run.counters,
      errorMessage,
      errorDetails: details,
    });
    if (!failed) {
      // Cancelled while failing: cancellation wins
      return this.finishCancelled(run);
    }

    const integration = await this.markIntegrationFailed(run.job.integrationId, details.kind, errorMessage);

    logger.error('Sync job failed', {
      jobId: run.job.id,
      integrationId: run.job.integrationId,
      kind: details.kind,
      code: details.code,
      error: details.message,
    });

    await this.deps.audit.record(
      {
        action: 'sync_failed',
        resourceType: 'sync_job',
        resourceId: run.job.id,
        details: { integrationId: run.job.integrationId, kind: details.kind, code: details.code },
      },
      { tenantId: integration?.tenantId ?? null }
    );

    return failed;
  }

  private async markIntegrationFailed(
    integrationId: string,
    kind: IntegrationErrorKind,
    message: string
  ): Promise<Integration | null> {
    try {
      return await this.deps.credentials.mutate(integrationId, (current) =>
        current.isActive ? { syncStatus: 'ERROR', lastError: message, lastErrorKind: kind } : null
      );
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private describeFailure(error: unknown, attempts: number): SyncErrorDetails {
    const message = toErrorMessage(error);

    if (error instanceof SyncTimeoutError) {
      return { kind: 'TIMEOUT', code: error.code, message, attempts };
    }
    if (
      error instanceof RefreshFailedError ||
      error instanceof ProviderUnauthorizedError ||
      error instanceof CredentialsUnreadableError
    ) {
      return { kind: 'RECONNECT_REQUIRED', code: error.code, message, attempts };
    }
    if (error instanceof ProviderTransientError) {
      return { kind: 'TRANSIENT', code: error.code, message, attempts, httpStatus: error.httpStatus };
    }
    if (error instanceof RateLimitExceededError) {
      return { kind: 'TRANSIENT', code: error.code, message, attempts };
    }
    if (error instanceof ProviderUnavailableError) {
      return { kind: 'TRANSIENT', code: error.code, message, attempts, retryAfterMs: error.retryAfterMs };
    }
    if (error instanceof AppError) {
      return { ...error.details, kind: 'PERMANENT', code: error.code, message, attempts };
    }
    return { kind: 'PERMANENT', code: 'INTERNAL_ERROR', message, attempts };
  }
}
