import { describe, expect, it } from 'vitest';
import { makeRecords } from '../../testing/FakeProviderAdapter.js';
import { createTestContainer, seedIntegration, seedTenant } from '../../testing/testContainer.js';
import { ProviderPermanentError } from '../../utils/errors.js';
import { JobError, JobErrorCode } from '../types.js';
import { SyncWorker } from './SyncWorker.js';

const TRIGGERED_AT = '2026-03-02T09:00:00.000Z';

describe('SyncWorker', () => {
  it('should run the claimed job and report its counters', async () => {
    const harness = createTestContainer();
    const tenant = await seedTenant(harness);
    const integration = await seedIntegration(harness, tenant);
    harness.adapter.pages = [{ records: makeRecords('a', 3) }];
    const job = await harness.container.engine.triggerSync({ integrationId: integration.id, kind: 'FULL' });
    const worker = new SyncWorker(harness.container.engine);

    const result = await worker.processJob({
      id: job.id,
      name: 'run-sync',
      data: { syncJobId: job.id, triggeredAt: TRIGGERED_AT },
    });

    expect(result).toEqual({
      success: true,
      message: undefined,
      data: { syncJobId: job.id, status: 'COMPLETED', recordsFetched: 3, recordsProcessed: 3, recordsFailed: 0 },
    });
  });

  it('should resolve with an unsuccessful result when the sync fails', async () => {
    const harness = createTestContainer();
    const tenant = await seedTenant(harness);
    const integration = await seedIntegration(harness, tenant);
    harness.adapter.pages = [new ProviderPermanentError('SHOPIFY fetch page failed with status 403', 403)];
    const job = await harness.container.engine.triggerSync({ integrationId: integration.id, kind: 'FULL' });
    const worker = new SyncWorker(harness.container.engine);

    const result = await worker.processJob({
      id: job.id,
      name: 'run-sync',
      data: { syncJobId: job.id, triggeredAt: TRIGGERED_AT },
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Sync failed, check data: SHOPIFY fetch page failed with status 403');
    expect(result.data).toMatchObject({ status: 'FAILED' });
  });

  it('should raise a non-retryable job error for an unknown sync job', async () => {
    const harness = createTestContainer();
    const worker = new SyncWorker(harness.container.engine);

    const processing = worker.processJob({
      id: 'missing',
      name: 'run-sync',
      data: { syncJobId: 'missing', triggeredAt: TRIGGERED_AT },
    });

    await expect(processing).rejects.toBeInstanceOf(JobError);
    await expect(processing).rejects.toMatchObject({ code: JobErrorCode.NOT_FOUND, retryable: false });
  });
});
