import { describe, expect, it } from 'vitest';
import { AuditService } from './AuditService.js';
import { MemoryAuditLogRepository } from '../testing/memory.js';

describe('AuditService', () => {
  it('should append an entry with the caller context', async () => {
    const repository = new MemoryAuditLogRepository();
    const audit = new AuditService(repository);

    const recorded = await audit.record(
      { action: 'sync_triggered', resourceType: 'sync_job', resourceId: 'job-1', details: { kind: 'FULL' } },
      { tenantId: 'tenant-1', actorId: 'user-1', ipAddress: '10.0.0.1', userAgent: 'vitest' }
    );

    expect(recorded).toBe(true);
    expect(repository.rows[0]).toMatchObject({
      tenantId: 'tenant-1',
      actorId: 'user-1',
      action: 'sync_triggered',
      resourceType: 'sync_job',
      resourceId: 'job-1',
      ipAddress: '10.0.0.1',
      userAgent: 'vitest',
      details: { kind: 'FULL' },
    });
  });

  it('should redact secrets from details', async () => {
    const repository = new MemoryAuditLogRepository();
    const audit = new AuditService(repository);

    await audit.record(
      {
        action: 'token_refreshed',
        resourceType: 'integration',
        resourceId: 'integration-1',
        details: { provider: 'STRIPE', accessToken: 'test-access-token', nested: { clientSecret: 'test-secret' } },
      },
      { tenantId: 'tenant-1' }
    );

    expect(repository.rows[0].details).toEqual({
      provider: 'STRIPE',
      accessToken: '[REDACTED]',
      nested: { clientSecret: '[REDACTED]' },
    });
  });

  it('should report a failed write without throwing', async () => {
    const repository = new MemoryAuditLogRepository();
    repository.failAppends = true;
    const audit = new AuditService(repository);

    await expect(
      audit.record({ action: 'tenant_created', resourceType: 'tenant', resourceId: 'tenant-1' })
    ).resolves.toBe(false);
  });

  it('should list a tenant trail newest first and filter by time', async () => {
    const repository = new MemoryAuditLogRepository();
    const audit = new AuditService(repository);
    await repository.append({
      tenantId: 'tenant-1',
      action: 'tenant_created',
      resourceType: 'tenant',
      createdAt: new Date('2026-03-01T08:00:00.000Z'),
    });
    await repository.append({
      tenantId: 'tenant-1',
      action: 'sync_triggered',
      resourceType: 'sync_job',
      createdAt: new Date('2026-03-02T08:00:00.000Z'),
    });
    await repository.append({
      tenantId: 'tenant-2',
      action: 'tenant_created',
      resourceType: 'tenant',
      createdAt: new Date('2026-03-02T09:00:00.000Z'),
    });

    const all = await audit.listForTenant('tenant-1', { limit: 10 });
    const recent = await audit.listForTenant('tenant-1', { limit: 10, since: new Date('2026-03-02T00:00:00.000Z') });

    expect(all.map((row) => row.action)).toEqual(['sync_triggered', 'tenant_created']);
    expect(recent.map((row) => row.action)).toEqual(['sync_triggered']);
  });
});
