import { describe, expect, it } from 'vitest';
import { createTestContainer } from '../testing/testContainer.js';
import { ConflictError, NotFoundError, TenantInactiveError, ValidationError } from '../utils/errors.js';

describe('TenantService', () => {
  it('should create a tenant with a normalized subdomain', async () => {
    const { container, repositories } = createTestContainer();

    const tenant = await container.tenants.createTenant(
      { name: '  Acme Retail ', subdomain: 'Acme-Retail', ownerUserId: 'user-1' },
      { actorId: 'user-1' }
    );

    expect(tenant).toMatchObject({
      name: 'Acme Retail',
      subdomain: 'acme-retail',
      ownerUserId: 'user-1',
      subscriptionTier: 'free',
      isActive: true,
    });
    expect(repositories.auditLogs.rows[0]).toMatchObject({
      action: 'tenant_created',
      tenantId: tenant.id,
      actorId: 'user-1',
      resourceId: tenant.id,
    });
  });

  it('should reject subdomains with other characters', async () => {
    const { container } = createTestContainer();

    await expect(
      container.tenants.createTenant({ name: 'Acme', subdomain: 'acme_retail', ownerUserId: 'user-1' })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a taken subdomain', async () => {
    const { container } = createTestContainer();
    await container.tenants.createTenant({ name: 'Acme', subdomain: 'acme', ownerUserId: 'user-1' });

    await expect(
      container.tenants.createTenant({ name: 'Other', subdomain: 'acme', ownerUserId: 'user-2' })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it('should resolve the tenant from the token claim before ownership', async () => {
    const { container } = createTestContainer();
    const owned = await container.tenants.createTenant({ name: 'Owned', subdomain: 'owned', ownerUserId: 'user-1' });
    const member = await container.tenants.createTenant({ name: 'Member', subdomain: 'member', ownerUserId: 'user-9' });

    await expect(container.tenants.resolveForUser({ userId: 'user-1' })).resolves.toMatchObject({ id: owned.id });
    await expect(
      container.tenants.resolveForUser({ userId: 'user-1', tenantId: member.id })
    ).resolves.toMatchObject({ id: member.id });
    await expect(container.tenants.resolveForUser({ userId: 'user-3' })).resolves.toBeNull();
  });

  it('should deactivate a tenant and then refuse it as active', async () => {
    const { container, repositories } = createTestContainer();
    const tenant = await container.tenants.createTenant({ name: 'Acme', subdomain: 'acme', ownerUserId: 'user-1' });

    const deactivated = await container.tenants.deactivateTenant(tenant.id);

    expect(deactivated.isActive).toBe(false);
    await expect(container.tenants.requireActiveTenant(tenant.id)).rejects.toBeInstanceOf(TenantInactiveError);
    expect(repositories.auditLogs.actions()).toEqual(['tenant_created', 'tenant_deactivated']);
  });

  it('should report unknown tenants as not found', async () => {
    const { container } = createTestContainer();

    await expect(container.tenants.getTenant('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(container.tenants.deactivateTenant('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});
