import { DrizzleTenantRepository, type TenantRepository } from '../repositories/TenantRepository.js';
import { NotFoundError, TenantInactiveError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AuditService } from './AuditService.js';
import type { AuditContext, JWTPayload, SubscriptionTier, Tenant } from '../types/index.js';

export interface CreateTenantInput {
  name: string;
  subdomain: string;
  ownerUserId: string;
  contactEmail?: string;
  subscriptionTier?: SubscriptionTier;
}

const SUBDOMAIN_PATTERN = /^[a-z0-9-]+$/;

export class TenantService {
  constructor(
    private readonly audit: AuditService,
    private readonly repository: TenantRepository = new DrizzleTenantRepository()
  ) {}

  async createTenant(input: CreateTenantInput, context: AuditContext = {}): Promise<Tenant> {
    const subdomain = input.subdomain.trim().toLowerCase();
    if (!SUBDOMAIN_PATTERN.test(subdomain)) {
      throw new ValidationError('Subdomain may only contain lowercase letters, numbers and hyphens', {
        subdomain: input.subdomain,
      });
    }

    const tenant = await this.repository.create({
      name: input.name.trim(),
      subdomain,
      ownerUserId: input.ownerUserId,
      contactEmail: input.contactEmail ?? null,
      subscriptionTier: input.subscriptionTier ?? 'free',
    });

    logger.info('Tenant created', { tenantId: tenant.id, subdomain });

    await this.audit.record(
      {
        action: 'tenant_created',
        resourceType: 'tenant',
        resourceId: tenant.id,
        details: { subdomain, subscriptionTier: tenant.subscriptionTier },
      },
      { ...context, tenantId: tenant.id }
    );

    return tenant;
  }

  async getTenant(id: string): Promise<Tenant> {
    const tenant = await this.repository.findById(id);
    if (!tenant) {
      throw new NotFoundError('Tenant', id);
    }
    return tenant;
  }

  async requireActiveTenant(id: string): Promise<Tenant> {
    const tenant = await this.getTenant(id);
    if (!tenant.isActive) {
      throw new TenantInactiveError(id);
    }
    return tenant;
  }

  /**
   * The tenant a caller acts for: the token's tenant claim, or else the
   * tenant the user owns.
   */
  async resolveForUser(user: JWTPayload): Promise<Tenant | null> {
    if (user.tenantId) {
      return this.repository.findById(user.tenantId);
    }
    return this.repository.findByOwner(user.userId);
  }

  async deactivateTenant(id: string, context: AuditContext = {}): Promise<Tenant> {
    const tenant = await this.repository.setActive(id, false);
    if (!tenant) {
      throw new NotFoundError('Tenant', id);
    }

    logger.info('Tenant deactivated', { tenantId: id });

    await this.audit.record(
      { action: 'tenant_deactivated', resourceType: 'tenant', resourceId: id },
      { ...context, tenantId: id }
    );

    return tenant;
  }
}
