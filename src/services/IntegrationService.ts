import type { CircuitBreakerRegistry, CircuitStatus } from '../integrations/common/CircuitBreaker.js';
import type { CredentialStore } from '../integrations/common/CredentialStore.js';
import type { RateGovernor, RateUsage } from '../integrations/common/RateGovernor.js';
import type { SyncEngine } from '../integrations/common/SyncEngine.js';
import type { TokenRefresher } from '../integrations/common/TokenRefresher.js';
import { PROVIDER_DEFINITIONS } from '../integrations/providers/definitions.js';
import type { ProviderRegistry } from '../integrations/providers/registry.js';
import type { AccountDescription } from '../integrations/providers/types.js';
import type { SyncedRecordRepository } from '../repositories/SyncedRecordRepository.js';
import { AppError, ConflictError, NotFoundError, ProviderTransientError, toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AuditService } from './AuditService.js';
import type { AuditContext, Integration, IntegrationView, SyncedRecord } from '../types/index.js';

export interface IntegrationDetails extends IntegrationView {
  rateUsage: RateUsage | null;
  circuit: CircuitStatus | null;
}

export type ConnectionTestResult =
  | { ok: true; testedAt: Date; account: AccountDescription | null }
  | { ok: false; testedAt: Date; code: string; error: string };

export class IntegrationService {
  constructor(
    private readonly credentials: CredentialStore,
    private readonly providers: ProviderRegistry,
    private readonly engine: SyncEngine,
    private readonly governor: RateGovernor,
    private readonly records: SyncedRecordRepository,
    private readonly audit: AuditService,
    private readonly refresher: TokenRefresher,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly now: () => Date = () => new Date()
  ) {}

  toView(integration: Integration): IntegrationView {
    return {
      id: integration.id,
      provider: integration.provider,
      category: PROVIDER_DEFINITIONS[integration.provider].category,
      externalAccountId: integration.externalAccountId,
      externalAccountName: integration.externalAccountName,
      scopes: integration.scopes,
      tokenExpiresAt: integration.tokenExpiresAt,
      lastSyncedAt: integration.lastSyncedAt,
      syncStatus: integration.syncStatus,
      lastError: integration.lastError,
      lastErrorKind: integration.lastErrorKind,
      isActive: integration.isActive,
      connectedAt: integration.connectedAt,
      disconnectedAt: integration.disconnectedAt,
    };
  }

  async listForTenant(tenantId: string): Promise<IntegrationView[]> {
    const integrations = await this.credentials.listForTenant(tenantId);
    return integrations.map((integration) => this.toView(integration));
  }

  /**
   * Load an integration the tenant owns. Another tenant's integration is
   * reported as not found.
   */
  async requireOwned(tenantId: string, integrationId: string): Promise<Integration> {
    const integration = await this.credentials.findById(integrationId);
    if (!integration || integration.tenantId !== tenantId) {
      throw new NotFoundError('Integration', integrationId);
    }
    return integration;
  }

  async getDetails(tenantId: string, integrationId: string): Promise<IntegrationDetails> {
    const integration = await this.requireOwned(tenantId, integrationId);
    const configured = this.providers.isConfigured(integration.provider);
    const rateUsage = configured
      ? await this.governor.getUsage(integration.id, this.providers.get(integration.provider).rateLimit)
      : null;
    const circuit = configured ? this.breakers.get(integration.provider).getStatus() : null;

    return { ...this.toView(integration), rateUsage, circuit };
  }

  /**
   * Make one authenticated call to the provider with the stored credentials.
   * Provider and credential failures are reported in the result, not thrown.
   */
  async testConnection(
    tenantId: string,
    integrationId: string,
    context: AuditContext = {}
  ): Promise<ConnectionTestResult> {
    const stored = await this.requireOwned(tenantId, integrationId);
    if (!stored.isActive) {
      throw new ConflictError('Integration is disconnected', { integrationId: stored.id });
    }

    const adapter = this.providers.get(stored.provider);
    const breaker = this.breakers.get(adapter.provider);
    const testedAt = this.now();
    let result: ConnectionTestResult;

    try {
      breaker.assertCallable();
      const integration = await this.refresher.ensureFreshToken(stored);
      const tokens = await this.credentials.getDecryptedTokens(integration);
      await this.governor.acquire(integration.id, adapter.rateLimit);

      let account: AccountDescription | null = null;
      if (adapter.describeAccount) {
        account = await adapter.describeAccount(tokens.accessToken, integration.externalAccountId);
      } else {
        await adapter.fetchPage({
          accessToken: tokens.accessToken,
          externalAccountId: integration.externalAccountId,
          params: {},
        });
      }
      breaker.recordSuccess();
      result = { ok: true, testedAt, account };
    } catch (error) {
      if (!(error instanceof AppError)) {
        throw error;
      }
      if (error instanceof ProviderTransientError) {
        breaker.recordFailure();
      }
      result = { ok: false, testedAt, code: error.code, error: error.message };
    }

    logger.info('Connection tested', { integrationId: stored.id, provider: stored.provider, ok: result.ok });

    await this.audit.record(
      {
        action: 'connection_tested',
        resourceType: 'integration',
        resourceId: stored.id,
        details: result.ok
          ? { provider: stored.provider, ok: true }
          : { provider: stored.provider, ok: false, code: result.code },
      },
      { ...context, tenantId }
    );

    return result;
  }

  /**
   * Disconnect: cancel any active sync, revoke at the provider where
   * supported, then deactivate. Jobs and audit history are kept.
   */
  async disconnect(tenantId: string, integrationId: string, context: AuditContext = {}): Promise<IntegrationView> {
    const integration = await this.requireOwned(tenantId, integrationId);
    if (!integration.isActive) {
      return this.toView(integration);
    }

    const activeJob = await this.engine.findActiveJob(integration.id);
    if (activeJob) {
      await this.engine.cancelSync(activeJob.id, context);
    }

    const revoked = await this.revokeAtProvider(integration);
    const deactivated = await this.credentials.deactivate(integration.id);

    logger.info('Integration disconnected', {
      integrationId: integration.id,
      tenantId,
      provider: integration.provider,
      revoked,
    });

    await this.audit.record(
      {
        action: 'integration_disconnected',
        resourceType: 'integration',
        resourceId: integration.id,
        details: { provider: integration.provider, revoked },
      },
      { ...context, tenantId }
    );

    return this.toView(deactivated);
  }

  async listRecords(
    tenantId: string,
    integrationId: string,
    limit: number,
    offset: number
  ): Promise<SyncedRecord[]> {
    const integration = await this.requireOwned(tenantId, integrationId);
    return this.records.listByIntegration(integration.id, limit, offset);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Revocation is best effort: a failure is logged and the disconnect proceeds.
   */
  private async revokeAtProvider(integration: Integration): Promise<boolean> {
    if (!this.providers.isConfigured(integration.provider) || !integration.accessTokenEncrypted) {
      return false;
    }

    const adapter = this.providers.get(integration.provider);
    if (!adapter.revoke) {
      return false;
    }

    try {
      const tokens = await this.credentials.getDecryptedTokens(integration);
      await adapter.revoke(tokens.refreshToken ?? tokens.accessToken, integration.externalAccountId);
      return true;
    } catch (error) {
      logger.warn('Provider token revocation failed', {
        integrationId: integration.id,
        provider: integration.provider,
        error: toErrorMessage(error),
      });
      return false;
    }
  }
}
