/**
 * TokenRefresher
 * Keeps access tokens valid ahead of use
 */

import { config } from '../../config/index.js';
import type { AuditService } from '../../services/AuditService.js';
import { ProviderTransientError, RefreshFailedError, toErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { CredentialStore } from './CredentialStore.js';
import type { Integration, TokenSet } from '../../types/index.js';

export interface TokenRefresherOptions {
  skewMs: number;
  now?: () => Date;
}

export interface EnsureFreshOptions {
  /** Refresh even when the stored expiry looks fine, e.g. after the provider answered 401 */
  force?: boolean;
}

export class TokenRefresher {
  private readonly inFlight = new Map<string, Promise<Integration>>();
  private readonly now: () => Date;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly providers: ProviderRegistry,
    private readonly audit: AuditService,
    private readonly options: TokenRefresherOptions = { skewMs: config.tokens.refreshSkewMs }
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * True when the token expires within the skew window. A null expiry means
   * the provider issued a non-expiring token.
   */
  isExpiringSoon(integration: Integration): boolean {
    if (!integration.tokenExpiresAt) {
      return false;
    }
    return integration.tokenExpiresAt.getTime() - this.now().getTime() <= this.options.skewMs;
  }

  /**
   * Return the integration with a usable access token, refreshing it first
   * if needed. Concurrent callers for one integration share a single refresh.
   */
  async ensureFreshToken(integration: Integration, options: EnsureFreshOptions = {}): Promise<Integration> {
    if (!options.force && !this.isExpiringSoon(integration)) {
      return integration;
    }

    const pending = this.inFlight.get(integration.id);
    if (pending) {
      return pending;
    }

    const refresh = this.refresh(integration, options.force ?? false).finally(() => {
      this.inFlight.delete(integration.id);
    });
    this.inFlight.set(integration.id, refresh);
    return refresh;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async refresh(stale: Integration, force: boolean): Promise<Integration> {
    // Another worker may already have rotated the token
    const current = await this.credentials.requireById(stale.id);

    if (!current.isActive) {
      throw new RefreshFailedError(current.id, 'Integration is disconnected');
    }
    // Status and metadata writes bump the version too; only a new ciphertext is a new token
    const rotatedElsewhere = current.accessTokenEncrypted !== stale.accessTokenEncrypted;
    if (force ? rotatedElsewhere : !this.isExpiringSoon(current)) {
      return current;
    }

    const tokens = await this.credentials.getDecryptedTokens(current);
    if (!tokens.refreshToken) {
      return this.fail(current, 'No refresh token available');
    }

    const adapter = this.providers.get(current.provider);
    let refreshed: TokenSet;
    try {
      refreshed = await adapter.refreshToken(tokens.refreshToken, current.externalAccountId);
    } catch (error) {
      if (error instanceof ProviderTransientError) {
        throw error;
      }
      return this.fail(current, toErrorMessage(error));
    }

    const rotated = await this.credentials.rotateTokens(current, refreshed);
    if (!rotated) {
      logger.info('Token rotated concurrently, using the stored token', {
        integrationId: current.id,
        provider: current.provider,
      });
      return this.credentials.requireById(current.id);
    }

    logger.info('OAuth token refreshed', {
      integrationId: rotated.id,
      provider: rotated.provider,
      expiresAt: rotated.tokenExpiresAt,
    });

    await this.audit.record(
      {
        action: 'token_refreshed',
        resourceType: 'integration',
        resourceId: rotated.id,
        details: { provider: rotated.provider, expiresAt: rotated.tokenExpiresAt?.toISOString() ?? null },
      },
      { tenantId: rotated.tenantId }
    );

    return rotated;
  }

  private async fail(integration: Integration, reason: string): Promise<never> {
    logger.warn('OAuth token refresh failed, reconnection required', {
      integrationId: integration.id,
      provider: integration.provider,
      reason,
    });

    await this.credentials.mutate(integration.id, () => ({
      syncStatus: 'ERROR',
      lastError: `Reconnection required: ${reason}`,
      lastErrorKind: 'RECONNECT_REQUIRED',
    }));

    await this.audit.record(
      {
        action: 'token_refresh_failed',
        resourceType: 'integration',
        resourceId: integration.id,
        details: { provider: integration.provider, reason },
      },
      { tenantId: integration.tenantId }
    );

    throw new RefreshFailedError(integration.id, reason);
  }
}
