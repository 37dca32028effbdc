/**
 * OAuthManager
 * Authorization-code handshake for all integration providers
 */

import { config } from '../../config/index.js';
import {
  DrizzleOAuthStateRepository,
  type OAuthStateRepository,
} from '../../repositories/OAuthStateRepository.js';
import { EncryptionService, encryptionService } from '../../services/EncryptionService.js';
import type { AuditService } from '../../services/AuditService.js';
import type { TenantService } from '../../services/TenantService.js';
import {
  AppError,
  InvalidStateError,
  TokenExchangeError,
  type InvalidStateReason,
  toErrorMessage,
} from '../../utils/errors.js';
import { logger, logSecurity } from '../../utils/logger.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { AccountDescription, ExchangedTokens, ProviderAdapter } from '../providers/types.js';
import type { CredentialStore } from './CredentialStore.js';
import type { AuditContext, Integration, IntegrationProvider } from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface BeginHandshakeInput {
  tenantId: string;
  userId: string;
  provider: IntegrationProvider;
  redirectAfter?: string;
  /** Account the tenant wants to connect, for providers addressed per account (shop domain) */
  accountHint?: string;
}

export interface HandshakeStart {
  authorizationUrl: string;
  state: string;
  expiresAt: Date;
}

export interface CallbackInput {
  provider: IntegrationProvider;
  state: string;
  code?: string;
  /** Error code sent by the provider when the user declined */
  error?: string;
  callbackParams: Record<string, string>;
}

export interface HandshakeResult {
  integration: Integration;
  redirectAfter: string | null;
}

export interface OAuthManagerOptions {
  stateTtlMs: number;
  callbackBaseUrl: string;
  now?: () => Date;
}

// ============================================================================
// OAuthManager Class
// ============================================================================

export class OAuthManager {
  private readonly now: () => Date;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly tenants: TenantService,
    private readonly providers: ProviderRegistry,
    private readonly audit: AuditService,
    private readonly states: OAuthStateRepository = new DrizzleOAuthStateRepository(),
    private readonly encryption: EncryptionService = encryptionService,
    private readonly options: OAuthManagerOptions = {
      stateTtlMs: config.oauth.stateTtlMs,
      callbackBaseUrl: config.oauth.callbackBaseUrl,
    }
  ) {
    this.now = options.now ?? (() => new Date());
  }

  redirectUri(provider: IntegrationProvider): string {
    return `${this.options.callbackBaseUrl}/${provider.toLowerCase()}/callback`;
  }

  /**
   * Start a handshake: persist a single-use state and return the provider's
   * consent URL. Earlier unconsumed states for the same tenant and provider
   * stay valid until used or expired.
   */
  async beginHandshake(input: BeginHandshakeInput, context: AuditContext = {}): Promise<HandshakeStart> {
    await this.tenants.requireActiveTenant(input.tenantId);
    const adapter = this.providers.get(input.provider);

    const state = this.encryption.newState();
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + this.options.stateTtlMs);

    const authorizationUrl = adapter.buildAuthorizationUrl({
      state,
      redirectUri: this.redirectUri(input.provider),
      scopes: adapter.defaultScopes,
      accountHint: input.accountHint,
    });

    await this.states.create({
      stateToken: state,
      tenantId: input.tenantId,
      userId: input.userId,
      provider: input.provider,
      redirectAfter: input.redirectAfter ?? null,
      accountHint: input.accountHint ?? null,
      createdAt,
      expiresAt,
    });

    logger.info('OAuth handshake started', { tenantId: input.tenantId, provider: input.provider });

    await this.audit.record(
      {
        action: 'handshake_started',
        resourceType: 'oauth_state',
        details: { provider: input.provider, expiresAt: expiresAt.toISOString() },
      },
      { ...context, tenantId: input.tenantId, actorId: input.userId }
    );

    return { authorizationUrl, state, expiresAt };
  }

  /**
   * Complete a handshake. The state is consumed before the code is exchanged,
   * so a replayed or concurrent duplicate callback always fails.
   */
  async handleCallback(input: CallbackInput, context: AuditContext = {}): Promise<HandshakeResult> {
    const adapter = this.providers.get(input.provider);

    if (adapter.verifyCallback && !adapter.verifyCallback(input.callbackParams)) {
      logSecurity('oauth_callback_bad_signature', 'high', { provider: input.provider });
      return this.reject(input, new InvalidStateError('BAD_SIGNATURE'), context);
    }

    const claimed = await this.states.consume(input.state, this.now());
    if (!claimed) {
      const reason = await this.explainUnusableState(input.state);
      logSecurity('oauth_state_rejected', 'medium', { provider: input.provider, reason });
      return this.reject(input, new InvalidStateError(reason), context);
    }

    const callerContext: AuditContext = { ...context, tenantId: claimed.tenantId, actorId: claimed.userId };

    if (claimed.provider !== input.provider) {
      return this.reject(input, new InvalidStateError('PROVIDER_MISMATCH'), callerContext);
    }
    if (input.error || !input.code) {
      const reason = input.error ? `Authorization was declined: ${input.error}` : 'Authorization code missing';
      return this.reject(input, new TokenExchangeError(reason, { provider: input.provider }), callerContext);
    }

    try {
      await this.tenants.requireActiveTenant(claimed.tenantId);

      const exchanged = await adapter.exchangeCode({
        code: input.code,
        redirectUri: this.redirectUri(input.provider),
        accountHint: claimed.accountHint,
        callbackParams: input.callbackParams,
      });

      const account = await this.describeAccount(adapter, exchanged);

      const integration = await this.credentials.upsertFromTokens({
        tenantId: claimed.tenantId,
        provider: input.provider,
        externalAccountId: exchanged.externalAccountId,
        externalAccountName: account?.name ?? exchanged.externalAccountName,
        tokens: exchanged,
        metadata: account ? { account: account.metadata } : undefined,
      });

      logger.info('OAuth handshake completed', {
        tenantId: claimed.tenantId,
        provider: input.provider,
        integrationId: integration.id,
      });

      await this.audit.record(
        {
          action: 'handshake_completed',
          resourceType: 'integration',
          resourceId: integration.id,
          details: { provider: input.provider, externalAccountId: integration.externalAccountId },
        },
        callerContext
      );

      return { integration, redirectAfter: claimed.redirectAfter };
    } catch (error) {
      const failure =
        error instanceof AppError
          ? error
          : new TokenExchangeError('Failed to complete authorization', { cause: toErrorMessage(error) });
      return this.reject(input, failure, callerContext);
    }
  }

  /**
   * Delete expired and consumed states.
   */
  async purgeExpiredStates(): Promise<number> {
    const deleted = await this.states.deleteStale(this.now());
    if (deleted > 0) {
      logger.info('Purged stale OAuth states', { deleted });
    }
    return deleted;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Profile lookup after the exchange is best effort: the connection is
   * stored with what the token response carried if it fails.
   */
  private async describeAccount(
    adapter: ProviderAdapter,
    exchanged: ExchangedTokens
  ): Promise<AccountDescription | null> {
    if (!adapter.describeAccount) {
      return null;
    }
    try {
      return await adapter.describeAccount(exchanged.accessToken, exchanged.externalAccountId);
    } catch (error) {
      logger.warn('Account profile lookup failed', {
        provider: adapter.provider,
        externalAccountId: exchanged.externalAccountId,
        error: toErrorMessage(error),
      });
      return null;
    }
  }

  private async explainUnusableState(stateToken: string): Promise<InvalidStateReason> {
    const existing = await this.states.findByToken(stateToken);
    if (!existing) {
      return 'NOT_FOUND';
    }
    return existing.consumed ? 'CONSUMED' : 'EXPIRED';
  }

  private async reject(input: CallbackInput, error: AppError, context: AuditContext): Promise<never> {
    logger.warn('OAuth handshake failed', {
      provider: input.provider,
      code: error.code,
      message: error.message,
    });

    await this.audit.record(
      {
        action: 'handshake_failed',
        resourceType: 'oauth_state',
        details: { provider: input.provider, errorCode: error.code, ...error.details },
      },
      context
    );

    throw error;
  }
}
