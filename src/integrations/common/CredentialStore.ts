/**
 * CredentialStore
 * Encrypted persistence of integration credentials, with version-guarded writes
 */

import {
  DrizzleIntegrationRepository,
  type IntegrationPatch,
  type IntegrationRepository,
} from '../../repositories/IntegrationRepository.js';
import {
  EncryptionService,
  encryptionService,
  type DecryptedTokens,
} from '../../services/EncryptionService.js';
import { ConcurrentUpdateError, NotFoundError, RefreshFailedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Integration, IntegrationMetadata, IntegrationProvider, TokenSet } from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface UpsertCredentialsInput {
  tenantId: string;
  provider: IntegrationProvider;
  externalAccountId: string;
  externalAccountName?: string;
  tokens: TokenSet;
  metadata?: IntegrationMetadata;
}

/**
 * Returns the patch to apply to the current row, or null to leave it untouched.
 */
export type IntegrationMutator = (current: Integration) => IntegrationPatch | null;

const MAX_MUTATE_ATTEMPTS = 5;

// ============================================================================
// CredentialStore Class
// ============================================================================

export class CredentialStore {
  constructor(
    private readonly integrations: IntegrationRepository = new DrizzleIntegrationRepository(),
    private readonly encryption: EncryptionService = encryptionService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Encrypt and store freshly exchanged tokens. Reconnecting the same
   * external account updates and reactivates its existing row.
   */
  async upsertFromTokens(input: UpsertCredentialsInput): Promise<Integration> {
    const encrypted = await this.encryption.seal(input.tokens);

    const integration = await this.integrations.connect({
      tenantId: input.tenantId,
      provider: input.provider,
      externalAccountId: input.externalAccountId,
      externalAccountName: input.externalAccountName ?? null,
      accessTokenEncrypted: encrypted.accessTokenEncrypted,
      refreshTokenEncrypted: encrypted.refreshTokenEncrypted,
      tokenType: input.tokens.tokenType ?? 'Bearer',
      scopes: input.tokens.scopes,
      tokenExpiresAt: this.expiresAt(input.tokens),
      metadata: input.metadata ?? {},
    });

    logger.info('OAuth tokens stored', {
      integrationId: integration.id,
      tenantId: input.tenantId,
      provider: input.provider,
    });

    return integration;
  }

  async getDecryptedTokens(integration: Integration): Promise<DecryptedTokens> {
    if (!integration.accessTokenEncrypted) {
      throw new RefreshFailedError(integration.id, 'No stored credentials');
    }
    return this.encryption.open({
      accessTokenEncrypted: integration.accessTokenEncrypted,
      refreshTokenEncrypted: integration.refreshTokenEncrypted,
    });
  }

  /**
   * Store rotated tokens if nobody else has written the row since `integration`
   * was read. Returns null when the write lost that race.
   * A provider that does not rotate refresh tokens keeps the stored one.
   */
  async rotateTokens(integration: Integration, tokens: TokenSet): Promise<Integration | null> {
    const encrypted = await this.encryption.seal(tokens);

    return this.integrations.updateIfVersion(integration.id, integration.version, {
      accessTokenEncrypted: encrypted.accessTokenEncrypted,
      refreshTokenEncrypted: encrypted.refreshTokenEncrypted ?? integration.refreshTokenEncrypted,
      tokenType: tokens.tokenType ?? integration.tokenType,
      scopes: tokens.scopes.length > 0 ? tokens.scopes : integration.scopes,
      tokenExpiresAt: this.expiresAt(tokens),
    });
  }

  /**
   * Read, apply `mutator`, and write back conditionally on the version read.
   * Retries on a lost race with the freshly read row.
   */
  async mutate(id: string, mutator: IntegrationMutator): Promise<Integration> {
    for (let attempt = 0; attempt < MAX_MUTATE_ATTEMPTS; attempt++) {
      const current = await this.requireById(id);
      const patch = mutator(current);
      if (!patch) {
        return current;
      }

      const updated = await this.integrations.updateIfVersion(id, current.version, patch);
      if (updated) {
        return updated;
      }

      logger.debug('Integration write lost a version race, retrying', { integrationId: id, attempt });
    }

    throw new ConcurrentUpdateError('Integration', id);
  }

  /**
   * Soft disconnect: the row, its jobs and its audit trail stay; the
   * credentials are wiped.
   */
  async deactivate(id: string): Promise<Integration> {
    const disconnectedAt = this.now();
    return this.mutate(id, (current) =>
      current.isActive
        ? {
            isActive: false,
            accessTokenEncrypted: null,
            refreshTokenEncrypted: null,
            tokenExpiresAt: null,
            syncStatus: 'IDLE',
            disconnectedAt,
          }
        : null
    );
  }

  async findById(id: string): Promise<Integration | null> {
    return this.integrations.findById(id);
  }

  async requireById(id: string): Promise<Integration> {
    const integration = await this.integrations.findById(id);
    if (!integration) {
      throw new NotFoundError('Integration', id);
    }
    return integration;
  }

  async listForTenant(tenantId: string): Promise<Integration[]> {
    return this.integrations.listByTenant(tenantId);
  }

  async listActive(): Promise<Integration[]> {
    return this.integrations.listActive();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private expiresAt(tokens: TokenSet): Date | null {
    return tokens.expiresIn ? new Date(this.now().getTime() + tokens.expiresIn * 1000) : null;
  }
}
