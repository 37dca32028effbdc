/**
 * Service wiring. Production uses the Postgres repositories, the configured
 * provider adapters and the BullMQ dispatcher; tests swap in their own.
 */

import { config } from './config/index.js';
import type { Database } from './database/client.js';
import { CircuitBreakerRegistry, type CircuitBreakerOptions } from './integrations/common/CircuitBreaker.js';
import { CredentialStore } from './integrations/common/CredentialStore.js';
import { OAuthManager, type OAuthManagerOptions } from './integrations/common/OAuthManager.js';
import { RateGovernor } from './integrations/common/RateGovernor.js';
import { SyncEngine, type SyncDispatcher, type SyncEngineOptions } from './integrations/common/SyncEngine.js';
import { TokenRefresher, type TokenRefresherOptions } from './integrations/common/TokenRefresher.js';
import { createProviderRegistry, type ProviderRegistry } from './integrations/providers/registry.js';
import { QueueSyncDispatcher } from './jobs/queue.js';
import { DrizzleAuditLogRepository, type AuditLogRepository } from './repositories/AuditLogRepository.js';
import { DrizzleIntegrationRepository, type IntegrationRepository } from './repositories/IntegrationRepository.js';
import { DrizzleOAuthStateRepository, type OAuthStateRepository } from './repositories/OAuthStateRepository.js';
import { DrizzleRateLimitRepository, type RateLimitRepository } from './repositories/RateLimitRepository.js';
import { DrizzleSyncJobRepository, type SyncJobRepository } from './repositories/SyncJobRepository.js';
import { DrizzleSyncedRecordRepository, type SyncedRecordRepository } from './repositories/SyncedRecordRepository.js';
import { DrizzleTenantRepository, type TenantRepository } from './repositories/TenantRepository.js';
import { AuditService } from './services/AuditService.js';
import { EncryptionService, encryptionService } from './services/EncryptionService.js';
import { IntegrationService } from './services/IntegrationService.js';
import { TenantService } from './services/TenantService.js';

export interface Repositories {
  tenants: TenantRepository;
  integrations: IntegrationRepository;
  syncJobs: SyncJobRepository;
  rateLimits: RateLimitRepository;
  oauthStates: OAuthStateRepository;
  auditLogs: AuditLogRepository;
  syncedRecords: SyncedRecordRepository;
}

export interface ContainerOptions {
  repositories: Repositories;
  providers: ProviderRegistry;
  dispatcher: SyncDispatcher;
  encryption?: EncryptionService;
  now?: () => Date;
  oauth?: Partial<OAuthManagerOptions>;
  tokens?: Partial<TokenRefresherOptions>;
  sync?: Partial<SyncEngineOptions>;
  circuit?: Partial<CircuitBreakerOptions>;
}

export interface Container {
  repositories: Repositories;
  providers: ProviderRegistry;
  audit: AuditService;
  tenants: TenantService;
  credentials: CredentialStore;
  refresher: TokenRefresher;
  governor: RateGovernor;
  breakers: CircuitBreakerRegistry;
  oauth: OAuthManager;
  engine: SyncEngine;
  integrations: IntegrationService;
}

export function createDrizzleRepositories(db?: Database): Repositories {
  return {
    tenants: new DrizzleTenantRepository(db),
    integrations: new DrizzleIntegrationRepository(db),
    syncJobs: new DrizzleSyncJobRepository(db),
    rateLimits: new DrizzleRateLimitRepository(db),
    oauthStates: new DrizzleOAuthStateRepository(db),
    auditLogs: new DrizzleAuditLogRepository(db),
    syncedRecords: new DrizzleSyncedRecordRepository(db),
  };
}

export function createContainer(options: ContainerOptions): Container {
  const { repositories, providers, dispatcher } = options;
  const encryption = options.encryption ?? encryptionService;
  const now = options.now ?? (() => new Date());

  const audit = new AuditService(repositories.auditLogs);
  const tenants = new TenantService(audit, repositories.tenants);
  const credentials = new CredentialStore(repositories.integrations, encryption, now);
  const governor = new RateGovernor(repositories.rateLimits, now);
  const breakers = new CircuitBreakerRegistry({
    failureThreshold: config.sync.circuitFailureThreshold,
    resetTimeoutMs: config.sync.circuitResetMs,
    now,
    ...options.circuit,
  });

  const refresher = new TokenRefresher(credentials, providers, audit, {
    skewMs: config.tokens.refreshSkewMs,
    now,
    ...options.tokens,
  });

  const oauth = new OAuthManager(credentials, tenants, providers, audit, repositories.oauthStates, encryption, {
    stateTtlMs: config.oauth.stateTtlMs,
    callbackBaseUrl: config.oauth.callbackBaseUrl,
    now,
    ...options.oauth,
  });

  const engine = new SyncEngine(
    {
      jobs: repositories.syncJobs,
      records: repositories.syncedRecords,
      credentials,
      refresher,
      governor,
      breakers,
      providers,
      audit,
      dispatcher,
    },
    {
      jobTimeoutMs: config.sync.jobTimeoutMs,
      maxRetries: config.sync.maxRetries,
      backoffBaseMs: config.sync.backoffBaseMs,
      backoffMaxMs: config.sync.backoffMaxMs,
      minIntervalMs: config.sync.minIntervalMs,
      now,
      ...options.sync,
    }
  );

  const integrations = new IntegrationService(
    credentials,
    providers,
    engine,
    governor,
    repositories.syncedRecords,
    audit,
    refresher,
    breakers,
    now
  );

  return {
    repositories,
    providers,
    audit,
    tenants,
    credentials,
    refresher,
    governor,
    breakers,
    oauth,
    engine,
    integrations,
  };
}

/**
 * Container backed by Postgres, the configured providers and the sync queue.
 */
export function createProductionContainer(): Container {
  return createContainer({
    repositories: createDrizzleRepositories(),
    providers: createProviderRegistry(),
    dispatcher: new QueueSyncDispatcher(),
  });
}
