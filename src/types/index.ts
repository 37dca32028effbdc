import type { Request } from 'express';
import type {
  AuditLog,
  Integration,
  IntegrationMetadata,
  OAuthState,
  RateLimitWindow,
  SyncErrorDetails,
  SyncJob,
  SyncJobParams,
  SyncedRecord,
  Tenant,
} from '../database/schema.js';
import type { CircuitStatus } from '../integrations/common/CircuitBreaker.js';

export type {
  AuditLog,
  Integration,
  IntegrationMetadata,
  OAuthState,
  RateLimitWindow,
  SyncErrorDetails,
  SyncJob,
  SyncJobParams,
  SyncedRecord,
  Tenant,
};

// ==================== AUTH TYPES ====================

export interface JWTPayload {
  userId: string;
  tenantId?: string;
  role?: string;
  iat?: number;
  exp?: number;
}

export interface AuthenticatedRequest extends Request {
  user?: JWTPayload;
  userId?: string;
  tenantId?: string;
}

// ==================== INTEGRATION TYPES ====================

export const INTEGRATION_PROVIDERS = ['SHOPIFY', 'QUICKBOOKS', 'STRIPE', 'GOOGLE_SHEETS'] as const;

export type IntegrationProvider = (typeof INTEGRATION_PROVIDERS)[number];

export type ProviderCategory = 'ECOMMERCE' | 'ACCOUNTING' | 'PAYMENTS' | 'SPREADSHEET';

export type SyncStatus = Integration['syncStatus'];
export type IntegrationErrorKind = SyncErrorDetails['kind'];
export type SyncJobKind = SyncJob['kind'];
export type SyncJobStatus = SyncJob['status'];
export type SubscriptionTier = Tenant['subscriptionTier'];

export const ACTIVE_SYNC_JOB_STATUSES: readonly SyncJobStatus[] = ['PENDING', 'RUNNING'];

/**
 * Token material as handed over by a provider, before encryption.
 */
export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scopes: string[];
  expiresIn?: number;
}

/**
 * Integration as exposed over the API: no token material.
 */
export interface IntegrationView {
  id: string;
  provider: IntegrationProvider;
  category: ProviderCategory;
  externalAccountId: string;
  externalAccountName: string | null;
  scopes: string[];
  tokenExpiresAt: Date | null;
  lastSyncedAt: Date | null;
  syncStatus: SyncStatus;
  lastError: string | null;
  lastErrorKind: IntegrationErrorKind | null;
  isActive: boolean;
  connectedAt: Date;
  disconnectedAt: Date | null;
}

// ==================== AUDIT TYPES ====================

export type AuditAction =
  | 'tenant_created'
  | 'tenant_deactivated'
  | 'handshake_started'
  | 'handshake_completed'
  | 'handshake_failed'
  | 'integration_disconnected'
  | 'connection_tested'
  | 'token_refreshed'
  | 'token_refresh_failed'
  | 'sync_triggered'
  | 'sync_completed'
  | 'sync_failed'
  | 'sync_cancelled';

export type AuditResourceType = 'tenant' | 'integration' | 'oauth_state' | 'sync_job';

export interface AuditContext {
  tenantId?: string | null;
  actorId?: string | null;
  ipAddress?: string;
  userAgent?: string;
}

export interface AuditEntry {
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId?: string;
  details?: Record<string, unknown>;
}

// ==================== API TYPES ====================

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  message?: string;
  details?: unknown;
}

export interface PaginatedResponse<T> extends APIResponse<T[]> {
  pagination: {
    limit: number;
    offset: number;
    total?: number;
  };
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  services: {
    database: ServiceStatus;
    redis: ServiceStatus;
  };
  providers: IntegrationProvider[];
  /** Only providers that have been called since startup */
  circuits: Partial<Record<IntegrationProvider, CircuitStatus>>;
  uptime: number;
}

export interface ServiceStatus {
  status: 'connected' | 'disconnected' | 'error';
  latency?: number;
  error?: string;
}
