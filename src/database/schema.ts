import { sql } from 'drizzle-orm';
import {
  boolean,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';
import { v4 as uuidv4 } from 'uuid';

// ============================================================================
// Enums
// ============================================================================

export const integrationProviderEnum = pgEnum('integration_provider', [
  'SHOPIFY',
  'QUICKBOOKS',
  'STRIPE',
  'GOOGLE_SHEETS',
]);

export const subscriptionTierEnum = pgEnum('subscription_tier', ['free', 'starter', 'pro', 'enterprise']);

export const syncStatusEnum = pgEnum('sync_status', ['IDLE', 'SYNCING', 'ERROR']);

export const integrationErrorKindEnum = pgEnum('integration_error_kind', [
  'RECONNECT_REQUIRED',
  'TRANSIENT',
  'PERMANENT',
  'TIMEOUT',
]);

export const syncJobKindEnum = pgEnum('sync_job_kind', ['FULL', 'INCREMENTAL', 'MANUAL']);

export const syncJobStatusEnum = pgEnum('sync_job_status', [
  'PENDING',
  'RUNNING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
]);

// ============================================================================
// JSON column shapes
// ============================================================================

export interface IntegrationMetadata {
  syncToken?: string;
  syncTokenUpdatedAt?: string;
  [key: string]: unknown;
}

export interface SyncJobParams {
  since?: string;
  until?: string;
  filters?: Record<string, string>;
}

export interface SyncErrorDetails {
  kind: 'RECONNECT_REQUIRED' | 'TRANSIENT' | 'PERMANENT' | 'TIMEOUT';
  code: string;
  message: string;
  attempts?: number;
  httpStatus?: number;
  [key: string]: unknown;
}

// ============================================================================
// Tables
// ============================================================================

export const tenants = pgTable(
  'tenants',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    name: varchar('name', { length: 255 }).notNull(),
    subdomain: varchar('subdomain', { length: 100 }).notNull(),
    ownerUserId: varchar('owner_user_id', { length: 255 }).notNull(),
    contactEmail: varchar('contact_email', { length: 255 }),
    subscriptionTier: subscriptionTierEnum('subscription_tier').notNull().default('free'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    subdomainIdx: uniqueIndex('tenants_subdomain_idx').on(t.subdomain),
    ownerIdx: index('tenants_owner_idx').on(t.ownerUserId),
  })
);

export const integrations = pgTable(
  'integrations',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id),
    provider: integrationProviderEnum('provider').notNull(),
    externalAccountId: varchar('external_account_id', { length: 255 }).notNull(),
    externalAccountName: varchar('external_account_name', { length: 255 }),
    accessTokenEncrypted: text('access_token_encrypted'),
    refreshTokenEncrypted: text('refresh_token_encrypted'),
    tokenType: varchar('token_type', { length: 50 }).notNull().default('Bearer'),
    scopes: text('scopes').array().notNull().default(sql`'{}'::text[]`),
    tokenExpiresAt: timestamp('token_expires_at', { withTimezone: true }),
    lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }),
    syncStatus: syncStatusEnum('sync_status').notNull().default('IDLE'),
    lastError: text('last_error'),
    lastErrorKind: integrationErrorKindEnum('last_error_kind'),
    metadata: jsonb('metadata').$type<IntegrationMetadata>().notNull().default({}),
    isActive: boolean('is_active').notNull().default(true),
    version: integer('version').notNull().default(1),
    connectedAt: timestamp('connected_at', { withTimezone: true }).notNull().defaultNow(),
    disconnectedAt: timestamp('disconnected_at', { withTimezone: true }),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    activeAccountIdx: uniqueIndex('integrations_active_account_idx')
      .on(t.tenantId, t.provider, t.externalAccountId)
      .where(sql`${t.isActive}`),
    tenantIdx: index('integrations_tenant_idx').on(t.tenantId, t.isActive),
  })
);

export const syncJobs = pgTable(
  'sync_jobs',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => integrations.id),
    kind: syncJobKindEnum('kind').notNull(),
    status: syncJobStatusEnum('status').notNull().default('PENDING'),
    triggeredBy: varchar('triggered_by', { length: 255 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp('started_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    recordsFetched: integer('records_fetched').notNull().default(0),
    recordsProcessed: integer('records_processed').notNull().default(0),
    recordsFailed: integer('records_failed').notNull().default(0),
    errorMessage: text('error_message'),
    errorDetails: jsonb('error_details').$type<SyncErrorDetails>(),
    params: jsonb('params').$type<SyncJobParams>().notNull().default({}),
  },
  (t) => ({
    // Storage backstop for the sync engine's exclusivity claim
    activeJobIdx: uniqueIndex('sync_jobs_active_idx')
      .on(t.integrationId)
      .where(sql`${t.status} in ('PENDING', 'RUNNING')`),
    integrationIdx: index('sync_jobs_integration_idx').on(t.integrationId, t.createdAt),
    statusIdx: index('sync_jobs_status_idx').on(t.status, t.startedAt),
  })
);

export const rateLimitWindows = pgTable(
  'rate_limit_windows',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => integrations.id),
    windowStart: timestamp('window_start', { withTimezone: true }).notNull(),
    windowEnd: timestamp('window_end', { withTimezone: true }).notNull(),
    requestsMade: integer('requests_made').notNull().default(0),
    requestsLimit: integer('requests_limit').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    windowIdx: uniqueIndex('rate_limit_windows_window_idx').on(t.integrationId, t.windowStart),
  })
);

export const oauthStates = pgTable(
  'oauth_states',
  {
    stateToken: varchar('state_token', { length: 128 }).primaryKey(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id),
    userId: varchar('user_id', { length: 255 }).notNull(),
    provider: integrationProviderEnum('provider').notNull(),
    redirectAfter: varchar('redirect_after', { length: 500 }),
    accountHint: varchar('account_hint', { length: 255 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    consumed: boolean('consumed').notNull().default(false),
  },
  (t) => ({
    expiryIdx: index('oauth_states_expiry_idx').on(t.expiresAt),
  })
);

export const auditLogs = pgTable(
  'audit_logs',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    tenantId: uuid('tenant_id').references(() => tenants.id),
    actorId: varchar('actor_id', { length: 255 }),
    action: varchar('action', { length: 100 }).notNull(),
    resourceType: varchar('resource_type', { length: 50 }).notNull(),
    resourceId: varchar('resource_id', { length: 64 }),
    ipAddress: varchar('ip_address', { length: 64 }),
    userAgent: text('user_agent'),
    details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    tenantIdx: index('audit_logs_tenant_idx').on(t.tenantId, t.createdAt),
    resourceIdx: index('audit_logs_resource_idx').on(t.resourceType, t.resourceId),
  })
);

export const syncedRecords = pgTable(
  'synced_records',
  {
    id: uuid('id').primaryKey().$defaultFn(() => uuidv4()),
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => integrations.id),
    externalId: varchar('external_id', { length: 255 }).notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    syncedAt: timestamp('synced_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    externalIdx: uniqueIndex('synced_records_external_idx').on(t.integrationId, t.externalId),
  })
);

// ============================================================================
// Row types
// ============================================================================

export type Tenant = typeof tenants.$inferSelect;
export type NewTenant = typeof tenants.$inferInsert;
export type Integration = typeof integrations.$inferSelect;
export type NewIntegration = typeof integrations.$inferInsert;
export type SyncJob = typeof syncJobs.$inferSelect;
export type NewSyncJob = typeof syncJobs.$inferInsert;
export type RateLimitWindow = typeof rateLimitWindows.$inferSelect;
export type OAuthState = typeof oauthStates.$inferSelect;
export type NewOAuthState = typeof oauthStates.$inferInsert;
export type AuditLog = typeof auditLogs.$inferSelect;
export type NewAuditLog = typeof auditLogs.$inferInsert;
export type SyncedRecord = typeof syncedRecords.$inferSelect;
