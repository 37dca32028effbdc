import { z } from 'zod';
import { config } from '../config/index.js';
import { INTEGRATION_PROVIDERS } from '../types/index.js';

// ==================== COMMON SCHEMAS ====================

export const uuidSchema = z.string().uuid('Invalid ID format');

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const providerParamSchema = z
  .string()
  .transform((value) => value.toUpperCase().replace(/-/g, '_'))
  .pipe(z.enum(INTEGRATION_PROVIDERS));

// ==================== TENANT SCHEMAS ====================

export const createTenantSchema = z.object({
  name: z.string().trim().min(1).max(200),
  subdomain: z.string().trim().min(2).max(63),
  contact_email: z.string().email().optional(),
  subscription_tier: z.enum(['free', 'starter', 'pro', 'enterprise']).optional(),
});

export type CreateTenantBody = z.infer<typeof createTenantSchema>;

// ==================== INTEGRATION SCHEMAS ====================

export const providerParamsSchema = z.object({
  provider: providerParamSchema,
});

export const integrationParamsSchema = z.object({
  id: uuidSchema,
});

export const syncJobParamsSchema = z.object({
  id: uuidSchema,
  jobId: uuidSchema,
});

/**
 * Post-handshake redirects may only point back at the frontend.
 */
export function isFrontendUrl(value: string, frontendUrl: string = config.server.frontendUrl): boolean {
  try {
    return new URL(value).origin === new URL(frontendUrl).origin;
  } catch {
    return false;
  }
}

export const connectSchema = z.object({
  redirect_after: z
    .string()
    .url()
    .refine((value) => isFrontendUrl(value), {
      message: 'Redirect must target the application frontend',
    })
    .optional(),
  account_hint: z.string().trim().min(1).max(255).optional(),
});

export type ConnectBody = z.infer<typeof connectSchema>;

export const callbackQuerySchema = z
  .object({
    state: z.string().min(1, 'state is required'),
    code: z.string().min(1).optional(),
    error: z.string().optional(),
  })
  .passthrough();

export const triggerSyncSchema = z
  .object({
    kind: z.enum(['FULL', 'INCREMENTAL', 'MANUAL']).default('MANUAL'),
    since: z.string().datetime().optional(),
    until: z.string().datetime().optional(),
    filters: z.record(z.string()).optional(),
  })
  .refine((value) => !value.since || !value.until || Date.parse(value.since) < Date.parse(value.until), {
    message: 'since must be before until',
    path: ['until'],
  });

export type TriggerSyncBody = z.infer<typeof triggerSyncSchema>;

export const jobHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// ==================== AUDIT SCHEMAS ====================

export const auditLogQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  since: z.coerce.date().optional(),
  resource_type: z.enum(['tenant', 'integration', 'oauth_state', 'sync_job']).optional(),
  resource_id: z.string().min(1).optional(),
});
