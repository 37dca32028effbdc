import 'dotenv/config';
import { z } from 'zod';

const optionalNumber = (fallback: string) => z.string().default(fallback).transform(Number);

const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3000'),
  API_URL: z.string().url().default('http://localhost:3000'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:5173'),

  // Database
  DATABASE_URL: z.string().url(),
  DATABASE_POOL_MAX: optionalNumber('10'),

  // Redis (BullMQ)
  REDIS_URL: z.string().default('redis://localhost:6379'),

  // Authentication
  JWT_SECRET: z.string().min(32),

  // Encryption
  ENCRYPTION_KEY_TOKENS: z.string().length(64),

  // OAuth handshake
  OAUTH_STATE_TTL_MS: optionalNumber('600000'),
  OAUTH_CALLBACK_BASE_URL: z.string().url().optional(),

  // Token refresh
  TOKEN_REFRESH_SKEW_MS: optionalNumber('300000'),

  // Sync engine
  SYNC_JOB_TIMEOUT_MS: optionalNumber('600000'),
  SYNC_MAX_RETRIES: optionalNumber('3'),
  SYNC_BACKOFF_BASE_MS: optionalNumber('1000'),
  SYNC_BACKOFF_MAX_MS: optionalNumber('30000'),
  SYNC_SCHEDULE_CRON: z.string().default('*/30 * * * *'),
  SYNC_MIN_INTERVAL_MS: optionalNumber('1800000'),
  SYNC_WORKER_CONCURRENCY: optionalNumber('5'),
  PROVIDER_CIRCUIT_THRESHOLD: optionalNumber('5'),
  PROVIDER_CIRCUIT_RESET_MS: optionalNumber('60000'),

  // Shopify
  SHOPIFY_CLIENT_ID: z.string().optional(),
  SHOPIFY_CLIENT_SECRET: z.string().optional(),
  SHOPIFY_SCOPES: z.string().optional(),
  SHOPIFY_AUTH_URL: z.string().url().optional(),
  SHOPIFY_TOKEN_URL: z.string().url().optional(),
  SHOPIFY_REVOKE_URL: z.string().url().optional(),
  SHOPIFY_DATA_URL: z.string().optional(),
  SHOPIFY_RATE_LIMIT: z.string().transform(Number).optional(),
  SHOPIFY_RATE_WINDOW_MS: z.string().transform(Number).optional(),

  // QuickBooks
  QUICKBOOKS_CLIENT_ID: z.string().optional(),
  QUICKBOOKS_CLIENT_SECRET: z.string().optional(),
  QUICKBOOKS_SCOPES: z.string().optional(),
  QUICKBOOKS_AUTH_URL: z.string().url().optional(),
  QUICKBOOKS_TOKEN_URL: z.string().url().optional(),
  QUICKBOOKS_REVOKE_URL: z.string().url().optional(),
  QUICKBOOKS_DATA_URL: z.string().optional(),
  QUICKBOOKS_RATE_LIMIT: z.string().transform(Number).optional(),
  QUICKBOOKS_RATE_WINDOW_MS: z.string().transform(Number).optional(),

  // Stripe
  STRIPE_CLIENT_ID: z.string().optional(),
  STRIPE_CLIENT_SECRET: z.string().optional(),
  STRIPE_SCOPES: z.string().optional(),
  STRIPE_AUTH_URL: z.string().url().optional(),
  STRIPE_TOKEN_URL: z.string().url().optional(),
  STRIPE_REVOKE_URL: z.string().url().optional(),
  STRIPE_DATA_URL: z.string().optional(),
  STRIPE_RATE_LIMIT: z.string().transform(Number).optional(),
  STRIPE_RATE_WINDOW_MS: z.string().transform(Number).optional(),

  // Google Sheets
  GOOGLE_SHEETS_CLIENT_ID: z.string().optional(),
  GOOGLE_SHEETS_CLIENT_SECRET: z.string().optional(),
  GOOGLE_SHEETS_SCOPES: z.string().optional(),
  GOOGLE_SHEETS_AUTH_URL: z.string().url().optional(),
  GOOGLE_SHEETS_TOKEN_URL: z.string().url().optional(),
  GOOGLE_SHEETS_REVOKE_URL: z.string().url().optional(),
  GOOGLE_SHEETS_DATA_URL: z.string().optional(),
  GOOGLE_SHEETS_RATE_LIMIT: z.string().transform(Number).optional(),
  GOOGLE_SHEETS_RATE_WINDOW_MS: z.string().transform(Number).optional(),

  // Monitoring
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Inbound rate limiting
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('900000'),
  RATE_LIMIT_MAX_REQUESTS: z.string().transform(Number).default('300'),
});

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missing = error.errors.map((e) => e.path.join('.')).join(', ');
      throw new Error(`Missing or invalid environment variables: ${missing}`);
    }
    throw error;
  }
}

const env = validateEnv();

const splitScopes = (value?: string): string[] | undefined =>
  value ? value.split(/[\s,]+/).filter(Boolean) : undefined;

export interface ProviderEnvConfig {
  clientId?: string;
  clientSecret?: string;
  scopes?: string[];
  authUrl?: string;
  tokenUrl?: string;
  revokeUrl?: string;
  dataUrl?: string;
  rateLimit?: number;
  rateWindowMs?: number;
}

export const config = {
  env: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  server: {
    port: env.PORT,
    apiUrl: env.API_URL,
    frontendUrl: env.FRONTEND_URL,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',').map((s) => s.trim()),
  },

  database: {
    url: env.DATABASE_URL,
    poolMax: env.DATABASE_POOL_MAX,
  },

  redis: {
    url: env.REDIS_URL,
  },

  auth: {
    jwtSecret: env.JWT_SECRET,
  },

  encryption: {
    tokenKey: env.ENCRYPTION_KEY_TOKENS,
  },

  oauth: {
    stateTtlMs: env.OAUTH_STATE_TTL_MS,
    callbackBaseUrl: env.OAUTH_CALLBACK_BASE_URL ?? `${env.API_URL}/api/integrations`,
  },

  tokens: {
    refreshSkewMs: env.TOKEN_REFRESH_SKEW_MS,
  },

  sync: {
    jobTimeoutMs: env.SYNC_JOB_TIMEOUT_MS,
    maxRetries: env.SYNC_MAX_RETRIES,
    backoffBaseMs: env.SYNC_BACKOFF_BASE_MS,
    backoffMaxMs: env.SYNC_BACKOFF_MAX_MS,
    scheduleCron: env.SYNC_SCHEDULE_CRON,
    minIntervalMs: env.SYNC_MIN_INTERVAL_MS,
    workerConcurrency: env.SYNC_WORKER_CONCURRENCY,
    circuitFailureThreshold: env.PROVIDER_CIRCUIT_THRESHOLD,
    circuitResetMs: env.PROVIDER_CIRCUIT_RESET_MS,
  },

  providers: {
    SHOPIFY: {
      clientId: env.SHOPIFY_CLIENT_ID,
      clientSecret: env.SHOPIFY_CLIENT_SECRET,
      scopes: splitScopes(env.SHOPIFY_SCOPES),
      authUrl: env.SHOPIFY_AUTH_URL,
      tokenUrl: env.SHOPIFY_TOKEN_URL,
      revokeUrl: env.SHOPIFY_REVOKE_URL,
      dataUrl: env.SHOPIFY_DATA_URL,
      rateLimit: env.SHOPIFY_RATE_LIMIT,
      rateWindowMs: env.SHOPIFY_RATE_WINDOW_MS,
    },
    QUICKBOOKS: {
      clientId: env.QUICKBOOKS_CLIENT_ID,
      clientSecret: env.QUICKBOOKS_CLIENT_SECRET,
      scopes: splitScopes(env.QUICKBOOKS_SCOPES),
      authUrl: env.QUICKBOOKS_AUTH_URL,
      tokenUrl: env.QUICKBOOKS_TOKEN_URL,
      revokeUrl: env.QUICKBOOKS_REVOKE_URL,
      dataUrl: env.QUICKBOOKS_DATA_URL,
      rateLimit: env.QUICKBOOKS_RATE_LIMIT,
      rateWindowMs: env.QUICKBOOKS_RATE_WINDOW_MS,
    },
    STRIPE: {
      clientId: env.STRIPE_CLIENT_ID,
      clientSecret: env.STRIPE_CLIENT_SECRET,
      scopes: splitScopes(env.STRIPE_SCOPES),
      authUrl: env.STRIPE_AUTH_URL,
      tokenUrl: env.STRIPE_TOKEN_URL,
      revokeUrl: env.STRIPE_REVOKE_URL,
      dataUrl: env.STRIPE_DATA_URL,
      rateLimit: env.STRIPE_RATE_LIMIT,
      rateWindowMs: env.STRIPE_RATE_WINDOW_MS,
    },
    GOOGLE_SHEETS: {
      clientId: env.GOOGLE_SHEETS_CLIENT_ID,
      clientSecret: env.GOOGLE_SHEETS_CLIENT_SECRET,
      scopes: splitScopes(env.GOOGLE_SHEETS_SCOPES),
      authUrl: env.GOOGLE_SHEETS_AUTH_URL,
      tokenUrl: env.GOOGLE_SHEETS_TOKEN_URL,
      revokeUrl: env.GOOGLE_SHEETS_REVOKE_URL,
      dataUrl: env.GOOGLE_SHEETS_DATA_URL,
      rateLimit: env.GOOGLE_SHEETS_RATE_LIMIT,
      rateWindowMs: env.GOOGLE_SHEETS_RATE_WINDOW_MS,
    },
  } satisfies Record<string, ProviderEnvConfig>,

  monitoring: {
    logLevel: env.LOG_LEVEL,
  },

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
  },
} as const;

export type Config = typeof config;
