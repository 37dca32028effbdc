/**
 * Error taxonomy for the integration and sync subsystem.
 *
 * Every error carries a stable `code`, the HTTP status the API layer maps it
 * to, and whether the sync engine may retry the operation that raised it.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly retryable: boolean = false,
    public readonly details: ErrorDetails = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ============================================================================
// Request / lookup errors
// ============================================================================

export class ValidationError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'VALIDATION_ERROR', 400, false, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404, false, { resource, id });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'CONFLICT', 409, false, details);
  }
}

export class TenantInactiveError extends AppError {
  constructor(tenantId: string) {
    super('Tenant is not active', 'TENANT_INACTIVE', 403, false, { tenantId });
  }
}

export class ConcurrentUpdateError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} was modified concurrently`, 'CONCURRENT_UPDATE', 409, true, { resource, id });
  }
}

// ============================================================================
// OAuth handshake
// ============================================================================

export type InvalidStateReason = 'NOT_FOUND' | 'CONSUMED' | 'EXPIRED' | 'PROVIDER_MISMATCH' | 'BAD_SIGNATURE';

export class InvalidStateError extends AppError {
  constructor(public readonly reason: InvalidStateReason) {
    super('Invalid or expired authorization request. Please retry connecting.', 'INVALID_STATE', 400, false, {
      reason,
    });
  }
}

export class TokenExchangeError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'TOKEN_EXCHANGE_FAILED', 502, false, details);
  }
}

export class ProviderNotConfiguredError extends AppError {
  constructor(provider: string) {
    super(`${provider} integration is not configured`, 'PROVIDER_NOT_CONFIGURED', 503, false, { provider });
  }
}

// ============================================================================
// Token lifecycle
// ============================================================================

export class RefreshFailedError extends AppError {
  constructor(integrationId: string, reason: string) {
    super(`Token refresh failed: ${reason}`, 'REFRESH_FAILED', 409, false, { integrationId, reason });
  }
}

// ============================================================================
// Rate governance
// ============================================================================

export class RateLimitExceededError extends AppError {
  constructor(integrationId: string, public readonly retryAfterMs: number) {
    super('Provider request budget exhausted for the current window', 'RATE_LIMIT_EXCEEDED', 429, true, {
      integrationId,
      retryAfterMs,
    });
  }
}

// ============================================================================
// Sync jobs
// ============================================================================

export class SyncAlreadyInProgressError extends AppError {
  constructor(integrationId: string) {
    super('A sync is already in progress for this integration', 'SYNC_ALREADY_IN_PROGRESS', 409, false, {
      integrationId,
    });
  }
}

export class SyncNotCancellableError extends AppError {
  constructor(jobId: string, status: string) {
    super(`Sync job cannot be cancelled in status ${status}`, 'SYNC_NOT_CANCELLABLE', 409, false, {
      jobId,
      status,
    });
  }
}

export class SyncTimeoutError extends AppError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'SYNC_TIMEOUT', 504, false, details);
  }
}

export class SyncCancelledError extends AppError {
  constructor(jobId: string) {
    super('Sync job was cancelled', 'SYNC_CANCELLED', 409, false, { jobId });
  }
}

// ============================================================================
// Provider responses
// ============================================================================

export class ProviderTransientError extends AppError {
  constructor(
    message: string,
    public readonly httpStatus?: number,
    public readonly retryAfterMs?: number
  ) {
    super(message, 'PROVIDER_TRANSIENT', 502, true, { httpStatus, retryAfterMs });
  }
}

export class ProviderPermanentError extends AppError {
  constructor(message: string, public readonly httpStatus?: number, details: ErrorDetails = {}) {
    super(message, 'PROVIDER_PERMANENT', 502, false, { httpStatus, ...details });
  }
}

export class ProviderUnauthorizedError extends AppError {
  constructor(message: string = 'Provider rejected the access token') {
    super(message, 'PROVIDER_UNAUTHORIZED', 502, false, { httpStatus: 401 });
  }
}

/**
 * Raised without calling the provider while its circuit is open.
 */
export class ProviderUnavailableError extends AppError {
  constructor(provider: string, public readonly retryAfterMs: number) {
    super(`${provider} is temporarily unavailable`, 'PROVIDER_UNAVAILABLE', 503, true, { provider, retryAfterMs });
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
