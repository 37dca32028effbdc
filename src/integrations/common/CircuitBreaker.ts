/**
 * CircuitBreaker
 * Stops calling a provider that keeps failing until a recovery period passes
 */

import { ProviderUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { IntegrationProvider } from '../../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** How long an open circuit rejects calls before letting one through */
  resetTimeoutMs: number;
  now?: () => Date;
}

export interface CircuitStatus {
  state: CircuitState;
  failureCount: number;
  failureThreshold: number;
  lastFailureAt: string | null;
}

// ============================================================================
// CircuitBreaker Class
// ============================================================================

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private openedAt: number | null = null;
  private lastFailureAt: Date | null = null;
  private readonly now: () => Date;

  constructor(
    readonly provider: IntegrationProvider,
    private readonly options: CircuitBreakerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Throw ProviderUnavailableError while open. Once the reset timeout has
   * passed the circuit turns HALF_OPEN and the next call goes through.
   */
  assertCallable(): void {
    if (this.state !== 'OPEN' || this.openedAt === null) {
      return;
    }

    const elapsed = this.now().getTime() - this.openedAt;
    if (elapsed >= this.options.resetTimeoutMs) {
      this.state = 'HALF_OPEN';
      logger.info('Circuit half-open, allowing a trial call', { provider: this.provider });
      return;
    }

    throw new ProviderUnavailableError(this.provider, this.options.resetTimeoutMs - elapsed);
  }

  recordSuccess(): void {
    if (this.state !== 'CLOSED') {
      logger.info('Circuit closed', { provider: this.provider });
    }
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.openedAt = null;
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureAt = this.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.options.failureThreshold) {
      if (this.state !== 'OPEN') {
        logger.warn('Circuit opened', { provider: this.provider, failures: this.failureCount });
      }
      this.state = 'OPEN';
      this.openedAt = this.lastFailureAt.getTime();
    }
  }

  getStatus(): CircuitStatus {
    return {
      state: this.state,
      failureCount: this.failureCount,
      failureThreshold: this.options.failureThreshold,
      lastFailureAt: this.lastFailureAt?.toISOString() ?? null,
    };
  }
}

/**
 * One breaker per provider, created on first use.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<IntegrationProvider, CircuitBreaker>();

  constructor(private readonly options: CircuitBreakerOptions) {}

  get(provider: IntegrationProvider): CircuitBreaker {
    let breaker = this.breakers.get(provider);
    if (!breaker) {
      breaker = new CircuitBreaker(provider, this.options);
      this.breakers.set(provider, breaker);
    }
    return breaker;
  }

  getStatuses(): Partial<Record<IntegrationProvider, CircuitStatus>> {
    const statuses: Partial<Record<IntegrationProvider, CircuitStatus>> = {};
    for (const [provider, breaker] of this.breakers) {
      statuses[provider] = breaker.getStatus();
    }
    return statuses;
  }
}
