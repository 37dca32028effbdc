/**
 * RateGovernor
 * Per-integration outbound request budget over fixed time windows
 */

import {
  DrizzleRateLimitRepository,
  type RateLimitRepository,
} from '../../repositories/RateLimitRepository.js';
import { RateLimitExceededError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ProviderRateLimit } from '../providers/types.js';

// ============================================================================
// Types
// ============================================================================

export interface RateWindowBounds {
  windowStart: Date;
  windowEnd: Date;
}

export interface RateUsage extends RateWindowBounds {
  requestsMade: number;
  requestsLimit: number;
  remaining: number;
}

// ============================================================================
// RateGovernor Class
// ============================================================================

export class RateGovernor {
  constructor(
    private readonly repository: RateLimitRepository = new DrizzleRateLimitRepository(),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Windows are aligned to multiples of `windowMs` since the epoch, so every
   * caller computes the same window for the same instant.
   */
  currentWindow(windowMs: number, at: Date = this.now()): RateWindowBounds {
    const start = Math.floor(at.getTime() / windowMs) * windowMs;
    return { windowStart: new Date(start), windowEnd: new Date(start + windowMs) };
  }

  /**
   * Consume `cost` units of the current window's budget if they fit.
   * A denied request leaves the window unchanged.
   */
  async tryAcquire(integrationId: string, limit: ProviderRateLimit, cost: number = 1): Promise<boolean> {
    const window = this.currentWindow(limit.windowMs);

    const granted = await this.repository.incrementWithinLimit({
      integrationId,
      windowStart: window.windowStart,
      windowEnd: window.windowEnd,
      limit: limit.limit,
      cost,
    });

    if (!granted) {
      logger.debug('Rate budget exhausted', {
        integrationId,
        windowStart: window.windowStart,
        limit: limit.limit,
      });
    }

    return granted;
  }

  /**
   * Like tryAcquire, but throws RateLimitExceededError carrying the wait time.
   */
  async acquire(integrationId: string, limit: ProviderRateLimit, cost: number = 1): Promise<void> {
    if (!(await this.tryAcquire(integrationId, limit, cost))) {
      throw new RateLimitExceededError(integrationId, this.waitTime(limit));
    }
  }

  /**
   * Milliseconds until the current window closes and the budget resets.
   */
  waitTime(limit: ProviderRateLimit): number {
    const { windowEnd } = this.currentWindow(limit.windowMs);
    return Math.max(0, windowEnd.getTime() - this.now().getTime());
  }

  async getUsage(integrationId: string, limit: ProviderRateLimit): Promise<RateUsage> {
    const window = this.currentWindow(limit.windowMs);
    const row = await this.repository.findWindow(integrationId, window.windowStart);
    const requestsMade = row?.requestsMade ?? 0;
    const requestsLimit = row?.requestsLimit ?? limit.limit;

    return {
      ...window,
      requestsMade,
      requestsLimit,
      remaining: Math.max(0, requestsLimit - requestsMade),
    };
  }
}
