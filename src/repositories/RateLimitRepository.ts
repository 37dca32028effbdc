import { and, eq, sql } from 'drizzle-orm';
import { db as defaultDb, type Database } from '../database/client.js';
import { rateLimitWindows, type RateLimitWindow } from '../database/schema.js';

export interface AcquireRequest {
  integrationId: string;
  windowStart: Date;
  windowEnd: Date;
  limit: number;
  cost: number;
}

export interface RateLimitRepository {
  /**
   * Find-or-create the window row and add `cost` to it, in one atomic step,
   * only if the result stays within the limit. Returns false (and changes
   * nothing) when the budget would be exceeded.
   */
  incrementWithinLimit(request: AcquireRequest): Promise<boolean>;
  findWindow(integrationId: string, windowStart: Date): Promise<RateLimitWindow | null>;
}

export class DrizzleRateLimitRepository implements RateLimitRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async incrementWithinLimit(request: AcquireRequest): Promise<boolean> {
    if (request.cost > request.limit) {
      return false;
    }

    const rows = await this.db
      .insert(rateLimitWindows)
      .values({
        integrationId: request.integrationId,
        windowStart: request.windowStart,
        windowEnd: request.windowEnd,
        requestsMade: request.cost,
        requestsLimit: request.limit,
      })
      .onConflictDoUpdate({
        target: [rateLimitWindows.integrationId, rateLimitWindows.windowStart],
        set: { requestsMade: sql`${rateLimitWindows.requestsMade} + ${request.cost}` },
        setWhere: sql`${rateLimitWindows.requestsMade} + ${request.cost} <= ${rateLimitWindows.requestsLimit}`,
      })
      .returning({ requestsMade: rateLimitWindows.requestsMade });

    return rows.length > 0;
  }

  async findWindow(integrationId: string, windowStart: Date): Promise<RateLimitWindow | null> {
    const [row] = await this.db
      .select()
      .from(rateLimitWindows)
      .where(
        and(
          eq(rateLimitWindows.integrationId, integrationId),
          eq(rateLimitWindows.windowStart, windowStart)
        )
      )
      .limit(1);
    return row ?? null;
  }
}
