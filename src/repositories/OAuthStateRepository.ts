import { and, eq, gt, lt, or } from 'drizzle-orm';
import { db as defaultDb, type Database } from '../database/client.js';
import { oauthStates, type NewOAuthState, type OAuthState } from '../database/schema.js';

export interface OAuthStateRepository {
  create(values: NewOAuthState): Promise<OAuthState>;
  findByToken(stateToken: string): Promise<OAuthState | null>;
  /**
   * Flip `consumed` from false to true if the state is unconsumed and not
   * expired at `now`. Exactly one concurrent caller gets the row back.
   */
  consume(stateToken: string, now: Date): Promise<OAuthState | null>;
  /**
   * Delete states that expired before `cutoff` or were already consumed.
   */
  deleteStale(cutoff: Date): Promise<number>;
}

export class DrizzleOAuthStateRepository implements OAuthStateRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async create(values: NewOAuthState): Promise<OAuthState> {
    const [state] = await this.db.insert(oauthStates).values(values).returning();
    return state;
  }

  async findByToken(stateToken: string): Promise<OAuthState | null> {
    const [state] = await this.db
      .select()
      .from(oauthStates)
      .where(eq(oauthStates.stateToken, stateToken))
      .limit(1);
    return state ?? null;
  }

  async consume(stateToken: string, now: Date): Promise<OAuthState | null> {
    const [state] = await this.db
      .update(oauthStates)
      .set({ consumed: true })
      .where(
        and(
          eq(oauthStates.stateToken, stateToken),
          eq(oauthStates.consumed, false),
          gt(oauthStates.expiresAt, now)
        )
      )
      .returning();
    return state ?? null;
  }

  async deleteStale(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(oauthStates)
      .where(or(lt(oauthStates.expiresAt, cutoff), eq(oauthStates.consumed, true)))
      .returning({ stateToken: oauthStates.stateToken });
    return deleted.length;
  }
}
