import { and, asc, desc, eq, sql } from 'drizzle-orm';
import { db as defaultDb, isUniqueViolation, type Database } from '../database/client.js';
import { integrations, type Integration, type NewIntegration } from '../database/schema.js';
import type { IntegrationProvider } from '../types/index.js';

export interface IntegrationAccountKey {
  tenantId: string;
  provider: IntegrationProvider;
  externalAccountId: string;
}

/**
 * Columns a writer may change. `version` and `updatedAt` are managed by the
 * repository on every conditional update.
 */
export type IntegrationPatch = Partial<
  Omit<Integration, 'id' | 'tenantId' | 'provider' | 'externalAccountId' | 'version' | 'updatedAt'>
>;

export type IntegrationConnectValues = IntegrationAccountKey &
  Pick<
    NewIntegration,
    | 'externalAccountName'
    | 'accessTokenEncrypted'
    | 'refreshTokenEncrypted'
    | 'tokenType'
    | 'scopes'
    | 'tokenExpiresAt'
    | 'metadata'
  >;

export interface IntegrationRepository {
  findById(id: string): Promise<Integration | null>;
  findActiveByAccount(key: IntegrationAccountKey): Promise<Integration | null>;
  listByTenant(tenantId: string): Promise<Integration[]>;
  listActive(): Promise<Integration[]>;
  /**
   * Insert, or update and reactivate, the row for the account key. A reconnect
   * of the same external account never produces a second row.
   */
  connect(values: IntegrationConnectValues): Promise<Integration>;
  /**
   * Apply the patch only if the stored version still equals `expectedVersion`.
   * Returns null when another writer got there first.
   */
  updateIfVersion(id: string, expectedVersion: number, patch: IntegrationPatch): Promise<Integration | null>;
}

export class DrizzleIntegrationRepository implements IntegrationRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async findById(id: string): Promise<Integration | null> {
    const [row] = await this.db.select().from(integrations).where(eq(integrations.id, id)).limit(1);
    return row ?? null;
  }

  async findActiveByAccount(key: IntegrationAccountKey): Promise<Integration | null> {
    const [row] = await this.db
      .select()
      .from(integrations)
      .where(
        and(
          eq(integrations.tenantId, key.tenantId),
          eq(integrations.provider, key.provider),
          eq(integrations.externalAccountId, key.externalAccountId),
          eq(integrations.isActive, true)
        )
      )
      .limit(1);
    return row ?? null;
  }

  async listByTenant(tenantId: string): Promise<Integration[]> {
    return this.db
      .select()
      .from(integrations)
      .where(eq(integrations.tenantId, tenantId))
      .orderBy(desc(integrations.connectedAt));
  }

  async listActive(): Promise<Integration[]> {
    return this.db
      .select()
      .from(integrations)
      .where(eq(integrations.isActive, true))
      .orderBy(asc(integrations.lastSyncedAt));
  }

  async connect(values: IntegrationConnectValues): Promise<Integration> {
    try {
      return await this.connectOnce(values);
    } catch (error) {
      // Two callbacks for the same account raced on insert: the loser now finds the row
      if (isUniqueViolation(error)) {
        return this.connectOnce(values);
      }
      throw error;
    }
  }

  private async connectOnce(values: IntegrationConnectValues): Promise<Integration> {
    return this.db.transaction(async (tx) => {
      const [existing] = await tx
        .select()
        .from(integrations)
        .where(
          and(
            eq(integrations.tenantId, values.tenantId),
            eq(integrations.provider, values.provider),
            eq(integrations.externalAccountId, values.externalAccountId)
          )
        )
        .orderBy(desc(integrations.isActive), desc(integrations.connectedAt))
        .limit(1)
        .for('update');

      const now = new Date();

      if (existing) {
        const [updated] = await tx
          .update(integrations)
          .set({
            externalAccountName: values.externalAccountName ?? existing.externalAccountName,
            accessTokenEncrypted: values.accessTokenEncrypted,
            refreshTokenEncrypted: values.refreshTokenEncrypted,
            tokenType: values.tokenType,
            scopes: values.scopes,
            tokenExpiresAt: values.tokenExpiresAt,
            metadata: { ...existing.metadata, ...values.metadata },
            isActive: true,
            // A job running on the active row keeps its claim
            syncStatus: existing.isActive && existing.syncStatus === 'SYNCING' ? 'SYNCING' : 'IDLE',
            lastError: null,
            lastErrorKind: null,
            connectedAt: now,
            disconnectedAt: null,
            version: sql`${integrations.version} + 1`,
            updatedAt: now,
          })
          .where(eq(integrations.id, existing.id))
          .returning();
        return updated;
      }

      const [created] = await tx
        .insert(integrations)
        .values({ ...values, connectedAt: now, updatedAt: now })
        .returning();
      return created;
    });
  }

  async updateIfVersion(
    id: string,
    expectedVersion: number,
    patch: IntegrationPatch
  ): Promise<Integration | null> {
    const [row] = await this.db
      .update(integrations)
      .set({
        ...patch,
        version: sql`${integrations.version} + 1`,
        updatedAt: new Date(),
      })
      .where(and(eq(integrations.id, id), eq(integrations.version, expectedVersion)))
      .returning();
    return row ?? null;
  }
}
