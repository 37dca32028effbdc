import { desc, eq, sql } from 'drizzle-orm';
import { db as defaultDb, type Database } from '../database/client.js';
import { syncedRecords, type SyncedRecord } from '../database/schema.js';

export interface SyncedRecordInput {
  externalId: string;
  payload: Record<string, unknown>;
}

export interface SyncedRecordRepository {
  /**
   * Upsert one page of records in a single statement; a page is written
   * entirely or not at all.
   */
  upsertPage(integrationId: string, records: SyncedRecordInput[]): Promise<number>;
  listByIntegration(integrationId: string, limit: number, offset: number): Promise<SyncedRecord[]>;
}

export class DrizzleSyncedRecordRepository implements SyncedRecordRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async upsertPage(integrationId: string, records: SyncedRecordInput[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    // ON CONFLICT cannot touch the same row twice in one statement: last occurrence wins
    const unique = new Map(records.map((record) => [record.externalId, record]));

    const now = new Date();
    const rows = await this.db
      .insert(syncedRecords)
      .values([...unique.values()].map((record) => ({ integrationId, ...record, syncedAt: now })))
      .onConflictDoUpdate({
        target: [syncedRecords.integrationId, syncedRecords.externalId],
        set: { payload: sql`excluded.payload`, syncedAt: now },
      })
      .returning({ id: syncedRecords.id });

    return rows.length;
  }

  async listByIntegration(integrationId: string, limit: number, offset: number): Promise<SyncedRecord[]> {
    return this.db
      .select()
      .from(syncedRecords)
      .where(eq(syncedRecords.integrationId, integrationId))
      .orderBy(desc(syncedRecords.syncedAt))
      .limit(limit)
      .offset(offset);
  }
}
