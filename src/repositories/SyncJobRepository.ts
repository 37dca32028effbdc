import { and, desc, eq, inArray, lt } from 'drizzle-orm';
import { db as defaultDb, isUniqueViolation, type Database } from '../database/client.js';
import { integrations, syncJobs, type NewSyncJob, type SyncJob } from '../database/schema.js';
import { ACTIVE_SYNC_JOB_STATUSES, type SyncJobStatus } from '../types/index.js';

export type SyncJobPatch = Partial<
  Pick<
    SyncJob,
    | 'startedAt'
    | 'completedAt'
    | 'recordsFetched'
    | 'recordsProcessed'
    | 'recordsFailed'
    | 'errorMessage'
    | 'errorDetails'
  >
>;

export type SyncJobCounters = Pick<SyncJob, 'recordsFetched' | 'recordsProcessed' | 'recordsFailed'>;

export interface SyncJobRepository {
  /**
   * Atomically insert a PENDING job unless the integration already has a
   * PENDING or RUNNING one. Returns null when the claim is lost.
   */
  createIfIdle(values: Omit<NewSyncJob, 'status'>): Promise<SyncJob | null>;
  findById(id: string): Promise<SyncJob | null>;
  findActiveByIntegration(integrationId: string): Promise<SyncJob | null>;
  listByIntegration(integrationId: string, limit: number): Promise<SyncJob[]>;
  /**
   * Move a job to `to` only if it is currently in one of `from`.
   * Returns null when the job is not in an allowed source status.
   */
  transition(id: string, from: readonly SyncJobStatus[], to: SyncJobStatus, patch?: SyncJobPatch): Promise<SyncJob | null>;
  updateCounters(id: string, counters: SyncJobCounters): Promise<void>;
  listRunningStartedBefore(cutoff: Date): Promise<SyncJob[]>;
}

export class DrizzleSyncJobRepository implements SyncJobRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async createIfIdle(values: Omit<NewSyncJob, 'status'>): Promise<SyncJob | null> {
    try {
      return await this.db.transaction(async (tx) => {
        // Serialize claims per integration on its row lock
        await tx
          .select({ id: integrations.id })
          .from(integrations)
          .where(eq(integrations.id, values.integrationId))
          .for('update');

        const [active] = await tx
          .select({ id: syncJobs.id })
          .from(syncJobs)
          .where(
            and(
              eq(syncJobs.integrationId, values.integrationId),
              inArray(syncJobs.status, [...ACTIVE_SYNC_JOB_STATUSES])
            )
          )
          .limit(1);

        if (active) {
          return null;
        }

        const [job] = await tx
          .insert(syncJobs)
          .values({ ...values, status: 'PENDING' })
          .returning();
        return job;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    }
  }

  async findById(id: string): Promise<SyncJob | null> {
    const [job] = await this.db.select().from(syncJobs).where(eq(syncJobs.id, id)).limit(1);
    return job ?? null;
  }

  async findActiveByIntegration(integrationId: string): Promise<SyncJob | null> {
    const [job] = await this.db
      .select()
      .from(syncJobs)
      .where(
        and(
          eq(syncJobs.integrationId, integrationId),
          inArray(syncJobs.status, [...ACTIVE_SYNC_JOB_STATUSES])
        )
      )
      .limit(1);
    return job ?? null;
  }

  async listByIntegration(integrationId: string, limit: number): Promise<SyncJob[]> {
    return this.db
      .select()
      .from(syncJobs)
      .where(eq(syncJobs.integrationId, integrationId))
      .orderBy(desc(syncJobs.createdAt))
      .limit(limit);
  }

  async transition(
    id: string,
    from: readonly SyncJobStatus[],
    to: SyncJobStatus,
    patch: SyncJobPatch = {}
  ): Promise<SyncJob | null> {
    const [job] = await this.db
      .update(syncJobs)
      .set({ ...patch, status: to })
      .where(and(eq(syncJobs.id, id), inArray(syncJobs.status, [...from])))
      .returning();
    return job ?? null;
  }

  async updateCounters(id: string, counters: SyncJobCounters): Promise<void> {
    await this.db.update(syncJobs).set(counters).where(eq(syncJobs.id, id));
  }

  async listRunningStartedBefore(cutoff: Date): Promise<SyncJob[]> {
    return this.db
      .select()
      .from(syncJobs)
      .where(and(eq(syncJobs.status, 'RUNNING'), lt(syncJobs.startedAt, cutoff)));
  }
}
