import { and, desc, eq, gte } from 'drizzle-orm';
import { db as defaultDb, type Database } from '../database/client.js';
import { auditLogs, type AuditLog, type NewAuditLog } from '../database/schema.js';

export interface AuditLogQuery {
  limit: number;
  since?: Date;
}

/**
 * Append-only: no update or delete.
 */
export interface AuditLogRepository {
  append(entry: NewAuditLog): Promise<AuditLog>;
  listByTenant(tenantId: string, query: AuditLogQuery): Promise<AuditLog[]>;
  listByResource(resourceType: string, resourceId: string): Promise<AuditLog[]>;
}

export class DrizzleAuditLogRepository implements AuditLogRepository {
  constructor(private readonly db: Database = defaultDb) {}

  async append(entry: NewAuditLog): Promise<AuditLog> {
    const [row] = await this.db.insert(auditLogs).values(entry).returning();
    return row;
  }

  async listByTenant(tenantId: string, query: AuditLogQuery): Promise<AuditLog[]> {
    const conditions = [eq(auditLogs.tenantId, tenantId)];
    if (query.since) {
      conditions.push(gte(auditLogs.createdAt, query.since));
    }

    return this.db
      .select()
      .from(auditLogs)
      .where(and(...conditions))
      .orderBy(desc(auditLogs.createdAt))
      .limit(query.limit);
  }

  async listByResource(resourceType: string, resourceId: string): Promise<AuditLog[]> {
    return this.db
      .select()
      .from(auditLogs)
      .where(and(eq(auditLogs.resourceType, resourceType), eq(auditLogs.resourceId, resourceId)))
      .orderBy(desc(auditLogs.createdAt));
  }
}
