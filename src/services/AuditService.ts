import {
  DrizzleAuditLogRepository,
  type AuditLogQuery,
  type AuditLogRepository,
} from '../repositories/AuditLogRepository.js';
import { logger, logSecurity, sanitizeForLogging } from '../utils/logger.js';
import type { AuditContext, AuditEntry, AuditLog } from '../types/index.js';

export class AuditService {
  constructor(private readonly repository: AuditLogRepository = new DrizzleAuditLogRepository()) {}

  /**
   * Append an audit entry. Resolves to false when the write failed: the gap
   * is escalated in the logs and the caller carries on with its action.
   */
  async record(entry: AuditEntry, context: AuditContext = {}): Promise<boolean> {
    try {
      await this.repository.append({
        tenantId: context.tenantId ?? null,
        actorId: context.actorId ?? null,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId ?? null,
        ipAddress: context.ipAddress ?? null,
        userAgent: context.userAgent ?? null,
        details: sanitizeForLogging(entry.details ?? {}),
      });

      logger.debug('Audit log created', {
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        tenantId: context.tenantId,
      });
      return true;
    } catch (error) {
      logger.error('Failed to create audit log', {
        error,
        entry: sanitizeForLogging({ ...entry }),
        tenantId: context.tenantId,
        actorId: context.actorId,
      });
      logSecurity('audit_gap', 'high', {
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
      });
      return false;
    }
  }

  /**
   * Audit trail of a tenant, newest first
   */
  async listForTenant(tenantId: string, query: AuditLogQuery): Promise<AuditLog[]> {
    return this.repository.listByTenant(tenantId, query);
  }

  /**
   * Every entry recorded against a single resource, newest first
   */
  async listForResource(resourceType: AuditEntry['resourceType'], resourceId: string): Promise<AuditLog[]> {
    return this.repository.listByResource(resourceType, resourceId);
  }
}
