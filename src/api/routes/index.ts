import { Router } from 'express';
import type { Router as RouterType } from 'express';
import type { Container } from '../../container.js';
import { createAuditRoutes } from './audit.routes.js';
import { createHealthRoutes } from './health.routes.js';
import { createIntegrationRoutes } from './integration.routes.js';
import { createTenantRoutes } from './tenant.routes.js';

export function createRoutes(container: Container): RouterType {
  const router: RouterType = Router();

  // Health routes (no /api prefix)
  router.use('/health', createHealthRoutes(container));

  // ==================== TENANTS ====================
  router.use('/api/tenants', createTenantRoutes(container));

  // ==================== INTEGRATIONS ====================
  router.use('/api/integrations', createIntegrationRoutes(container));

  // ==================== AUDIT LOG ====================
  router.use('/api/audit-logs', createAuditRoutes(container));

  return router;
}
