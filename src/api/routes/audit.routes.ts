/**
 * Audit Log Routes
 * Read access to the tenant's audit trail
 */

import { Router } from 'express';
import type { Response, Router as RouterType } from 'express';
import type { Container } from '../../container.js';
import { asyncHandler, sendSuccess } from '../../utils/helpers.js';
import { auditLogQuerySchema } from '../../utils/validation.js';
import { authenticate, requireCaller, requireTenant } from '../middleware/auth.middleware.js';
import { parseQuery } from '../middleware/validation.middleware.js';
import type { AuthenticatedRequest } from '../../types/index.js';

export function createAuditRoutes(container: Container): RouterType {
  const router: RouterType = Router();

  router.use(authenticate, requireTenant(container.tenants));

  /**
   * GET /api/audit-logs
   * Newest first; `resource_type` with `resource_id` narrows to one resource
   */
  router.get(
    '/',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const query = parseQuery(auditLogQuerySchema, req.query);

      if (query.resource_type && query.resource_id) {
        const entries = await container.audit.listForResource(query.resource_type, query.resource_id);
        sendSuccess(
          res,
          entries.filter((entry) => entry.tenantId === tenantId).slice(0, query.limit)
        );
        return;
      }

      sendSuccess(res, await container.audit.listForTenant(tenantId, { limit: query.limit, since: query.since }));
    })
  );

  return router;
}
