/**
 * Tenant Routes
 */

import { Router } from 'express';
import type { Response, Router as RouterType } from 'express';
import type { Container } from '../../container.js';
import { asyncHandler, sendSuccess } from '../../utils/helpers.js';
import { createTenantSchema } from '../../utils/validation.js';
import { authenticate, getAuditContext, requireCaller, requireTenant, requireUserId } from '../middleware/auth.middleware.js';
import { parseBody } from '../middleware/validation.middleware.js';
import type { AuthenticatedRequest } from '../../types/index.js';

export function createTenantRoutes(container: Container): RouterType {
  const router: RouterType = Router();

  router.use(authenticate);

  /**
   * POST /api/tenants
   * Create a tenant owned by the caller
   */
  router.post(
    '/',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const body = parseBody(createTenantSchema, req.body);
      const userId = requireUserId(req);

      const tenant = await container.tenants.createTenant(
        {
          name: body.name,
          subdomain: body.subdomain,
          ownerUserId: userId,
          contactEmail: body.contact_email,
          subscriptionTier: body.subscription_tier,
        },
        getAuditContext(req)
      );

      sendSuccess(res, tenant, 'Tenant created', 201);
    })
  );

  /**
   * GET /api/tenants/me
   */
  router.get(
    '/me',
    requireTenant(container.tenants),
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      sendSuccess(res, await container.tenants.getTenant(tenantId));
    })
  );

  /**
   * DELETE /api/tenants/me
   * Soft-deactivate the caller's tenant
   */
  router.delete(
    '/me',
    requireTenant(container.tenants),
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const tenant = await container.tenants.deactivateTenant(tenantId, getAuditContext(req));
      sendSuccess(res, tenant, 'Tenant deactivated');
    })
  );

  return router;
}
