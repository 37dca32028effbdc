/**
 * Integration Routes
 * OAuth handshakes, sync jobs and disconnects for a tenant's provider connections
 */

import { Router } from 'express';
import type { Response, Router as RouterType } from 'express';
import type { Container } from '../../container.js';
import { asyncHandler, sendPaginated, sendSuccess } from '../../utils/helpers.js';
import {
  callbackQuerySchema,
  connectSchema,
  integrationParamsSchema,
  jobHistoryQuerySchema,
  paginationSchema,
  providerParamsSchema,
  syncJobParamsSchema,
  triggerSyncSchema,
} from '../../utils/validation.js';
import { NotFoundError } from '../../utils/errors.js';
import { authenticate, getAuditContext, requireCaller, requireTenant } from '../middleware/auth.middleware.js';
import { callbackRateLimit } from '../middleware/rateLimit.middleware.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validation.middleware.js';
import type { AuthenticatedRequest, SyncJob } from '../../types/index.js';

function toJobView(job: SyncJob) {
  return {
    id: job.id,
    integrationId: job.integrationId,
    kind: job.kind,
    status: job.status,
    params: job.params,
    recordsFetched: job.recordsFetched,
    recordsProcessed: job.recordsProcessed,
    recordsFailed: job.recordsFailed,
    errorMessage: job.errorMessage,
    errorKind: job.errorDetails?.kind ?? null,
    triggeredBy: job.triggeredBy,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
  };
}

/**
 * Query parameters the provider sent back, flattened to strings
 */
function callbackParams(query: Record<string, unknown>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

export function createIntegrationRoutes(container: Container): RouterType {
  const router: RouterType = Router();

  // ============================================================================
  // OAuth Callback (the state parameter authorizes the request)
  // ============================================================================

  /**
   * GET /api/integrations/:provider/callback
   */
  router.get(
    '/:provider/callback',
    callbackRateLimit,
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { provider } = parseParams(providerParamsSchema, req.params);
      const query = parseQuery(callbackQuerySchema, req.query);

      const { integration, redirectAfter } = await container.oauth.handleCallback(
        {
          provider,
          state: query.state,
          code: query.code,
          error: query.error,
          callbackParams: callbackParams(query),
        },
        getAuditContext(req)
      );

      if (redirectAfter) {
        const target = new URL(redirectAfter);
        target.searchParams.set('integration_id', integration.id);
        target.searchParams.set('status', 'connected');
        res.redirect(302, target.toString());
        return;
      }

      sendSuccess(res, { integration_id: integration.id, status: 'connected' });
    })
  );

  // ============================================================================
  // Authenticated Routes
  // ============================================================================

  router.use(authenticate, requireTenant(container.tenants));

  /**
   * POST /api/integrations/:provider/connect
   * Start an OAuth handshake and return the provider consent URL
   */
  router.post(
    '/:provider/connect',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId, userId } = requireCaller(req);
      const { provider } = parseParams(providerParamsSchema, req.params);
      const body = parseBody(connectSchema, req.body);

      const handshake = await container.oauth.beginHandshake(
        {
          tenantId,
          userId,
          provider,
          redirectAfter: body.redirect_after,
          accountHint: body.account_hint,
        },
        getAuditContext(req)
      );

      sendSuccess(res, {
        authorization_url: handshake.authorizationUrl,
        expires_at: handshake.expiresAt.toISOString(),
      });
    })
  );

  /**
   * GET /api/integrations
   */
  router.get(
    '/',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      sendSuccess(res, await container.integrations.listForTenant(tenantId));
    })
  );

  /**
   * GET /api/integrations/:id
   */
  router.get(
    '/:id',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      sendSuccess(res, await container.integrations.getDetails(tenantId, id));
    })
  );

  /**
   * DELETE /api/integrations/:id
   * Disconnect: revoke at the provider where supported and wipe stored tokens
   */
  router.delete(
    '/:id',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      const integration = await container.integrations.disconnect(tenantId, id, getAuditContext(req));
      sendSuccess(res, integration, 'Integration disconnected');
    })
  );

  /**
   * POST /api/integrations/:id/test
   * One authenticated provider call; a failed check is still a 200 with ok: false
   */
  router.post(
    '/:id/test',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      const result = await container.integrations.testConnection(tenantId, id, getAuditContext(req));
      sendSuccess(res, result, result.ok ? 'Connection is working' : 'Connection test failed');
    })
  );

  // ============================================================================
  // Sync Jobs
  // ============================================================================

  /**
   * POST /api/integrations/:id/sync
   */
  router.post(
    '/:id/sync',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId, userId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      const body = parseBody(triggerSyncSchema, req.body);
      const integration = await container.integrations.requireOwned(tenantId, id);

      const job = await container.engine.triggerSync(
        {
          integrationId: integration.id,
          kind: body.kind,
          params: { since: body.since, until: body.until, filters: body.filters },
          triggeredBy: userId,
        },
        getAuditContext(req)
      );

      sendSuccess(res, { job_id: job.id, status: 'pending' }, 'Sync job queued', 202);
    })
  );

  /**
   * GET /api/integrations/:id/sync
   * Job history, newest first
   */
  router.get(
    '/:id/sync',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      const { limit } = parseQuery(jobHistoryQuerySchema, req.query);
      const integration = await container.integrations.requireOwned(tenantId, id);

      const jobs = await container.engine.listJobs(integration.id, limit);
      sendSuccess(res, jobs.map(toJobView));
    })
  );

  /**
   * GET /api/integrations/:id/sync/:jobId
   */
  router.get(
    '/:id/sync/:jobId',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const job = await loadOwnedJob(container, req);
      sendSuccess(res, toJobView(job));
    })
  );

  /**
   * POST /api/integrations/:id/sync/:jobId/cancel
   */
  router.post(
    '/:id/sync/:jobId/cancel',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const job = await loadOwnedJob(container, req);
      const cancelled = await container.engine.cancelSync(job.id, getAuditContext(req));
      sendSuccess(res, toJobView(cancelled), 'Sync job cancelled');
    })
  );

  /**
   * GET /api/integrations/:id/records
   */
  router.get(
    '/:id/records',
    asyncHandler(async (req: AuthenticatedRequest, res: Response) => {
      const { tenantId } = requireCaller(req);
      const { id } = parseParams(integrationParamsSchema, req.params);
      const { limit, offset } = parseQuery(paginationSchema, req.query);

      const records = await container.integrations.listRecords(tenantId, id, limit, offset);
      sendPaginated(res, records, limit, offset);
    })
  );

  return router;
}

async function loadOwnedJob(container: Container, req: AuthenticatedRequest): Promise<SyncJob> {
  const { tenantId } = requireCaller(req);
  const { id, jobId } = parseParams(syncJobParamsSchema, req.params);
  const integration = await container.integrations.requireOwned(tenantId, id);

  const job = await container.engine.getJob(jobId);
  if (job.integrationId !== integration.id) {
    throw new NotFoundError('Sync job', jobId);
  }
  return job;
}
