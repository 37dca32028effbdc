import type { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config/index.js';
import type { TenantService } from '../../services/TenantService.js';
import { sendError } from '../../utils/helpers.js';
import type { AuditContext, AuthenticatedRequest, JWTPayload } from '../../types/index.js';

const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  tenantId: z.string().optional(),
  role: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

/**
 * Verify a bearer token issued by the platform's identity service
 */
export function verifyAccessToken(token: string): JWTPayload {
  const decoded = jwt.verify(token, config.auth.jwtSecret);
  const result = jwtPayloadSchema.safeParse(decoded);
  if (!result.success) {
    throw new Error('Invalid token payload');
  }
  return result.data;
}

/**
 * Authenticate request with JWT token
 */
export function authenticate(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      sendError(res, 'Authorization header is required', 401);
      return;
    }

    if (!authHeader.startsWith('Bearer ')) {
      sendError(res, 'Invalid authorization format. Use: Bearer <token>', 401);
      return;
    }

    const token = authHeader.substring(7);

    if (!token) {
      sendError(res, 'Access token is required', 401);
      return;
    }

    const payload = verifyAccessToken(token);
    req.user = payload;
    req.userId = payload.userId;

    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      sendError(res, 'Access token has expired', 401);
      return;
    }
    sendError(res, 'Invalid access token', 401);
  }
}

/**
 * Resolve the caller's tenant and require it to be active
 */
export function requireTenant(tenants: TenantService) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      sendError(res, 'Authentication required', 401);
      return;
    }

    tenants
      .resolveForUser(req.user)
      .then(async (tenant) => {
        if (!tenant) {
          sendError(res, 'No tenant is associated with this user', 403, 'TENANT_REQUIRED');
          return;
        }
        await tenants.requireActiveTenant(tenant.id);
        req.tenantId = tenant.id;
        next();
      })
      .catch(next);
  };
}

/**
 * Extract caller info from request for audit context
 */
export function getAuditContext(req: AuthenticatedRequest): AuditContext {
  const userAgent = req.headers['user-agent'];
  return {
    tenantId: req.tenantId ?? null,
    actorId: req.userId ?? null,
    ipAddress: getClientIP(req),
    userAgent: Array.isArray(userAgent) ? userAgent[0] : userAgent,
  };
}

/**
 * Get client IP address
 */
export function getClientIP(req: AuthenticatedRequest): string {
  const forwardedFor = req.headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor)
      ? forwardedFor[0]
      : forwardedFor.split(',')[0];
    return ips.trim();
  }

  const realIP = req.headers['x-real-ip'];
  if (realIP) {
    return Array.isArray(realIP) ? realIP[0] : realIP;
  }

  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Narrow a request that passed `authenticate`
 */
export function requireUserId(req: AuthenticatedRequest): string {
  if (!req.userId) {
    throw new Error('Route is missing the authenticate middleware');
  }
  return req.userId;
}

/**
 * Narrow a request that passed `authenticate` and `requireTenant`
 */
export function requireCaller(req: AuthenticatedRequest): { userId: string; tenantId: string } {
  if (!req.userId || !req.tenantId) {
    throw new Error('Route is missing the authenticate/requireTenant middleware');
  }
  return { userId: req.userId, tenantId: req.tenantId };
}
