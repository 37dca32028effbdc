import jwt from 'jsonwebtoken';
import { config } from '../config/index.js';

/**
 * Authorization header carrying a token the auth middleware accepts.
 */
export function bearer(userId: string, claims: { tenantId?: string; expiresIn?: number } = {}): string {
  const payload = claims.tenantId ? { userId, tenantId: claims.tenantId } : { userId };
  const token = jwt.sign(payload, config.auth.jwtSecret, { expiresIn: claims.expiresIn ?? 3600 });
  return `Bearer ${token}`;
}
