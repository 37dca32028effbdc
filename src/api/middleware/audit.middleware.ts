import type { Response, NextFunction } from 'express';
import { logRequest } from '../../utils/logger.js';
import type { AuthenticatedRequest } from '../../types/index.js';

/**
 * Log all API requests once the response has been sent
 */
export function requestLogger(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  res.on('finish', () => {
    logRequest(req.method, req.originalUrl.split('?')[0], res.statusCode, Date.now() - startTime, req.userId);
  });

  next();
}
