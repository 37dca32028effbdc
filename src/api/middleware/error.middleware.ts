import type { NextFunction, Request, Response } from 'express';
import { config } from '../../config/index.js';
import { AppError, toErrorMessage } from '../../utils/errors.js';
import { isRecord, sendError } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';

/**
 * 404 handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  sendError(res, 'Endpoint not found', 404, 'NOT_FOUND');
}

/**
 * Map AppError to its status and code; anything else is a logged 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, code: err.code, error: err.message });
    }
    const details = err.statusCode < 500 && Object.keys(err.details).length > 0 ? err.details : undefined;
    sendError(res, err.message, err.statusCode, err.code, details);
    return;
  }

  // express.json() rejects unparseable bodies with type entity.parse.failed
  if (isRecord(err) && err.type === 'entity.parse.failed') {
    sendError(res, 'Malformed JSON body', 400, 'VALIDATION_ERROR');
    return;
  }

  logger.error('Unhandled error', {
    path: req.path,
    error: toErrorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  sendError(res, config.isProduction ? 'Internal server error' : toErrorMessage(err), 500, 'INTERNAL_ERROR');
}
