import type { NextFunction, Request, Response } from 'express';
import type { APIResponse, PaginatedResponse } from '../types/index.js';

// ==================== API RESPONSE HELPERS ====================

export function sendSuccess<T>(
  res: Response,
  data: T,
  message?: string,
  statusCode: number = 200
): void {
  const response: APIResponse<T> = {
    success: true,
    data,
    message,
  };
  res.status(statusCode).json(response);
}

export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  code?: string,
  details?: unknown
): void {
  const response: APIResponse = {
    success: false,
    error,
    code,
    details,
  };
  res.status(statusCode).json(response);
}

export function sendPaginated<T>(
  res: Response,
  data: T[],
  limit: number,
  offset: number,
  total?: number
): void {
  const response: PaginatedResponse<T> = {
    success: true,
    data,
    pagination: {
      limit,
      offset,
      total,
    },
  };
  res.status(200).json(response);
}

// ==================== ASYNC HELPERS ====================

/**
 * Forward a rejected handler promise to the Express error middleware.
 */
export function asyncHandler<Req extends Request = Request>(
  handler: (req: Req, res: Response, next: NextFunction) => Promise<void>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Resolves after `ms`, or rejects with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ==================== OBJECT HELPERS ====================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
