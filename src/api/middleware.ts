/**
 * API Middleware: caller identity and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { isRecord } from '../domain/artifact';
import {
  ErrorCategory,
  KernelError,
  KernelException,
  apiError,
  errorMessage,
  systemError,
  validationError,
} from '../domain/errors';
import { logger } from '../logger';

export const PRINCIPAL_HEADER = 'x-principal-id';

/** Request carrying the principal named by the transport. */
export interface PrincipalRequest extends Request {
  principalId?: string;
}

/**
 * Read the acting principal from the `x-principal-id` header. There is no
 * authentication: the kernel trusts its transport.
 */
export function principalIdentityMiddleware() {
  return (req: PrincipalRequest, _res: Response, next: NextFunction) => {
    const header = req.headers[PRINCIPAL_HEADER];
    if (typeof header === 'string' && header.trim() !== '') {
      req.principalId = header.trim();
    }
    next();
  };
}

export function httpStatus(error: KernelError): number {
  switch (error.category) {
    case ErrorCategory.Validation:
      return 400;
    case ErrorCategory.Permission:
      return 403;
    case ErrorCategory.Resource:
      return error.code === 'not_found' || error.code === 'deleted' ? 404 : 409;
    case ErrorCategory.Execution:
      return 422;
    case ErrorCategory.System:
      return 500;
  }
}

export function sendError(res: Response, error: KernelError): void {
  res.status(httpStatus(error)).json(apiError(error));
}

/** Parse a non-negative integer query parameter. */
export function queryInt(value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof KernelException) {
    const status = httpStatus(err.kernelError);
    logger.warn('Request error', { code: err.kernelError.code, status });
    sendError(res, err.kernelError);
    return;
  }

  if (isRecord(err) && err.type === 'entity.parse.failed') {
    sendError(res, validationError('invalid_type', 'Request body is not valid JSON'));
    return;
  }

  logger.error('Unhandled request error', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  sendError(res, systemError(errorMessage(err)));
}
