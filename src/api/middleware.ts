/**
 * API error handling middleware.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, TypedError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

/** Errors thrown by services carry their typed error. */
interface TypedErrorCarrier {
  typedError: TypedError;
}

function carriesTypedError(err: unknown): err is TypedErrorCarrier {
  if (typeof err !== 'object' || err === null || !('typedError' in err)) return false;
  const typed: unknown = err.typedError;
  return typeof typed === 'object' && typed !== null && 'code' in typed && typeof typed.code === 'string';
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (carriesTypedError(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'SESSION.ALREADY_RUNNING') return 409;
  return 500;
}
