/**
 * HTTP middleware: async route wrapping, request logging, 404s and faults.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  apiError,
  createTypedError,
  httpStatusFor,
  internalError,
  routeNotFoundError,
  TypedError,
  validationError,
} from '../domain/errors';
import { renderErrorPage } from '../web/views';
import { errorContext, logger as rootLogger } from '../logger';

const logger = rootLogger.child({ layer: 'http' });

/**
 * Wrap an async route so a rejected promise reaches the error handler
 * instead of escaping as an unhandled rejection.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/** Log one line per finished request. */
export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

function wantsJson(req: Request): boolean {
  return req.path === '/api' || req.path.startsWith('/api/');
}

function sendError(req: Request, res: Response, error: TypedError, status = httpStatusFor(error)): void {
  if (wantsJson(req)) {
    res.status(status).json(apiError(error));
    return;
  }
  res.status(status).type('html').send(renderErrorPage(status, error.message));
}

/** Catch-all for unmatched routes. */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(req, res, routeNotFoundError(req.path));
}

/** Body parsers reject payloads with a 4xx `status` on the error. */
function isClientError(err: unknown): err is Error & { status: number } {
  if (!(err instanceof Error) || !('status' in err)) return false;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}

function rejectedBodyError(status: number, reason: string): TypedError {
  if (status === 413) {
    return createTypedError({ code: 'VALIDATION.BODY_TOO_LARGE', message: 'Request body too large', details: { reason } });
  }
  return validationError('Malformed request body', { reason });
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (isClientError(err) && !res.headersSent) {
    logger.warn('Rejected request body', { path: req.path, status: err.status, message: err.message });
    sendError(req, res, rejectedBodyError(err.status, err.message), err.status);
    return;
  }

  logger.error('Unhandled request error', { method: req.method, path: req.path, ...errorContext(err) });

  if (res.headersSent) {
    next(err);
    return;
  }

  sendError(req, res, internalError());
}
