/**
 * API Middleware — request logging, error responses, and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import {
  apiError,
  badRequestError,
  httpStatusFor,
  internalError,
  isTypedErrorException,
  TypedError,
} from '../domain/errors';
import { presentError } from '../domain/error-presentation';
import { logger } from '../logger';
import { renderErrorPage } from './error-page';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Log one line per completed request. Reuses an incoming request id or
 * assigns a fresh one, and echoes it back.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    const requestId = req.get(REQUEST_ID_HEADER) || uuid();
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on('finish', () => {
      logger.info('Request completed', {
        requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });

    next();
  };
}

/** JSON endpoints never answer with an HTML page. */
function isJsonOnlyPath(url: string): boolean {
  return url === '/health' || url.startsWith('/api/');
}

/** Answer with a typed error as JSON. */
export function sendJsonError(res: Response, error: TypedError): void {
  res.status(httpStatusFor(error)).json(apiError(error));
}

/**
 * Answer with a typed error, negotiated: browsers get an HTML page built
 * from the error presentation, other clients the JSON error body.
 */
export function sendError(req: Request, res: Response, error: TypedError): void {
  const status = httpStatusFor(error);
  if (!isJsonOnlyPath(req.originalUrl) && req.accepts(['html', 'json']) === 'html') {
    res.status(status).type('html').send(renderErrorPage(presentError(error)));
    return;
  }
  res.status(status).json(apiError(error));
}

/**
 * 4xx status carried by an error raised inside Express or its helpers,
 * e.g. the URIError for a malformed percent-encoded parameter.
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function errorMessage(err: unknown, fallback: string): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return fallback;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    logger.error('Error after response started', {
      path: req.originalUrl,
      message: err instanceof Error ? err.message : String(err),
    });
    next(err);
    return;
  }

  if (isTypedErrorException(err)) {
    const status = httpStatusFor(err.typedError);
    const log = status >= 500 ? logger.error : logger.warn;
    log('Request error', { code: err.typedError.code, status, path: req.originalUrl, details: err.typedError.details });
    sendError(req, res, err.typedError);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    const message = errorMessage(err, 'Bad request');
    logger.warn('Rejected malformed request', { status: clientStatus, path: req.originalUrl, message });
    sendError(req, res, badRequestError(message, { status: clientStatus }));
    return;
  }

  logger.error('Unhandled request error', {
    path: req.originalUrl,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  sendError(req, res, internalError('Internal server error'));
}
