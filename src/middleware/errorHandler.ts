// src/middleware/errorHandler.ts
import type { ErrorRequestHandler, RequestHandler } from 'express';
import { AppError, makeError } from '../errors';
import { Logger } from '../services/base/types';
import { getRequestId } from './correlation';

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    res.status(404).json(makeError('ROUTE_NOT_FOUND', `No route for ${req.method} ${req.path}`, getRequestId(res)));
  };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    const traceId = getRequestId(res);

    if (error instanceof AppError) {
      const meta = { code: error.code, method: req.method, path: req.path, traceId };
      if (error.statusCode >= 500) {
        logger.error(error.message, meta);
      } else {
        logger.warn(error.message, meta);
      }
      res.status(error.statusCode).json(makeError(error.code, error.message, traceId));
      return;
    }

    if (error instanceof SyntaxError && 'body' in error) {
      // express.json() could not parse the request body
      res.status(400).json(makeError('INVALID_REQUEST', 'Request body is not valid JSON', traceId));
      return;
    }

    logger.error('Unhandled error', {
      method: req.method,
      path: req.path,
      traceId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    res.status(500).json(makeError('INTERNAL_ERROR', 'Internal server error', traceId));
  };
}
