/**
 * Express glue: async handler wrapper and the JSON error responder.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { POS_ERROR_CODES, isPosError } from './errors.js';
import { Logger } from './logger.js';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

const logger = new Logger('Http');

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
  });
}

interface BodyParserError {
  type: string;
  status: number;
}

// body-parser tags its errors with a type and a 4xx status
function isBodyParserError(err: unknown): err is BodyParserError {
  if (typeof err !== 'object' || err === null) return false;
  if (!('type' in err) || !('status' in err)) return false;
  return typeof err.type === 'string' && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
};

/**
 * PosErrors answer with their own status and code, unreadable bodies are
 * VALIDATION_ERRORs with body-parser's status, anything else is a 500
 * that never leaks internals.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isPosError(err)) {
    if (err.status >= 500) {
      logger.warn({ event: 'request_failed', method: req.method, path: req.path, code: err.code, error: err });
    }
    res.status(err.status).json(err.toResult());
    return;
  }

  if (isBodyParserError(err)) {
    res.status(err.status).json({
      success: false,
      error: {
        code: POS_ERROR_CODES.VALIDATION_ERROR,
        message: BODY_ERROR_MESSAGES[err.type] ?? 'Request body could not be read',
      },
    });
    return;
  }

  logger.error({ event: 'unhandled_error', method: req.method, path: req.path, error: err });
  res.status(500).json({
    success: false,
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  });
}
