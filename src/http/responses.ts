/**
 * Response envelopes and error mapping
 *
 * Success: `{ "data": ... }`. Failure: `{ "error": { "code", "message" } }`.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { QueryContext } from '../persistence/types.js';
import {
  ApiError,
  CommonErrors,
  createErrorResponse,
  sanitizeError,
} from '../utils/errors.js';

export function sendData(res: Response, data: unknown, statusCode: number = 200): void {
  res.status(statusCode).json({ data });
}

/**
 * Cancellation scope for one request: aborted when the client goes away
 * before the response has been written.
 */
export function requestContext(res: Response): QueryContext {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return { signal: controller.signal };
}

export type RouteHandler = (req: Request, res: Response, ctx: QueryContext) => Promise<void>;

/** Adapt an async handler to express 4, which ignores returned promises */
export function asyncHandler(handler: RouteHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    void handler(req, res, requestContext(res)).catch(next);
  };
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export const notFoundHandler: RequestHandler = (req, res) => {
  const { statusCode, body } = createErrorResponse(CommonErrors.NOT_FOUND(`Route ${req.method} ${req.path}`));
  res.status(statusCode).json(body);
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  let apiError: ApiError;
  if (err instanceof ApiError) {
    apiError = err;
    if (apiError.statusCode >= 500) {
      console.error(`[HTTP] ${req.method} ${req.path} failed:`, sanitizeError(apiError));
    }
  } else if (isBodyParseError(err)) {
    apiError = CommonErrors.INVALID_REQUEST('Malformed JSON body');
  } else {
    console.error(`[HTTP] Unhandled error on ${req.method} ${req.path}:`, sanitizeError(err));
    apiError = CommonErrors.INTERNAL();
  }

  if (apiError.statusCode === 401) {
    res.setHeader('WWW-Authenticate', `Bearer error="invalid_token", error_description="${apiError.message}"`);
  }
  if (apiError.retryable) {
    res.setHeader('Retry-After', '1');
  }

  const { statusCode, body } = createErrorResponse(apiError);
  res.status(statusCode).json(body);
};
