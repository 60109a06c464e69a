import type { ErrorRequestHandler } from 'express';
import type { Logger } from '../core/Logger.js';
import type { ErrorBody } from '../core/types.js';

// Errors that carry their own HTTP status; the message is safe to send to clients
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends HttpError {
  constructor() {
    super(404, 'Not found');
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(public readonly allowed: readonly string[]) {
    super(405, 'Method not allowed');
    this.name = 'MethodNotAllowedError';
  }
}

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof HttpError) {
      if (err instanceof MethodNotAllowedError) res.setHeader('Allow', err.allowed.join(', '));
      const body: ErrorBody = { error: err.message };
      res.status(err.status).json(body);
      return;
    }
    logger.error('request_failed', { method: req.method, path: req.path, error: err });
    const body: ErrorBody = { error: INTERNAL_ERROR_MESSAGE };
    res.status(500).json(body);
  };
}
