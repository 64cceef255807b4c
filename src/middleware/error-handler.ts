/**
 * Error Handling Middleware
 * API errors, async route wrapper and the terminal Express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { CrawlConfigError, describeError } from '../lib/crawling/crawl-errors';

export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Forward rejected promises from async handlers to next()
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({ success: false, error: err.message });
    return;
  }

  if (err instanceof CrawlConfigError) {
    res.status(400).json({ success: false, error: err.message });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, describeError(err));
  res.status(500).json({ success: false, error: 'Internal server error' });
};
