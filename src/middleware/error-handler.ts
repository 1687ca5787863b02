/**
 * Error Handling Middleware
 * ApiError, async route wrapper and the terminal Express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { env } from '../config/env';
import { SnapshotUnavailableError } from '../lib/cache/snapshot.reader';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly isOperational: boolean;

  constructor(statusCode: number, message: string, isOperational: boolean = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

export interface ErrorResponse {
  success: false;
  error: string;
  statusCode: number;
  details?: Array<{ path: string; message: string }>;
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler =
  (fn: AsyncRoute): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): Promise<void> =>
    fn(req, res, next).catch(next);

/**
 * body-parser marks its own failures with a status and a type
 */
function bodyParserStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export const notFoundHandler = (req: Request, res: Response): void => {
  const response: ErrorResponse = {
    success: false,
    error: `Route ${req.method} ${req.path} not found`,
    statusCode: 404,
  };
  res.status(404).json(response);
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  let statusCode = 500;
  let message = 'Internal server error';
  let details: ErrorResponse['details'];

  if (err instanceof ApiError) {
    statusCode = err.statusCode;
    message = err.message;
  } else if (err instanceof ZodError) {
    statusCode = 400;
    message = 'Invalid request';
    details = err.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  } else if (err instanceof SnapshotUnavailableError) {
    statusCode = 503;
    message = err.message;
  } else if (bodyParserStatus(err) !== undefined) {
    statusCode = bodyParserStatus(err) ?? 400;
    message = statusCode === 413 ? 'Request body too large' : 'Malformed request body';
  } else if (err instanceof Error && env.NODE_ENV !== 'production') {
    message = err.message;
  }

  if (statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.path} failed:`, err);
  }

  const response: ErrorResponse = { success: false, error: message, statusCode };
  if (details) {
    response.details = details;
  }

  res.status(statusCode).json(response);
};
