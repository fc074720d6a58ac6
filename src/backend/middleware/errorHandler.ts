/**
 * Error handling middleware - provides centralized error handling for the API.
 * Maps pipeline and validation errors to status codes and handles structured
 * logging of server-side errors.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { loggers, serializeError } from '../../shared/logging/logger';
import { PipelineError, PipelineErrorCode } from '../../tailor/errors/types';
import { zodErrorToValidationErrors } from '../../tailor/validation/validator';
import { config } from '../config';

const logger = loggers.http;

/**
 * Custom error class for API errors with status codes
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * HTTP status for a pipeline error: bad request bodies are 400, unusable
 * resume input is 422
 */
export function statusForPipelineError(err: PipelineError): number {
  switch (err.code) {
    case PipelineErrorCode.INVALID_INPUT:
      return 400;
    case PipelineErrorCode.CONFIGURATION_ERROR:
      return 500;
    default:
      return 422;
  }
}

function statusFor(err: Error): number {
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof PipelineError) return statusForPipelineError(err);
  if (err instanceof ZodError) return 400;
  return 500;
}

function requestId(req: Request): string | undefined {
  const id: unknown = Reflect.get(req, 'id');
  return typeof id === 'string' ? id : undefined;
}

/**
 * Centralized error handler middleware
 * Logs errors with full context and returns appropriate responses
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = statusFor(err);
  const isServerError = statusCode >= 500;
  const id = requestId(req);

  const errorContext = {
    err: serializeError(err),
    requestId: id,
    method: req.method,
    path: req.path,
    statusCode,
    ...(err instanceof PipelineError && { errorCode: err.code }),
    ...(err instanceof ApiError && err.code && { errorCode: err.code }),
  };

  if (isServerError) {
    logger.error(errorContext, `Request failed: ${err.message}`);
  } else {
    logger.warn(errorContext, `Client error: ${err.message}`);
  }

  if (err instanceof PipelineError && !isServerError) {
    res.status(statusCode).json(err.toErrorResponse(id));
    return;
  }

  if (err instanceof ZodError) {
    res.status(statusCode).json({
      error: PipelineErrorCode.INVALID_INPUT,
      message: 'Invalid request body',
      validation_errors: zodErrorToValidationErrors(err),
    });
    return;
  }

  const response: Record<string, unknown> = {
    error: isServerError ? 'Internal Server Error' : err.message,
  };

  if (config.server.isDevelopment) {
    response.message = err.message;
    response.stack = err.stack;
  }

  if (err instanceof ApiError) {
    if (err.code) {
      response.code = err.code;
    }
    if (err.details && config.server.isDevelopment) {
      response.details = err.details;
    }
  }

  res.status(statusCode).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
