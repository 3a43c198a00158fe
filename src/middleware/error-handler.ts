import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express'
import httpStatus from 'http-status'
import { ApiError, isApiError } from '../lib/errors.js'
import { error as logError, warn } from '../lib/logger.js'
import { isProduction } from '../config/env.js'

interface ErrorResponse {
  statusCode: number
  message: string
  details?: unknown
  stack?: string
}

function convertToApiError(err: Error): ApiError {
  // Already an ApiError
  if (isApiError(err)) {
    return err
  }

  // body-parser and friends attach an HTTP status to client errors
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return new ApiError({
      statusCode: err.status,
      message: err.message,
      isOperational: true,
      cause: err,
    })
  }

  // Default: internal server error
  return new ApiError({
    statusCode: httpStatus.INTERNAL_SERVER_ERROR,
    message: isProduction() ? 'Internal server error' : err.message,
    isOperational: false,
    cause: err,
  })
}

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const apiError = convertToApiError(err)

  // Log the error
  if (apiError.isOperational) {
    warn(apiError.message, {
      event: 'HttpRequestFailed',
      metadata: { statusCode: apiError.statusCode, path: req.originalUrl },
    })
  } else {
    logError('Unhandled error', {
      event: 'HttpUnhandledError',
      metadata: { statusCode: apiError.statusCode, path: req.originalUrl },
      err,
    })
  }

  // Build response
  const response: ErrorResponse = {
    statusCode: apiError.statusCode,
    message: apiError.message,
  }

  // Include details if present
  if (apiError.details) {
    response.details = apiError.details
  }

  // Include stack trace in non-production
  if (!isProduction() && err.stack && !apiError.isOperational) {
    response.stack = err.stack
  }

  res.status(apiError.statusCode).json(response)
}

// 404 handler for unmatched routes
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(
    new ApiError({
      statusCode: httpStatus.NOT_FOUND,
      message: `Route ${req.method} ${req.originalUrl} not found`,
      isOperational: true,
    })
  )
}
