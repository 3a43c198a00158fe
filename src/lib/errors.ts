import httpStatus from 'http-status'

export interface ApiErrorOptions {
  statusCode: number
  message?: string
  isOperational?: boolean
  details?: unknown
  cause?: Error
}

export class ApiError extends Error {
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly details?: unknown

  constructor(options: ApiErrorOptions) {
    const message = options.message || (httpStatus[options.statusCode] as string) || 'Unknown Error'
    super(message, { cause: options.cause })

    this.statusCode = options.statusCode
    this.isOperational = options.isOperational ?? true
    this.details = options.details

    Error.captureStackTrace(this, this.constructor)
    Object.setPrototypeOf(this, ApiError.prototype)
  }

  toJSON() {
    return {
      statusCode: this.statusCode,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    }
  }
}

export const notFound = (message?: string, details?: unknown) =>
  new ApiError({ statusCode: httpStatus.NOT_FOUND, message, details })

export const internalError = (message?: string, cause?: Error) =>
  new ApiError({
    statusCode: httpStatus.INTERNAL_SERVER_ERROR,
    message,
    isOperational: false,
    cause,
  })

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError
}

/**
 * Normalized failure reasons reported by destination facades.
 *
 * The dispatch loop only ever looks at these; SDK exception types stay inside
 * the facade that caught them.
 */
export enum ReasonCode {
  THROTTLING = 'THROTTLING',
  ABORTED = 'ABORTED',
  INVALID_SEQUENCE_TOKEN = 'INVALID_SEQUENCE_TOKEN',
  ALREADY_PROCESSED = 'ALREADY_PROCESSED',
  MISSING_LOG_GROUP = 'MISSING_LOG_GROUP',
  MISSING_DESTINATION = 'MISSING_DESTINATION',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  UNEXPECTED_EXCEPTION = 'UNEXPECTED_EXCEPTION',
}

export interface FacadeErrorOptions {
  reason: ReasonCode
  functionName: string
  destination: string
  detail: string
  retryable?: boolean
  cause?: unknown
}

const RETRYABLE_REASONS: ReadonlySet<ReasonCode> = new Set([
  ReasonCode.THROTTLING,
  ReasonCode.ABORTED,
  ReasonCode.INVALID_SEQUENCE_TOKEN,
])

export class FacadeError extends Error {
  public readonly reason: ReasonCode
  public readonly retryable: boolean
  public readonly functionName: string

  constructor(options: FacadeErrorOptions) {
    super(`${options.functionName}(${options.destination}): ${options.detail}`, { cause: options.cause })

    this.name = 'FacadeError'
    this.reason = options.reason
    this.retryable = options.retryable ?? RETRYABLE_REASONS.has(options.reason)
    this.functionName = options.functionName

    Error.captureStackTrace(this, this.constructor)
    Object.setPrototypeOf(this, FacadeError.prototype)
  }
}

export function isFacadeError(error: unknown): error is FacadeError {
  return error instanceof FacadeError
}

export function hasReason(error: unknown, ...reasons: ReasonCode[]): error is FacadeError {
  return isFacadeError(error) && reasons.includes(error.reason)
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Wraps anything a facade did not classify, keeping the original as the cause.
 */
export const unexpectedError = (functionName: string, destination: string, cause: unknown) =>
  new FacadeError({
    reason: ReasonCode.UNEXPECTED_EXCEPTION,
    functionName,
    destination,
    detail: `unexpected exception: ${errorMessage(cause)}`,
    cause,
  })

export const invalidConfiguration = (functionName: string, destination: string, detail: string, cause?: unknown) =>
  new FacadeError({
    reason: ReasonCode.INVALID_CONFIGURATION,
    functionName,
    destination,
    detail,
    cause,
  })
