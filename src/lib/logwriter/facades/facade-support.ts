/**
 * Helpers shared by the AWS destination facades.
 */

import type { AWSClientConfig } from '../../../config/aws.js'
import { FacadeError, ReasonCode, hasReason } from '../../errors.js'
import type { RetryManager } from '../retry-manager.js'

export interface FacadeOptions<TClient> {
  /** Used for create-and-wait operations during initialization */
  retryManager: RetryManager
  /** Time budget for each create-or-wait step */
  initializationTimeout: number
  /** SDK client configuration; ignored when `client` is given */
  clientConfig?: AWSClientConfig
  /** Pre-built SDK client (tests inject one) */
  client?: TClient
}

/**
 * SDK v3 exceptions carry the service's error code as their name.
 */
export function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined
}

export function isTransient(error: unknown): boolean {
  return hasReason(error, ReasonCode.THROTTLING, ReasonCode.ABORTED)
}

/**
 * Unwraps a retry result inside initialization code, where a failure should
 * propagate to the writer's initializer.
 */
export async function invokeWithRetry<T>(
  retryManager: RetryManager,
  timeoutMs: number,
  operation: () => Promise<T>
): Promise<T> {
  const result = await retryManager.invoke(operation, { isRetryable: isTransient, timeoutMs })
  if (result.ok) return result.value
  throw result.error
}

export function timedOut(functionName: string, destination: string, what: string): FacadeError {
  return new FacadeError({
    reason: ReasonCode.UNEXPECTED_EXCEPTION,
    functionName,
    destination,
    detail: `timed out waiting for ${what}`,
  })
}
