/**
 * Retry Manager
 *
 * Runs an operation until it succeeds, fails with a non-retryable error, or
 * runs out of time (or attempts). The delay between attempts starts at
 * `initialDelay` and either stays there or doubles up to `maxDelay`.
 *
 * An instance holds only its backoff settings, so one manager can be shared
 * by unrelated operations.
 */

export interface RetryManagerOptions {
  /** Delay before the second attempt, in milliseconds */
  initialDelay: number
  /** Upper bound for the delay (default: no bound) */
  maxDelay?: number
  /** Double the delay after each attempt (default: true) */
  exponential?: boolean
  /** Replaceable for tests */
  sleep?: (millis: number) => Promise<void>
  /** Replaceable for tests */
  now?: () => number
}

export interface RetryInvokeOptions {
  /** Decides whether an error is worth another attempt */
  isRetryable: (error: unknown) => boolean
  /** Elapsed-time budget; no attempt starts after it has passed */
  timeoutMs: number
  /** Attempt budget, including the first attempt */
  maxAttempts?: number
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; exhausted: boolean }

export function sleep(millis: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, millis))
}

export class RetryManager {
  private readonly initialDelay: number
  private readonly maxDelay: number
  private readonly exponential: boolean
  private readonly sleep: (millis: number) => Promise<void>
  private readonly now: () => number

  constructor(options: RetryManagerOptions) {
    this.initialDelay = Math.max(0, options.initialDelay)
    this.maxDelay = Math.max(this.initialDelay, options.maxDelay ?? Number.POSITIVE_INFINITY)
    this.exponential = options.exponential ?? true
    this.sleep = options.sleep ?? sleep
    this.now = options.now ?? Date.now
  }

  async invoke<T>(operation: () => Promise<T>, options: RetryInvokeOptions): Promise<RetryResult<T>> {
    const deadline = this.now() + options.timeoutMs
    const maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY

    let delay = this.initialDelay
    let attempts = 0

    for (;;) {
      attempts++
      try {
        const value = await operation()
        return { ok: true, value, attempts }
      } catch (error) {
        if (!options.isRetryable(error)) {
          return { ok: false, error, attempts, exhausted: false }
        }

        if (attempts >= maxAttempts || this.now() + delay > deadline) {
          return { ok: false, error, attempts, exhausted: true }
        }
      }

      await this.sleep(delay)
      if (this.exponential) {
        delay = Math.min(delay * 2, this.maxDelay)
      }
    }
  }

  /**
   * Repeatedly calls `operation` until it returns something other than null or
   * undefined. Used to wait for a just-created resource to become visible.
   * Resolves null if the time budget runs out; errors from the operation are
   * retried only when `isRetryable` says so.
   */
  async waitFor<T>(
    operation: () => Promise<T | null | undefined>,
    timeoutMs: number,
    isRetryable: (error: unknown) => boolean = () => false
  ): Promise<T | null> {
    const result = await this.invoke(
      async () => {
        const value = await operation()
        if (value === null || value === undefined) {
          throw new ResourceNotReadyError()
        }
        return value
      },
      {
        timeoutMs,
        isRetryable: (error) => error instanceof ResourceNotReadyError || isRetryable(error),
      }
    )

    if (result.ok) return result.value
    if (result.error instanceof ResourceNotReadyError) return null
    throw result.error
  }
}

class ResourceNotReadyError extends Error {
  constructor() {
    super('resource not ready')
    this.name = 'ResourceNotReadyError'
  }
}
