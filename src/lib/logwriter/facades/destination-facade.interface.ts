/**
 * Destination Facade Interface
 *
 * The contract between a writer's dispatch loop and one backend service.
 * Implementations are a closed set, told apart by `kind`.
 */

import type { LogMessage } from '../log-message.js'
import type { DestinationKind } from '../types.js'

/**
 * Interface for log destinations
 *
 * All implementations must:
 * - Translate every SDK exception into a FacadeError
 * - Treat "already exists" from a concurrent create as success
 * - Return unsent messages from send() in their original order
 */
export interface DestinationFacade {
  readonly kind: DestinationKind

  /**
   * Human-readable destination name, reported in statistics
   */
  readonly destinationName: string

  /**
   * Largest message body (in bytes) the destination accepts
   */
  readonly maxMessageSize: number

  /**
   * Verify that the destination exists, creating it if configured to do so.
   *
   * @returns false if the configuration can never work (bad name, bad retention)
   * @throws FacadeError for anything else that prevents the writer from starting
   */
  ensureDestinationAvailable(): Promise<boolean>

  /**
   * The message's contribution to a batch's size, including per-message overhead
   */
  effectiveSize(message: LogMessage): number

  /**
   * Whether a batch of this many bytes and messages is acceptable
   */
  withinServiceLimits(batchBytes: number, numMessages: number): boolean

  /**
   * Send a batch.
   *
   * @returns the messages that were rejected and must be retried, in order
   * @throws FacadeError for failures that affect the whole batch
   */
  send(batch: readonly LogMessage[]): Promise<LogMessage[]>

  /**
   * Release the SDK client. Safe to call more than once.
   */
  shutdown(): void
}
