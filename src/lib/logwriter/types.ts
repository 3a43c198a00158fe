/**
 * Log Writer Types
 *
 * Shared enums and contracts for the asynchronous log writers.
 */

import type { LogMessage } from './log-message.js'

/**
 * What the message queue does with a new message when it is full.
 */
export enum DiscardAction {
  /** Refuse growth: the incoming message is dropped and counted as an overflow */
  none = 'none',
  /** Drop from the head of the queue to make room */
  oldest = 'oldest',
  /** Drop the incoming message */
  newest = 'newest',
}

export enum WriterState {
  UNINITIALIZED = 'UNINITIALIZED',
  READY = 'READY',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  STOPPED = 'STOPPED',
  FAILED = 'FAILED',
}

export type DestinationKind = 'cloudwatch' | 'kinesis' | 'sns'

/**
 * Producer-facing writer contract.
 *
 * This is what a logging framework integration holds on to; everything else
 * about a writer is an implementation detail.
 */
export interface ILogWriter {
  /**
   * Queue a message for delivery. In synchronous mode the returned promise
   * settles once the message has been sent (or requeued); otherwise it
   * resolves immediately.
   */
  addMessage(message: LogMessage): Promise<void>

  setBatchDelay(value: number): void
  setDiscardThreshold(value: number): void
  setDiscardAction(value: DiscardAction): void

  /**
   * Verify (and if configured, create) the destination. Returns false if the
   * writer cannot run.
   */
  initialize(): Promise<boolean>
  waitUntilInitialized(millisToWait: number): Promise<boolean>

  stop(): void
  waitUntilStopped(millisToWait: number): Promise<boolean>

  readonly isRunning: boolean
}
