/**
 * Writer Statistics
 *
 * Counters and last-error state for one writer. Only the writer updates them;
 * monitoring reads them through `snapshot()` with no ordering guarantee
 * relative to a batch that is in flight.
 */

import type { MessageQueue } from './message-queue.js'

export interface LastError {
  message: string
  timestamp: Date
  stacktrace: string[] | null
}

export interface WriterStatisticsSnapshot {
  actualDestinationName: string | null
  messagesSent: number
  messagesSentLastBatch: number
  messagesRequeued: number
  messagesRequeuedLastBatch: number
  messagesDiscarded: number
  oversizeMessages: number
  throttledWrites: number
  writerRaceRetries: number
  unrecoveredWriterRaceRetries: number
  lastError: {
    message: string
    timestamp: string
    stacktrace: string[] | null
  } | null
}

export class WriterStatistics {
  private messageQueue: MessageQueue | null = null

  actualDestinationName: string | null = null
  messagesSent = 0
  messagesSentLastBatch = 0
  messagesRequeued = 0
  messagesRequeuedLastBatch = 0
  oversizeMessages = 0
  /** Batches that hit throttling at least once */
  throttledWrites = 0
  /** Sends rejected because another writer used the sequence token first */
  writerRaceRetries = 0
  /** Batches requeued because the sequence-token race was not resolved by a retry */
  unrecoveredWriterRaceRetries = 0
  lastError: LastError | null = null

  setMessageQueue(queue: MessageQueue): void {
    this.messageQueue = queue
  }

  get messagesDiscarded(): number {
    return this.messageQueue?.droppedMessageCount ?? 0
  }

  updateMessagesSent(count: number): void {
    this.messagesSent += count
    this.messagesSentLastBatch = count
  }

  updateMessagesRequeued(count: number): void {
    this.messagesRequeued += count
    this.messagesRequeuedLastBatch = count
  }

  setLastError(message: string, error?: unknown): void {
    this.lastError = {
      message,
      timestamp: new Date(),
      stacktrace: error instanceof Error && error.stack ? error.stack.split('\n').map((line) => line.trim()) : null,
    }
  }

  snapshot(): WriterStatisticsSnapshot {
    return {
      actualDestinationName: this.actualDestinationName,
      messagesSent: this.messagesSent,
      messagesSentLastBatch: this.messagesSentLastBatch,
      messagesRequeued: this.messagesRequeued,
      messagesRequeuedLastBatch: this.messagesRequeuedLastBatch,
      messagesDiscarded: this.messagesDiscarded,
      oversizeMessages: this.oversizeMessages,
      throttledWrites: this.throttledWrites,
      writerRaceRetries: this.writerRaceRetries,
      unrecoveredWriterRaceRetries: this.unrecoveredWriterRaceRetries,
      lastError: this.lastError
        ? {
            message: this.lastError.message,
            timestamp: this.lastError.timestamp.toISOString(),
            stacktrace: this.lastError.stacktrace,
          }
        : null,
    }
  }
}
