import { describe, it, expect } from 'vitest'
import { WriterStatistics } from '../../../src/lib/logwriter/writer-statistics.js'
import { MessageQueue } from '../../../src/lib/logwriter/message-queue.js'
import { LogMessage } from '../../../src/lib/logwriter/log-message.js'
import { DiscardAction } from '../../../src/lib/logwriter/types.js'

describe('WriterStatistics', () => {
  it('should accumulate totals and remember the last batch', () => {
    const stats = new WriterStatistics()

    stats.updateMessagesSent(5)
    stats.updateMessagesSent(3)
    stats.updateMessagesRequeued(2)

    expect(stats.messagesSent).toBe(8)
    expect(stats.messagesSentLastBatch).toBe(3)
    expect(stats.messagesRequeued).toBe(2)
    expect(stats.messagesRequeuedLastBatch).toBe(2)
  })

  it('should read discarded messages from the queue', () => {
    const stats = new WriterStatistics()
    const queue = new MessageQueue(1, DiscardAction.newest)
    stats.setMessageQueue(queue)

    queue.enqueue(new LogMessage(0, 'kept'))
    queue.enqueue(new LogMessage(0, 'dropped'))

    expect(stats.messagesDiscarded).toBe(1)
  })

  it('should record the last error with its stack trace', () => {
    const stats = new WriterStatistics()
    const error = new Error('boom')

    stats.setLastError('failed to send batch: boom', error)

    expect(stats.lastError?.message).toBe('failed to send batch: boom')
    expect(stats.lastError?.stacktrace?.[0]).toBe('Error: boom')
  })

  it('should record an error without a stack trace', () => {
    const stats = new WriterStatistics()

    stats.setLastError('unable to configure destination: logs')

    expect(stats.lastError?.stacktrace).toBeNull()
  })

  it('should produce a JSON-friendly snapshot', () => {
    const stats = new WriterStatistics()
    stats.actualDestinationName = 'group/stream'
    stats.oversizeMessages = 1
    stats.setLastError('failed')

    const snapshot = stats.snapshot()

    expect(snapshot).toMatchObject({
      actualDestinationName: 'group/stream',
      messagesSent: 0,
      messagesDiscarded: 0,
      oversizeMessages: 1,
      throttledWrites: 0,
      writerRaceRetries: 0,
      unrecoveredWriterRaceRetries: 0,
      lastError: { message: 'failed', stacktrace: null },
    })
    expect(typeof snapshot.lastError?.timestamp).toBe('string')
  })
})
