import { describe, it, expect, vi } from 'vitest'
import { MessageQueue } from '../../../src/lib/logwriter/message-queue.js'
import { LogMessage } from '../../../src/lib/logwriter/log-message.js'
import { DiscardAction } from '../../../src/lib/logwriter/types.js'
import { warn } from '../../../src/lib/logger.js'

vi.mock('../../../src/lib/logger.js', () => ({
  debug: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
}))

function fill(queue: MessageQueue, texts: string[]): void {
  for (const text of texts) {
    queue.enqueue(new LogMessage(0, text))
  }
}

function contents(queue: MessageQueue): string[] {
  return queue.toArray().map((message) => message.message)
}

describe('MessageQueue', () => {
  describe('enqueue', () => {
    it('should keep messages in FIFO order', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      fill(queue, ['a', 'b', 'c'])

      expect(queue.size).toBe(3)
      expect((await queue.dequeue(0))?.message).toBe('a')
      expect((await queue.dequeue(0))?.message).toBe('b')
      expect(contents(queue)).toEqual(['c'])
    })

    it('should drop the oldest messages when full', () => {
      const queue = new MessageQueue(3, DiscardAction.oldest)
      fill(queue, ['a', 'b', 'c', 'd', 'e'])

      expect(contents(queue)).toEqual(['c', 'd', 'e'])
      expect(queue.droppedMessageCount).toBe(2)
    })

    it('should drop the newest message when full', () => {
      const queue = new MessageQueue(3, DiscardAction.newest)
      fill(queue, ['a', 'b', 'c', 'd', 'e'])

      expect(contents(queue)).toEqual(['a', 'b', 'c'])
      expect(queue.droppedMessageCount).toBe(2)
    })

    it('should refuse growth and warn once per overflow with action none', () => {
      const queue = new MessageQueue(2, DiscardAction.none)
      fill(queue, ['a', 'b', 'c', 'd'])

      expect(contents(queue)).toEqual(['a', 'b'])
      expect(queue.droppedMessageCount).toBe(2)
      expect(warn).toHaveBeenCalledTimes(1)
      expect(warn).toHaveBeenCalledWith('message queue overflow; dropping new messages', {
        event: 'MessageQueueOverflow',
        metadata: { threshold: 2 },
      })
    })

    it('should discard everything with a threshold of zero', () => {
      const queue = new MessageQueue(0, DiscardAction.oldest)
      fill(queue, ['a', 'b'])

      expect(queue.isEmpty()).toBe(true)
      expect(queue.droppedMessageCount).toBe(2)
    })

    it('should never exceed the threshold', () => {
      for (const action of [DiscardAction.none, DiscardAction.oldest, DiscardAction.newest]) {
        const queue = new MessageQueue(5, action)
        for (let i = 0; i < 50; i++) {
          queue.enqueue(new LogMessage(i, `m${i}`))
          expect(queue.size).toBeLessThanOrEqual(5)
        }
        expect(queue.droppedMessageCount).toBe(45)
      }
    })
  })

  describe('requeue', () => {
    it('should put messages back at the head', () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      fill(queue, ['c'])

      queue.requeue(new LogMessage(0, 'b'))

      expect(contents(queue)).toEqual(['b', 'c'])
    })

    it('should preserve the order of a requeued list', () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      fill(queue, ['d'])

      queue.requeueAll([new LogMessage(0, 'a'), new LogMessage(0, 'b'), new LogMessage(0, 'c')])

      expect(contents(queue)).toEqual(['a', 'b', 'c', 'd'])
    })

    it('should drop the requeued message itself when full with action oldest', () => {
      const queue = new MessageQueue(2, DiscardAction.oldest)
      fill(queue, ['b', 'c'])

      queue.requeue(new LogMessage(0, 'a'))

      expect(contents(queue)).toEqual(['b', 'c'])
      expect(queue.droppedMessageCount).toBe(1)
    })

    it('should drop from the tail when full with action newest', () => {
      const queue = new MessageQueue(2, DiscardAction.newest)
      fill(queue, ['b', 'c'])

      queue.requeue(new LogMessage(0, 'a'))

      expect(contents(queue)).toEqual(['a', 'b'])
      expect(queue.droppedMessageCount).toBe(1)
    })
  })

  describe('dequeue', () => {
    it('should resolve null immediately when polling an empty queue', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)

      await expect(queue.dequeue(0)).resolves.toBeNull()
      await expect(queue.dequeue(-5)).resolves.toBeNull()
    })

    it('should resolve null when the wait times out', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)

      await expect(queue.dequeue(10)).resolves.toBeNull()
    })

    it('should wake a waiting consumer when a message arrives', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      const pending = queue.dequeue(Number.POSITIVE_INFINITY)

      queue.enqueue(new LogMessage(0, 'hello'))

      expect((await pending)?.message).toBe('hello')
      expect(queue.isEmpty()).toBe(true)
    })

    it('should wake a waiting consumer when a message is requeued', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      const pending = queue.dequeue(1000)

      queue.requeue(new LogMessage(0, 'again'))

      expect((await pending)?.message).toBe('again')
    })

    it('should resolve null when the signal aborts', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      const controller = new AbortController()
      const pending = queue.dequeue(Number.POSITIVE_INFINITY, controller.signal)

      controller.abort()

      await expect(pending).resolves.toBeNull()

      // the aborted waiter must not swallow a later message
      queue.enqueue(new LogMessage(0, 'kept'))
      expect(contents(queue)).toEqual(['kept'])
    })

    it('should poll when the signal is already aborted', async () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      const controller = new AbortController()
      controller.abort()

      await expect(queue.dequeue(Number.POSITIVE_INFINITY, controller.signal)).resolves.toBeNull()

      fill(queue, ['x'])
      expect((await queue.dequeue(Number.POSITIVE_INFINITY, controller.signal))?.message).toBe('x')
    })
  })

  describe('configuration', () => {
    it('should trim from the head when the threshold is lowered with action oldest', () => {
      const queue = new MessageQueue(10, DiscardAction.oldest)
      fill(queue, ['a', 'b', 'c', 'd'])

      queue.setDiscardThreshold(2)

      expect(contents(queue)).toEqual(['c', 'd'])
      expect(queue.getDiscardThreshold()).toBe(2)
      expect(queue.droppedMessageCount).toBe(2)
    })

    it('should trim from the tail when the threshold is lowered with action none', () => {
      const queue = new MessageQueue(10, DiscardAction.none)
      fill(queue, ['a', 'b', 'c', 'd'])

      queue.setDiscardThreshold(1)

      expect(contents(queue)).toEqual(['a'])
    })

    it('should apply a changed discard action to later messages', () => {
      const queue = new MessageQueue(2, DiscardAction.oldest)
      fill(queue, ['a', 'b'])

      queue.setDiscardAction(DiscardAction.newest)
      fill(queue, ['c'])

      expect(contents(queue)).toEqual(['a', 'b'])
      expect(queue.getDiscardAction()).toBe(DiscardAction.newest)
    })
  })
})
