/**
 * Message Queue
 *
 * Bounded FIFO between producers and a writer's dispatch loop. Producers never
 * wait: when the queue is full the discard action decides which message goes.
 * The dispatch loop waits on `dequeue()`, which can be cut short through an
 * AbortSignal when the writer is stopped.
 */

import type { LogMessage } from './log-message.js'
import { DiscardAction } from './types.js'
import { warn } from '../logger.js'

interface Waiter {
  resolve: (message: LogMessage | null) => void
  cleanup: () => void
}

// setTimeout cannot represent longer delays; anything beyond is "forever"
const MAX_TIMER_DELAY = 2_147_483_647

export class MessageQueue {
  private messages: LogMessage[] = []
  private waiters: Waiter[] = []
  private discardThreshold: number
  private discardAction: DiscardAction
  private droppedMessages = 0
  private overflowing = false

  constructor(discardThreshold: number, discardAction: DiscardAction) {
    this.discardThreshold = discardThreshold
    this.discardAction = discardAction
  }

  get size(): number {
    return this.messages.length
  }

  isEmpty(): boolean {
    return this.messages.length === 0
  }

  /**
   * Total number of messages dropped by the discard policy.
   */
  get droppedMessageCount(): number {
    return this.droppedMessages
  }

  getDiscardThreshold(): number {
    return this.discardThreshold
  }

  getDiscardAction(): DiscardAction {
    return this.discardAction
  }

  setDiscardThreshold(value: number): void {
    this.discardThreshold = Math.max(0, value)
    this.trimToThreshold()
  }

  setDiscardAction(value: DiscardAction): void {
    this.discardAction = value
  }

  enqueue(message: LogMessage): void {
    if (this.discardThreshold === 0) {
      this.droppedMessages++
      return
    }

    if (this.messages.length >= this.discardThreshold) {
      switch (this.discardAction) {
        case DiscardAction.oldest:
          while (this.messages.length >= this.discardThreshold) {
            this.messages.shift()
            this.droppedMessages++
          }
          break
        case DiscardAction.none:
          if (!this.overflowing) {
            this.overflowing = true
            warn('message queue overflow; dropping new messages', {
              event: 'MessageQueueOverflow',
              metadata: { threshold: this.discardThreshold },
            })
          }
          this.droppedMessages++
          return
        case DiscardAction.newest:
          this.droppedMessages++
          return
      }
    }

    this.overflowing = false
    this.messages.push(message)
    this.wakeWaiter()
  }

  /**
   * Puts a message back at the head of the queue. If the queue has filled up
   * in the meantime the discard action still applies, so the threshold holds.
   */
  requeue(message: LogMessage): void {
    if (this.discardThreshold === 0) {
      this.droppedMessages++
      return
    }

    if (this.messages.length >= this.discardThreshold) {
      this.droppedMessages++
      if (this.discardAction === DiscardAction.oldest) {
        // the requeued message is the oldest one
        return
      }
      this.messages.pop()
    }

    this.messages.unshift(message)
    this.wakeWaiter()
  }

  /**
   * Requeues a list of messages so that the first one ends up at the head.
   */
  requeueAll(messages: readonly LogMessage[]): void {
    for (let i = messages.length - 1; i >= 0; i--) {
      this.requeue(messages[i])
    }
  }

  /**
   * Removes and returns the head of the queue, waiting up to `waitMillis` for
   * one to arrive. A non-finite wait only ends when a message arrives or the
   * signal aborts. Resolves null on timeout or abort.
   */
  dequeue(waitMillis: number, signal?: AbortSignal): Promise<LogMessage | null> {
    const head = this.messages.shift()
    if (head) {
      return Promise.resolve(head)
    }

    if (!(waitMillis > 0) || signal?.aborted) {
      return Promise.resolve(null)
    }

    return new Promise<LogMessage | null>((resolve) => {
      let timer: NodeJS.Timeout | undefined

      const onAbort = () => {
        this.removeWaiter(waiter)
        waiter.cleanup()
        resolve(null)
      }

      const waiter: Waiter = {
        resolve,
        cleanup: () => {
          if (timer) clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
        },
      }

      if (Number.isFinite(waitMillis) && waitMillis <= MAX_TIMER_DELAY) {
        timer = setTimeout(() => {
          this.removeWaiter(waiter)
          waiter.cleanup()
          resolve(null)
        }, waitMillis)
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /**
   * Returns a copy of the queued messages, head first.
   */
  toArray(): LogMessage[] {
    return [...this.messages]
  }

  private wakeWaiter(): void {
    const waiter = this.waiters.shift()
    if (!waiter) return

    const message = this.messages.shift()
    waiter.cleanup()
    waiter.resolve(message ?? null)
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter)
    if (index >= 0) this.waiters.splice(index, 1)
  }

  private trimToThreshold(): void {
    while (this.messages.length > this.discardThreshold) {
      if (this.discardAction === DiscardAction.oldest) {
        this.messages.shift()
      } else {
        this.messages.pop()
      }
      this.droppedMessages++
    }
  }
}
