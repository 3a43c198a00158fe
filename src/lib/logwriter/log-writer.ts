/**
 * Log Writer
 *
 * Owns a message queue and a destination facade. Producers call
 * `addMessage()`; a single background loop drains the queue into batches that
 * respect the destination's limits and sends them, retrying transient
 * failures and requeueing whatever could not be delivered.
 *
 * Lifecycle: UNINITIALIZED -> READY -> RUNNING -> STOPPING -> STOPPED, or
 * UNINITIALIZED -> FAILED when the destination cannot be set up. A failed
 * writer discards everything it is given.
 *
 * In synchronous mode there is no background loop: each `addMessage()` sends
 * its message before resolving. Batch processing is serialized by a mutex in
 * both modes.
 */

import { AsyncMutex, Latch, settlesWithin } from './async-primitives.js'
import type { DestinationFacade } from './facades/destination-facade.interface.js'
import type { LogMessage } from './log-message.js'
import { MessageQueue } from './message-queue.js'
import { RetryManager } from './retry-manager.js'
import { DiscardAction, WriterState, type ILogWriter } from './types.js'
import type { CommonWriterConfig } from './writer-config.js'
import { WriterStatistics } from './writer-statistics.js'
import { ReasonCode, errorMessage, hasReason } from '../errors.js'
import { debug, error as logError, info, warn } from '../logger.js'

export interface LogWriterOptions {
  config: Readonly<CommonWriterConfig>
  facade: DestinationFacade
  statistics?: WriterStatistics
  /** Defaults to one built from the config's retry delays */
  retryManager?: RetryManager
  /** Re-raises a signal once the writer has stopped; replaceable for tests */
  killProcess?: (signal: NodeJS.Signals) => void
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT']

function killCurrentProcess(signal: NodeJS.Signals): void {
  process.kill(process.pid, signal)
}

export class LogWriter implements ILogWriter {
  readonly facade: DestinationFacade
  readonly statistics: WriterStatistics
  readonly messageQueue: MessageQueue

  private config: Readonly<CommonWriterConfig>
  private readonly retryManager: RetryManager
  private readonly batchLock = new AsyncMutex()

  private currentState = WriterState.UNINITIALIZED
  private initialization: Promise<boolean> | null = null
  private runPromise: Promise<void> | null = null
  private readonly initialized = new Latch()
  private readonly stopRequested = new Latch()
  private readonly stopped = new Latch()

  private shutdownTime = Number.POSITIVE_INFINITY
  // replaced after every abort so that later waits are not turned into polls
  private waitController = new AbortController()
  private batches = 0
  private shutdownHookInstalled = false

  private readonly killProcess: (signal: NodeJS.Signals) => void

  private readonly exitHook = () => {
    this.stop()
  }

  // our listener suppresses the default exit, so raise the signal again once stopped
  private readonly signalHook = (signal: NodeJS.Signals) => {
    this.stop()
    void this.stopped.promise.then(() => {
      if (process.listenerCount(signal) === 0) {
        this.killProcess(signal)
      }
    })
  }

  constructor(options: LogWriterOptions) {
    this.config = Object.freeze({ ...options.config })
    this.facade = options.facade
    this.killProcess = options.killProcess ?? killCurrentProcess
    this.statistics = options.statistics ?? new WriterStatistics()
    this.retryManager =
      options.retryManager ??
      new RetryManager({ initialDelay: this.config.retryInitialDelay, maxDelay: this.config.retryMaxDelay })

    this.messageQueue = new MessageQueue(this.config.discardThreshold, this.config.discardAction)
    this.statistics.setMessageQueue(this.messageQueue)
  }

  get state(): WriterState {
    return this.currentState
  }

  get isRunning(): boolean {
    return this.currentState === WriterState.RUNNING
  }

  /**
   * Number of non-empty batches processed so far.
   */
  get batchCount(): number {
    return this.batches
  }

  get batchDelay(): number {
    return this.config.batchDelay
  }

  getConfig(): Readonly<CommonWriterConfig> {
    return this.config
  }

  async addMessage(message: LogMessage): Promise<void> {
    const prepared = this.prepareMessage(message)
    if (!prepared) return

    this.messageQueue.enqueue(prepared)

    if (this.config.synchronousMode && this.isRunning) {
      await this.processBatch(Date.now())
    }
  }

  setBatchDelay(value: number): void {
    this.config = Object.freeze({ ...this.config, batchDelay: value })
  }

  setDiscardThreshold(value: number): void {
    this.config = Object.freeze({ ...this.config, discardThreshold: value })
    this.messageQueue.setDiscardThreshold(value)
  }

  setDiscardAction(value: DiscardAction): void {
    this.config = Object.freeze({ ...this.config, discardAction: value })
    this.messageQueue.setDiscardAction(value)
  }

  /**
   * Verifies the destination. Safe to call more than once; later calls return
   * the first call's result.
   */
  initialize(): Promise<boolean> {
    if (!this.initialization) {
      this.initialization = this.runInitialization()
    }
    return this.initialization
  }

  async waitUntilInitialized(millisToWait: number): Promise<boolean> {
    return settlesWithin(this.initialized.promise, millisToWait)
  }

  /**
   * Initializes the writer (if needed) and starts the dispatch loop in the
   * background. Calling it again has no effect.
   */
  start(): void {
    if (this.runPromise || this.currentState === WriterState.STOPPED) return

    this.runPromise = this.run().catch((err: unknown) => {
      // run() handles its own errors; reaching this is a bug
      this.reportError(`dispatch loop terminated: ${errorMessage(err)}`, err)
      this.cleanup()
    })
  }

  /**
   * Asks the writer to stop. Messages already queued get one more batch
   * delay to be sent. Returns immediately. A writer that was never started
   * stops at once, leaving its queue as it is.
   */
  stop(): void {
    if (this.currentState === WriterState.STOPPED) return
    if (this.currentState === WriterState.FAILED) {
      if (!this.runPromise) this.stopped.release()
      return
    }

    this.shutdownTime = Date.now() + this.config.batchDelay
    if (this.currentState === WriterState.RUNNING) {
      this.currentState = WriterState.STOPPING
    }

    debug('log writer stop requested', {
      event: 'LogWriterStopping',
      metadata: { destination: this.facade.destinationName, queued: this.messageQueue.size },
    })

    this.stopRequested.release()
    this.interruptWait()

    if (!this.runPromise) {
      this.cleanup()
    }
  }

  async waitUntilStopped(millisToWait: number): Promise<boolean> {
    return settlesWithin(this.stopped.promise, millisToWait)
  }

  /**
   * Builds one batch and sends it. Waits until `waitUntil` (epoch millis) for
   * the first message. Resolves true if the batch made progress, that is, if
   * not every message in it had to be requeued.
   */
  async processBatch(waitUntil: number): Promise<boolean> {
    return this.batchLock.runExclusive(async () => {
      const batch = await this.buildBatch(waitUntil)
      if (batch.length === 0) return false

      this.batches++
      const failures = await this.sendBatch(batch)
      this.messageQueue.requeueAll(failures)
      return failures.length < batch.length
    })
  }

  private async run(): Promise<void> {
    info('log writer starting', {
      event: 'LogWriterStarting',
      metadata: { destination: this.facade.destinationName, synchronous: this.config.synchronousMode },
    })

    if (!(await this.initialize())) {
      this.stopped.release()
      return
    }

    this.installShutdownHook()
    this.currentState = this.stopRequested.isReleased ? WriterState.STOPPING : WriterState.RUNNING

    if (this.config.synchronousMode) {
      // producers do the sending once we are running; flush what arrived before that
      await this.drainQueue()
      await this.stopRequested.promise
      await this.drainQueue()
    } else {
      let progress: boolean
      do {
        progress = await this.processBatchSafely(this.shutdownTime)
      } while (this.keepRunning(progress))
    }

    if (!this.messageQueue.isEmpty()) {
      warn(`log writer stopped with ${this.messageQueue.size} unsent messages`, {
        event: 'LogWriterUnsentMessages',
        metadata: { destination: this.facade.destinationName },
      })
    }

    this.cleanup()
  }

  private async processBatchSafely(waitUntil: number): Promise<boolean> {
    try {
      return await this.processBatch(waitUntil)
    } catch (err) {
      this.reportError(`unexpected error in dispatch loop: ${errorMessage(err)}`, err)
      return false
    }
  }

  private async drainQueue(): Promise<void> {
    let progress = true
    while (progress && !this.messageQueue.isEmpty()) {
      progress = await this.processBatchSafely(Date.now())
    }
  }

  private keepRunning(lastBatchProgressed: boolean): boolean {
    if (this.shutdownTime > Date.now()) return true
    if (this.messageQueue.isEmpty()) return false
    // past the deadline, a destination that accepts nothing would keep us here forever
    return lastBatchProgressed
  }

  private async runInitialization(): Promise<boolean> {
    let success = false

    try {
      success = await this.facade.ensureDestinationAvailable()
      if (!success) {
        this.reportError(`unable to configure destination: ${this.facade.destinationName}`)
      }
    } catch (err) {
      this.reportError(`exception in initializer: ${errorMessage(err)}`, err)
    }

    if (success) {
      this.statistics.actualDestinationName = this.facade.destinationName
      this.currentState = WriterState.READY
      debug('log writer initialization complete', {
        event: 'LogWriterInitialized',
        metadata: { destination: this.facade.destinationName },
      })
    } else {
      this.messageQueue.setDiscardThreshold(0)
      this.messageQueue.setDiscardAction(DiscardAction.oldest)
      this.currentState = WriterState.FAILED
      this.facade.shutdown()
    }

    this.initialized.release()
    return success
  }

  private prepareMessage(message: LogMessage): LogMessage | null {
    if (message.bytes === 0) {
      warn('discarded empty message', {
        event: 'LogWriterEmptyMessage',
        metadata: { destination: this.facade.destinationName },
      })
      return null
    }

    const maxSize = this.facade.maxMessageSize
    if (message.bytes <= maxSize) return message

    this.statistics.oversizeMessages++

    if (this.config.truncateOversizeMessages) {
      warn(`truncated oversize message (${message.bytes} bytes)`, {
        event: 'LogWriterOversizeMessage',
        metadata: { destination: this.facade.destinationName, maxSize },
      })
      return message.truncate(maxSize)
    }

    warn(`discarded oversize message (${message.bytes} bytes)`, {
      event: 'LogWriterOversizeMessage',
      metadata: { destination: this.facade.destinationName, maxSize },
    })
    return null
  }

  private async buildBatch(waitUntil: number): Promise<LogMessage[]> {
    // one read per batch: setters replace the object, never mutate it
    const config = this.config

    const first = await this.waitForMessage(waitUntil)
    if (!first) return []

    const batchTimeout = config.synchronousMode ? Date.now() : Date.now() + config.batchDelay
    const batch = [first]
    let batchBytes = this.facade.effectiveSize(first)

    for (;;) {
      const message = await this.waitForMessage(batchTimeout)
      if (!message) break

      const size = this.facade.effectiveSize(message)
      if (!this.facade.withinServiceLimits(batchBytes + size, batch.length + 1)) {
        this.messageQueue.requeue(message)
        break
      }

      batch.push(message)
      batchBytes += size
    }

    return batch
  }

  private waitForMessage(waitUntil: number): Promise<LogMessage | null> {
    return this.messageQueue.dequeue(waitUntil - Date.now(), this.waitController.signal)
  }

  private interruptWait(): void {
    const controller = this.waitController
    this.waitController = new AbortController()
    controller.abort()
  }

  /**
   * Sends a batch through the retry manager. Returns the messages that have
   * to go back on the queue.
   */
  private async sendBatch(batch: LogMessage[]): Promise<LogMessage[]> {
    const config = this.config
    const destination = this.facade.destinationName

    let throttled = false
    const send = () =>
      this.retryManager.invoke(() => this.facade.send(batch), {
        maxAttempts: config.sendRetryAttempts,
        timeoutMs: config.sendRetryTimeout,
        isRetryable: (err) => {
          if (hasReason(err, ReasonCode.THROTTLING)) {
            throttled = true
            return true
          }
          return hasReason(err, ReasonCode.ABORTED)
        },
      })

    let result = await send()
    if (!result.ok && hasReason(result.error, ReasonCode.INVALID_SEQUENCE_TOKEN)) {
      // another writer got there first; the facade re-reads the token
      this.statistics.writerRaceRetries++
      result = await send()
    }

    if (throttled) {
      this.statistics.throttledWrites++
    }

    if (result.ok) {
      const failures = result.value
      this.statistics.updateMessagesSent(batch.length - failures.length)
      this.statistics.updateMessagesRequeued(failures.length)
      return failures
    }

    const err = result.error
    this.statistics.updateMessagesSent(0)

    if (hasReason(err, ReasonCode.ALREADY_PROCESSED)) {
      warn(`batch already processed; discarding ${batch.length} messages`, {
        event: 'LogWriterBatchAlreadyProcessed',
        metadata: { destination },
      })
      this.statistics.updateMessagesRequeued(0)
      return []
    }

    this.statistics.updateMessagesRequeued(batch.length)

    if (hasReason(err, ReasonCode.THROTTLING)) {
      warn(`batch throttled; requeueing ${batch.length} messages`, {
        event: 'LogWriterBatchThrottled',
        metadata: { destination, attempts: result.attempts },
      })
    } else if (hasReason(err, ReasonCode.ABORTED)) {
      warn(`batch aborted; requeueing ${batch.length} messages`, {
        event: 'LogWriterBatchAborted',
        metadata: { destination, attempts: result.attempts },
      })
    } else if (hasReason(err, ReasonCode.INVALID_SEQUENCE_TOKEN)) {
      this.statistics.unrecoveredWriterRaceRetries++
      warn(`sequence token race not resolved; requeueing ${batch.length} messages`, {
        event: 'LogWriterWriterRace',
        metadata: { destination },
      })
    } else if (hasReason(err, ReasonCode.MISSING_LOG_GROUP, ReasonCode.MISSING_DESTINATION)) {
      this.reportError(err.message, err)
      await this.recoverDestination()
    } else {
      this.reportError(`failed to send batch: ${errorMessage(err)}`, err)
    }

    return batch
  }

  /**
   * The destination disappeared after the writer started; try to recreate it.
   * Another failure leaves the messages queued for the next batch.
   */
  private async recoverDestination(): Promise<void> {
    try {
      if (!(await this.facade.ensureDestinationAvailable())) {
        this.reportError(`unable to configure destination: ${this.facade.destinationName}`)
      }
    } catch (err) {
      this.reportError(`unable to recreate destination: ${errorMessage(err)}`, err)
    }
  }

  private reportError(message: string, err?: unknown): void {
    logError(message, {
      event: 'LogWriterError',
      metadata: { destination: this.facade.destinationName },
      err,
    })
    this.statistics.setLastError(message, err)
  }

  private installShutdownHook(): void {
    if (!this.config.useShutdownHook || this.shutdownHookInstalled) return

    process.on('beforeExit', this.exitHook)
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, this.signalHook)
    }
    this.shutdownHookInstalled = true
  }

  private removeShutdownHook(): void {
    if (!this.shutdownHookInstalled) return

    process.off('beforeExit', this.exitHook)
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, this.signalHook)
    }
    this.shutdownHookInstalled = false
  }

  private cleanup(): void {
    this.removeShutdownHook()
    this.facade.shutdown()
    this.currentState = WriterState.STOPPED
    this.stopped.release()

    info('log writer stopped', {
      event: 'LogWriterStopped',
      metadata: {
        destination: this.facade.destinationName,
        batches: this.batches,
        messagesSent: this.statistics.messagesSent,
      },
    })
  }
}
