import { describe, it, expect, vi, beforeEach } from 'vitest'
import { KinesisFacade } from '../../../src/lib/logwriter/facades/kinesis-facade.js'
import { LogMessage } from '../../../src/lib/logwriter/log-message.js'
import { RetryManager } from '../../../src/lib/logwriter/retry-manager.js'
import { WriterState } from '../../../src/lib/logwriter/types.js'
import { parseKinesisConfig, type KinesisConfigInput } from '../../../src/lib/logwriter/writer-config.js'
import { createLogWriter } from '../../../src/lib/logwriter/writer-factory.js'
import { FacadeError, ReasonCode } from '../../../src/lib/errors.js'
import { logger } from '../../../src/lib/logger.js'
import { fakeKinesis } from '../../helpers/fake-kinesis.js'

vi.mock('@aws-sdk/client-kinesis', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-kinesis')>()
  const { fakeKinesis } = await import('../../helpers/fake-kinesis.js')
  return fakeKinesis.install(actual)
})

const STREAM = 'app-logs'

function noWaitRetryManager(): RetryManager {
  return new RetryManager({ initialDelay: 1, sleep: async () => undefined })
}

function createFacade(overrides: Partial<KinesisConfigInput> = {}): KinesisFacade {
  return new KinesisFacade(parseKinesisConfig({ streamName: STREAM, ...overrides }), {
    retryManager: noWaitRetryManager(),
    initializationTimeout: 1000,
  })
}

async function rejectionOf(promise: Promise<unknown>): Promise<FacadeError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof FacadeError) return err
    throw err
  }
  throw new Error('expected the promise to reject')
}

function messages(count: number): LogMessage[] {
  return Array.from({ length: count }, (_, i) => new LogMessage(i, `message ${i}`))
}

describe('KinesisFacade', () => {
  beforeEach(() => {
    fakeKinesis.reset()
  })

  describe('ensureDestinationAvailable', () => {
    it('should use an active stream', async () => {
      fakeKinesis.addStream(STREAM)
      const facade = createFacade()

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)
      expect(fakeKinesis.calls).toEqual(['DescribeStreamSummary'])
    })

    it('should fail when the stream is missing and auto-create is off', async () => {
      const facade = createFacade()

      const error = await rejectionOf(facade.ensureDestinationAvailable())

      expect(error.reason).toBe(ReasonCode.MISSING_DESTINATION)
      expect(error.message).toBe(
        'ensureDestinationAvailable(app-logs): stream does not exist and auto-create is not enabled'
      )
      expect(fakeKinesis.callCount('CreateStream')).toBe(0)
    })

    it('should create the stream and wait for it to become active', async () => {
      const facade = createFacade({ autoCreate: true, shardCount: 3 })

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)

      const stream = fakeKinesis.streams.get(STREAM)
      expect(stream?.status).toBe('ACTIVE')
      expect(stream?.shardCount).toBe(3)
      // missing, creating, active
      expect(fakeKinesis.callCount('DescribeStreamSummary')).toBe(3)
      expect(fakeKinesis.callCount('IncreaseStreamRetentionPeriod')).toBe(0)
    })

    it('should extend the retention period of a created stream', async () => {
      const facade = createFacade({ autoCreate: true, retentionPeriod: 48 })

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)

      expect(fakeKinesis.streams.get(STREAM)?.retentionHours).toBe(48)
      expect(fakeKinesis.streams.get(STREAM)?.status).toBe('ACTIVE')
      expect(fakeKinesis.callCount('DescribeStreamSummary')).toBe(5)
    })

    it('should leave the default retention period alone', async () => {
      const facade = createFacade({ autoCreate: true, retentionPeriod: 24 })

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)
      expect(fakeKinesis.callCount('IncreaseStreamRetentionPeriod')).toBe(0)
    })

    it('should fail on a retention period Kinesis rejects', async () => {
      const facade = createFacade({ autoCreate: true, retentionPeriod: 9000 })

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(false)
      expect(fakeKinesis.callCount('IncreaseStreamRetentionPeriod')).toBe(1)
    })

    it('should log a configuration error naming the rejected retention period', async () => {
      const errorSpy = vi.spyOn(logger, 'error')
      const facade = createFacade({ autoCreate: true, retentionPeriod: 9000 })

      await facade.ensureDestinationAvailable()

      expect(errorSpy).toHaveBeenCalledWith(
        'setRetentionPeriod(app-logs): invalid retention period: 9000',
        expect.objectContaining({ event: 'KinesisInvalidConfiguration' })
      )
      errorSpy.mockRestore()
    })

    it('should not change the retention period of an existing stream', async () => {
      fakeKinesis.addStream(STREAM)
      const facade = createFacade({ autoCreate: true, retentionPeriod: 48 })

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)
      expect(fakeKinesis.streams.get(STREAM)?.retentionHours).toBe(24)
    })

    it('should wait for a stream that is still being created', async () => {
      fakeKinesis.addStream(STREAM, 'CREATING')
      const facade = createFacade()

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)
      expect(fakeKinesis.callCount('DescribeStreamSummary')).toBe(2)
    })

    it('should treat a concurrently created stream as success', async () => {
      fakeKinesis.addStream(STREAM, 'CREATING')
      const facade = createFacade({ autoCreate: true })

      await expect(facade.createStream()).resolves.toBeUndefined()
    })

    it('should retry a throttled describe', async () => {
      fakeKinesis.addStream(STREAM)
      fakeKinesis.failNext('DescribeStreamSummary', fakeKinesis.throughputExceededError())
      const facade = createFacade()

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(true)
      expect(fakeKinesis.callCount('DescribeStreamSummary')).toBe(2)
    })

    it.each([
      [{ streamName: 'bad name' }],
      [{ streamName: '' }],
      [{ partitionKey: 'k'.repeat(257) }],
    ])('should reject invalid settings without calling Kinesis: %o', async (overrides) => {
      const facade = createFacade(overrides)

      await expect(facade.ensureDestinationAvailable()).resolves.toBe(false)
      expect(fakeKinesis.calls).toEqual([])
    })
  })

  describe('limits', () => {
    it('should count a random partition key against each record', () => {
      const facade = createFacade()

      expect(facade.effectiveSize(new LogMessage(0, 'hello'))).toBe(41)
      expect(facade.maxMessageSize).toBe(1_048_540)
    })

    it('should count a configured partition key against each record', () => {
      const facade = createFacade({ partitionKey: 'fixed' })

      expect(facade.effectiveSize(new LogMessage(0, 'hello'))).toBe(10)
      expect(facade.maxMessageSize).toBe(1_048_571)
    })

    it('should enforce the byte and record limits', () => {
      const facade = createFacade()

      expect(facade.withinServiceLimits(5 * 1024 * 1024, 500)).toBe(true)
      expect(facade.withinServiceLimits(5 * 1024 * 1024 + 1, 1)).toBe(false)
      expect(facade.withinServiceLimits(100, 501)).toBe(false)
    })
  })

  describe('send', () => {
    beforeEach(() => {
      fakeKinesis.addStream(STREAM)
    })

    it('should write one record per message with random partition keys', async () => {
      const facade = createFacade()

      await expect(facade.send(messages(3))).resolves.toEqual([])

      const records = fakeKinesis.streams.get(STREAM)?.records ?? []
      expect(records.map((record) => record.data)).toEqual(['message 0', 'message 1', 'message 2'])
      for (const record of records) {
        expect(record.partitionKey).toHaveLength(36)
      }
      expect(new Set(records.map((record) => record.partitionKey)).size).toBe(3)
    })

    it('should use the configured partition key', async () => {
      const facade = createFacade({ partitionKey: 'fixed' })

      await facade.send(messages(2))

      expect(fakeKinesis.streams.get(STREAM)?.records.map((record) => record.partitionKey)).toEqual([
        'fixed',
        'fixed',
      ])
    })

    it('should return the records Kinesis rejected', async () => {
      const facade = createFacade()
      const batch = messages(4)
      fakeKinesis.rejectRecordsNext([1, 3])

      const failures = await facade.send(batch)

      expect(failures).toEqual([batch[1], batch[3]])
      expect(fakeKinesis.streams.get(STREAM)?.records.map((record) => record.data)).toEqual([
        'message 0',
        'message 2',
      ])
    })

    it('should translate throughput errors into throttling', async () => {
      const facade = createFacade()
      fakeKinesis.failNext('PutRecords', fakeKinesis.throughputExceededError())

      const error = await rejectionOf(facade.send(messages(1)))

      expect(error.reason).toBe(ReasonCode.THROTTLING)
      expect(error.retryable).toBe(true)
    })

    it('should report a deleted stream as a missing destination', async () => {
      const facade = createFacade()
      fakeKinesis.streams.delete(STREAM)

      const error = await rejectionOf(facade.send(messages(1)))

      expect(error.reason).toBe(ReasonCode.MISSING_DESTINATION)
      expect(error.message).toBe('putRecords(app-logs): missing stream')
    })

    it('should wrap unexpected errors', async () => {
      const facade = createFacade()
      fakeKinesis.failNext('PutRecords', new Error('socket hang up'))

      const error = await rejectionOf(facade.send(messages(1)))

      expect(error.reason).toBe(ReasonCode.UNEXPECTED_EXCEPTION)
      expect(error.message).toBe('putRecords(app-logs): unexpected exception: socket hang up')
    })
  })

  describe('with a log writer', () => {
    function createWriter(config: KinesisConfigInput) {
      return createLogWriter({
        destination: { kind: 'kinesis', config },
        writer: { batchDelay: 10, useShutdownHook: false },
        clientConfig: { region: 'us-east-1' },
        retryManager: noWaitRetryManager(),
      })
    }

    it('should split messages at the record limit', async () => {
      fakeKinesis.addStream(STREAM)
      const writer = createWriter({ streamName: STREAM })
      await writer.initialize()

      for (const message of messages(600)) {
        await writer.addMessage(message)
      }
      await writer.processBatch(Date.now())
      await writer.processBatch(Date.now())

      expect(fakeKinesis.callCount('PutRecords')).toBe(2)
      expect(fakeKinesis.streams.get(STREAM)?.records).toHaveLength(600)
      expect(writer.statistics.messagesSentLastBatch).toBe(100)
    })

    it('should requeue rejected records for the next batch', async () => {
      fakeKinesis.addStream(STREAM)
      const writer = createWriter({ streamName: STREAM })
      await writer.initialize()

      for (const message of messages(3)) {
        await writer.addMessage(message)
      }
      fakeKinesis.rejectRecordsNext([0])
      await writer.processBatch(Date.now())

      expect(writer.statistics.messagesSent).toBe(2)
      expect(writer.statistics.messagesRequeued).toBe(1)
      expect(writer.messageQueue.toArray().map((message) => message.message)).toEqual(['message 0'])
    })

    it('should fail initialization when the stream is missing', async () => {
      const writer = createWriter({ streamName: STREAM })

      await expect(writer.initialize()).resolves.toBe(false)

      expect(writer.state).toBe(WriterState.FAILED)
      expect(writer.statistics.lastError?.message).toBe(
        'exception in initializer: ensureDestinationAvailable(app-logs): stream does not exist and auto-create is not enabled'
      )
      expect(fakeKinesis.destroyedClients).toBe(1)
    })
  })
})
