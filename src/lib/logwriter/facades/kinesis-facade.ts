/**
 * Kinesis Data Streams Destination
 *
 * Each message becomes one record. With no configured partition key every
 * record gets a random one, which spreads load over all shards.
 */

import {
  CreateStreamCommand,
  DescribeStreamSummaryCommand,
  IncreaseStreamRetentionPeriodCommand,
  KinesisClient,
  PutRecordsCommand,
  type StreamStatus,
} from '@aws-sdk/client-kinesis'
import { v4 as uuidv4 } from 'uuid'
import type { DestinationFacade } from './destination-facade.interface.js'
import { errorName, invokeWithRetry, isTransient, timedOut, type FacadeOptions } from './facade-support.js'
import type { LogMessage } from '../log-message.js'
import type { RetryManager } from '../retry-manager.js'
import type { KinesisConfig } from '../writer-config.js'
import { FacadeError, ReasonCode, hasReason, invalidConfiguration, isFacadeError, unexpectedError } from '../../errors.js'
import { debug, error as logError, info, warn } from '../../logger.js'

// https://docs.aws.amazon.com/kinesis/latest/APIReference/API_PutRecords.html
export const KINESIS_MAX_BATCH_BYTES = 5 * 1024 * 1024
export const KINESIS_MAX_BATCH_COUNT = 500
export const KINESIS_MAX_RECORD_SIZE = 1024 * 1024

// random keys are v4 UUIDs
const RANDOM_PARTITION_KEY_LENGTH = 36

const STREAM_NAME_PATTERN = /^[a-zA-Z0-9_.-]{1,128}$/
const MIN_RETENTION_HOURS = 24

export class KinesisFacade implements DestinationFacade {
  readonly kind = 'kinesis' as const
  readonly destinationName: string
  readonly maxMessageSize: number

  private readonly config: KinesisConfig
  private readonly options: FacadeOptions<KinesisClient>
  private readonly retryManager: RetryManager
  private readonly partitionKeyLength: number
  private client: KinesisClient | null

  constructor(config: KinesisConfig, options: FacadeOptions<KinesisClient>) {
    this.config = config
    this.options = options
    this.retryManager = options.retryManager
    this.client = options.client ?? null
    this.destinationName = config.streamName
    this.partitionKeyLength = config.partitionKey
      ? Buffer.byteLength(config.partitionKey, 'utf8')
      : RANDOM_PARTITION_KEY_LENGTH
    this.maxMessageSize = KINESIS_MAX_RECORD_SIZE - this.partitionKeyLength
  }

  async ensureDestinationAvailable(): Promise<boolean> {
    const { streamName, autoCreate, partitionKey } = this.config
    const timeout = this.options.initializationTimeout

    if (!STREAM_NAME_PATTERN.test(streamName)) {
      logError(`invalid stream name: ${streamName}`, { event: 'KinesisInvalidConfiguration' })
      return false
    }

    if (Buffer.byteLength(partitionKey, 'utf8') > 256) {
      logError(`partition key longer than 256 bytes: ${partitionKey}`, { event: 'KinesisInvalidConfiguration' })
      return false
    }

    const status = await invokeWithRetry(this.retryManager, timeout, () => this.getStreamStatus())
    if (status === 'ACTIVE') {
      debug(`using existing Kinesis stream: ${streamName}`, { event: 'KinesisStreamFound' })
      return true
    }

    if (status === null) {
      if (!autoCreate) {
        throw new FacadeError({
          reason: ReasonCode.MISSING_DESTINATION,
          functionName: 'ensureDestinationAvailable',
          destination: this.destinationName,
          detail: 'stream does not exist and auto-create is not enabled',
        })
      }

      info(`creating Kinesis stream: ${streamName}`, {
        event: 'KinesisStreamCreate',
        metadata: { shardCount: this.config.shardCount },
      })
      await invokeWithRetry(this.retryManager, timeout, () => this.createStream())
      await this.waitForActive('createStream')

      if (!(await this.applyRetentionPeriod())) return false
      return true
    }

    // CREATING or UPDATING
    await this.waitForActive('ensureDestinationAvailable')
    return true
  }

  effectiveSize(message: LogMessage): number {
    return message.bytes + this.partitionKeyLength
  }

  withinServiceLimits(batchBytes: number, numMessages: number): boolean {
    return batchBytes <= KINESIS_MAX_BATCH_BYTES && numMessages <= KINESIS_MAX_BATCH_COUNT
  }

  async send(batch: readonly LogMessage[]): Promise<LogMessage[]> {
    if (batch.length === 0) return []

    try {
      const response = await this.getClient().send(
        new PutRecordsCommand({
          StreamName: this.config.streamName,
          Records: batch.map((message) => ({
            Data: Buffer.from(message.message, 'utf8'),
            PartitionKey: this.config.partitionKey || uuidv4(),
          })),
        })
      )

      if (!response.FailedRecordCount) return []

      // result entries line up with the request's records
      const results = response.Records ?? []
      const failed = batch.filter((_, index) => Boolean(results[index]?.ErrorCode))

      debug(`${failed.length} of ${batch.length} Kinesis records were rejected`, {
        event: 'KinesisRecordsRejected',
        metadata: { destination: this.destinationName, errorCode: results.find((r) => r.ErrorCode)?.ErrorCode },
      })

      return failed
    } catch (err) {
      throw this.translateError('putRecords', err)
    }
  }

  shutdown(): void {
    if (this.client) {
      this.client.destroy()
      this.client = null
    }
  }

  /**
   * Returns the stream's status, or null if it does not exist.
   */
  async getStreamStatus(): Promise<StreamStatus | null> {
    try {
      const response = await this.getClient().send(
        new DescribeStreamSummaryCommand({ StreamName: this.config.streamName })
      )
      return response.StreamDescriptionSummary?.StreamStatus ?? null
    } catch (err) {
      if (errorName(err) === 'ResourceNotFoundException') return null
      throw this.translateError('describeStream', err)
    }
  }

  async createStream(): Promise<void> {
    try {
      await this.getClient().send(
        new CreateStreamCommand({ StreamName: this.config.streamName, ShardCount: this.config.shardCount })
      )
    } catch (err) {
      if (errorName(err) === 'ResourceInUseException') return
      throw this.translateError('createStream', err)
    }
  }

  /**
   * Streams are created with 24 hours of retention; anything longer has to be
   * requested separately, after the stream has become active.
   */
  async applyRetentionPeriod(): Promise<boolean> {
    const { retentionPeriod, streamName } = this.config
    if (retentionPeriod === undefined || retentionPeriod <= MIN_RETENTION_HOURS) return true

    try {
      await invokeWithRetry(this.retryManager, this.options.initializationTimeout, () =>
        this.increaseRetentionPeriod(retentionPeriod)
      )
    } catch (err) {
      if (hasReason(err, ReasonCode.INVALID_CONFIGURATION)) {
        logError(err.message, { event: 'KinesisInvalidConfiguration', err })
        return false
      }
      throw err
    }

    await this.waitForActive('setRetentionPeriod')
    return true
  }

  async increaseRetentionPeriod(hours: number): Promise<void> {
    try {
      await this.getClient().send(
        new IncreaseStreamRetentionPeriodCommand({
          StreamName: this.config.streamName,
          RetentionPeriodHours: hours,
        })
      )
    } catch (err) {
      if (errorName(err) === 'InvalidArgumentException') {
        throw invalidConfiguration('setRetentionPeriod', this.destinationName, `invalid retention period: ${hours}`, err)
      }
      throw this.translateError('setRetentionPeriod', err)
    }
  }

  protected getClient(): KinesisClient {
    if (!this.client) {
      this.client = new KinesisClient(this.options.clientConfig ?? {})
    }
    return this.client
  }

  private async waitForActive(functionName: string): Promise<void> {
    const active = await this.retryManager.waitFor(
      async () => ((await this.getStreamStatus()) === 'ACTIVE' ? true : null),
      this.options.initializationTimeout,
      isTransient
    )

    if (!active) {
      warn(`Kinesis stream ${this.config.streamName} did not become active`, { event: 'KinesisStreamNotActive' })
      throw timedOut(functionName, this.destinationName, 'stream to become active')
    }
  }

  private translateError(functionName: string, err: unknown): FacadeError {
    if (isFacadeError(err)) return err

    const fail = (reason: ReasonCode, detail: string) =>
      new FacadeError({ reason, functionName, destination: this.destinationName, detail, cause: err })

    switch (errorName(err)) {
      case 'ProvisionedThroughputExceededException':
      case 'LimitExceededException':
        return fail(ReasonCode.THROTTLING, 'throttled')
      case 'ResourceInUseException':
        return fail(ReasonCode.ABORTED, 'stream is being updated')
      case 'ResourceNotFoundException':
        return fail(ReasonCode.MISSING_DESTINATION, 'missing stream')
      case 'InvalidArgumentException':
        return fail(ReasonCode.INVALID_CONFIGURATION, `invalid argument: ${err instanceof Error ? err.message : ''}`)
      default:
        return unexpectedError(functionName, this.destinationName, err)
    }
  }
}
