/**
 * CloudWatch Logs Destination
 *
 * Writes to a log stream inside a log group, creating either one if needed.
 * PutLogEvents historically required the stream's sequence token; a dedicated
 * writer caches it between sends, a shared writer reads it before every send.
 */

import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  InvalidSequenceTokenException,
  PutLogEventsCommand,
  PutRetentionPolicyCommand,
  type LogStream,
} from '@aws-sdk/client-cloudwatch-logs'
import type { DestinationFacade } from './destination-facade.interface.js'
import { errorName, invokeWithRetry, isTransient, timedOut, type FacadeOptions } from './facade-support.js'
import type { LogMessage } from '../log-message.js'
import type { RetryManager } from '../retry-manager.js'
import type { CloudWatchConfig } from '../writer-config.js'
import { FacadeError, ReasonCode, hasReason, invalidConfiguration, isFacadeError, unexpectedError } from '../../errors.js'
import { debug, error as logError, info, warn } from '../../logger.js'

// https://docs.aws.amazon.com/AmazonCloudWatchLogs/latest/APIReference/API_PutLogEvents.html
export const CLOUDWATCH_MAX_BATCH_BYTES = 1_048_576
export const CLOUDWATCH_MAX_BATCH_COUNT = 10_000
export const CLOUDWATCH_MAX_EVENT_SIZE = 256 * 1024
export const CLOUDWATCH_OVERHEAD_BYTES = 26

const LOG_GROUP_NAME_PATTERN = /^[.\-_/#A-Za-z0-9]{1,512}$/
const LOG_STREAM_NAME_PATTERN = /^[^:*]{1,512}$/

export class CloudWatchFacade implements DestinationFacade {
  readonly kind = 'cloudwatch' as const
  readonly maxMessageSize = CLOUDWATCH_MAX_EVENT_SIZE - CLOUDWATCH_OVERHEAD_BYTES
  readonly destinationName: string

  private readonly config: CloudWatchConfig
  private readonly options: FacadeOptions<CloudWatchLogsClient>
  private readonly retryManager: RetryManager
  private client: CloudWatchLogsClient | null

  private sequenceToken: string | undefined
  private sequenceTokenKnown = false

  constructor(config: CloudWatchConfig, options: FacadeOptions<CloudWatchLogsClient>) {
    this.config = config
    this.options = options
    this.retryManager = options.retryManager
    this.client = options.client ?? null
    this.destinationName = `${config.logGroupName}/${config.logStreamName}`
  }

  async ensureDestinationAvailable(): Promise<boolean> {
    const { logGroupName, logStreamName } = this.config
    const timeout = this.options.initializationTimeout

    if (!LOG_GROUP_NAME_PATTERN.test(logGroupName)) {
      logError(`invalid log group name: ${logGroupName}`, { event: 'CloudWatchInvalidConfiguration' })
      return false
    }

    if (!LOG_STREAM_NAME_PATTERN.test(logStreamName)) {
      logError(`invalid log stream name: ${logStreamName}`, { event: 'CloudWatchInvalidConfiguration' })
      return false
    }

    const existingGroup = await invokeWithRetry(this.retryManager, timeout, () => this.findLogGroup())
    if (existingGroup) {
      debug(`using existing CloudWatch log group: ${logGroupName}`, { event: 'CloudWatchLogGroupFound' })
    } else {
      info(`creating CloudWatch log group: ${logGroupName}`, { event: 'CloudWatchLogGroupCreate' })
      await invokeWithRetry(this.retryManager, timeout, () => this.createLogGroup())

      const created = await this.retryManager.waitFor(() => this.findLogGroup(), timeout, isTransient)
      if (!created) throw timedOut('createLogGroup', this.destinationName, 'log group creation')

      if (!(await this.applyRetentionPolicy())) return false
    }

    let stream = await invokeWithRetry(this.retryManager, timeout, () => this.findLogStream())
    if (stream) {
      debug(`using existing CloudWatch log stream: ${logStreamName}`, { event: 'CloudWatchLogStreamFound' })
    } else {
      info(`creating CloudWatch log stream: ${logStreamName}`, { event: 'CloudWatchLogStreamCreate' })
      await invokeWithRetry(this.retryManager, timeout, () => this.createLogStream())

      stream = await this.retryManager.waitFor(() => this.findLogStream(), timeout, isTransient)
      if (!stream) throw timedOut('createLogStream', this.destinationName, 'log stream creation')
    }

    this.rememberSequenceToken(stream.uploadSequenceToken)
    return true
  }

  effectiveSize(message: LogMessage): number {
    return message.bytes + CLOUDWATCH_OVERHEAD_BYTES
  }

  withinServiceLimits(batchBytes: number, numMessages: number): boolean {
    return batchBytes <= CLOUDWATCH_MAX_BATCH_BYTES && numMessages <= CLOUDWATCH_MAX_BATCH_COUNT
  }

  async send(batch: readonly LogMessage[]): Promise<LogMessage[]> {
    if (batch.length === 0) return []

    const sequenceToken =
      this.config.dedicatedWriter && this.sequenceTokenKnown ? this.sequenceToken : await this.retrieveSequenceToken()

    // PutLogEvents requires chronological order within a batch; sort is stable
    const logEvents = [...batch]
      .sort((a, b) => a.timestamp - b.timestamp)
      .map((message) => ({ timestamp: message.timestamp, message: message.message }))

    try {
      const response = await this.getClient().send(
        new PutLogEventsCommand({
          logGroupName: this.config.logGroupName,
          logStreamName: this.config.logStreamName,
          logEvents,
          sequenceToken,
        })
      )

      this.rememberSequenceToken(response.nextSequenceToken)

      if (response.rejectedLogEventsInfo) {
        warn('CloudWatch rejected some log events', {
          event: 'CloudWatchEventsRejected',
          metadata: { destination: this.destinationName, ...response.rejectedLogEventsInfo },
        })
      }

      return []
    } catch (err) {
      const translated = this.translateError('putEvents', err, ReasonCode.MISSING_DESTINATION, 'missing log group or stream')
      if (translated.reason === ReasonCode.INVALID_SEQUENCE_TOKEN) {
        this.sequenceTokenKnown = false
      }
      throw translated
    }
  }

  shutdown(): void {
    if (this.client) {
      this.client.destroy()
      this.client = null
    }
  }

  /**
   * Returns the ARN of the configured log group, or null if it does not exist.
   */
  async findLogGroup(): Promise<string | null> {
    const { logGroupName } = this.config
    let nextToken: string | undefined

    try {
      do {
        const response = await this.getClient().send(
          new DescribeLogGroupsCommand({ logGroupNamePrefix: logGroupName, nextToken })
        )

        const match = response.logGroups?.find((group) => group.logGroupName === logGroupName)
        if (match) return match.arn ?? logGroupName

        nextToken = response.nextToken
      } while (nextToken)
    } catch (err) {
      throw this.translateError('findLogGroup', err)
    }

    return null
  }

  async createLogGroup(): Promise<void> {
    try {
      await this.getClient().send(new CreateLogGroupCommand({ logGroupName: this.config.logGroupName }))
    } catch (err) {
      if (errorName(err) === 'ResourceAlreadyExistsException') return
      throw this.translateError('createLogGroup', err)
    }
  }

  /**
   * Applies the configured retention period to a newly created group. Returns
   * false only when CloudWatch rejects the value.
   */
  async applyRetentionPolicy(): Promise<boolean> {
    const { retentionPeriod, logGroupName } = this.config
    if (retentionPeriod === undefined) return true

    try {
      await invokeWithRetry(this.retryManager, this.options.initializationTimeout, () => this.setLogGroupRetention())
      return true
    } catch (err) {
      if (hasReason(err, ReasonCode.INVALID_CONFIGURATION)) {
        logError(err.message, { event: 'CloudWatchInvalidConfiguration', err })
        return false
      }

      // the group exists, so the writer can still run
      warn(`failed to set retention policy on log group ${logGroupName}`, {
        event: 'CloudWatchRetentionPolicyError',
        err,
      })
      return true
    }
  }

  async setLogGroupRetention(): Promise<void> {
    const { retentionPeriod, logGroupName } = this.config
    if (retentionPeriod === undefined) return

    try {
      await this.getClient().send(
        new PutRetentionPolicyCommand({ logGroupName, retentionInDays: retentionPeriod })
      )
    } catch (err) {
      if (errorName(err) === 'InvalidParameterException') {
        throw invalidConfiguration(
          'setLogGroupRetention',
          this.destinationName,
          `invalid retention period: ${retentionPeriod}`,
          err
        )
      }
      throw this.translateError('setLogGroupRetention', err)
    }
  }

  /**
   * Returns the configured log stream, or null if it does not exist (including
   * when its log group has gone away).
   */
  async findLogStream(): Promise<LogStream | null> {
    const { logGroupName, logStreamName } = this.config
    let nextToken: string | undefined

    try {
      do {
        const response = await this.getClient().send(
          new DescribeLogStreamsCommand({ logGroupName, logStreamNamePrefix: logStreamName, nextToken })
        )

        const match = response.logStreams?.find((stream) => stream.logStreamName === logStreamName)
        if (match) return match

        nextToken = response.nextToken
      } while (nextToken)
    } catch (err) {
      if (errorName(err) === 'ResourceNotFoundException') return null
      throw this.translateError('retrieveSequenceToken', err)
    }

    return null
  }

  async createLogStream(): Promise<void> {
    try {
      await this.getClient().send(
        new CreateLogStreamCommand({
          logGroupName: this.config.logGroupName,
          logStreamName: this.config.logStreamName,
        })
      )
    } catch (err) {
      if (errorName(err) === 'ResourceAlreadyExistsException') return
      throw this.translateError('createLogStream', err, ReasonCode.MISSING_LOG_GROUP, 'missing log group')
    }
  }

  /**
   * Reads the stream's current upload sequence token.
   *
   * @throws FacadeError with MISSING_DESTINATION if the stream is gone
   */
  async retrieveSequenceToken(): Promise<string | undefined> {
    const stream = await this.findLogStream()
    if (!stream) {
      throw new FacadeError({
        reason: ReasonCode.MISSING_DESTINATION,
        functionName: 'retrieveSequenceToken',
        destination: this.destinationName,
        detail: 'missing log stream',
      })
    }

    this.rememberSequenceToken(stream.uploadSequenceToken)
    return stream.uploadSequenceToken
  }

  protected getClient(): CloudWatchLogsClient {
    if (!this.client) {
      this.client = new CloudWatchLogsClient(this.options.clientConfig ?? {})
    }
    return this.client
  }

  private rememberSequenceToken(token: string | undefined): void {
    this.sequenceToken = token
    this.sequenceTokenKnown = true
  }

  private translateError(
    functionName: string,
    err: unknown,
    missingReason: ReasonCode = ReasonCode.MISSING_LOG_GROUP,
    missingDetail = 'missing log group'
  ): FacadeError {
    if (isFacadeError(err)) return err

    const fail = (reason: ReasonCode, detail: string) =>
      new FacadeError({ reason, functionName, destination: this.destinationName, detail, cause: err })

    if (err instanceof InvalidSequenceTokenException) {
      return fail(ReasonCode.INVALID_SEQUENCE_TOKEN, `invalid sequence token: ${err.expectedSequenceToken}`)
    }

    switch (errorName(err)) {
      case 'ThrottlingException':
        return fail(ReasonCode.THROTTLING, 'throttled')
      case 'OperationAbortedException':
        return fail(ReasonCode.ABORTED, 'aborted')
      case 'InvalidSequenceTokenException':
        return fail(ReasonCode.INVALID_SEQUENCE_TOKEN, 'invalid sequence token')
      case 'DataAlreadyAcceptedException':
        return fail(ReasonCode.ALREADY_PROCESSED, 'already processed')
      case 'ResourceNotFoundException':
        return fail(missingReason, missingDetail)
      case 'InvalidParameterException':
        return fail(ReasonCode.INVALID_CONFIGURATION, `invalid parameter: ${err instanceof Error ? err.message : ''}`)
      default:
        return unexpectedError(functionName, this.destinationName, err)
    }
  }
}
