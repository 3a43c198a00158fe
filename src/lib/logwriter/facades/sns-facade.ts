/**
 * SNS Destination
 *
 * Publishes each message to a topic, identified either by ARN or by name. A
 * topic identified by name is looked up with ListTopics and may be created.
 */

import {
  CreateTopicCommand,
  GetTopicAttributesCommand,
  ListTopicsCommand,
  PublishBatchCommand,
  SNSClient,
} from '@aws-sdk/client-sns'
import type { DestinationFacade } from './destination-facade.interface.js'
import { errorName, invokeWithRetry, type FacadeOptions } from './facade-support.js'
import type { LogMessage } from '../log-message.js'
import type { RetryManager } from '../retry-manager.js'
import type { SNSConfig } from '../writer-config.js'
import { FacadeError, ReasonCode, isFacadeError, unexpectedError } from '../../errors.js'
import { debug, error as logError, info, warn } from '../../logger.js'

// https://docs.aws.amazon.com/sns/latest/api/API_PublishBatch.html
export const SNS_MAX_BATCH_BYTES = 256 * 1024
export const SNS_MAX_BATCH_COUNT = 10

const TOPIC_NAME_PATTERN = /^[A-Za-z0-9_-]{1,256}$/
const TOPIC_ARN_PATTERN = /^arn:[^:]+:sns:[^:]*:[^:]*:[A-Za-z0-9_-]{1,256}$/

export class SNSFacade implements DestinationFacade {
  readonly kind = 'sns' as const
  readonly maxMessageSize = SNS_MAX_BATCH_BYTES

  private readonly config: SNSConfig
  private readonly options: FacadeOptions<SNSClient>
  private readonly retryManager: RetryManager
  private client: SNSClient | null
  private topicArn: string | null = null

  constructor(config: SNSConfig, options: FacadeOptions<SNSClient>) {
    this.config = config
    this.options = options
    this.retryManager = options.retryManager
    this.client = options.client ?? null
  }

  /**
   * The topic's ARN once resolved, otherwise the configured identifier.
   */
  get destinationName(): string {
    return this.topicArn ?? this.config.topicArn ?? this.config.topicName ?? ''
  }

  /**
   * ARN of the resolved topic; null until the destination has been found.
   */
  get resolvedTopicArn(): string | null {
    return this.topicArn
  }

  async ensureDestinationAvailable(): Promise<boolean> {
    const { topicArn, topicName, autoCreate } = this.config
    const timeout = this.options.initializationTimeout

    if (topicArn !== undefined && !TOPIC_ARN_PATTERN.test(topicArn)) {
      logError(`invalid topic ARN: ${topicArn}`, { event: 'SNSInvalidConfiguration' })
      return false
    }

    if (topicName !== undefined && !TOPIC_NAME_PATTERN.test(topicName)) {
      logError(`invalid topic name: ${topicName}`, { event: 'SNSInvalidConfiguration' })
      return false
    }

    const existing = topicArn
      ? await invokeWithRetry(this.retryManager, timeout, () => this.describeTopic(topicArn))
      : await invokeWithRetry(this.retryManager, timeout, () => this.findTopicByName(topicName ?? ''))

    if (existing) {
      debug(`using existing SNS topic: ${existing}`, { event: 'SNSTopicFound' })
      this.topicArn = existing
      return true
    }

    if (!topicName || !autoCreate) {
      throw new FacadeError({
        reason: ReasonCode.MISSING_DESTINATION,
        functionName: 'ensureDestinationAvailable',
        destination: this.destinationName,
        detail: topicName ? 'topic does not exist and auto-create is not enabled' : 'topic does not exist',
      })
    }

    info(`creating SNS topic: ${topicName}`, { event: 'SNSTopicCreate' })
    this.topicArn = await invokeWithRetry(this.retryManager, timeout, () => this.createTopic(topicName))
    return true
  }

  effectiveSize(message: LogMessage): number {
    return message.bytes
  }

  withinServiceLimits(batchBytes: number, numMessages: number): boolean {
    return batchBytes <= SNS_MAX_BATCH_BYTES && numMessages <= SNS_MAX_BATCH_COUNT
  }

  async send(batch: readonly LogMessage[]): Promise<LogMessage[]> {
    if (batch.length === 0) return []

    const topicArn = this.topicArn
    if (!topicArn) {
      throw new FacadeError({
        reason: ReasonCode.MISSING_DESTINATION,
        functionName: 'publish',
        destination: this.destinationName,
        detail: 'topic has not been resolved',
      })
    }

    try {
      const response = await this.getClient().send(
        new PublishBatchCommand({
          TopicArn: topicArn,
          PublishBatchRequestEntries: batch.map((message, index) => ({
            Id: String(index),
            Message: message.message,
            ...(this.config.subject ? { Subject: this.config.subject } : {}),
          })),
        })
      )

      const failures = response.Failed ?? []
      if (failures.length === 0) return []

      const retryIds = new Set<string>()
      for (const failure of failures) {
        if (failure.SenderFault) {
          // the same entry would be rejected again
          warn(`SNS rejected message: ${failure.Code ?? 'unknown'}`, {
            event: 'SNSMessageRejected',
            metadata: { destination: this.destinationName, message: failure.Message },
          })
        } else if (failure.Id !== undefined) {
          retryIds.add(failure.Id)
        }
      }

      return batch.filter((_, index) => retryIds.has(String(index)))
    } catch (err) {
      throw this.translateError('publish', err)
    }
  }

  shutdown(): void {
    if (this.client) {
      this.client.destroy()
      this.client = null
    }
  }

  /**
   * Returns the ARN if the topic exists, null if it does not.
   */
  async describeTopic(topicArn: string): Promise<string | null> {
    try {
      await this.getClient().send(new GetTopicAttributesCommand({ TopicArn: topicArn }))
      return topicArn
    } catch (err) {
      if (errorName(err) === 'NotFoundException') return null
      throw this.translateError('describeTopic', err)
    }
  }

  async findTopicByName(topicName: string): Promise<string | null> {
    const suffix = `:${topicName}`
    let nextToken: string | undefined

    try {
      do {
        const response = await this.getClient().send(new ListTopicsCommand({ NextToken: nextToken }))

        const match = response.Topics?.find((topic) => topic.TopicArn?.endsWith(suffix))
        if (match?.TopicArn) return match.TopicArn

        nextToken = response.NextToken
      } while (nextToken)
    } catch (err) {
      throw this.translateError('listTopics', err)
    }

    return null
  }

  /**
   * CreateTopic is idempotent: an existing topic's ARN comes back unchanged.
   */
  async createTopic(topicName: string): Promise<string> {
    try {
      const response = await this.getClient().send(new CreateTopicCommand({ Name: topicName }))
      if (!response.TopicArn) {
        throw unexpectedError('createTopic', this.destinationName, new Error('no topic ARN in response'))
      }
      return response.TopicArn
    } catch (err) {
      throw this.translateError('createTopic', err)
    }
  }

  protected getClient(): SNSClient {
    if (!this.client) {
      this.client = new SNSClient(this.options.clientConfig ?? {})
    }
    return this.client
  }

  private translateError(functionName: string, err: unknown): FacadeError {
    if (isFacadeError(err)) return err

    const fail = (reason: ReasonCode, detail: string) =>
      new FacadeError({ reason, functionName, destination: this.destinationName, detail, cause: err })

    switch (errorName(err)) {
      case 'ThrottledException':
      case 'ThrottlingException':
        return fail(ReasonCode.THROTTLING, 'throttled')
      case 'ConcurrentAccessException':
        return fail(ReasonCode.ABORTED, 'aborted')
      case 'NotFoundException':
        return fail(ReasonCode.MISSING_DESTINATION, 'missing topic')
      case 'InvalidParameterException':
      case 'InvalidParameterValueException':
        return fail(ReasonCode.INVALID_CONFIGURATION, `invalid parameter: ${err instanceof Error ? err.message : ''}`)
      default:
        return unexpectedError(functionName, this.destinationName, err)
    }
  }
}
