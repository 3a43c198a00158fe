/**
 * Writer Factory
 *
 * Builds a writer and its destination facade from unvalidated configuration.
 */

import type { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs'
import type { KinesisClient } from '@aws-sdk/client-kinesis'
import type { SNSClient } from '@aws-sdk/client-sns'
import { getAWSClientConfig, type AWSClientConfig } from '../../config/aws.js'
import type { Env } from '../../config/env.js'
import { CloudWatchFacade } from './facades/cloudwatch-facade.js'
import type { DestinationFacade } from './facades/destination-facade.interface.js'
import { KinesisFacade } from './facades/kinesis-facade.js'
import { SNSFacade } from './facades/sns-facade.js'
import { LogWriter } from './log-writer.js'
import { RetryManager } from './retry-manager.js'
import { DiscardAction } from './types.js'
import {
  parseCloudWatchConfig,
  parseKinesisConfig,
  parseSNSConfig,
  parseWriterConfig,
  type CloudWatchConfigInput,
  type CommonWriterConfig,
  type CommonWriterConfigInput,
  type KinesisConfigInput,
  type SNSConfigInput,
} from './writer-config.js'

export type DestinationConfig =
  | { kind: 'cloudwatch'; config: CloudWatchConfigInput }
  | { kind: 'kinesis'; config: KinesisConfigInput }
  | { kind: 'sns'; config: SNSConfigInput }

/**
 * Pre-built SDK clients, keyed by destination kind
 */
export interface DestinationClients {
  cloudwatch?: CloudWatchLogsClient
  kinesis?: KinesisClient
  sns?: SNSClient
}

export interface CreateLogWriterOptions {
  destination: DestinationConfig
  writer?: CommonWriterConfigInput
  /** Defaults to the configuration derived from the environment */
  clientConfig?: AWSClientConfig
  clients?: DestinationClients
  retryManager?: RetryManager
}

export function createLogWriter(options: CreateLogWriterOptions): LogWriter {
  const config = parseWriterConfig(options.writer)
  const retryManager =
    options.retryManager ?? new RetryManager({ initialDelay: config.retryInitialDelay, maxDelay: config.retryMaxDelay })

  const facade = createDestinationFacade(options.destination, config, {
    retryManager,
    clientConfig: options.clientConfig,
    clients: options.clients,
  })

  return new LogWriter({ config, facade, retryManager })
}

export function createDestinationFacade(
  destination: DestinationConfig,
  config: Readonly<CommonWriterConfig>,
  options: { retryManager: RetryManager; clientConfig?: AWSClientConfig; clients?: DestinationClients }
): DestinationFacade {
  const base = {
    retryManager: options.retryManager,
    initializationTimeout: config.initializationTimeout,
  }

  // only touch the environment when a facade will build its own client
  const clientConfig = (client: unknown) =>
    client ? options.clientConfig : (options.clientConfig ?? getAWSClientConfig())

  switch (destination.kind) {
    case 'cloudwatch':
      return new CloudWatchFacade(parseCloudWatchConfig(destination.config), {
        ...base,
        client: options.clients?.cloudwatch,
        clientConfig: clientConfig(options.clients?.cloudwatch),
      })
    case 'kinesis':
      return new KinesisFacade(parseKinesisConfig(destination.config), {
        ...base,
        client: options.clients?.kinesis,
        clientConfig: clientConfig(options.clients?.kinesis),
      })
    case 'sns':
      return new SNSFacade(parseSNSConfig(destination.config), {
        ...base,
        client: options.clients?.sns,
        clientConfig: clientConfig(options.clients?.sns),
      })
  }
}

/**
 * Maps the runner's environment variables onto writer options.
 */
export function writerOptionsFromEnv(env: Env): CreateLogWriterOptions {
  const writer: CommonWriterConfigInput = {
    batchDelay: env.BATCH_DELAY,
    discardThreshold: env.DISCARD_THRESHOLD,
    discardAction: DiscardAction[env.DISCARD_ACTION],
    synchronousMode: env.SYNCHRONOUS_MODE,
    truncateOversizeMessages: env.TRUNCATE_OVERSIZE_MESSAGES,
    // the runner handles signals itself
    useShutdownHook: false,
  }

  const clientConfig = getAWSClientConfig(env)

  switch (env.DESTINATION) {
    case 'cloudwatch':
      return {
        writer,
        clientConfig,
        destination: {
          kind: 'cloudwatch',
          config: {
            logGroupName: requireSetting(env.CLOUDWATCH_LOG_GROUP, 'CLOUDWATCH_LOG_GROUP'),
            logStreamName: requireSetting(env.CLOUDWATCH_LOG_STREAM, 'CLOUDWATCH_LOG_STREAM'),
            retentionPeriod: env.CLOUDWATCH_RETENTION_DAYS,
            dedicatedWriter: env.CLOUDWATCH_DEDICATED_WRITER,
          },
        },
      }
    case 'kinesis':
      return {
        writer,
        clientConfig,
        destination: {
          kind: 'kinesis',
          config: {
            streamName: requireSetting(env.KINESIS_STREAM, 'KINESIS_STREAM'),
            partitionKey: env.KINESIS_PARTITION_KEY,
            autoCreate: env.KINESIS_AUTO_CREATE,
            shardCount: env.KINESIS_SHARD_COUNT,
            retentionPeriod: env.KINESIS_RETENTION_HOURS,
          },
        },
      }
    case 'sns':
      return {
        writer,
        clientConfig,
        destination: {
          kind: 'sns',
          config: {
            topicName: env.SNS_TOPIC_NAME,
            topicArn: env.SNS_TOPIC_ARN,
            subject: env.SNS_SUBJECT,
            autoCreate: env.SNS_AUTO_CREATE,
          },
        },
      }
  }
}

function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} must be set`)
  }
  return value
}
