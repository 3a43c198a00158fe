/**
 * Writer Configuration
 *
 * Validated once when a writer is built. The common settings are shared by
 * every destination; each destination adds its own block.
 */

import { z } from 'zod'
import { DiscardAction } from './types.js'

export const commonWriterConfigSchema = z.object({
  /** Longest time (ms) spent accumulating a batch after its first message */
  batchDelay: z.number().int().positive().default(2000),
  discardThreshold: z.number().int().nonnegative().default(10000),
  discardAction: z.nativeEnum(DiscardAction).default(DiscardAction.oldest),
  /** Send each message on the caller's turn instead of batching in the background */
  synchronousMode: z.boolean().default(false),
  truncateOversizeMessages: z.boolean().default(true),
  /** Stop the writer when the process is asked to exit */
  useShutdownHook: z.boolean().default(true),
  /** Send attempts per batch before it is requeued */
  sendRetryAttempts: z.number().int().positive().default(4),
  sendRetryTimeout: z.number().int().positive().default(10000),
  /** Budget for creating a destination and waiting for it to become usable */
  initializationTimeout: z.number().int().positive().default(60000),
  retryInitialDelay: z.number().int().nonnegative().default(100),
  retryMaxDelay: z.number().int().nonnegative().default(2000),
})

export const cloudWatchConfigSchema = z.object({
  logGroupName: z.string(),
  logStreamName: z.string(),
  /** Days; must be one of the values CloudWatch Logs accepts */
  retentionPeriod: z.number().int().positive().optional(),
  /** The only writer for this stream, so the sequence token can be cached */
  dedicatedWriter: z.boolean().default(true),
})

export const kinesisConfigSchema = z.object({
  streamName: z.string(),
  /** Empty means a random key per record */
  partitionKey: z.string().default(''),
  autoCreate: z.boolean().default(false),
  shardCount: z.number().int().positive().default(1),
  /** Hours; only applied when the stream is created */
  retentionPeriod: z.number().int().positive().optional(),
})

export const snsConfigSchema = z
  .object({
    topicName: z.string().optional(),
    topicArn: z.string().optional(),
    subject: z.string().optional(),
    autoCreate: z.boolean().default(false),
  })
  .refine((value) => Boolean(value.topicName) !== Boolean(value.topicArn), {
    message: 'exactly one of topicName or topicArn must be provided',
  })

export type CommonWriterConfig = z.infer<typeof commonWriterConfigSchema>
export type CommonWriterConfigInput = z.input<typeof commonWriterConfigSchema>
export type CloudWatchConfig = z.infer<typeof cloudWatchConfigSchema>
export type CloudWatchConfigInput = z.input<typeof cloudWatchConfigSchema>
export type KinesisConfig = z.infer<typeof kinesisConfigSchema>
export type KinesisConfigInput = z.input<typeof kinesisConfigSchema>
export type SNSConfig = z.infer<typeof snsConfigSchema>
export type SNSConfigInput = z.input<typeof snsConfigSchema>

function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    throw new Error(`Invalid ${label} configuration: ${formatZodError(parsed.error)}`)
  }
  const data: z.infer<S> = parsed.data
  Object.freeze(data)
  return data
}

export function parseWriterConfig(input: CommonWriterConfigInput = {}): Readonly<CommonWriterConfig> {
  return parseWith(commonWriterConfigSchema, input, 'writer')
}

export function parseCloudWatchConfig(input: CloudWatchConfigInput): Readonly<CloudWatchConfig> {
  return parseWith(cloudWatchConfigSchema, input, 'CloudWatch')
}

export function parseKinesisConfig(input: KinesisConfigInput): Readonly<KinesisConfig> {
  return parseWith(kinesisConfigSchema, input, 'Kinesis')
}

export function parseSNSConfig(input: SNSConfigInput): Readonly<SNSConfig> {
  return parseWith(snsConfigSchema, input, 'SNS')
}
