export { LogMessage } from './log-message.js'
export { MessageQueue } from './message-queue.js'
export { RetryManager, sleep, type RetryInvokeOptions, type RetryManagerOptions, type RetryResult } from './retry-manager.js'
export { LogWriter, type LogWriterOptions } from './log-writer.js'
export { WriterStatistics, type LastError, type WriterStatisticsSnapshot } from './writer-statistics.js'
export { DiscardAction, WriterState, type DestinationKind, type ILogWriter } from './types.js'
export {
  parseCloudWatchConfig,
  parseKinesisConfig,
  parseSNSConfig,
  parseWriterConfig,
  type CloudWatchConfig,
  type CloudWatchConfigInput,
  type CommonWriterConfig,
  type CommonWriterConfigInput,
  type KinesisConfig,
  type KinesisConfigInput,
  type SNSConfig,
  type SNSConfigInput,
} from './writer-config.js'
export {
  createDestinationFacade,
  createLogWriter,
  writerOptionsFromEnv,
  type CreateLogWriterOptions,
  type DestinationClients,
  type DestinationConfig,
} from './writer-factory.js'
export type { DestinationFacade } from './facades/destination-facade.interface.js'
export type { FacadeOptions } from './facades/facade-support.js'
export { CloudWatchFacade } from './facades/cloudwatch-facade.js'
export { KinesisFacade } from './facades/kinesis-facade.js'
export { SNSFacade } from './facades/sns-facade.js'
