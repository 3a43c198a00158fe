import winston from 'winston'

interface LogMetadata {
  event?: string
  metadata?: Record<string, unknown>
  err?: unknown
}

const levels = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

type LogLevel = keyof typeof levels

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value)
}

function serializeError(err: unknown): Record<string, unknown> | undefined {
  if (err === undefined || err === null) return undefined
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    }
  }
  return { message: String(err) }
}

const structuredFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json(),
  winston.format.printf(({ timestamp, level, message, ...meta }: Record<string, unknown>) => {
    const structuredLog: Record<string, unknown> = {
      timestamp,
      level,
      service: meta.service || 'aws-log-dispatch',
      event: meta.event || 'General',
      message,
      metadata: meta.metadata || {},
    }

    if (meta.err) {
      structuredLog.err = meta.err
    }

    return JSON.stringify(structuredLog)
  })
)

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }: Record<string, unknown>) => {
    const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : ''
    return `${timestamp} [${level}]: ${message}${metaStr}`
  })
)

// read directly from process.env: the logger is needed before configuration is bootstrapped
const serviceName = process.env.SERVICE_NAME || 'aws-log-dispatch'
const nodeEnv = process.env.NODE_ENV || 'development'
const requestedLevel = process.env.LOG_LEVEL || 'info'
const logLevel: LogLevel = isLogLevel(requestedLevel) ? requestedLevel : 'info'

export const logger = winston.createLogger({
  levels,
  level: logLevel,
  silent: requestedLevel === 'silent',
  format: structuredFormat,
  defaultMeta: { service: serviceName },
  transports: [
    new winston.transports.Console({
      format: nodeEnv === 'production' ? structuredFormat : consoleFormat,
      level: logLevel,
      // stdout may be the writer's input when running as a pipe
      stderrLevels: Object.keys(levels),
    }),
  ],
})

function createLogMetadata(meta: LogMetadata): Record<string, unknown> {
  const logMetadata: Record<string, unknown> = {
    event: meta.event,
    metadata: meta.metadata ?? {},
  }

  const err = serializeError(meta.err)
  if (err) logMetadata.err = err

  return logMetadata
}

export const error = (message: string, meta: LogMetadata = {}) => {
  logger.error(message, createLogMetadata(meta))
}

export const warn = (message: string, meta: LogMetadata = {}) => {
  logger.warn(message, createLogMetadata(meta))
}

export const info = (message: string, meta: LogMetadata = {}) => {
  logger.info(message, createLogMetadata(meta))
}

export const debug = (message: string, meta: LogMetadata = {}) => {
  logger.debug(message, createLogMetadata(meta))
}

export const fatal = (message: string, meta: LogMetadata = {}) => {
  logger.log('fatal', message, createLogMetadata(meta))
}
