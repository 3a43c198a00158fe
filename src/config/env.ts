import { z } from 'zod'
import { config as dotenvConfig } from 'dotenv'
import { logger } from '../lib/logger.js'
import { DEFAULT_SERVICE_NAME } from './constants.js'

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true')

/**
 * Environment variable schema for the log dispatch runner.
 *
 * `DESTINATION` selects the writer variant; only the variables for that
 * variant are checked by the writer factory.
 */
const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test', 'local']).default('development'),
  PORT: z.coerce.number().default(3000),
  SERVICE_NAME: z.string().default(DEFAULT_SERVICE_NAME),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(),

  // Writer
  DESTINATION: z.enum(['cloudwatch', 'kinesis', 'sns']).default('cloudwatch'),
  BATCH_DELAY: z.coerce.number().int().positive().default(2000),
  DISCARD_THRESHOLD: z.coerce.number().int().nonnegative().default(10000),
  DISCARD_ACTION: z.enum(['none', 'oldest', 'newest']).default('oldest'),
  SYNCHRONOUS_MODE: booleanFlag(false),
  TRUNCATE_OVERSIZE_MESSAGES: booleanFlag(true),

  // CloudWatch Logs
  CLOUDWATCH_LOG_GROUP: z.string().optional(),
  CLOUDWATCH_LOG_STREAM: z.string().optional(),
  CLOUDWATCH_RETENTION_DAYS: z.coerce.number().int().positive().optional(),
  CLOUDWATCH_DEDICATED_WRITER: booleanFlag(true),

  // Kinesis
  KINESIS_STREAM: z.string().optional(),
  KINESIS_PARTITION_KEY: z.string().default(''),
  KINESIS_AUTO_CREATE: booleanFlag(false),
  KINESIS_SHARD_COUNT: z.coerce.number().int().positive().default(1),
  KINESIS_RETENTION_HOURS: z.coerce.number().int().positive().optional(),

  // SNS
  SNS_TOPIC_NAME: z.string().optional(),
  SNS_TOPIC_ARN: z.string().optional(),
  SNS_SUBJECT: z.string().optional(),
  SNS_AUTO_CREATE: booleanFlag(false),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'silent']).default('info'),
})

export type Env = z.infer<typeof envSchema>

let cachedEnv: Env | null = null

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

/**
 * Bootstrap application configuration.
 *
 * Loading order:
 * 1. Load .env into process.env (existing variables win)
 * 2. Validate with Zod schema
 * 3. Freeze and cache
 */
export function bootstrap(): Env {
  if (cachedEnv) {
    logger.warn('Configuration already bootstrapped')
    return cachedEnv
  }

  dotenvConfig()

  const parsed = envSchema.safeParse(process.env)

  if (!parsed.success) {
    throw new Error(`Configuration validation failed:\n${formatIssues(parsed.error)}`)
  }

  cachedEnv = Object.freeze(parsed.data)

  logger.info('Configuration bootstrapped successfully', {
    nodeEnv: cachedEnv.NODE_ENV,
    serviceName: cachedEnv.SERVICE_NAME,
    destination: cachedEnv.DESTINATION,
  })

  return cachedEnv
}

/**
 * Load environment synchronously without reading .env. Used by tests.
 */
export function loadEnv(overrides: Record<string, string> = {}): Env {
  const raw = { ...process.env, ...overrides }
  const parsed = envSchema.safeParse(raw)

  if (!parsed.success) {
    throw new Error(`Environment validation failed:\n${formatIssues(parsed.error)}`)
  }

  cachedEnv = Object.freeze(parsed.data)
  return cachedEnv
}

/**
 * Return the bootstrapped environment (cached).
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    throw new Error('Environment not loaded. Call bootstrap() or loadEnv() first.')
  }

  return cachedEnv
}

export function resetEnv(): void {
  cachedEnv = null
}

export function isProduction(): boolean {
  return cachedEnv?.NODE_ENV === 'production'
}
