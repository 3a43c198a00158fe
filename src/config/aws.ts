import { getEnv, type Env } from './env.js'

export interface AWSClientConfig {
  region: string
  credentials?: {
    accessKeyId: string
    secretAccessKey: string
  }
  endpoint?: string
}

/**
 * Client configuration shared by every SDK client the writers create.
 *
 * Static credentials are only used when both halves are present; otherwise the
 * SDK's default provider chain applies (instance profile, SSO, etc.).
 * Built from `env` on every call.
 */
export function getAWSClientConfig(env: Env = getEnv()): AWSClientConfig {
  return {
    region: env.AWS_REGION,
    ...(env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY
      ? {
          credentials: {
            accessKeyId: env.AWS_ACCESS_KEY_ID,
            secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
          },
        }
      : {}),
    ...(env.AWS_ENDPOINT ? { endpoint: env.AWS_ENDPOINT } : {}),
  }
}
