import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { parse as parseEnv } from 'dotenv'
import { z } from 'zod'
import { ConfigurationError } from '../core/errors.ts'
import { formatIssues } from '../core/decoder.ts'
import type { TLogLevel } from '../core/logger.ts'
import type { TTokenProvider } from '../core/types.ts'
import { RefreshTokenProvider } from '../providers/auth/refresh-token.ts'
import { StaticTokenProvider } from '../providers/auth/static-token.ts'

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
)

const envSchema = z
  .object({
    GOOGLE_API_ACCESS_TOKEN: optionalString,
    GOOGLE_API_KEY: optionalString,
    GOOGLE_OAUTH_CLIENT_ID: optionalString,
    GOOGLE_OAUTH_CLIENT_SECRET: optionalString,
    GOOGLE_OAUTH_REFRESH_TOKEN: optionalString,
    GOOGLE_API_HUBS_LOG_LEVEL: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.enum(['debug', 'warn', 'error', 'silent']).optional(),
    ),
  })
  .superRefine((env, context) => {
    const oauth = [
      env.GOOGLE_OAUTH_CLIENT_ID,
      env.GOOGLE_OAUTH_CLIENT_SECRET,
      env.GOOGLE_OAUTH_REFRESH_TOKEN,
    ]
    const given = oauth.filter((value) => value !== undefined).length
    if (given > 0 && given < oauth.length) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          'GOOGLE_OAUTH_CLIENT_ID, GOOGLE_OAUTH_CLIENT_SECRET and GOOGLE_OAUTH_REFRESH_TOKEN must be set together',
      })
    }
  })

export type TCliConfig = {
  accessToken?: string
  apiKey?: string
  oauth?: { clientId: string; clientSecret: string; refreshToken: string }
  logLevel?: TLogLevel
}

export type TLoadConfigOptions = {
  /** Explicit env file; it must exist. Without one, `.env` in `cwd` is read when present. */
  envFile?: string
  env: Record<string, string | undefined>
  cwd: string
}

/** Reads configuration from the environment, with values from the env file underneath. */
export function loadCliConfig(options: TLoadConfigOptions): TCliConfig {
  const fileValues = readEnvFile(options)
  const parsed = envSchema.safeParse({ ...fileValues, ...options.env })
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }

  const env = parsed.data
  const oauth =
    env.GOOGLE_OAUTH_CLIENT_ID && env.GOOGLE_OAUTH_CLIENT_SECRET && env.GOOGLE_OAUTH_REFRESH_TOKEN
      ? {
          clientId: env.GOOGLE_OAUTH_CLIENT_ID,
          clientSecret: env.GOOGLE_OAUTH_CLIENT_SECRET,
          refreshToken: env.GOOGLE_OAUTH_REFRESH_TOKEN,
        }
      : undefined

  return {
    accessToken: env.GOOGLE_API_ACCESS_TOKEN,
    apiKey: env.GOOGLE_API_KEY,
    oauth,
    logLevel: env.GOOGLE_API_HUBS_LOG_LEVEL,
  }
}

function readEnvFile(options: TLoadConfigOptions): Record<string, string> {
  if (options.envFile !== undefined) {
    const path = resolve(options.cwd, options.envFile)
    try {
      return parseEnv(readFileSync(path))
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read env file '${options.envFile}': ${error instanceof Error ? error.message : String(error)}`,
      )
    }
  }
  const defaultPath = resolve(options.cwd, '.env')
  return existsSync(defaultPath) ? parseEnv(readFileSync(defaultPath)) : {}
}

/** OAuth refresh credentials win over a fixed access token; with neither, calls need an API key. */
export function createTokenProvider(
  config: TCliConfig,
  fetchImplementation?: typeof fetch,
): TTokenProvider {
  if (config.oauth) {
    return new RefreshTokenProvider({ ...config.oauth, fetchImplementation })
  }
  return new StaticTokenProvider(config.accessToken)
}
