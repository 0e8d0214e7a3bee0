import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTokenProvider, loadCliConfig } from '../../../src/cli/config.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { RefreshTokenProvider } from '../../../src/providers/auth/refresh-token.ts'
import { StaticTokenProvider } from '../../../src/providers/auth/static-token.ts'
import { TEST_CONFIG } from '../../helpers/constants.ts'

describe('loadCliConfig', () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'google-api-hubs-config-'))
  })

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true })
  })

  it('reads the environment', () => {
    const config = loadCliConfig({
      cwd,
      env: { GOOGLE_API_ACCESS_TOKEN: TEST_CONFIG.accessToken, GOOGLE_API_KEY: TEST_CONFIG.apiKey },
    })

    expect(config).toEqual({
      accessToken: TEST_CONFIG.accessToken,
      apiKey: TEST_CONFIG.apiKey,
      oauth: undefined,
      logLevel: undefined,
    })
  })

  it('treats empty variables as unset', () => {
    const config = loadCliConfig({ cwd, env: { GOOGLE_API_KEY: '', GOOGLE_API_HUBS_LOG_LEVEL: '' } })

    expect(config.apiKey).toBeUndefined()
    expect(config.logLevel).toBeUndefined()
  })

  it('reads .env from the working directory underneath the environment', async () => {
    await writeFile(join(cwd, '.env'), 'GOOGLE_API_KEY=from-file\nGOOGLE_API_HUBS_LOG_LEVEL=debug\n')

    const config = loadCliConfig({ cwd, env: { GOOGLE_API_KEY: 'from-env' } })

    expect(config.apiKey).toBe('from-env')
    expect(config.logLevel).toBe('debug')
  })

  it('reads an explicit env file relative to the working directory', async () => {
    await writeFile(
      join(cwd, 'oauth.env'),
      [
        `GOOGLE_OAUTH_CLIENT_ID=${TEST_CONFIG.clientId}`,
        `GOOGLE_OAUTH_CLIENT_SECRET=${TEST_CONFIG.clientSecret}`,
        `GOOGLE_OAUTH_REFRESH_TOKEN=${TEST_CONFIG.refreshToken}`,
      ].join('\n'),
    )

    const config = loadCliConfig({ cwd, env: {}, envFile: 'oauth.env' })

    expect(config.oauth).toEqual({
      clientId: TEST_CONFIG.clientId,
      clientSecret: TEST_CONFIG.clientSecret,
      refreshToken: TEST_CONFIG.refreshToken,
    })
  })

  it('fails when an explicit env file is missing', () => {
    expect(() => loadCliConfig({ cwd, env: {}, envFile: 'missing.env' })).toThrow(
      "Cannot read env file 'missing.env'",
    )
  })

  it('requires the OAuth variables together', () => {
    expect(() => loadCliConfig({ cwd, env: { GOOGLE_OAUTH_CLIENT_ID: TEST_CONFIG.clientId } })).toThrow(
      new ConfigurationError(
        'Invalid configuration: <root>: GOOGLE_OAUTH_CLIENT_ID, GOOGLE_OAUTH_CLIENT_SECRET and GOOGLE_OAUTH_REFRESH_TOKEN must be set together',
      ),
    )
  })

  it('rejects an unknown log level', () => {
    expect(() => loadCliConfig({ cwd, env: { GOOGLE_API_HUBS_LOG_LEVEL: 'loud' } })).toThrow(
      ConfigurationError,
    )
  })
})

describe('createTokenProvider', () => {
  it('prefers OAuth refresh credentials', () => {
    const provider = createTokenProvider({
      accessToken: TEST_CONFIG.accessToken,
      oauth: {
        clientId: TEST_CONFIG.clientId,
        clientSecret: TEST_CONFIG.clientSecret,
        refreshToken: TEST_CONFIG.refreshToken,
      },
    })

    expect(provider).toBeInstanceOf(RefreshTokenProvider)
  })

  it('falls back to the fixed access token', async () => {
    const provider = createTokenProvider({ accessToken: TEST_CONFIG.accessToken })

    expect(provider).toBeInstanceOf(StaticTokenProvider)
    expect(await provider.getToken([])).toBe(TEST_CONFIG.accessToken)
  })
})
