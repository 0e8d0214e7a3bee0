import { z } from 'zod'
import { AuthError, ConfigurationError } from '../../core/errors.ts'
import type { TTokenProvider } from '../../core/types.ts'
import { createTimeoutSignal, resolveFetch, validateRequiredStrings, validateUrl } from '../../core/utils.ts'

const DEFAULT_TOKEN_URL = 'https://oauth2.googleapis.com/token'
const DEFAULT_REFRESH_BUFFER_MS = 30_000
const DEFAULT_TIMEOUT_MS = 10_000

export type TRefreshTokenProviderOptions = {
  /** OAuth2 client ID. */
  clientId: string
  /** OAuth2 client secret. */
  clientSecret: string
  /** Long-lived refresh token issued to the client. */
  refreshToken: string
  /** @default 'https://oauth2.googleapis.com/token' */
  tokenUrl?: string
  /** Time in ms before expiry to trigger refresh. @default 30000 */
  refreshBufferMs?: number
  /** Request timeout in ms. @default 10000 */
  timeoutMs?: number
  fetchImplementation?: typeof fetch
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
})

const tokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
})

type TCachedToken = {
  token: string
  expiresAtMs: number
}

/**
 * Token provider using the OAuth2 refresh-token grant. Tokens are cached per scope set and
 * refreshed before expiry; concurrent requests for the same scope set share one refresh.
 */
export class RefreshTokenProvider implements TTokenProvider {
  private readonly clientId: string
  private readonly clientSecret: string
  private readonly refreshToken: string
  private readonly tokenUrl: string
  private readonly refreshBufferMs: number
  private readonly timeoutMs: number
  private readonly fetchImplementation: typeof fetch

  private readonly cachedTokens = new Map<string, TCachedToken>()
  private readonly pendingTokenRequests = new Map<string, Promise<string>>()

  constructor(options: TRefreshTokenProviderOptions) {
    this.validateOptions(options)

    this.clientId = options.clientId
    this.clientSecret = options.clientSecret
    this.refreshToken = options.refreshToken
    this.tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL
    this.refreshBufferMs = options.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  /**
   * Returns a valid access token for `scopes`, fetching or refreshing as needed. Aborting
   * `signal` rejects this caller only; a refresh shared with other callers keeps going.
   */
  async getToken(scopes: readonly string[], signal?: AbortSignal): Promise<string> {
    const key = scopeKey(scopes)
    const cached = this.cachedTokens.get(key)
    if (cached && Date.now() < cached.expiresAtMs - this.refreshBufferMs) {
      return cached.token
    }
    if (signal?.aborted) throw new AuthError('Token request was cancelled')

    let request = this.pendingTokenRequests.get(key)
    if (!request) {
      request = this.fetchToken(key).finally(() => this.pendingTokenRequests.delete(key))
      this.pendingTokenRequests.set(key, request)
    }
    return signal ? await raceCancellation(request, signal) : await request
  }

  /** Clears cached tokens, forcing the next getToken() to fetch fresh. */
  clearCache(): void {
    this.cachedTokens.clear()
  }

  private async fetchToken(key: string): Promise<string> {
    const now = Date.now()
    const timeout = createTimeoutSignal(this.timeoutMs)

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.clientId,
      client_secret: this.clientSecret,
      refresh_token: this.refreshToken,
    })
    if (key !== '') body.set('scope', key)

    try {
      const response = await this.fetchImplementation(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
        signal: timeout.signal,
      })

      if (!response.ok) {
        await this.handleErrorResponse(response)
      }

      const parsed = tokenResponseSchema.safeParse(await response.json())
      if (!parsed.success) {
        throw new AuthError('Token response missing access_token or expires_in')
      }

      const token = { token: parsed.data.access_token, expiresAtMs: now + parsed.data.expires_in * 1000 }
      this.cachedTokens.set(key, token)
      return token.token
    } catch (error) {
      if (error instanceof AuthError) {
        throw error
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new AuthError(`Token request timed out after ${this.timeoutMs}ms`, { cause: error })
      }

      throw new AuthError(
        `Failed to fetch token: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      )
    } finally {
      timeout.cleanup()
    }
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text()
    let errorDetail = text
    try {
      const parsed = tokenErrorSchema.safeParse(JSON.parse(text))
      if (parsed.success) {
        errorDetail = parsed.data.error_description ?? parsed.data.error ?? text
      }
    } catch {
      // not JSON: report the raw body
    }

    const statusMessage = errorDetail ? `: ${errorDetail}` : ''

    if (response.status === 400 || response.status === 401) {
      throw new AuthError(`Refresh token rejected (${response.status})${statusMessage}`)
    }

    if (response.status >= 500) {
      throw new AuthError(`Token server error (${response.status})${statusMessage}`)
    }

    throw new AuthError(`Token request failed (${response.status})${statusMessage}`)
  }

  private validateOptions(options: TRefreshTokenProviderOptions): void {
    validateRequiredStrings(options, ['clientId', 'clientSecret', 'refreshToken'])

    if (options.tokenUrl !== undefined) {
      validateUrl('tokenUrl', options.tokenUrl)
    }

    if (options.refreshBufferMs !== undefined) {
      if (typeof options.refreshBufferMs !== 'number' || options.refreshBufferMs < 0) {
        throw new ConfigurationError('refreshBufferMs must be a non-negative number')
      }
    }

    if (options.timeoutMs !== undefined) {
      if (typeof options.timeoutMs !== 'number' || options.timeoutMs <= 0) {
        throw new ConfigurationError('timeoutMs must be a positive number')
      }
    }
  }
}

/** Settles with `request`, or rejects as soon as `signal` aborts. */
async function raceCancellation(request: Promise<string>, signal: AbortSignal): Promise<string> {
  let cancel = () => {}
  const cancelled = new Promise<never>((_resolve, reject) => {
    cancel = () => reject(new AuthError('Token request was cancelled'))
    signal.addEventListener('abort', cancel, { once: true })
  })
  try {
    return await Promise.race([request, cancelled])
  } finally {
    signal.removeEventListener('abort', cancel)
  }
}

/** Order-independent cache key of a scope set. */
function scopeKey(scopes: readonly string[]): string {
  return [...new Set(scopes)].sort().join(' ')
}
