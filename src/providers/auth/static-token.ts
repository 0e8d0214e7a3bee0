import { ConfigurationError } from '../../core/errors.ts'
import type { TTokenProvider } from '../../core/types.ts'

/**
 * Hands out one fixed access token for every scope set. Without a token it offers nothing,
 * which is enough for hubs whose calls go out with an API key.
 */
export class StaticTokenProvider implements TTokenProvider {
  private readonly accessToken?: string

  constructor(accessToken?: string) {
    if (accessToken !== undefined && (typeof accessToken !== 'string' || accessToken === '')) {
      throw new ConfigurationError('accessToken must be a non-empty string')
    }
    this.accessToken = accessToken
  }

  async getToken(): Promise<string | undefined> {
    return this.accessToken
  }
}
