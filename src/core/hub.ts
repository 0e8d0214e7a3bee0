import { Call, type TCallContext } from './call.ts'
import { composeDelegate, type TDelegate, type TRetryPolicy } from './delegate.ts'
import { ConfigurationError } from './errors.ts'
import { Transport } from './transport.ts'
import type { TMethodDescriptor, TQueryShape, TTokenProvider } from './types.ts'
import { normalizeBaseUrl, validateUrl } from './utils.ts'

export type THubOptions = {
  /** Supplies bearer tokens for scoped calls. */
  tokenProvider: TTokenProvider
  /** Sent as `key` on calls made without scopes. */
  apiKey?: string
  baseUrl?: string
  rootUrl?: string
  userAgent?: string
  fetchImplementation?: typeof fetch
  timeoutInMilliseconds?: number
  /** Delegate for calls that do not set their own. */
  delegate?: TDelegate
  /** Shorthand for a delegate built from this retry policy alone. Ignored when `delegate` is set. */
  retryPolicy?: TRetryPolicy
}

export type THubDefaults = {
  baseUrl: string
  rootUrl: string
}

/**
 * Root object of one API: holds the transport, the auth provider and the base and root URLs.
 * Concrete hubs add resource accessors that create calls through `call`.
 */
export abstract class Hub {
  protected readonly transport: Transport
  private baseUrl: string
  private rootUrl: string
  private readonly apiKey?: string
  private readonly delegate?: TDelegate

  protected constructor(options: THubOptions, defaults: THubDefaults) {
    if (!options.tokenProvider || typeof options.tokenProvider.getToken !== 'function') {
      throw new ConfigurationError('tokenProvider is required')
    }
    if (options.timeoutInMilliseconds !== undefined && options.timeoutInMilliseconds <= 0) {
      throw new ConfigurationError('timeoutInMilliseconds must be a positive number')
    }

    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? defaults.baseUrl)
    this.rootUrl = normalizeBaseUrl(options.rootUrl ?? defaults.rootUrl)
    validateUrl('baseUrl', this.baseUrl)
    validateUrl('rootUrl', this.rootUrl)

    this.apiKey = options.apiKey
    this.delegate =
      options.delegate ?? (options.retryPolicy ? composeDelegate(options.retryPolicy) : undefined)
    this.transport = new Transport({
      tokenProvider: options.tokenProvider,
      userAgent: options.userAgent,
      fetchImplementation: options.fetchImplementation,
      timeoutInMilliseconds: options.timeoutInMilliseconds,
    })
  }

  /** Sets the user-agent sent with every request and returns the previous one. */
  setUserAgent(userAgent: string): string {
    return this.transport.setUserAgent(userAgent)
  }

  /** Sets the URL method paths are resolved against and returns the previous one. */
  setBaseUrl(baseUrl: string): string {
    const previous = this.baseUrl
    validateUrl('baseUrl', baseUrl)
    this.baseUrl = normalizeBaseUrl(baseUrl)
    return previous
  }

  /** Sets the URL upload paths are resolved against and returns the previous one. */
  setRootUrl(rootUrl: string): string {
    const previous = this.rootUrl
    validateUrl('rootUrl', rootUrl)
    this.rootUrl = normalizeBaseUrl(rootUrl)
    return previous
  }

  getBaseUrl(): string {
    return this.baseUrl
  }

  getRootUrl(): string {
    return this.rootUrl
  }

  /** Creates a call for `descriptor` with its path parameters (and body) already bound. */
  call<TResponse, TQuery extends TQueryShape, TBody = never>(
    descriptor: TMethodDescriptor<TResponse, TQuery, TBody>,
    pathValues: Record<string, string>,
    body?: TBody,
  ): Call<TResponse, TQuery, TBody> {
    const context: TCallContext = {
      transport: this.transport,
      baseUrl: this.baseUrl,
      rootUrl: this.rootUrl,
      apiKey: this.apiKey,
      delegate: this.delegate,
    }
    return new Call(context, descriptor, pathValues, body)
  }
}
