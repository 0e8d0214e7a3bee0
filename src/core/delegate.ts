import { logger } from './logger.ts'
import { backoffDelay } from './retry.ts'
import type { TBackoffOptions, THttpResponse, TMethodInfo } from './types.ts'
import type { TServerErrorDetail } from './errors.ts'

export type TRetry = { type: 'abort' } | { type: 'after'; delayInMilliseconds: number }

export const Retry = {
  abort(): TRetry {
    return { type: 'abort' }
  },
  after(delayInMilliseconds: number): TRetry {
    return { type: 'after', delayInMilliseconds }
  },
}

/** Decides whether a failed attempt is tried again. `attempt` counts from 1. */
export type TRetryPolicy = {
  httpError(error: unknown, attempt: number): TRetry
  httpFailure(
    response: THttpResponse,
    serverError: TServerErrorDetail | undefined,
    attempt: number,
  ): TRetry
}

/** Lifecycle callbacks with no influence on the outcome of a call. */
export type TProgressObserver = {
  begin?(info: TMethodInfo): void
  preRequest?(attempt: number): void
  responseJsonDecodeError?(body: string, diagnostics: string): void
  finished?(isSuccess: boolean): void
}

/**
 * Consulted by the executor at each decision point of a call. Every hook is optional;
 * a missing retry hook means "do not retry".
 */
export type TDelegate = Partial<TRetryPolicy> &
  TProgressObserver & {
    /**
     * Called when the token provider fails. Return a token to continue with it, or
     * `undefined` to fail the call with `MissingTokenError`.
     */
    token?(error: unknown): string | undefined | Promise<string | undefined>
  }

/** Never retries and observes nothing. Used when a call has no delegate of its own. */
export const DEFAULT_DELEGATE: TDelegate = Object.freeze({})

export function composeDelegate(
  retryPolicy: TRetryPolicy,
  observer: TProgressObserver = {},
  extra: Pick<TDelegate, 'token'> = {},
): TDelegate {
  return {
    httpError: (error, attempt) => retryPolicy.httpError(error, attempt),
    httpFailure: (response, serverError, attempt) =>
      retryPolicy.httpFailure(response, serverError, attempt),
    begin: observer.begin?.bind(observer),
    preRequest: observer.preRequest?.bind(observer),
    responseJsonDecodeError: observer.responseJsonDecodeError?.bind(observer),
    finished: observer.finished?.bind(observer),
    token: extra.token,
  }
}

const DEFAULT_BACKOFF: TBackoffOptions = {
  attempts: 5,
  baseDelayInMilliseconds: 500,
  maximumDelayInMilliseconds: 30_000,
}

export type TBackoffRetryPolicyOptions = Partial<TBackoffOptions> & {
  /** HTTP statuses worth retrying. Defaults to 408, 429 and every 5xx. */
  isRetryableStatus?: (status: number) => boolean
}

function defaultRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599)
}

/**
 * Exponential backoff with jitter for transport errors and retryable statuses.
 * Honors a numeric `retry-after` header when it asks for a longer wait.
 */
export class BackoffRetryPolicy implements TRetryPolicy {
  private readonly backoff: TBackoffOptions
  private readonly isRetryableStatus: (status: number) => boolean

  constructor(options: TBackoffRetryPolicyOptions = {}) {
    this.backoff = {
      attempts: options.attempts ?? DEFAULT_BACKOFF.attempts,
      baseDelayInMilliseconds:
        options.baseDelayInMilliseconds ?? DEFAULT_BACKOFF.baseDelayInMilliseconds,
      maximumDelayInMilliseconds:
        options.maximumDelayInMilliseconds ?? DEFAULT_BACKOFF.maximumDelayInMilliseconds,
    }
    this.isRetryableStatus = options.isRetryableStatus ?? defaultRetryableStatus
  }

  httpError(error: unknown, attempt: number): TRetry {
    if (attempt >= this.backoff.attempts) return Retry.abort()
    const delay = this.delayFor(attempt)
    logger.debug(`Transport error on attempt ${attempt}, retrying in ${Math.round(delay)}ms`, error)
    return Retry.after(delay)
  }

  httpFailure(response: THttpResponse, _serverError: unknown, attempt: number): TRetry {
    if (attempt >= this.backoff.attempts || !this.isRetryableStatus(response.status)) {
      return Retry.abort()
    }
    const delay = Math.max(this.delayFor(attempt), retryAfterMilliseconds(response) ?? 0)
    logger.debug(`HTTP ${response.status} on attempt ${attempt}, retrying in ${Math.round(delay)}ms`)
    return Retry.after(delay)
  }

  private delayFor(attempt: number): number {
    return backoffDelay(attempt, this.backoff)
  }
}

function retryAfterMilliseconds(response: THttpResponse): number | undefined {
  const header = response.headers.get('retry-after')
  if (header === null) return undefined
  const seconds = Number(header)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}
