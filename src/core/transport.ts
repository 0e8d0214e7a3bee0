import type { z } from 'zod'
import { decodeResponse, parseServerError } from './decoder.ts'
import { DEFAULT_DELEGATE, Retry, type TDelegate, type TRetry } from './delegate.ts'
import {
  BadRequestError,
  CancelledError,
  FailureError,
  HttpError,
  JsonDecodeError,
  MissingTokenError,
} from './errors.ts'
import { logger } from './logger.ts'
import { sleep } from './retry.ts'
import { USER_AGENT } from './sdk-info.ts'
import type { TCallResult, THttpResponse, TRequestSpec, TTokenProvider } from './types.ts'
import { createTimeoutSignal, resolveFetch } from './utils.ts'

export type TTransportOptions = {
  tokenProvider: TTokenProvider
  userAgent?: string
  fetchImplementation?: typeof fetch | undefined
  /** Per-attempt limit. A timed-out attempt is a transport error like any other. */
  timeoutInMilliseconds?: number
}

type TAttemptOutcome =
  | { type: 'response'; response: THttpResponse; ok: boolean }
  | { type: 'transport-error'; error: unknown }

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError()
}

/**
 * Executes one request spec: acquire token, send, then succeed, retry or fail as the
 * delegate decides. Exactly one HTTP request is made per loop iteration.
 */
export class Transport {
  private readonly tokenProvider: TTokenProvider
  private readonly fetchImplementation: typeof fetch
  private readonly timeoutInMilliseconds?: number
  private userAgent: string

  constructor(options: TTransportOptions) {
    this.tokenProvider = options.tokenProvider
    this.userAgent = options.userAgent ?? USER_AGENT
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
    this.timeoutInMilliseconds = options.timeoutInMilliseconds
  }

  /** Returns the previous user agent. */
  setUserAgent(userAgent: string): string {
    const previous = this.userAgent
    this.userAgent = userAgent
    return previous
  }

  async execute<TResponse>(
    spec: TRequestSpec,
    schema: z.ZodType<TResponse, z.ZodTypeDef, unknown>,
    delegate: TDelegate = DEFAULT_DELEGATE,
  ): Promise<TCallResult<TResponse>> {
    try {
      for (let attempt = 1; ; attempt++) {
        throwIfCancelled(spec.signal)
        const token = await this.acquireToken(spec, delegate)

        delegate.preRequest?.(attempt)
        const outcome = await this.send(spec, token)

        let decision: TRetry
        if (outcome.type === 'transport-error') {
          throwIfCancelled(spec.signal)
          decision = delegate.httpError?.(outcome.error, attempt) ?? Retry.abort()
          if (decision.type === 'abort') throw new HttpError(outcome.error)
        } else if (!outcome.ok) {
          const serverError = parseServerError(outcome.response.body)
          decision =
            delegate.httpFailure?.(outcome.response, serverError, attempt) ?? Retry.abort()
          if (decision.type === 'abort') {
            throw serverError
              ? new BadRequestError(outcome.response.status, serverError)
              : new FailureError(outcome.response)
          }
        } else {
          const data = this.decode(outcome.response.body, schema, delegate)
          delegate.finished?.(true)
          return { response: outcome.response, data }
        }

        logger.debug(
          `${spec.info.id}: attempt ${attempt} failed, retrying in ${Math.round(decision.delayInMilliseconds)}ms`,
        )
        await sleep(decision.delayInMilliseconds, spec.signal)
      }
    } catch (error) {
      delegate.finished?.(false)
      throw error
    }
  }

  private async acquireToken(spec: TRequestSpec, delegate: TDelegate): Promise<string | undefined> {
    if (spec.scopes.length === 0) return undefined
    try {
      return await this.tokenProvider.getToken(spec.scopes, spec.signal)
    } catch (error) {
      throwIfCancelled(spec.signal)
      const substitute = await delegate.token?.(error)
      if (substitute === undefined) throw new MissingTokenError(error)
      logger.warn(`${spec.info.id}: token provider failed, using the token supplied by the delegate`)
      return substitute
    }
  }

  private async send(spec: TRequestSpec, token: string | undefined): Promise<TAttemptOutcome> {
    const timeout =
      this.timeoutInMilliseconds !== undefined
        ? createTimeoutSignal(this.timeoutInMilliseconds, spec.signal)
        : undefined

    const headers: Record<string, string> = { 'user-agent': this.userAgent }
    if (token !== undefined) headers.authorization = `Bearer ${token}`
    if (spec.body) headers['content-type'] = spec.body.contentType

    try {
      const httpResponse: Response = await this.fetchImplementation(spec.url, {
        method: spec.info.httpMethod,
        headers,
        body: spec.body?.data,
        signal: timeout?.signal ?? spec.signal,
      })
      const body = await httpResponse.text()
      return {
        type: 'response',
        ok: httpResponse.ok,
        response: {
          status: httpResponse.status,
          statusText: httpResponse.statusText,
          headers: httpResponse.headers,
          body,
        },
      }
    } catch (error) {
      return { type: 'transport-error', error }
    } finally {
      timeout?.cleanup()
    }
  }

  private decode<TResponse>(
    body: string,
    schema: z.ZodType<TResponse, z.ZodTypeDef, unknown>,
    delegate: TDelegate,
  ): TResponse {
    try {
      return decodeResponse(body, schema)
    } catch (error) {
      if (error instanceof JsonDecodeError) {
        delegate.responseJsonDecodeError?.(error.body, error.diagnostics)
      }
      throw error
    }
  }
}
