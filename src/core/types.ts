import type { z } from 'zod'

export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type TTokenProvider = {
  /**
   * Returns a bearer token valid for every scope in `scopes`, or `undefined` when the
   * provider has nothing to offer. Implementations may cache and rotate tokens.
   */
  getToken(scopes: readonly string[], signal?: AbortSignal): Promise<string | undefined>
  /** Drops any cached token so the next `getToken` fetches a fresh one. */
  clearCache?(): void
}

/** A single query or path value as it appears on the wire. */
export type TParamValue = string | number | boolean

/** Values accepted for typed parameters; arrays produce one pair per element. */
export type TQueryValue = TParamValue | readonly TParamValue[] | undefined

export type TQueryShape = Record<string, TQueryValue>

export type TMediaUpload = {
  /** Largest accepted payload in bytes. */
  maxSize: number
  /** Template relative to the hub's root URL, e.g. `upload/books/v1/cloudloading/addBook`. */
  path: string
}

/**
 * Static description of one REST method. One descriptor replaces a generated call-builder
 * type: `Call` reads everything it needs to validate, template and decode from here.
 */
export type TMethodDescriptor<TResponse, TQuery extends TQueryShape = TQueryShape, TBody = never> = {
  /** Discovery id, e.g. `chromemanagement.customers.apps.android.get`. */
  id: string
  httpMethod: THttpMethod
  /** Template relative to the hub's base URL, e.g. `v1/{+name}`. */
  path: string
  pathParameters: readonly string[]
  query: z.ZodType<TQuery, z.ZodTypeDef, unknown>
  /** Accepted scopes. The first one is the default unless the caller overrides. */
  scopes: readonly string[]
  response: z.ZodType<TResponse, z.ZodTypeDef, unknown>
  request?: z.ZodType<TBody, z.ZodTypeDef, unknown>
  mediaUpload?: TMediaUpload
}

export type TMethodInfo = {
  id: string
  httpMethod: THttpMethod
}

/** The response as the executor saw it, with the body already read. */
export type THttpResponse = {
  status: number
  statusText: string
  headers: Headers
  body: string
}

export type TCallResult<TResponse> = {
  response: THttpResponse
  data: TResponse
}

export type TUploadPayload = {
  data: Uint8Array
  mimeType: string
}

/** Everything the executor needs for one call, assembled by `Call`. */
export type TRequestSpec = {
  info: TMethodInfo
  url: string
  scopes: readonly string[]
  body?: { contentType: string; data: string | Uint8Array }
  signal?: AbortSignal
}

export type TBackoffOptions = {
  /** Total attempts including the first one. */
  attempts: number
  baseDelayInMilliseconds: number
  maximumDelayInMilliseconds: number
}
