import { z } from 'zod'
import { formatIssues } from './decoder.ts'
import type { TDelegate } from './delegate.ts'
import {
  ConfigurationError,
  InvalidParameterError,
  MissingApiKeyError,
  UploadSizeLimitExceededError,
} from './errors.ts'
import { assertNoFieldClash, Params } from './params.ts'
import type { Transport } from './transport.ts'
import type {
  TCallResult,
  TMethodDescriptor,
  TQueryShape,
  TRequestSpec,
  TUploadPayload,
} from './types.ts'
import { buildUrl, expandTemplate } from './url-template.ts'

/** What a call needs from the hub that created it. */
export type TCallContext = {
  transport: Transport
  baseUrl: string
  rootUrl: string
  apiKey?: string
  delegate?: TDelegate
}

/**
 * Builder for a single invocation of a method. Set typed parameters with `set`, escape-hatch
 * parameters with `param`, then run it once with `doit`.
 */
export class Call<TResponse, TQuery extends TQueryShape = TQueryShape, TBody = never> {
  private readonly context: TCallContext
  private readonly descriptor: TMethodDescriptor<TResponse, TQuery, TBody>
  private readonly pathValues: Record<string, string>
  private readonly requestBody: TBody | undefined
  private readonly query: Record<string, unknown> = {}
  private readonly additionalParams = new Map<string, string>()
  private readonly scopes = new Set<string>()
  private scopesCleared = false
  private callDelegate?: TDelegate
  private abortSignal?: AbortSignal
  private uploadPayload?: TUploadPayload
  private consumed = false

  constructor(
    context: TCallContext,
    descriptor: TMethodDescriptor<TResponse, TQuery, TBody>,
    pathValues: Record<string, string>,
    requestBody?: TBody,
  ) {
    this.context = context
    this.descriptor = descriptor
    this.pathValues = { ...pathValues }
    this.requestBody = requestBody
  }

  /** Sets a typed query parameter. */
  set<K extends keyof TQuery & string>(name: K, value: TQuery[K]): this {
    this.query[name] = value
    return this
  }

  /** Sets several typed query parameters at once. */
  with(values: Partial<TQuery>): this {
    Object.assign(this.query, values)
    return this
  }

  /**
   * Sets a typed query parameter from its textual form; the method's schema converts it.
   * Returns false when the method has no parameter of that name.
   */
  setFromString(name: string, value: string): boolean {
    if (!this.queryParameterNames().includes(name)) return false
    const current = this.query[name]
    if (this.isRepeated(name)) {
      this.query[name] = Array.isArray(current) ? [...current, value] : [value]
    } else {
      this.query[name] = value
    }
    return true
  }

  /** Replaces a path parameter given when the call was created. */
  setPath(name: string, value: string): this {
    if (!this.descriptor.pathParameters.includes(name)) {
      throw new ConfigurationError(`${this.descriptor.id} has no path parameter '${name}'`)
    }
    this.pathValues[name] = value
    return this
  }

  /**
   * Sets a parameter that has no typed setter, such as `fields`, `quotaUser` or `key`.
   * Using the name of a typed parameter fails the call with `FieldClashError`.
   */
  param(name: string, value: string): this {
    this.additionalParams.set(name, value)
    return this
  }

  /** Adds a scope. Once any scope is added, the method's default scope no longer applies. */
  addScope(scope: string): this {
    this.scopes.add(scope)
    return this
  }

  addScopes(scopes: Iterable<string>): this {
    for (const scope of scopes) this.scopes.add(scope)
    return this
  }

  /** Removes every scope, including the method's default. The call then needs an API key. */
  clearScopes(): this {
    this.scopes.clear()
    this.scopesCleared = true
    return this
  }

  delegate(delegate: TDelegate): this {
    this.callDelegate = delegate
    return this
  }

  signal(signal: AbortSignal): this {
    this.abortSignal = signal
    return this
  }

  /** Attaches a media payload. Only methods that accept uploads take one. */
  upload(data: Uint8Array, mimeType: string): this {
    if (!this.descriptor.mediaUpload) {
      throw new ConfigurationError(`${this.descriptor.id} does not accept media uploads`)
    }
    this.uploadPayload = { data, mimeType }
    return this
  }

  /** Scopes the call authenticates with: those added, else the method's first declared one. */
  getScopes(): string[] {
    if (this.scopes.size > 0 || this.scopesCleared) return [...this.scopes]
    return this.descriptor.scopes.slice(0, 1)
  }

  /** Names of the typed query parameters, as they go on the wire. */
  queryParameterNames(): string[] {
    const schema = this.descriptor.query
    return schema instanceof z.ZodObject ? Object.keys(schema.shape) : []
  }

  /** Performs the request. A call can only be performed once. */
  async doit(): Promise<TCallResult<TResponse>> {
    if (this.consumed) {
      throw new ConfigurationError(`${this.descriptor.id} call has already been performed`)
    }
    this.consumed = true

    const delegate = this.callDelegate ?? this.context.delegate
    delegate?.begin?.({ id: this.descriptor.id, httpMethod: this.descriptor.httpMethod })

    let spec: TRequestSpec
    try {
      spec = this.buildRequestSpec()
    } catch (error) {
      delegate?.finished?.(false)
      throw error
    }
    return await this.context.transport.execute(spec, this.descriptor.response, delegate)
  }

  /** Validates and assembles the request without sending it. */
  buildRequestSpec(): TRequestSpec {
    const descriptor = this.descriptor
    const upload = this.uploadPayload
    const knownFields = ['alt', ...descriptor.pathParameters, ...this.queryParameterNames()]
    if (descriptor.mediaUpload) knownFields.push('uploadType')
    assertNoFieldClash(knownFields, this.additionalParams)

    if (upload && descriptor.mediaUpload && upload.data.byteLength > descriptor.mediaUpload.maxSize) {
      throw new UploadSizeLimitExceededError(upload.data.byteLength, descriptor.mediaUpload.maxSize)
    }

    const query = this.validateQuery()
    const params = new Params()
    for (const name of descriptor.pathParameters) {
      const value = this.pathValues[name]
      if (value === undefined) {
        throw new ConfigurationError(`${descriptor.id} requires path parameter '${name}'`)
      }
      params.push(name, value)
    }
    for (const [name, value] of Object.entries(query)) params.pushValue(name, value)
    params.extend(this.additionalParams)
    if (upload) params.push('uploadType', 'media')
    params.push('alt', 'json')

    const scopes = this.getScopes()
    if (scopes.length === 0 && !params.has('key')) {
      if (!this.context.apiKey) throw new MissingApiKeyError()
      params.push('key', this.context.apiKey)
    }

    const url =
      upload && descriptor.mediaUpload
        ? buildUrl(this.context.rootUrl, expandTemplate(descriptor.mediaUpload.path, params), params)
        : buildUrl(this.context.baseUrl, expandTemplate(descriptor.path, params), params)

    return {
      info: { id: descriptor.id, httpMethod: descriptor.httpMethod },
      url,
      scopes,
      body: this.buildBody(upload),
      signal: this.abortSignal,
    }
  }

  private validateQuery(): TQuery {
    const result = this.descriptor.query.safeParse(this.query)
    if (!result.success) {
      throw new InvalidParameterError(formatIssues(result.error).split('; '))
    }
    return result.data
  }

  private buildBody(upload: TUploadPayload | undefined): TRequestSpec['body'] {
    if (upload) return { contentType: upload.mimeType, data: upload.data }
    if (this.requestBody === undefined) return undefined
    const request = this.descriptor.request
    if (request) {
      const result = request.safeParse(this.requestBody)
      if (!result.success) {
        throw new InvalidParameterError(formatIssues(result.error).split('; '))
      }
      return { contentType: 'application/json', data: JSON.stringify(result.data) }
    }
    return { contentType: 'application/json', data: JSON.stringify(this.requestBody) }
  }

  private isRepeated(name: string): boolean {
    const schema = this.descriptor.query
    if (!(schema instanceof z.ZodObject)) return false
    const field: unknown = schema.shape[name]
    return field instanceof z.ZodType && unwrapOptional(field) instanceof z.ZodArray
  }
}

export function unwrapOptional(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema
  while (
    current instanceof z.ZodOptional ||
    current instanceof z.ZodNullable ||
    current instanceof z.ZodDefault
  ) {
    current = current instanceof z.ZodDefault ? current._def.innerType : current.unwrap()
  }
  return current
}
