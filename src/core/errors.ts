import type { THttpResponse } from './types.ts'

export type THubErrorKind =
  | 'configuration'
  | 'auth'
  | 'invalid-parameter'
  | 'field-clash'
  | 'missing-token'
  | 'missing-api-key'
  | 'http'
  | 'failure'
  | 'bad-request'
  | 'json-decode'
  | 'upload-size-limit-exceeded'
  | 'cancelled'

/** Common base of every error raised by a hub call. Switch on `kind` to handle them. */
export abstract class HubError extends Error {
  abstract readonly kind: THubErrorKind
}

/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends HubError {
  readonly kind = 'configuration'

  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** A token provider could not obtain a token. The executor reports it as `MissingTokenError`. */
export class AuthError extends HubError {
  readonly kind = 'auth'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthError'
  }
}

/** A typed parameter value did not satisfy its schema. Raised before any request is sent. */
export class InvalidParameterError extends HubError {
  readonly kind = 'invalid-parameter'
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid parameters: ${issues.join('; ')}`)
    this.name = 'InvalidParameterError'
    this.issues = issues
  }
}

/** An additional parameter has the same name as a typed one. Raised before any request is sent. */
export class FieldClashError extends HubError {
  readonly kind = 'field-clash'
  readonly field: string

  constructor(field: string) {
    super(`Parameter '${field}' must be set through its typed setter, not as an additional parameter`)
    this.name = 'FieldClashError'
    this.field = field
  }
}

export class MissingTokenError extends HubError {
  readonly kind = 'missing-token'

  constructor(cause: unknown) {
    super(`Failed to obtain an access token: ${describeCause(cause)}`, { cause })
    this.name = 'MissingTokenError'
  }
}

/** The call was made without scopes, so it needs a `key` parameter, and none was given. */
export class MissingApiKeyError extends HubError {
  readonly kind = 'missing-api-key'

  constructor() {
    super('No scopes were requested and no API key was provided')
    this.name = 'MissingApiKeyError'
  }
}

/** Transport-level failure (DNS, connection, TLS, timeout) that was not retried. */
export class HttpError extends HubError {
  readonly kind = 'http'

  constructor(cause: unknown) {
    super(`HTTP transport failed: ${describeCause(cause)}`, { cause })
    this.name = 'HttpError'
  }
}

/** Non-2xx response whose body is not a structured server error. */
export class FailureError extends HubError {
  readonly kind = 'failure'
  readonly response: THttpResponse

  constructor(response: THttpResponse) {
    super(`HTTP ${response.status} ${response.statusText}`.trimEnd())
    this.name = 'FailureError'
    this.response = response
  }
}

export type TServerErrorDetail = {
  code?: number
  message?: string
  status?: string
  details?: Record<string, unknown>[]
  errors?: Record<string, unknown>[]
}

/** Non-2xx response carrying a structured server error. */
export class BadRequestError extends HubError {
  readonly kind = 'bad-request'
  readonly status: number
  readonly error: TServerErrorDetail

  constructor(status: number, error: TServerErrorDetail) {
    super(`HTTP ${status}: ${error.message ?? error.status ?? 'server error'}`)
    this.name = 'BadRequestError'
    this.status = status
    this.error = error
  }
}

/** A 2xx response body did not decode into the expected schema. */
export class JsonDecodeError extends HubError {
  readonly kind = 'json-decode'
  readonly body: string
  readonly diagnostics: string

  constructor(body: string, diagnostics: string, cause?: unknown) {
    super(`Failed to decode response: ${diagnostics}`, { cause })
    this.name = 'JsonDecodeError'
    this.body = body
    this.diagnostics = diagnostics
  }
}

export class UploadSizeLimitExceededError extends HubError {
  readonly kind = 'upload-size-limit-exceeded'
  readonly size: number
  readonly maxSize: number

  constructor(size: number, maxSize: number) {
    super(`Upload of ${size} bytes exceeds the limit of ${maxSize} bytes`)
    this.name = 'UploadSizeLimitExceededError'
    this.size = size
    this.maxSize = maxSize
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class CancelledError extends HubError {
  readonly kind = 'cancelled'

  constructor(message = 'Operation cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

export type TApiError =
  | ConfigurationError
  | AuthError
  | InvalidParameterError
  | FieldClashError
  | MissingTokenError
  | MissingApiKeyError
  | HttpError
  | FailureError
  | BadRequestError
  | JsonDecodeError
  | UploadSizeLimitExceededError
  | CancelledError

export function isHubError(error: unknown): error is TApiError {
  return error instanceof HubError
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
