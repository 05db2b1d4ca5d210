export type UpstreamErrorKind = 'authentication' | 'rate_limit' | 'bad_request' | 'api' | 'transport'

export type ClientErrorType =
  | 'authentication_error'
  | 'rate_limit_error'
  | 'invalid_request_error'
  | 'api_error'

const MESSAGE_PREFIX: Record<UpstreamErrorKind, string> = {
  authentication: 'authentication error',
  rate_limit: 'rate limit error',
  bad_request: 'bad request',
  api: 'api error',
  transport: 'connection error'
}

const CLIENT_ERROR_TYPE: Record<UpstreamErrorKind, ClientErrorType> = {
  authentication: 'authentication_error',
  rate_limit: 'rate_limit_error',
  bad_request: 'invalid_request_error',
  api: 'api_error',
  transport: 'api_error'
}

export interface UpstreamErrorOptions {
  status?: number
  retryable?: boolean
  cause?: unknown
}

/**
 * Failure talking to the upstream chat-completions service. `message` already
 * carries the kind prefix shown to clients.
 */
export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind
  readonly status?: number
  readonly retryable: boolean
  readonly detail: string

  constructor(kind: UpstreamErrorKind, detail: string, options: UpstreamErrorOptions = {}) {
    super(`${MESSAGE_PREFIX[kind]}: ${detail}`, { cause: options.cause })
    this.name = 'UpstreamError'
    this.kind = kind
    this.detail = detail
    this.status = options.status
    this.retryable = options.retryable ?? false
  }

  get clientErrorType(): ClientErrorType {
    return CLIENT_ERROR_TYPE[this.kind]
  }

  /** HTTP status surfaced to the client for non-streaming requests. */
  get clientStatus(): number {
    switch (this.kind) {
      case 'authentication':
        return 401
      case 'rate_limit':
        return 429
      case 'bad_request':
        return 400
      default:
        return this.status !== undefined && this.status >= 500 ? this.status : 502
    }
  }
}

export class TransportError extends UpstreamError {
  constructor(detail: string, options: Omit<UpstreamErrorOptions, 'status'> = {}) {
    super('transport', detail, { retryable: true, ...options })
    this.name = 'TransportError'
  }
}

export function classifyStatus(status: number, detail: string): UpstreamError {
  if (status === 401 || status === 403) {
    return new UpstreamError('authentication', detail, { status })
  }
  if (status === 429) {
    return new UpstreamError('rate_limit', detail, { status, retryable: true })
  }
  if (status === 400 || status === 404 || status === 409 || status === 422) {
    return new UpstreamError('bad_request', detail, { status })
  }
  return new UpstreamError('api', detail, { status, retryable: status >= 500 })
}

/**
 * Pulls a readable message out of an upstream error body, which may be JSON
 * in either `{error:{message}}` or `{message}` shape, or plain text.
 */
export function extractErrorDetail(raw: string): string {
  const text = raw.trim()
  if (!text) return 'empty response body'
  const message = findMessage(parseJson(text))
  if (message) return message
  return text.length > 500 ? `${text.slice(0, 500)}…` : text
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return null
  }
}

function findMessage(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) return null
  if ('error' in value) {
    const inner = value.error
    if (typeof inner === 'string') return inner
    const nested = findMessage(inner)
    if (nested) return nested
  }
  if ('message' in value && typeof value.message === 'string') {
    return value.message
  }
  return null
}

export function toUpstreamError(error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return new TransportError('request timed out', { cause: error })
    }
    return new TransportError(error.message, { cause: error })
  }
  return new TransportError(String(error))
}
