import type { FastifyBaseLogger } from 'fastify'
import type { UpstreamConfig } from '../config/types.js'
import type {
  MessagesRequest,
  MessagesResponse,
  ProviderChatRequestBody,
  ProviderChatResponse,
  StreamEvent
} from '../protocol/types.js'
import { buildProviderBody } from '../protocol/toProvider.js'
import { convertUpstreamResponse } from '../protocol/responseConverter.js'
import { StreamTranslator } from '../protocol/streamTranslator.js'
import { parseSseStream } from '../protocol/sse.js'
import { createOpenAIConnector } from './openai.js'
import type { RateGate } from './rateGate.js'
import { TransportError, UpstreamError, classifyStatus, extractErrorDetail, toUpstreamError } from './errors.js'
import { parseRetryAfter, readBodyText, sleep } from './utils.js'
import type { ProviderConnector, ProviderResponse } from './types.js'

export interface NimProviderOptions {
  config: UpstreamConfig
  gate: RateGate
  logger: FastifyBaseLogger
  connector?: ProviderConnector
  /** Base delay of the exponential retry backoff. */
  retryDelayMs?: number
}

export interface StreamRequestOptions {
  inputTokens: number
  signal?: AbortSignal
}

const MAX_RETRY_DELAY_MS = 10_000
const RATE_LIMIT_COOL_DOWN_SECONDS = 60

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isChatResponse(value: unknown): value is ProviderChatResponse {
  if (!isRecord(value) || !Array.isArray(value.choices)) return false
  return value.choices.every((choice: unknown) => isRecord(choice) && isRecord(choice.message))
}

/**
 * Client of the hosted chat-completions service. Owns admission through the
 * shared gate, retries, error classification and translation of both the
 * streaming and the complete response shape.
 */
export class NimProvider {
  private readonly config: UpstreamConfig
  private readonly gate: RateGate
  private readonly logger: FastifyBaseLogger
  private readonly connector: ProviderConnector
  private readonly retryDelayMs: number

  constructor(options: NimProviderOptions) {
    this.config = options.config
    this.gate = options.gate
    this.logger = options.logger
    this.connector = options.connector ?? createOpenAIConnector(options.config, { id: 'nim' })
    this.retryDelayMs = options.retryDelayMs ?? 500
  }

  get model(): string {
    return this.config.model
  }

  get id(): string {
    return this.connector.id
  }

  /**
   * Streams client protocol events. Upstream failures end the stream with an
   * error text block instead of throwing; an aborted signal ends it silently.
   */
  async *stream(request: MessagesRequest, options: StreamRequestOptions): AsyncGenerator<StreamEvent> {
    const { signal } = options
    let waited: boolean
    try {
      waited = await this.gate.wait(signal)
    } catch (err) {
      if (signal?.aborted) return
      throw err
    }
    if (waited) {
      this.logger.warn('upstream cool-down was active, request resumed')
    }

    const translator = new StreamTranslator({ model: this.config.model, inputTokens: options.inputTokens })
    yield* translator.begin(waited)

    const body = buildProviderBody(request, { model: this.config.model })
    this.logRequest('stream', body)

    let response: ProviderResponse | null = null
    try {
      response = await this.send(body, true, signal)
      if (!response.body) {
        throw new TransportError('upstream returned an empty body')
      }
      for await (const chunk of parseSseStream(response.body)) {
        if (signal?.aborted) return
        yield* translator.push(chunk)
      }
    } catch (err) {
      if (signal?.aborted) return
      const error = this.handleError(err, 'stream')
      yield* translator.fail(error.message)
    } finally {
      response?.dispose()
    }

    if (signal?.aborted) return
    yield* translator.finish()
  }

  async complete(request: MessagesRequest, signal?: AbortSignal): Promise<MessagesResponse> {
    await this.gate.wait(signal)
    const body = buildProviderBody(request, { model: this.config.model })
    this.logRequest('complete', body)

    try {
      const response = await this.send(body, false, signal)
      let text: string
      try {
        text = await readBodyText(response.body)
      } finally {
        response.dispose()
      }
      return convertUpstreamResponse(this.parseResponse(text), this.config.model)
    } catch (err) {
      throw this.handleError(err, 'complete')
    }
  }

  private parseResponse(text: string): ProviderChatResponse {
    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch (err) {
      throw new TransportError(`malformed response body: ${text.slice(0, 200)}`, { cause: err })
    }
    if (isRecord(payload) && payload.error !== undefined && payload.error !== null) {
      throw new UpstreamError('api', extractErrorDetail(text))
    }
    if (!isChatResponse(payload)) {
      throw new TransportError('response has no choices')
    }
    return payload
  }

  /**
   * Sends once plus up to `maxRetries` retries for retryable failures. A
   * response below 400 is returned with its body unread.
   */
  private async send(body: ProviderChatRequestBody, stream: boolean, signal?: AbortSignal): Promise<ProviderResponse> {
    let attempt = 0
    while (true) {
      let retryAfterMs: number | null = null
      try {
        const response = await this.connector.send({ body, stream, signal })
        if (response.status < 400) {
          return response
        }
        retryAfterMs = parseRetryAfter(response.headers.get('retry-after'))
        let detail: string
        try {
          detail = extractErrorDetail(await readBodyText(response.body))
        } finally {
          response.dispose()
        }
        throw classifyStatus(response.status, detail)
      } catch (err) {
        if (signal?.aborted) throw err
        const error = toUpstreamError(err)
        if (!error.retryable || attempt >= this.config.maxRetries) {
          throw error
        }
        attempt += 1
        const backoff = this.retryDelayMs * 2 ** (attempt - 1)
        const delayMs = Math.min(Math.max(backoff, retryAfterMs ?? 0), MAX_RETRY_DELAY_MS)
        this.logger.warn({ attempt, delayMs, kind: error.kind, status: error.status }, 'retrying upstream request')
        await sleep(delayMs, signal)
      }
    }
  }

  private handleError(err: unknown, operation: 'stream' | 'complete'): UpstreamError {
    const error = toUpstreamError(err)
    if (error.kind === 'rate_limit') {
      this.gate.block(RATE_LIMIT_COOL_DOWN_SECONDS)
    }
    this.logger.error({ kind: error.kind, status: error.status }, `${operation} error: ${error.message}`)
    return error
  }

  private logRequest(operation: 'stream' | 'complete', body: ProviderChatRequestBody): void {
    this.logger.info(
      { model: body.model, messages: body.messages.length, tools: body.tools?.length ?? 0 },
      `${operation} request`
    )
  }
}
