import type { ReadableStream } from 'node:stream/web'
import type { Headers } from 'undici'
import type { ProviderChatRequestBody } from '../protocol/types.js'

export interface ProviderRequest {
  body: ProviderChatRequestBody
  stream: boolean
  signal?: AbortSignal
}

export interface ProviderResponse {
  status: number
  headers: Headers
  body: ReadableStream<Uint8Array> | null
  /** Releases the request timeout. Call once the body has been consumed. */
  dispose: () => void
}

export interface ProviderConnector {
  id: string
  url: string
  send(request: ProviderRequest): Promise<ProviderResponse>
}
