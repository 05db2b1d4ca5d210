import type { ReadableStream } from 'node:stream/web'
import type { ProviderStreamChunk, StreamEvent } from './types.js'
import { TransportError, UpstreamError, extractErrorDetail } from '../providers/errors.js'

export const SSE_DONE_FRAME = 'data: [DONE]\n\n'

export function formatSseEvent(event: StreamEvent): string {
  if (event.type === 'done') {
    return SSE_DONE_FRAME
  }
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStreamChunk(value: Record<string, unknown>): value is Record<string, unknown> & ProviderStreamChunk {
  return value.choices === undefined || Array.isArray(value.choices)
}

/**
 * Decodes one `data:` payload. Returns null for the terminator, throws for
 * malformed JSON and for error payloads sent in the middle of a stream.
 */
export function parseSseData(data: string): ProviderStreamChunk | null {
  if (data === '[DONE]') return null

  let payload: unknown
  try {
    payload = JSON.parse(data)
  } catch (error) {
    throw new TransportError(`malformed stream chunk: ${data.slice(0, 200)}`, { cause: error })
  }

  if (!isRecord(payload)) {
    throw new TransportError(`unexpected stream chunk: ${data.slice(0, 200)}`)
  }
  if (payload.error !== undefined && payload.error !== null) {
    throw new UpstreamError('api', extractErrorDetail(data))
  }
  if (!isStreamChunk(payload)) {
    throw new TransportError(`unexpected stream chunk: ${data.slice(0, 200)}`)
  }
  return payload
}

/**
 * Reads an upstream chat-completions SSE body and yields its chunks until
 * `[DONE]` or the end of the body. A body left unread is cancelled on exit.
 */
export async function* parseSseStream(body: ReadableStream<Uint8Array>): AsyncGenerator<ProviderStreamChunk> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let buffer = ''
  // Set once the body ended or failed by itself
  let settled = false

  try {
    while (true) {
      const { value, done } = await reader.read().catch((error: unknown) => {
        settled = true
        throw error
      })
      if (done) {
        settled = true
        break
      }
      if (!value) continue
      buffer += decoder.decode(value, { stream: true })

      let newlineIndex = buffer.indexOf('\n')
      while (newlineIndex !== -1) {
        const line = buffer.slice(0, newlineIndex).trim()
        buffer = buffer.slice(newlineIndex + 1)
        newlineIndex = buffer.indexOf('\n')

        if (!line.startsWith('data:')) continue
        const data = line.slice(5).trim()
        if (!data) continue
        const chunk = parseSseData(data)
        if (chunk === null) return
        yield chunk
      }
    }

    buffer += decoder.decode()
    const tail = buffer.trim()
    if (tail.startsWith('data:') && tail.length > 5) {
      const chunk = parseSseData(tail.slice(5).trim())
      if (chunk !== null) {
        yield chunk
      }
    }
  } finally {
    if (!settled) {
      await reader.cancel()
    }
    reader.releaseLock()
  }
}
