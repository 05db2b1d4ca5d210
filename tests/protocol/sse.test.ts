import type { ReadableStream } from 'node:stream/web'
import { describe, expect, it } from 'vitest'
import { formatSseEvent, parseSseData, parseSseStream } from '../../src/server/protocol/sse.js'
import type { ProviderStreamChunk } from '../../src/server/protocol/types.js'
import { UpstreamError } from '../../src/server/providers/errors.js'
import { endlessBody, textStream } from '../helpers/upstream.js'

async function drain(body: ReadableStream<Uint8Array>): Promise<ProviderStreamChunk[]> {
  const chunks: ProviderStreamChunk[] = []
  for await (const chunk of parseSseStream(body)) {
    chunks.push(chunk)
  }
  return chunks
}

const collect = (parts: string[]) => drain(textStream(parts))

describe('formatSseEvent', () => {
  it('writes the event name and JSON data', () => {
    expect(formatSseEvent({ type: 'message_stop' })).toBe('event: message_stop\ndata: {"type":"message_stop"}\n\n')
  })

  it('writes the terminator for done', () => {
    expect(formatSseEvent({ type: 'done' })).toBe('data: [DONE]\n\n')
  })
})

describe('parseSseData', () => {
  it('returns null for the terminator', () => {
    expect(parseSseData('[DONE]')).toBeNull()
  })

  it('rejects malformed JSON as a connection error', () => {
    expect(() => parseSseData('not json')).toThrow('connection error: malformed stream chunk: not json')
  })

  it('raises error payloads sent mid-stream', () => {
    expect(() => parseSseData('{"error":{"message":"overloaded"}}')).toThrow(UpstreamError)
    expect(() => parseSseData('{"error":{"message":"overloaded"}}')).toThrow('api error: overloaded')
  })
})

describe('parseSseStream', () => {
  it('yields chunks split at arbitrary byte boundaries and stops at [DONE]', async () => {
    const chunks = await collect([
      'data: {"choices":[{"delta":{"con',
      'tent":"a"}}]}\n\n: keep-alive\n\nda',
      'ta: {"choices":[]}\n\ndata: [DONE]\n\n',
      'data: {"choices":[{"delta":{"content":"late"}}]}\n\n'
    ])
    expect(chunks).toEqual([{ choices: [{ delta: { content: 'a' } }] }, { choices: [] }])
  })

  it('accepts a final line without a trailing newline', async () => {
    expect(await collect(['data: {"id":"x"}'])).toEqual([{ id: 'x' }])
  })

  it('handles CRLF line endings', async () => {
    expect(await collect(['data: {"id":"a"}\r\n\r\ndata: [DONE]\r\n\r\n'])).toEqual([{ id: 'a' }])
  })

  it('propagates error payloads', async () => {
    await expect(collect(['data: {"error":{"message":"overloaded"}}\n\n'])).rejects.toThrow('api error: overloaded')
  })

  it('cancels the body after a malformed chunk', async () => {
    const upstream = endlessBody('data: {not json\n\n')
    await expect(drain(upstream.body)).rejects.toThrow('connection error: malformed stream chunk: {not json')
    expect(upstream.cancelled()).toBe(true)
  })

  it('cancels the body once [DONE] arrives', async () => {
    const upstream = endlessBody('data: {"id":"a"}\n\ndata: [DONE]\n\n')
    expect(await drain(upstream.body)).toEqual([{ id: 'a' }])
    expect(upstream.cancelled()).toBe(true)
  })

  it('cancels the body when the consumer stops early', async () => {
    const upstream = endlessBody('data: {"id":"a"}\n\n')
    for await (const chunk of parseSseStream(upstream.body)) {
      expect(chunk).toEqual({ id: 'a' })
      break
    }
    expect(upstream.cancelled()).toBe(true)
  })
})
