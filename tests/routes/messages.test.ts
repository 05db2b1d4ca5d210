import type { FastifyInstance } from 'fastify'
import { afterEach, describe, expect, it } from 'vitest'
import { defaultConfig } from '../../src/server/config/manager.js'
import type { GatewayConfig } from '../../src/server/config/types.js'
import { createServer } from '../../src/server/index.js'
import type { ErrorBody } from '../../src/server/routes/messages.js'
import type { MessagesResponse } from '../../src/server/protocol/types.js'
import { FakeConnector, jsonResponse, sseResponse } from '../helpers/upstream.js'

function testConfig(): GatewayConfig {
  const config = defaultConfig()
  return {
    ...config,
    logLevel: 'fatal',
    requestLogging: false,
    upstream: { ...config.upstream, apiKey: 'test-secret', maxRetries: 0 }
  }
}

const baseRequest = {
  model: 'claude-sonnet',
  max_tokens: 128,
  messages: [{ role: 'user', content: 'hello' }]
}

describe('messages routes', () => {
  let app: FastifyInstance | null = null

  async function start(connector: FakeConnector): Promise<FastifyInstance> {
    app = await createServer({ config: testConfig(), connector })
    return app
  }

  afterEach(async () => {
    await app?.close()
    app = null
  })

  it('reports status and the upstream model', async () => {
    const server = await start(new FakeConnector([]))
    const response = await server.inject({ method: 'GET', url: '/' })
    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ status: 'ok', provider: 'nim', model: 'moonshotai/kimi-k2.5' })

    const health = await server.inject({ method: 'GET', url: '/health' })
    expect(health.json<{ status: string; timestamp: number }>().status).toBe('ok')
  })

  it('rejects an invalid request with the failing field', async () => {
    const server = await start(new FakeConnector([]))
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { model: 'claude-sonnet', messages: [] }
    })
    expect(response.statusCode).toBe(400)
    expect(response.json<ErrorBody>()).toEqual({
      type: 'error',
      error: { type: 'invalid_request_error', message: 'max_tokens must be a positive integer (max_tokens)' }
    })
  })

  it('rejects a body that is not JSON', async () => {
    const server = await start(new FakeConnector([]))
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      headers: { 'content-type': 'application/json' },
      payload: '{"model":'
    })
    expect(response.statusCode).toBe(400)
    expect(response.json<ErrorBody>().error.type).toBe('invalid_request_error')
  })

  it('answers housekeeping requests locally, even when streaming is asked for', async () => {
    const connector = new FakeConnector([])
    const server = await start(connector)
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { ...baseRequest, max_tokens: 1, stream: true, messages: [{ role: 'user', content: 'quota' }] }
    })
    expect(response.statusCode).toBe(200)
    expect(response.json<MessagesResponse>().content).toEqual([{ type: 'text', text: 'Quota check passed.' }])
    expect(connector.requests).toHaveLength(0)
  })

  it('forwards housekeeping requests when their shortcut is disabled', async () => {
    const connector = new FakeConnector([
      jsonResponse(200, { id: 'chatcmpl-q', choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }] })
    ])
    const config = testConfig()
    app = await createServer({ config: { ...config, shortcuts: { ...config.shortcuts, quotaCheck: false } }, connector })
    const response = await app.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { ...baseRequest, max_tokens: 1, messages: [{ role: 'user', content: 'quota' }] }
    })
    expect(response.statusCode).toBe(200)
    expect(response.json<MessagesResponse>().content).toEqual([{ type: 'text', text: 'ok' }])
    expect(connector.requests).toHaveLength(1)
  })

  it('returns a complete message', async () => {
    const connector = new FakeConnector([
      jsonResponse(200, {
        id: 'chatcmpl-7',
        choices: [{ message: { content: 'Hi there' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 3, completion_tokens: 2 }
      })
    ])
    const server = await start(connector)
    const response = await server.inject({ method: 'POST', url: '/anthropic/v1/messages', payload: baseRequest })

    expect(response.statusCode).toBe(200)
    const body = response.json<MessagesResponse>()
    expect(body.id).toBe('chatcmpl-7')
    expect(body.content).toEqual([{ type: 'text', text: 'Hi there' }])
    expect(body.usage.output_tokens).toBe(2)
  })

  it('maps upstream failures to client errors', async () => {
    const connector = new FakeConnector([jsonResponse(401, { error: { message: 'invalid key' } })])
    const server = await start(connector)
    const response = await server.inject({ method: 'POST', url: '/v1/messages', payload: baseRequest })

    expect(response.statusCode).toBe(401)
    expect(response.json<ErrorBody>()).toEqual({
      type: 'error',
      error: { type: 'authentication_error', message: 'authentication error: invalid key' }
    })
  })

  it('streams server-sent events ending with the terminator', async () => {
    const connector = new FakeConnector([
      sseResponse([
        { choices: [{ delta: { content: 'Hi' } }] },
        { choices: [{ delta: {}, finish_reason: 'stop' }], usage: { completion_tokens: 1 } }
      ])
    ])
    const server = await start(connector)
    const response = await server.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: { ...baseRequest, stream: true }
    })

    expect(response.statusCode).toBe(200)
    expect(response.headers['content-type']).toBe('text/event-stream; charset=utf-8')
    const names = response.body
      .split('\n')
      .filter((line) => line.startsWith('event: '))
      .map((line) => line.slice('event: '.length))
    expect(names).toEqual([
      'message_start',
      'content_block_start',
      'content_block_delta',
      'content_block_stop',
      'message_delta',
      'message_stop'
    ])
    expect(response.body).toContain(
      'event: content_block_delta\ndata: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi"}}\n\n'
    )
    expect(response.body.endsWith('event: message_stop\ndata: {"type":"message_stop"}\n\ndata: [DONE]\n\n')).toBe(true)
  })

  it('counts tokens on both route prefixes', async () => {
    const server = await start(new FakeConnector([]))
    for (const url of ['/v1/messages/count_tokens', '/anthropic/v1/messages/count_tokens']) {
      const response = await server.inject({
        method: 'POST',
        url,
        payload: { model: 'claude-sonnet', messages: [{ role: 'user', content: 'hello' }] }
      })
      expect(response.statusCode).toBe(200)
      // one token for the text plus three for the message
      expect(response.json()).toEqual({ input_tokens: 4 })
    }
  })

  it('rejects a token count without messages', async () => {
    const server = await start(new FakeConnector([]))
    const response = await server.inject({ method: 'POST', url: '/v1/messages/count_tokens', payload: {} })
    expect(response.statusCode).toBe(400)
    expect(response.json<ErrorBody>().error.message).toBe('messages must be an array (messages)')
  })
})
