import { describe, expect, it } from 'vitest'
import { parseMessagesRequest, parseTokenCountRequest } from '../../src/server/protocol/normalize.js'

function makePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    model: 'claude-sonnet',
    max_tokens: 256,
    messages: [{ role: 'user', content: 'hi' }],
    ...overrides
  }
}

describe('parseMessagesRequest', () => {
  it('accepts a minimal request and defaults stream to false', () => {
    expect(parseMessagesRequest(makePayload())).toEqual({
      ok: true,
      value: {
        model: 'claude-sonnet',
        max_tokens: 256,
        messages: [{ role: 'user', content: 'hi' }],
        stream: false
      }
    })
  })

  it('rejects a body that is not an object', () => {
    expect(parseMessagesRequest('hello')).toEqual({ ok: false, message: 'request body must be a JSON object', path: undefined })
  })

  it('requires a model and a positive integer max_tokens', () => {
    expect(parseMessagesRequest(makePayload({ model: '' }))).toMatchObject({ ok: false, path: 'model' })
    expect(parseMessagesRequest(makePayload({ max_tokens: 0 }))).toMatchObject({ ok: false, path: 'max_tokens' })
    expect(parseMessagesRequest(makePayload({ max_tokens: 1.5 }))).toMatchObject({ ok: false, path: 'max_tokens' })
  })

  it('reports the path of an invalid content block', () => {
    const result = parseMessagesRequest(
      makePayload({
        messages: [{ role: 'user', content: [{ type: 'text', text: 'ok' }, { type: 'text', text: 42 }] }]
      })
    )
    expect(result).toEqual({ ok: false, message: 'text block needs a string text', path: 'messages[0].content[1].text' })
  })

  it('rejects an unknown role', () => {
    const result = parseMessagesRequest(makePayload({ messages: [{ role: 'robot', content: 'x' }] }))
    expect(result).toEqual({
      ok: false,
      message: 'role must be one of user, assistant, system, tool',
      path: 'messages[0].role'
    })
  })

  it('drops block types it does not translate', () => {
    const result = parseMessagesRequest(
      makePayload({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image', source: { type: 'base64', data: 'AAAA' } },
              { type: 'text', text: 'describe' }
            ]
          }
        ]
      })
    )
    expect(result.ok && result.value.messages[0]?.content).toEqual([{ type: 'text', text: 'describe' }])
  })

  it('normalizes tool_result content', () => {
    const result = parseMessagesRequest(
      makePayload({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'tool_result', tool_use_id: 'toolu_1', content: null },
              { type: 'tool_result', tool_use_id: 'toolu_2', content: ['raw', { type: 'text', text: 'part' }], is_error: 'yes' }
            ]
          }
        ]
      })
    )
    expect(result.ok && result.value.messages[0]?.content).toEqual([
      { type: 'tool_result', tool_use_id: 'toolu_1', content: '', is_error: false },
      {
        type: 'tool_result',
        tool_use_id: 'toolu_2',
        content: [
          { type: 'text', text: 'raw' },
          { type: 'text', text: 'part' }
        ],
        is_error: false
      }
    ])
  })

  it('keeps tool_use input and thinking signatures', () => {
    const result = parseMessagesRequest(
      makePayload({
        messages: [
          {
            role: 'assistant',
            content: [
              { type: 'thinking', thinking: 'hmm', signature: 'sig' },
              { type: 'tool_use', id: 'toolu_1', name: 'Read', input: { path: 'a' } }
            ]
          }
        ]
      })
    )
    expect(result.ok && result.value.messages[0]?.content).toEqual([
      { type: 'thinking', thinking: 'hmm', signature: 'sig' },
      { type: 'tool_use', id: 'toolu_1', name: 'Read', input: { path: 'a' } }
    ])
  })

  it('keeps only text blocks of an array system prompt', () => {
    const result = parseMessagesRequest(
      makePayload({
        system: [
          { type: 'text', text: 'Be brief.', cache_control: { type: 'ephemeral' } },
          { type: 'other', value: 1 }
        ]
      })
    )
    expect(result.ok && result.value.system).toEqual([{ type: 'text', text: 'Be brief.' }])
  })

  it('validates tools', () => {
    expect(parseMessagesRequest(makePayload({ tools: [{ name: 'Read' }] }))).toEqual({
      ok: false,
      message: 'input_schema must be an object',
      path: 'tools[0].input_schema'
    })
    const result = parseMessagesRequest(
      makePayload({ tools: [{ name: 'Read', description: 'read a file', input_schema: { type: 'object' } }] })
    )
    expect(result.ok && result.value.tools).toEqual([
      { name: 'Read', description: 'read a file', input_schema: { type: 'object' } }
    ])
  })

  it('validates sampling options and stop sequences', () => {
    expect(parseMessagesRequest(makePayload({ temperature: 'hot' }))).toMatchObject({ ok: false, path: 'temperature' })
    expect(parseMessagesRequest(makePayload({ stop_sequences: ['a', 1] }))).toMatchObject({
      ok: false,
      path: 'stop_sequences'
    })
    const result = parseMessagesRequest(
      makePayload({ temperature: 0.5, top_p: 1, stop_sequences: ['END'], stream: true, metadata: { user_id: 'u' } })
    )
    expect(result).toMatchObject({
      ok: true,
      value: { temperature: 0.5, top_p: 1, stop_sequences: ['END'], stream: true, metadata: { user_id: 'u' } }
    })
  })
})

describe('parseTokenCountRequest', () => {
  it('needs only messages', () => {
    expect(parseTokenCountRequest({ messages: [{ role: 'user', content: 'count me' }] })).toEqual({
      ok: true,
      value: { messages: [{ role: 'user', content: 'count me' }] }
    })
  })

  it('rejects a missing messages array', () => {
    expect(parseTokenCountRequest({ model: 'x' })).toEqual({ ok: false, message: 'messages must be an array', path: 'messages' })
  })
})
