import { describe, expect, it, vi } from 'vitest'
import { countRequestTokens, estimateTextTokens } from '../../src/server/protocol/tokenizer.js'

// Forces the length-based fallback so counts are predictable
vi.mock('tiktoken', () => ({
  get_encoding: () => {
    throw new Error('encoder unavailable')
  }
}))

describe('estimateTextTokens', () => {
  it('falls back to a quarter of the length', () => {
    expect(estimateTextTokens('abcdefghij')).toBe(2)
    expect(estimateTextTokens('')).toBe(0)
    expect(estimateTextTokens(null)).toBe(0)
  })
})

describe('countRequestTokens', () => {
  it('never reports less than one token', () => {
    expect(countRequestTokens({ messages: [] })).toBe(1)
  })

  it('adds system, blocks, tools and a per-message overhead', () => {
    const total = countRequestTokens({
      system: 'abcdefgh',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'abcd' },
            { type: 'tool_result', tool_use_id: 'toolu_1', content: 'abcdefgh' }
          ]
        },
        {
          role: 'assistant',
          content: [{ type: 'tool_use', id: 'toolu_1', name: 'Read', input: { p: 1 } }]
        }
      ],
      tools: [{ name: 'ab', description: 'cd', input_schema: {} }]
    })
    // system 2, text 1, tool_result 2+5, tool_use 1+1+10, tool 1+5, messages 2*3
    expect(total).toBe(34)
  })
})
