import { get_encoding, type Tiktoken } from 'tiktoken'
import type { ClientTool, ContentBlock, TokenCountRequest } from './types.js'
import { systemText } from './contentHelpers.js'

let encoder: Tiktoken | null | undefined

function getEncoder(): Tiktoken | null {
  if (encoder !== undefined) return encoder
  try {
    encoder = get_encoding('cl100k_base')
  } catch {
    encoder = null
  }
  return encoder
}

export function estimateTextTokens(text: string | null | undefined): number {
  if (!text) return 0
  const enc = getEncoder()
  if (!enc) {
    return Math.floor(text.length / 4)
  }
  return enc.encode(text).length
}

function estimateBlockTokens(block: ContentBlock): number {
  switch (block.type) {
    case 'text':
      return estimateTextTokens(block.text)
    case 'thinking':
      return estimateTextTokens(block.thinking)
    case 'tool_use':
      return estimateTextTokens(block.name) + estimateTextTokens(JSON.stringify(block.input ?? {})) + 10
    case 'tool_result': {
      const content = typeof block.content === 'string' ? block.content : JSON.stringify(block.content)
      return estimateTextTokens(content) + 5
    }
    default:
      return 0
  }
}

function estimateToolTokens(tool: ClientTool): number {
  return estimateTextTokens(tool.name + (tool.description ?? '') + JSON.stringify(tool.input_schema)) + 5
}

/**
 * Approximate prompt size. Not the upstream tokenizer, only close enough for
 * `count_tokens` and the `message_start` usage hint.
 */
export function countRequestTokens(request: TokenCountRequest): number {
  let total = estimateTextTokens(systemText(request.system))

  for (const message of request.messages) {
    if (typeof message.content === 'string') {
      total += estimateTextTokens(message.content)
    } else {
      for (const block of message.content) {
        total += estimateBlockTokens(block)
      }
    }
  }

  for (const tool of request.tools ?? []) {
    total += estimateToolTokens(tool)
  }

  total += request.messages.length * 3
  return Math.max(1, total)
}
