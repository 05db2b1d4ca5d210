/**
 * Response Format Conversion Module
 *
 * Converts a complete (non-streaming) chat-completions response into a
 * client protocol message.
 */

import type { MessagesResponse, ProviderChatResponse, ProviderResponseMessage, ResponseBlock } from './types.js'
import { generateId } from './contentHelpers.js'
import { extractThinkSpans } from './thinkParser.js'
import { mapStopReason } from './conversionMap.js'

// ============================================================================
// Tool arguments
// ============================================================================

export type ToolArgumentsResult =
  | { ok: true; value: unknown }
  | { ok: false; raw: string }

/**
 * Parse the JSON argument string of a tool call. Malformed JSON is not an
 * error: the caller decides what to do with the raw text.
 *
 * @example
 * parseToolArguments('{"path":"a.txt"}') // { ok: true, value: { path: 'a.txt' } }
 * parseToolArguments('{"path":')         // { ok: false, raw: '{"path":' }
 */
export function parseToolArguments(raw: string | null | undefined): ToolArgumentsResult {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return { ok: true, value: {} }
  }
  try {
    const value: unknown = JSON.parse(raw)
    return { ok: true, value }
  } catch {
    return { ok: false, raw }
  }
}

function toolInput(raw: string | undefined): unknown {
  const parsed = parseToolArguments(raw)
  return parsed.ok ? parsed.value : parsed.raw
}

// ============================================================================
// Reasoning and text
// ============================================================================

function explicitReasoning(message: ProviderResponseMessage): string | null {
  if (message.reasoning_content) {
    return message.reasoning_content
  }
  if (Array.isArray(message.reasoning_details) && message.reasoning_details.length > 0) {
    const joined = message.reasoning_details.map((detail) => detail.text ?? '').join('\n')
    return joined || null
  }
  return null
}

function contentBlocks(message: ProviderResponseMessage, hasReasoning: boolean): ResponseBlock[] {
  const raw = message.content
  if (!raw) return []

  if (typeof raw === 'string') {
    const blocks: ResponseBlock[] = []
    let text = raw
    // Inline spans only count when the upstream did not use its reasoning channel
    if (!hasReasoning) {
      const extracted = extractThinkSpans(raw)
      if (extracted.thinking !== null) {
        blocks.push({ type: 'thinking', thinking: extracted.thinking })
        text = extracted.remaining
      }
    }
    if (text) {
      blocks.push({ type: 'text', text })
    }
    return blocks
  }

  return raw
    .filter((part) => part.type === 'text' && typeof part.text === 'string' && part.text.length > 0)
    .map((part): ResponseBlock => ({ type: 'text', text: part.text ?? '' }))
}

// ============================================================================
// Main conversion
// ============================================================================

/**
 * Convert a chat-completions response to a client protocol message.
 *
 * @example
 * convertUpstreamResponse({
 *   id: 'chatcmpl-1',
 *   choices: [{ message: { content: 'Hello' }, finish_reason: 'stop' }],
 *   usage: { prompt_tokens: 10, completion_tokens: 2 }
 * }, 'kimi')
 */
export function convertUpstreamResponse(response: ProviderChatResponse, model: string): MessagesResponse {
  const choice = response.choices[0]
  const message: ProviderResponseMessage = choice?.message ?? {}
  const content: ResponseBlock[] = []

  const reasoning = explicitReasoning(message)
  if (reasoning) {
    content.push({ type: 'thinking', thinking: reasoning })
  }

  content.push(...contentBlocks(message, reasoning !== null))

  for (const call of message.tool_calls ?? []) {
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.function.name,
      input: toolInput(call.function.arguments)
    })
  }

  if (content.length === 0) {
    content.push({ type: 'text', text: ' ' })
  }

  return {
    id: response.id ?? generateId('msg'),
    type: 'message',
    role: 'assistant',
    model,
    content,
    stop_reason: mapStopReason(choice?.finish_reason),
    stop_sequence: null,
    usage: {
      input_tokens: response.usage?.prompt_tokens ?? 0,
      output_tokens: response.usage?.completion_tokens ?? 0,
      cache_creation_input_tokens: 0,
      cache_read_input_tokens: 0
    }
  }
}
