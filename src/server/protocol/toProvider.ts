import type {
  ClientMessage,
  ClientTool,
  ContentBlock,
  MessagesRequest,
  ProviderChatMessage,
  ProviderChatRequestBody,
  ProviderTool,
  ProviderToolCall
} from './types.js'
import { collectText, flattenToolResultContent, stringifyToolInput, systemText } from './contentHelpers.js'
import { THINK_CLOSE_TAG, THINK_OPEN_TAG } from './thinkParser.js'

function convertAssistant(blocks: ContentBlock[]): ProviderChatMessage {
  const textParts: string[] = []
  const reasoningParts: string[] = []
  const toolCalls: ProviderToolCall[] = []

  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        textParts.push(block.text)
        break
      case 'thinking':
        reasoningParts.push(block.thinking)
        break
      case 'tool_use':
        toolCalls.push({
          id: block.id,
          type: 'function',
          function: {
            name: block.name,
            arguments: stringifyToolInput(block.input)
          }
        })
        break
      default:
        break
    }
  }

  // Prior reasoning is replayed inline so the upstream template sees it in context
  const sections: string[] = []
  if (reasoningParts.length > 0) {
    sections.push(`${THINK_OPEN_TAG}\n${reasoningParts.join('\n')}\n${THINK_CLOSE_TAG}`)
  }
  if (textParts.length > 0) {
    sections.push(textParts.join('\n'))
  }

  let content = sections.join('\n\n')
  if (!content && toolCalls.length === 0) {
    content = ' '
  }

  const message: ProviderChatMessage = { role: 'assistant', content }
  if (toolCalls.length > 0) {
    message.tool_calls = toolCalls
  }
  return message
}

function convertUser(blocks: ContentBlock[]): ProviderChatMessage[] {
  const messages: ProviderChatMessage[] = []
  const textParts: string[] = []

  for (const block of blocks) {
    if (block.type === 'text') {
      textParts.push(block.text)
    } else if (block.type === 'tool_result') {
      messages.push({
        role: 'tool',
        tool_call_id: block.tool_use_id,
        content: flattenToolResultContent(block.content)
      })
    }
  }

  if (textParts.length > 0) {
    messages.push({ role: 'user', content: textParts.join('\n') })
  }
  return messages
}

export function convertMessages(messages: ClientMessage[]): ProviderChatMessage[] {
  const result: ProviderChatMessage[] = []
  for (const message of messages) {
    if (typeof message.content === 'string') {
      result.push({ role: message.role, content: message.content })
      continue
    }
    if (message.role === 'assistant') {
      result.push(convertAssistant(message.content))
    } else if (message.role === 'user') {
      result.push(...convertUser(message.content))
    } else {
      result.push({ role: message.role, content: collectText(message.content) })
    }
  }
  return result
}

export function convertTools(tools: ClientTool[]): ProviderTool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description ?? '',
      parameters: tool.input_schema
    }
  }))
}

export function convertSystem(system: MessagesRequest['system']): ProviderChatMessage | null {
  const text = systemText(system)
  return text === null ? null : { role: 'system', content: text }
}

export interface ProviderBuildOptions {
  model: string
}

export function buildProviderBody(request: MessagesRequest, options: ProviderBuildOptions): ProviderChatRequestBody {
  const messages = convertMessages(request.messages)
  const systemMessage = convertSystem(request.system)
  if (systemMessage) {
    messages.unshift(systemMessage)
  }

  const body: ProviderChatRequestBody = {
    model: options.model,
    messages,
    max_tokens: request.max_tokens,
    // the upstream only produces its reasoning channel with this template flag
    chat_template_kwargs: { thinking: true }
  }

  if (request.temperature !== undefined) {
    body.temperature = request.temperature
  }
  if (request.top_p !== undefined) {
    body.top_p = request.top_p
  }
  if (request.stop_sequences && request.stop_sequences.length > 0) {
    body.stop = request.stop_sequences
  }
  if (request.tools && request.tools.length > 0) {
    body.tools = convertTools(request.tools)
  }

  return body
}
