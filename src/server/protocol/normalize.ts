import type {
  ClientMessage,
  ClientRole,
  ClientTool,
  ContentBlock,
  MessagesRequest,
  TextBlock,
  TokenCountRequest,
  ToolResultPart
} from './types.js'

export interface ParseOk<T> {
  ok: true
  value: T
}

export interface ParseError {
  ok: false
  message: string
  path?: string
}

export type ParseResult<T> = ParseOk<T> | ParseError

const ROLES: readonly ClientRole[] = ['user', 'assistant', 'system', 'tool']

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function appendPath(base: string | undefined, segment: string): string {
  if (!base) return segment
  if (segment.startsWith('[')) return `${base}${segment}`
  return `${base}.${segment}`
}

function fail(message: string, path?: string): ParseError {
  return { ok: false, message, path }
}

function ok<T>(value: T): ParseOk<T> {
  return { ok: true, value }
}

function isRole(value: unknown): value is ClientRole {
  return typeof value === 'string' && ROLES.some((role) => role === value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function parseToolResultContent(value: unknown, path: string): ParseResult<string | ToolResultPart[]> {
  if (value === undefined || value === null) return ok('')
  if (typeof value === 'string') return ok(value)
  if (!Array.isArray(value)) {
    return fail('tool_result content must be a string or an array', path)
  }
  const parts: ToolResultPart[] = []
  for (let i = 0; i < value.length; i += 1) {
    const entry: unknown = value[i]
    const entryPath = appendPath(path, `[${i}]`)
    if (typeof entry === 'string') {
      parts.push({ type: 'text', text: entry })
      continue
    }
    if (!isPlainObject(entry) || typeof entry.type !== 'string') {
      return fail('tool_result content entries must be objects with a type', entryPath)
    }
    if (entry.text !== undefined && typeof entry.text !== 'string') {
      return fail('text must be a string', appendPath(entryPath, 'text'))
    }
    parts.push(typeof entry.text === 'string' ? { type: entry.type, text: entry.text } : { type: entry.type })
  }
  return ok(parts)
}

/**
 * Returns null for block types the gateway does not translate (images,
 * documents). They are dropped rather than rejected.
 */
function parseContentBlock(block: unknown, path: string): ParseResult<ContentBlock | null> {
  if (!isPlainObject(block)) {
    return fail('content block must be an object', path)
  }
  if (typeof block.type !== 'string' || block.type.length === 0) {
    return fail('content block needs a type', appendPath(path, 'type'))
  }

  switch (block.type) {
    case 'text':
      if (typeof block.text !== 'string') {
        return fail('text block needs a string text', appendPath(path, 'text'))
      }
      return ok<ContentBlock>({ type: 'text', text: block.text })
    case 'thinking': {
      if (typeof block.thinking !== 'string') {
        return fail('thinking block needs a string thinking', appendPath(path, 'thinking'))
      }
      const signature = typeof block.signature === 'string' ? block.signature : undefined
      return ok<ContentBlock>(signature === undefined ? { type: 'thinking', thinking: block.thinking } : { type: 'thinking', thinking: block.thinking, signature })
    }
    case 'tool_use':
      if (typeof block.id !== 'string' || block.id.length === 0) {
        return fail('tool_use block needs a string id', appendPath(path, 'id'))
      }
      if (typeof block.name !== 'string' || block.name.length === 0) {
        return fail('tool_use block needs a string name', appendPath(path, 'name'))
      }
      return ok<ContentBlock>({ type: 'tool_use', id: block.id, name: block.name, input: block.input ?? {} })
    case 'tool_result': {
      if (typeof block.tool_use_id !== 'string' || block.tool_use_id.length === 0) {
        return fail('tool_result block needs a string tool_use_id', appendPath(path, 'tool_use_id'))
      }
      const content = parseToolResultContent(block.content, appendPath(path, 'content'))
      if (!content.ok) return content
      return ok<ContentBlock>({
        type: 'tool_result',
        tool_use_id: block.tool_use_id,
        content: content.value,
        is_error: block.is_error === true
      })
    }
    default:
      return ok(null)
  }
}

function parseMessage(message: unknown, path: string): ParseResult<ClientMessage> {
  if (!isPlainObject(message)) {
    return fail('message must be an object', path)
  }
  if (!isRole(message.role)) {
    return fail(`role must be one of ${ROLES.join(', ')}`, appendPath(path, 'role'))
  }
  const contentPath = appendPath(path, 'content')
  if (typeof message.content === 'string') {
    return ok({ role: message.role, content: message.content })
  }
  if (!Array.isArray(message.content)) {
    return fail('content must be a string or an array of blocks', contentPath)
  }
  const blocks: ContentBlock[] = []
  for (let i = 0; i < message.content.length; i += 1) {
    const parsed = parseContentBlock(message.content[i], appendPath(contentPath, `[${i}]`))
    if (!parsed.ok) return parsed
    if (parsed.value) blocks.push(parsed.value)
  }
  return ok({ role: message.role, content: blocks })
}

function parseMessages(value: unknown): ParseResult<ClientMessage[]> {
  if (!Array.isArray(value)) {
    return fail('messages must be an array', 'messages')
  }
  const messages: ClientMessage[] = []
  for (let i = 0; i < value.length; i += 1) {
    const parsed = parseMessage(value[i], `messages[${i}]`)
    if (!parsed.ok) return parsed
    messages.push(parsed.value)
  }
  return ok(messages)
}

function parseSystem(value: unknown): ParseResult<string | TextBlock[] | undefined> {
  if (value === undefined || value === null) return ok(undefined)
  if (typeof value === 'string') return ok(value)
  if (!Array.isArray(value)) {
    return fail('system must be a string or an array of text blocks', 'system')
  }
  const blocks: TextBlock[] = []
  for (let i = 0; i < value.length; i += 1) {
    const entry: unknown = value[i]
    if (!isPlainObject(entry)) {
      return fail('system block must be an object', `system[${i}]`)
    }
    if (entry.type === 'text') {
      if (typeof entry.text !== 'string') {
        return fail('text block needs a string text', `system[${i}].text`)
      }
      blocks.push({ type: 'text', text: entry.text })
    }
  }
  return ok(blocks)
}

function parseTools(value: unknown): ParseResult<ClientTool[] | undefined> {
  if (value === undefined || value === null) return ok(undefined)
  if (!Array.isArray(value)) {
    return fail('tools must be an array', 'tools')
  }
  const tools: ClientTool[] = []
  for (let i = 0; i < value.length; i += 1) {
    const entry: unknown = value[i]
    const path = `tools[${i}]`
    if (!isPlainObject(entry)) {
      return fail('tool must be an object', path)
    }
    if (typeof entry.name !== 'string' || entry.name.length === 0) {
      return fail('tool needs a string name', appendPath(path, 'name'))
    }
    if (entry.description !== undefined && typeof entry.description !== 'string') {
      return fail('description must be a string', appendPath(path, 'description'))
    }
    if (!isPlainObject(entry.input_schema)) {
      return fail('input_schema must be an object', appendPath(path, 'input_schema'))
    }
    const tool: ClientTool = { name: entry.name, input_schema: entry.input_schema }
    if (typeof entry.description === 'string') {
      tool.description = entry.description
    }
    tools.push(tool)
  }
  return ok(tools)
}

/**
 * Validates an inbound `/v1/messages` payload once at the boundary. Everything
 * downstream works on the typed result.
 */
export function parseMessagesRequest(payload: unknown): ParseResult<MessagesRequest> {
  if (!isPlainObject(payload)) {
    return fail('request body must be a JSON object')
  }
  if (typeof payload.model !== 'string' || payload.model.length === 0) {
    return fail('model must be a non-empty string', 'model')
  }
  if (typeof payload.max_tokens !== 'number' || !Number.isInteger(payload.max_tokens) || payload.max_tokens < 1) {
    return fail('max_tokens must be a positive integer', 'max_tokens')
  }

  const messages = parseMessages(payload.messages)
  if (!messages.ok) return messages
  const system = parseSystem(payload.system)
  if (!system.ok) return system
  const tools = parseTools(payload.tools)
  if (!tools.ok) return tools

  const request: MessagesRequest = {
    model: payload.model,
    messages: messages.value,
    max_tokens: payload.max_tokens,
    stream: payload.stream === true
  }
  if (system.value !== undefined) request.system = system.value
  if (tools.value !== undefined) request.tools = tools.value

  if (payload.temperature !== undefined && payload.temperature !== null) {
    if (!isFiniteNumber(payload.temperature)) {
      return fail('temperature must be a number', 'temperature')
    }
    request.temperature = payload.temperature
  }
  if (payload.top_p !== undefined && payload.top_p !== null) {
    if (!isFiniteNumber(payload.top_p)) {
      return fail('top_p must be a number', 'top_p')
    }
    request.top_p = payload.top_p
  }
  if (payload.stop_sequences !== undefined && payload.stop_sequences !== null) {
    const stops: unknown = payload.stop_sequences
    if (!Array.isArray(stops) || !stops.every((item): item is string => typeof item === 'string')) {
      return fail('stop_sequences must be an array of strings', 'stop_sequences')
    }
    request.stop_sequences = stops
  }
  if (isPlainObject(payload.metadata)) {
    request.metadata = payload.metadata
  }

  return ok(request)
}

export function parseTokenCountRequest(payload: unknown): ParseResult<TokenCountRequest> {
  if (!isPlainObject(payload)) {
    return fail('request body must be a JSON object')
  }
  const messages = parseMessages(payload.messages)
  if (!messages.ok) return messages
  const system = parseSystem(payload.system)
  if (!system.ok) return system
  const tools = parseTools(payload.tools)
  if (!tools.ok) return tools

  const request: TokenCountRequest = { messages: messages.value }
  if (system.value !== undefined) request.system = system.value
  if (tools.value !== undefined) request.tools = tools.value
  return ok(request)
}
