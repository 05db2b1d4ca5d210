import type { ShortcutConfig } from '../config/types.js'
import type { ClientMessage, MessagesRequest, MessagesResponse } from '../protocol/types.js'
import { generateId } from '../protocol/contentHelpers.js'

/**
 * Recognizes housekeeping requests coding agents send alongside real work
 * and answers them locally, without spending an upstream call.
 */

export type ShortcutKind =
  | 'prefix_detection'
  | 'quota_check'
  | 'title_generation'
  | 'suggestion_mode'
  | 'filepath_extraction'

export interface ShortcutReply {
  kind: ShortcutKind
  text: string
  usage: { input_tokens: number; output_tokens: number }
}

const TWO_WORD_COMMANDS = new Set(['git', 'npm', 'docker', 'kubectl', 'cargo', 'go', 'pip', 'yarn'])
const READING_COMMANDS = new Set(['cat', 'head', 'tail', 'less', 'more', 'bat', 'type'])

const TITLE_PROMPT = 'write a 5-10 word title'
const SUGGESTION_MARKER = '[SUGGESTION MODE:'

function textParts(message: ClientMessage): string[] {
  if (typeof message.content === 'string') return [message.content]
  const parts: string[] = []
  for (const block of message.content) {
    if (block.type === 'text' && block.text) {
      parts.push(block.text)
    }
  }
  return parts
}

function soleUserText(request: MessagesRequest): string | null {
  const [first] = request.messages
  if (request.messages.length !== 1 || !first || first.role !== 'user') return null
  return textParts(first).join('')
}

/**
 * Splits a command line into words with POSIX shell quoting rules. Returns
 * null for an unterminated quote or a trailing backslash.
 */
export function splitShellWords(command: string): string[] | null {
  const words: string[] = []
  let current = ''
  let inWord = false
  let quote: '"' | "'" | null = null

  for (let i = 0; i < command.length; i += 1) {
    const char = command.charAt(i)

    if (quote === "'") {
      if (char === "'") {
        quote = null
      } else {
        current += char
      }
      continue
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null
      } else if (char === '\\' && i + 1 < command.length && '\\"$`\n'.includes(command.charAt(i + 1))) {
        i += 1
        current += command.charAt(i)
      } else {
        current += char
      }
      continue
    }

    if (char === '\\') {
      if (i + 1 >= command.length) return null
      i += 1
      current += command.charAt(i)
      inWord = true
    } else if (char === "'" || char === '"') {
      quote = char
      inWord = true
    } else if (/\s/.test(char)) {
      if (inWord) {
        words.push(current)
        current = ''
        inWord = false
      }
    } else {
      current += char
      inWord = true
    }
  }

  if (quote !== null) return null
  if (inWord) words.push(current)
  return words
}

export function extractCommandPrefix(command: string): string {
  if (command.includes('`') || command.includes('$(')) {
    return 'command_injection_detected'
  }

  const words = splitShellWords(command)
  if (words === null) {
    return command.split(/\s+/).find((word) => word.length > 0) ?? 'none'
  }

  // leading VAR=value assignments are not part of the command
  let start = 0
  while (start < words.length) {
    const word = words[start] ?? ''
    if (word.includes('=') && !word.startsWith('-')) {
      start += 1
    } else {
      break
    }
  }

  const [first, second] = words.slice(start)
  if (first === undefined) return 'none'
  if (TWO_WORD_COMMANDS.has(first) && second !== undefined && !second.startsWith('-')) {
    return `${first} ${second}`
  }
  return first
}

export function extractFilepaths(command: string): string {
  const empty = '<filepaths>\n</filepaths>'
  const words = splitShellWords(command)
  const [program, ...args] = words ?? []
  if (program === undefined) return empty

  const base = (program.split('/').pop() ?? '').split('\\').pop()?.toLowerCase() ?? ''
  if (!READING_COMMANDS.has(base)) return empty

  const paths = args.filter((arg) => !arg.startsWith('-'))
  if (paths.length === 0) return empty
  return `<filepaths>\n${paths.join('\n')}\n</filepaths>`
}

function detectPrefixRequest(request: MessagesRequest): string | null {
  const text = soleUserText(request)
  if (text === null || !text.includes('<policy_spec>') || !text.includes('Command:')) return null
  return text.slice(text.lastIndexOf('Command:') + 'Command:'.length).trim()
}

function isQuotaCheck(request: MessagesRequest): boolean {
  const [first] = request.messages
  if (request.max_tokens !== 1 || request.messages.length !== 1 || !first || first.role !== 'user') return false
  return textParts(first).some((part) => part.toLowerCase().includes('quota'))
}

function isTitleGeneration(request: MessagesRequest): boolean {
  const last = request.messages[request.messages.length - 1]
  if (!last || last.role !== 'user') return false
  return textParts(last).some((part) => part.toLowerCase().includes(TITLE_PROMPT))
}

function isSuggestionMode(request: MessagesRequest): boolean {
  return request.messages.some(
    (message) => message.role === 'user' && textParts(message).some((part) => part.includes(SUGGESTION_MARKER))
  )
}

function detectFilepathRequest(request: MessagesRequest): string | null {
  if (request.tools && request.tools.length > 0) return null
  const text = soleUserText(request)
  if (text === null || !text.includes('Command:') || !text.includes('Output:')) return null
  if (!text.toLowerCase().includes('filepaths')) return null

  const commandStart = text.indexOf('Command:') + 'Command:'.length
  const outputAt = text.indexOf('Output:', commandStart)
  if (outputAt === -1) return null
  return text.slice(commandStart, outputAt).trim()
}

/**
 * First matching shortcut, checked in a fixed order, each behind its switch.
 */
export function classifyRequest(request: MessagesRequest, shortcuts: ShortcutConfig): ShortcutReply | null {
  if (shortcuts.prefixDetection) {
    const command = detectPrefixRequest(request)
    if (command !== null) {
      return { kind: 'prefix_detection', text: extractCommandPrefix(command), usage: { input_tokens: 100, output_tokens: 5 } }
    }
  }

  if (shortcuts.quotaCheck && isQuotaCheck(request)) {
    return { kind: 'quota_check', text: 'Quota check passed.', usage: { input_tokens: 10, output_tokens: 5 } }
  }

  if (shortcuts.titleGeneration && isTitleGeneration(request)) {
    return { kind: 'title_generation', text: 'Conversation', usage: { input_tokens: 100, output_tokens: 5 } }
  }

  if (shortcuts.suggestionMode && isSuggestionMode(request)) {
    return { kind: 'suggestion_mode', text: '', usage: { input_tokens: 100, output_tokens: 1 } }
  }

  if (shortcuts.filepathExtraction) {
    const command = detectFilepathRequest(request)
    if (command !== null) {
      return { kind: 'filepath_extraction', text: extractFilepaths(command), usage: { input_tokens: 100, output_tokens: 10 } }
    }
  }

  return null
}

export function buildShortcutResponse(reply: ShortcutReply, model: string): MessagesResponse {
  return {
    id: generateId('msg'),
    type: 'message',
    role: 'assistant',
    model,
    content: [{ type: 'text', text: reply.text }],
    stop_reason: 'end_turn',
    stop_sequence: null,
    usage: {
      ...reply.usage,
      cache_creation_input_tokens: 0,
      cache_read_input_tokens: 0
    }
  }
}
