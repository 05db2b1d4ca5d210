import { generateId } from './contentHelpers.js'

/**
 * Recovers tool invocations the model writes inline as
 *
 *   ● <function=Name><parameter=key>value</parameter>...[</function>]
 *
 * Only visible text is fed here; thinking spans never reach this parser.
 */

export const TOOL_MARKER = '●'
const FUNCTION_OPEN = '<function='
const FUNCTION_CLOSE = '</function>'
const PARAMETER_OPEN = '<parameter='
const PARAMETER_CLOSE = '</parameter>'

/** How long a marker may wait for its `<function=...>` header before it is taken as prose. */
export const FUNCTION_PROBE_LIMIT = 100

export interface DetectedToolCall {
  id: string
  name: string
  input: Record<string, string>
}

export type ToolParserEvent =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; call: DetectedToolCall }

type ToolParserState = 'text' | 'matching_function' | 'parsing_parameters'

type HeaderMatch =
  | { status: 'matched'; name: string; consumed: number }
  | { status: 'pending' }
  | { status: 'mismatch' }

function isBlank(value: string): boolean {
  return value.trim().length === 0
}

/** True for blank text or a fragment that may still become a parameter or closing tag. */
function couldOpenTag(fragment: string): boolean {
  return fragment.length === 0 || PARAMETER_OPEN.startsWith(fragment) || FUNCTION_CLOSE.startsWith(fragment)
}

/**
 * Matches `●`, optional whitespace, then `<function=NAME>` at the start of `buffer`.
 */
function matchFunctionHeader(buffer: string): HeaderMatch {
  let cursor = TOOL_MARKER.length
  while (cursor < buffer.length && /\s/.test(buffer[cursor] ?? '')) {
    cursor += 1
  }
  const rest = buffer.slice(cursor)
  if (rest.length < FUNCTION_OPEN.length) {
    return FUNCTION_OPEN.startsWith(rest) ? { status: 'pending' } : { status: 'mismatch' }
  }
  if (!rest.startsWith(FUNCTION_OPEN)) {
    return { status: 'mismatch' }
  }
  const nameEnd = rest.indexOf('>', FUNCTION_OPEN.length)
  if (nameEnd === -1) {
    return { status: 'pending' }
  }
  const name = rest.slice(FUNCTION_OPEN.length, nameEnd).trim()
  if (!name) {
    return { status: 'mismatch' }
  }
  return { status: 'matched', name, consumed: cursor + nameEnd + 1 }
}

export interface ToolCallParserOptions {
  idFactory?: () => string
}

export class ToolCallParser {
  private state: ToolParserState = 'text'
  private buffer = ''
  private current: DetectedToolCall | null = null
  private readonly idFactory: () => string

  constructor(options: ToolCallParserOptions = {}) {
    this.idFactory = options.idFactory ?? (() => generateId('toolu', 8))
  }

  feed(text: string): ToolParserEvent[] {
    this.buffer += text
    const events: ToolParserEvent[] = []

    while (true) {
      if (this.state === 'text') {
        const markerAt = this.buffer.indexOf(TOOL_MARKER)
        if (markerAt === -1) {
          this.emitText(events, this.buffer)
          this.buffer = ''
          break
        }
        this.emitText(events, this.buffer.slice(0, markerAt))
        this.buffer = this.buffer.slice(markerAt)
        this.state = 'matching_function'
      }

      if (this.state === 'matching_function') {
        const match = matchFunctionHeader(this.buffer)
        if (match.status === 'matched') {
          this.current = { id: this.idFactory(), name: match.name, input: {} }
          this.buffer = this.buffer.slice(match.consumed)
          this.state = 'parsing_parameters'
        } else if (match.status === 'mismatch' || this.buffer.length > FUNCTION_PROBE_LIMIT) {
          // The marker was ordinary prose: release it and rescan what follows
          this.emitText(events, this.buffer.slice(0, TOOL_MARKER.length))
          this.buffer = this.buffer.slice(TOOL_MARKER.length)
          this.state = 'text'
          continue
        } else {
          break
        }
      }

      if (this.state === 'parsing_parameters') {
        if (!this.consumeParameters(events)) {
          break
        }
      }
    }

    return events
  }

  flush(): ToolParserEvent[] {
    const events: ToolParserEvent[] = []
    if (this.state === 'parsing_parameters' && this.current) {
      const openAt = this.buffer.indexOf(PARAMETER_OPEN)
      if (openAt !== -1) {
        const keyEnd = this.buffer.indexOf('>', openAt + PARAMETER_OPEN.length)
        if (keyEnd !== -1) {
          const key = this.buffer.slice(openAt + PARAMETER_OPEN.length, keyEnd).trim()
          if (key) {
            this.current.input[key] = this.buffer.slice(keyEnd + 1).trim()
          }
        }
      }
      events.push({ kind: 'tool_call', call: this.current })
    } else if (this.state === 'matching_function') {
      this.emitText(events, this.buffer)
    }
    this.reset()
    return events
  }

  /**
   * Consumes complete parameters. Returns true once the current call is
   * finished and emitted, false when more input is needed.
   */
  private consumeParameters(events: ToolParserEvent[]): boolean {
    while (true) {
      const openAt = this.buffer.indexOf(PARAMETER_OPEN)
      if (openAt === -1) break
      const keyEnd = this.buffer.indexOf('>', openAt + PARAMETER_OPEN.length)
      if (keyEnd === -1) break
      const closeAt = this.buffer.indexOf(PARAMETER_CLOSE, keyEnd + 1)
      if (closeAt === -1) break

      const leading = this.buffer.slice(0, openAt)
      if (leading.includes(TOOL_MARKER)) break
      if (!isBlank(leading)) {
        this.emitText(events, leading)
      }
      const key = this.buffer.slice(openAt + PARAMETER_OPEN.length, keyEnd).trim()
      if (key && this.current) {
        this.current.input[key] = this.buffer.slice(keyEnd + 1, closeAt).trim()
      }
      this.buffer = this.buffer.slice(closeAt + PARAMETER_CLOSE.length)
    }

    const trimmed = this.buffer.trimStart()
    if (trimmed.startsWith(FUNCTION_CLOSE)) {
      this.buffer = trimmed.slice(FUNCTION_CLOSE.length)
      return this.finishCall(events)
    }

    const markerAt = this.buffer.indexOf(TOOL_MARKER)
    if (markerAt !== -1) {
      this.emitText(events, this.buffer.slice(0, markerAt))
      this.buffer = this.buffer.slice(markerAt)
      return this.finishCall(events)
    }

    if (this.buffer.includes(PARAMETER_OPEN) || couldOpenTag(trimmed)) {
      return false
    }
    // Plain trailing text: the call is over. The text goes back through the text state.
    return this.finishCall(events)
  }

  private finishCall(events: ToolParserEvent[]): boolean {
    if (this.current) {
      events.push({ kind: 'tool_call', call: this.current })
    }
    this.current = null
    this.state = 'text'
    return true
  }

  private emitText(events: ToolParserEvent[], text: string): void {
    if (!text) return
    const last = events[events.length - 1]
    if (last && last.kind === 'text') {
      last.text += text
    } else {
      events.push({ kind: 'text', text })
    }
  }

  private reset(): void {
    this.state = 'text'
    this.buffer = ''
    this.current = null
  }
}
