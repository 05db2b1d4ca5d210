import type { ProviderStreamChunk, ProviderUsage, StreamEvent } from './types.js'
import { BlockEmitter } from './blockEmitter.js'
import { ThinkParser, type ParserChunk } from './thinkParser.js'
import { ToolCallParser } from './toolCallParser.js'
import { mapStopReason } from './conversionMap.js'
import { generateId } from './contentHelpers.js'

export const RATE_LIMIT_NOTICE = '⏱️ rate limit active, resuming now...'

export type TranslatorPhase = 'init' | 'streaming' | 'draining' | 'done' | 'errored'

export interface StreamTranslatorOptions {
  model: string
  inputTokens: number
  messageId?: string
  toolIdFactory?: () => string
}

/**
 * Turns upstream chat-completion chunks into client protocol stream events.
 * Each step returns the events it produced; the caller writes them out.
 */
export class StreamTranslator {
  readonly messageId: string
  private phase: TranslatorPhase = 'init'
  private readonly blocks: BlockEmitter
  private readonly thinkParser = new ThinkParser()
  private readonly toolParser: ToolCallParser
  private finishReason: string | null = null
  private usage: ProviderUsage | null = null

  constructor(private readonly options: StreamTranslatorOptions) {
    this.messageId = options.messageId ?? generateId('msg')
    this.blocks = new BlockEmitter({ toolIdFactory: options.toolIdFactory })
    this.toolParser = new ToolCallParser({ idFactory: options.toolIdFactory })
  }

  get state(): TranslatorPhase {
    return this.phase
  }

  begin(waited: boolean): StreamEvent[] {
    if (this.phase !== 'init') return []
    this.phase = 'streaming'
    const events: StreamEvent[] = [
      {
        type: 'message_start',
        message: {
          id: this.messageId,
          type: 'message',
          role: 'assistant',
          content: [],
          model: this.options.model,
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: this.options.inputTokens, output_tokens: 1 }
        }
      }
    ]
    if (waited) {
      events.push(...this.blocks.emitNotice(RATE_LIMIT_NOTICE))
    }
    return events
  }

  push(chunk: ProviderStreamChunk): StreamEvent[] {
    if (this.phase !== 'streaming') return []
    if (chunk.usage) {
      this.usage = chunk.usage
    }

    const choice = chunk.choices?.[0]
    if (!choice) return []
    if (choice.finish_reason) {
      this.finishReason = choice.finish_reason
    }

    const events: StreamEvent[] = []
    const delta = choice.delta
    if (!delta) return events

    if (delta.reasoning_content) {
      events.push(...this.blocks.appendThinking(delta.reasoning_content))
    }

    if (delta.content) {
      for (const part of this.thinkParser.feed(delta.content)) {
        events.push(...this.routeParserChunk(part))
      }
    }

    for (const call of delta.tool_calls ?? []) {
      events.push(
        ...this.blocks.applyToolFragment({
          index: call.index,
          id: call.id,
          name: call.function?.name,
          arguments: call.function?.arguments
        })
      )
    }

    return events
  }

  fail(message: string): StreamEvent[] {
    if (this.phase !== 'streaming') return []
    this.phase = 'errored'
    return [...this.blocks.closeAll(), ...this.blocks.emitNotice(message)]
  }

  finish(): StreamEvent[] {
    if (this.phase === 'done' || this.phase === 'init') return []
    const events: StreamEvent[] = []

    if (this.phase === 'streaming' || this.phase === 'errored') {
      const errored = this.phase === 'errored'
      this.phase = 'draining'
      const rest = this.thinkParser.flush()
      if (rest) {
        events.push(...this.routeParserChunk(rest))
      }
      for (const event of this.toolParser.flush()) {
        events.push(...(event.kind === 'text' ? this.blocks.appendText(event.text) : this.blocks.emitInlineTool(event.call)))
      }
      // Clients reject a message with no content blocks
      if (!errored && this.blocks.contentBlockCount === 0) {
        events.push(...this.blocks.appendText(' '))
      }
    }

    events.push(...this.blocks.closeAll())
    events.push(
      {
        type: 'message_delta',
        delta: { stop_reason: mapStopReason(this.finishReason), stop_sequence: null },
        usage: { output_tokens: this.usage?.completion_tokens ?? this.blocks.estimateOutputTokens() }
      },
      { type: 'message_stop' },
      { type: 'done' }
    )
    this.phase = 'done'
    return events
  }

  private routeParserChunk(part: ParserChunk): StreamEvent[] {
    if (part.kind === 'thinking') {
      return this.blocks.appendThinking(part.content)
    }
    const events: StreamEvent[] = []
    for (const event of this.toolParser.feed(part.content)) {
      if (event.kind === 'text') {
        events.push(...this.blocks.appendText(event.text))
      } else {
        events.push(...this.blocks.emitInlineTool(event.call))
      }
    }
    return events
  }
}
