import type { BlockDelta, BlockStart, StreamEvent } from './types.js'
import type { DetectedToolCall } from './toolCallParser.js'
import { generateId } from './contentHelpers.js'
import { estimateTextTokens } from './tokenizer.js'

export const FALLBACK_TOOL_NAME = 'tool_call'

export interface ToolCallFragment {
  index?: number
  id?: string | null
  name?: string | null
  arguments?: string | null
}

interface ToolSlot {
  blockIndex: number | null
  id: string | null
  name: string
  arguments: string
  closed: boolean
}

interface EmittedTool {
  name: string
  arguments: string
}

export interface BlockEmitterOptions {
  toolIdFactory?: () => string
}

/**
 * Owns the content-block lifecycle of one streamed message.
 *
 * At most one of the thinking/text blocks is open at a time. Tool blocks are
 * tracked per upstream slot and stay open until `closeAll`. Every method
 * returns the events it produced, in order.
 */
export class BlockEmitter {
  private nextIndex = 0
  private thinkingIndex: number | null = null
  private textIndex: number | null = null
  private readonly slots = new Map<number, ToolSlot>()
  private lastSlot: number | null = null
  private readonly emittedTools: EmittedTool[] = []
  private text = ''
  private reasoning = ''
  private contentBlocks = 0
  private readonly toolIdFactory: () => string

  constructor(options: BlockEmitterOptions = {}) {
    this.toolIdFactory = options.toolIdFactory ?? (() => generateId('toolu'))
  }

  /** Number of thinking/text/tool blocks opened for model output (notices excluded). */
  get contentBlockCount(): number {
    return this.contentBlocks
  }

  ensureThinking(): StreamEvent[] {
    const events: StreamEvent[] = []
    if (this.textIndex !== null) {
      events.push(this.stop(this.textIndex))
      this.textIndex = null
    }
    if (this.thinkingIndex === null) {
      this.thinkingIndex = this.allocate()
      this.contentBlocks += 1
      events.push(this.start(this.thinkingIndex, { type: 'thinking', thinking: '' }))
    }
    return events
  }

  ensureText(): StreamEvent[] {
    const events: StreamEvent[] = []
    if (this.thinkingIndex !== null) {
      events.push(this.stop(this.thinkingIndex))
      this.thinkingIndex = null
    }
    if (this.textIndex === null) {
      this.textIndex = this.allocate()
      this.contentBlocks += 1
      events.push(this.start(this.textIndex, { type: 'text', text: '' }))
    }
    return events
  }

  appendThinking(thinking: string): StreamEvent[] {
    if (!thinking) return []
    const events = this.ensureThinking()
    this.reasoning += thinking
    events.push(this.delta(this.requireIndex(this.thinkingIndex), { type: 'thinking_delta', thinking }))
    return events
  }

  appendText(text: string): StreamEvent[] {
    if (!text) return []
    const events = this.ensureText()
    this.text += text
    events.push(this.delta(this.requireIndex(this.textIndex), { type: 'text_delta', text }))
    return events
  }

  closeContent(): StreamEvent[] {
    const events: StreamEvent[] = []
    if (this.thinkingIndex !== null) {
      events.push(this.stop(this.thinkingIndex))
      this.thinkingIndex = null
    }
    if (this.textIndex !== null) {
      events.push(this.stop(this.textIndex))
      this.textIndex = null
    }
    return events
  }

  /**
   * Applies one native tool-call fragment. The name may arrive split over
   * several fragments, so the block is only opened once arguments start.
   */
  applyToolFragment(fragment: ToolCallFragment): StreamEvent[] {
    const slotKey = this.resolveSlot(fragment)
    let slot = this.slots.get(slotKey)
    if (!slot) {
      slot = { blockIndex: null, id: null, name: '', arguments: '', closed: false }
      this.slots.set(slotKey, slot)
    }
    this.lastSlot = slotKey

    if (fragment.id && !slot.id) {
      slot.id = fragment.id
    }
    if (fragment.name && slot.blockIndex === null) {
      slot.name += fragment.name
    }

    const args = fragment.arguments ?? ''
    if (!args) return []

    const events = this.closeContent()
    if (slot.blockIndex === null) {
      events.push(...this.openSlot(slot))
    }
    slot.arguments += args
    events.push(this.delta(this.requireIndex(slot.blockIndex), { type: 'input_json_delta', partial_json: args }))
    return events
  }

  /** Emits a complete tool_use block for a call recovered from inline markup. */
  emitInlineTool(call: DetectedToolCall): StreamEvent[] {
    const events = this.closeContent()
    const index = this.allocate()
    const partialJson = JSON.stringify(call.input)
    this.contentBlocks += 1
    this.emittedTools.push({ name: call.name, arguments: partialJson })
    events.push(
      this.start(index, { type: 'tool_use', id: call.id, name: call.name, input: {} }),
      this.delta(index, { type: 'input_json_delta', partial_json: partialJson }),
      this.stop(index)
    )
    return events
  }

  /** Self-contained text block that is not model output (rate-limit notice, error text). */
  emitNotice(message: string): StreamEvent[] {
    const events = this.closeContent()
    const index = this.allocate()
    events.push(
      this.start(index, { type: 'text', text: '' }),
      this.delta(index, { type: 'text_delta', text: message }),
      this.stop(index)
    )
    return events
  }

  closeAll(): StreamEvent[] {
    const events = this.closeContent()

    // Slots that only ever received a name still become (argument-less) blocks
    for (const slot of this.slots.values()) {
      if (slot.blockIndex === null && (slot.name || slot.id)) {
        events.push(...this.openSlot(slot))
      }
    }

    const open = Array.from(this.slots.values())
      .filter((slot): slot is ToolSlot & { blockIndex: number } => slot.blockIndex !== null && !slot.closed)
      .sort((a, b) => a.blockIndex - b.blockIndex)
    for (const slot of open) {
      slot.closed = true
      events.push(this.stop(slot.blockIndex))
    }
    return events
  }

  estimateOutputTokens(): number {
    let total = estimateTextTokens(this.text) + estimateTextTokens(this.reasoning)
    for (const tool of this.allTools()) {
      total += estimateTextTokens(tool.name) + estimateTextTokens(tool.arguments) + 10
    }
    return total
  }

  private allTools(): EmittedTool[] {
    const native = Array.from(this.slots.values())
      .filter((slot) => slot.blockIndex !== null)
      .map((slot) => ({ name: slot.name, arguments: slot.arguments }))
    return [...native, ...this.emittedTools]
  }

  private resolveSlot(fragment: ToolCallFragment): number {
    if (typeof fragment.index === 'number') return fragment.index
    // Without an index, a new id starts a new call; anything else continues the last one
    if (fragment.id && !Array.from(this.slots.values()).some((slot) => slot.id === fragment.id)) {
      return this.slots.size
    }
    return this.lastSlot ?? this.slots.size
  }

  private openSlot(slot: ToolSlot): StreamEvent[] {
    const events = this.closeContent()
    const index = this.allocate()
    slot.blockIndex = index
    slot.id = slot.id ?? this.toolIdFactory()
    slot.name = slot.name || FALLBACK_TOOL_NAME
    this.contentBlocks += 1
    events.push(this.start(index, { type: 'tool_use', id: slot.id, name: slot.name, input: {} }))
    return events
  }

  private allocate(): number {
    const index = this.nextIndex
    this.nextIndex += 1
    return index
  }

  private requireIndex(index: number | null): number {
    if (index === null) {
      throw new Error('content block is not open')
    }
    return index
  }

  private start(index: number, block: BlockStart): StreamEvent {
    return { type: 'content_block_start', index, content_block: block }
  }

  private delta(index: number, delta: BlockDelta): StreamEvent {
    return { type: 'content_block_delta', index, delta }
  }

  private stop(index: number): StreamEvent {
    return { type: 'content_block_stop', index }
  }
}
