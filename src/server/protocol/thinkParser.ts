/**
 * Incremental splitter for inline `<think>...</think>` spans.
 *
 * The upstream model interleaves reasoning and visible text in one content
 * channel. The parser classifies every character exactly once and holds back
 * at most `max(tag length) - 1` characters: the longest tail of the buffer
 * that could still grow into a tag.
 */

export const THINK_OPEN_TAG = '<think>'
export const THINK_CLOSE_TAG = '</think>'

export type ParserChunkKind = 'text' | 'thinking'

export interface ParserChunk {
  kind: ParserChunkKind
  content: string
}

type ThinkState = 'outside' | 'inside'

/**
 * Length of the longest proper suffix of `buffer` that is a prefix of one of `tags`.
 */
function partialTagLength(buffer: string, tags: readonly string[]): number {
  let longest = 0
  for (const tag of tags) {
    const max = Math.min(tag.length - 1, buffer.length)
    for (let size = max; size > longest; size -= 1) {
      if (buffer.endsWith(tag.slice(0, size))) {
        longest = size
        break
      }
    }
  }
  return longest
}

export class ThinkParser {
  private buffer = ''
  private state: ThinkState = 'outside'

  feed(content: string): ParserChunk[] {
    this.buffer += content
    const chunks: ParserChunk[] = []

    let progressed = true
    while (this.buffer.length > 0 && progressed) {
      progressed = this.state === 'outside' ? this.stepOutside(chunks) : this.stepInside(chunks)
    }
    return chunks
  }

  flush(): ParserChunk | null {
    if (!this.buffer) return null
    const chunk: ParserChunk = {
      kind: this.state === 'inside' ? 'thinking' : 'text',
      content: this.buffer
    }
    this.buffer = ''
    return chunk
  }

  /**
   * Returns true when a tag was consumed and the buffer should be scanned again.
   */
  private stepOutside(chunks: ParserChunk[]): boolean {
    const openAt = this.buffer.indexOf(THINK_OPEN_TAG)
    const closeAt = this.buffer.indexOf(THINK_CLOSE_TAG)

    // A stray close tag before any open tag is a boundary: drop it, keep the text
    if (closeAt !== -1 && (openAt === -1 || closeAt < openAt)) {
      this.push(chunks, 'text', this.buffer.slice(0, closeAt))
      this.buffer = this.buffer.slice(closeAt + THINK_CLOSE_TAG.length)
      return true
    }

    if (openAt !== -1) {
      this.push(chunks, 'text', this.buffer.slice(0, openAt))
      this.buffer = this.buffer.slice(openAt + THINK_OPEN_TAG.length)
      this.state = 'inside'
      return true
    }

    this.emitSafePrefix(chunks, 'text', [THINK_OPEN_TAG, THINK_CLOSE_TAG])
    return false
  }

  private stepInside(chunks: ParserChunk[]): boolean {
    const closeAt = this.buffer.indexOf(THINK_CLOSE_TAG)
    if (closeAt !== -1) {
      this.push(chunks, 'thinking', this.buffer.slice(0, closeAt))
      this.buffer = this.buffer.slice(closeAt + THINK_CLOSE_TAG.length)
      this.state = 'outside'
      return true
    }

    this.emitSafePrefix(chunks, 'thinking', [THINK_CLOSE_TAG])
    return false
  }

  private emitSafePrefix(chunks: ParserChunk[], kind: ParserChunkKind, tags: readonly string[]): void {
    const held = partialTagLength(this.buffer, tags)
    const emitLength = this.buffer.length - held
    this.push(chunks, kind, this.buffer.slice(0, emitLength))
    this.buffer = this.buffer.slice(emitLength)
  }

  private push(chunks: ParserChunk[], kind: ParserChunkKind, content: string): void {
    if (content) {
      chunks.push({ kind, content })
    }
  }
}

export interface ThinkExtraction {
  thinking: string | null
  remaining: string
}

/**
 * Whole-string variant used for non-streaming responses. Spans are joined
 * with a newline; the text around them is concatenated and trimmed.
 */
export function extractThinkSpans(text: string): ThinkExtraction {
  const spans: string[] = []
  const rest: string[] = []
  let cursor = 0

  while (cursor < text.length) {
    const openAt = text.indexOf(THINK_OPEN_TAG, cursor)
    if (openAt === -1) break
    const bodyStart = openAt + THINK_OPEN_TAG.length
    const closeAt = text.indexOf(THINK_CLOSE_TAG, bodyStart)
    if (closeAt === -1) break
    rest.push(text.slice(cursor, openAt))
    spans.push(text.slice(bodyStart, closeAt))
    cursor = closeAt + THINK_CLOSE_TAG.length
  }

  if (spans.length === 0) {
    return { thinking: null, remaining: text }
  }

  rest.push(text.slice(cursor))
  return {
    thinking: spans.join('\n'),
    remaining: rest.join('').trim()
  }
}
