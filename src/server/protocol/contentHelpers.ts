import { randomUUID } from 'node:crypto'
import type { ContentBlock, TextBlock, ToolResultPart } from './types.js'

export function generateId(prefix: string, length = 24): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, length)}`
}

export function stringifyToolInput(value: unknown): string {
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value ?? {})
  } catch {
    return String(value)
  }
}

export function flattenToolResultContent(content: string | ToolResultPart[] | undefined): string {
  if (content === undefined) return ''
  if (typeof content === 'string') return content
  return content
    .map((part) => (typeof part.text === 'string' ? part.text : JSON.stringify(part)))
    .join('\n')
}

export function collectText(content: string | ContentBlock[]): string {
  if (typeof content === 'string') return content
  return content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('')
}

export function systemText(system: string | TextBlock[] | undefined): string | null {
  if (system === undefined) return null
  if (typeof system === 'string') {
    return system.length > 0 ? system : null
  }
  const parts = system.map((block) => block.text)
  if (parts.length === 0) return null
  const joined = parts.join('\n\n').trim()
  return joined.length > 0 ? joined : null
}
