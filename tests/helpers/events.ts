import type { StreamEvent } from '../../src/server/protocol/types.js'

/**
 * Returns the first lifecycle violation in an event sequence, or null:
 * indexes start at 0 and grow by one, deltas and stops only touch open
 * blocks, and nothing is left open at message_delta.
 */
export function findLifecycleViolation(events: StreamEvent[]): string | null {
  const open = new Set<number>()
  let nextIndex = 0

  for (const event of events) {
    switch (event.type) {
      case 'content_block_start':
        if (event.index !== nextIndex) return `block ${event.index} started out of order`
        nextIndex += 1
        open.add(event.index)
        break
      case 'content_block_delta':
        if (!open.has(event.index)) return `delta for closed block ${event.index}`
        break
      case 'content_block_stop':
        if (!open.has(event.index)) return `stop for closed block ${event.index}`
        open.delete(event.index)
        break
      case 'message_delta':
        if (open.size > 0) return `blocks still open: ${Array.from(open).join(',')}`
        break
      default:
        break
    }
  }
  return open.size > 0 ? `blocks still open: ${Array.from(open).join(',')}` : null
}
