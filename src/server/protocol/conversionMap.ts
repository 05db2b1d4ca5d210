import type { StopReason } from './types.js'

const STOP_REASON_MAP: Record<string, StopReason> = {
  stop: 'end_turn',
  length: 'max_tokens',
  tool_calls: 'tool_use',
  content_filter: 'end_turn'
}

export function mapStopReason(finishReason: string | null | undefined): StopReason {
  if (!finishReason || !Object.prototype.hasOwnProperty.call(STOP_REASON_MAP, finishReason)) {
    return 'end_turn'
  }
  return STOP_REASON_MAP[finishReason] ?? 'end_turn'
}
