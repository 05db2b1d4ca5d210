import { describe, it, expect } from 'vitest'
import { mapStopReason } from '../../src/server/protocol/conversionMap.js'

describe('mapStopReason', () => {
  it('maps upstream finish reasons to client stop reasons', () => {
    expect(mapStopReason('stop')).toBe('end_turn')
    expect(mapStopReason('length')).toBe('max_tokens')
    expect(mapStopReason('tool_calls')).toBe('tool_use')
    expect(mapStopReason('content_filter')).toBe('end_turn')
  })

  it('falls back to end_turn for unknown or missing reasons', () => {
    expect(mapStopReason('function_call')).toBe('end_turn')
    expect(mapStopReason('')).toBe('end_turn')
    expect(mapStopReason(null)).toBe('end_turn')
    expect(mapStopReason(undefined)).toBe('end_turn')
  })

  it('does not resolve inherited object keys', () => {
    expect(mapStopReason('toString')).toBe('end_turn')
  })
})
