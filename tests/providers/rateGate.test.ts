import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RateGate } from '../../src/server/providers/rateGate.js'

describe('RateGate', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('admits up to the limit immediately', async () => {
    const gate = new RateGate({ limit: 2, windowMs: 1000 })
    await expect(gate.wait()).resolves.toBe(false)
    await expect(gate.wait()).resolves.toBe(false)
    expect(gate.queued).toBe(0)
  })

  it('queues the next caller until a token refills', async () => {
    const gate = new RateGate({ limit: 2, windowMs: 1000 })
    await gate.wait()
    await gate.wait()

    let admitted = false
    const third = gate.wait().then((waited) => {
      admitted = true
      return waited
    })
    expect(gate.queued).toBe(1)

    await vi.advanceTimersByTimeAsync(499)
    expect(admitted).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    expect(admitted).toBe(true)
    await expect(third).resolves.toBe(false)
    expect(gate.queued).toBe(0)
  })

  it('serves waiters in arrival order', async () => {
    const gate = new RateGate({ limit: 1, windowMs: 1000 })
    await gate.wait()

    const order: string[] = []
    const second = gate.wait().then(() => order.push('second'))
    const third = gate.wait().then(() => order.push('third'))

    await vi.advanceTimersByTimeAsync(1000)
    expect(order).toEqual(['second'])
    await vi.advanceTimersByTimeAsync(1000)
    expect(order).toEqual(['second', 'third'])
    await Promise.all([second, third])
  })

  it('holds every caller through a cool-down and reports the wait', async () => {
    const gate = new RateGate({ limit: 10, windowMs: 1000 })
    gate.block(60)
    expect(gate.coolDownRemaining).toBe(60_000)

    let waited: boolean | null = null
    const pending = gate.wait().then((result) => {
      waited = result
    })
    await vi.advanceTimersByTimeAsync(59_999)
    expect(waited).toBeNull()
    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(waited).toBe(true)
    expect(gate.coolDownRemaining).toBe(0)
  })

  it('restarts the cool-down from the latest block', async () => {
    const gate = new RateGate({ limit: 1, windowMs: 1000 })
    gate.block(60)
    await vi.advanceTimersByTimeAsync(5_000)
    gate.block(10)
    expect(gate.coolDownRemaining).toBe(10_000)
  })

  it('removes an aborted waiter from the queue', async () => {
    const gate = new RateGate({ limit: 1, windowMs: 1000 })
    await gate.wait()

    const controller = new AbortController()
    const pending = gate.wait(controller.signal)
    expect(gate.queued).toBe(1)
    controller.abort(new Error('client went away'))
    await expect(pending).rejects.toThrow('client went away')
    expect(gate.queued).toBe(0)
  })
})
