import { abortReason, sleep } from './utils.js'

export interface RateGateOptions {
  /** Requests admitted per window. */
  limit: number
  windowMs: number
}

interface Waiter {
  resolve: () => void
  reject: (reason: unknown) => void
  signal?: AbortSignal
  onAbort?: () => void
}

/**
 * Admission control for upstream calls: a continuously refilling token bucket
 * plus a cool-down deadline set when the upstream answers 429.
 *
 * Waiters are served in arrival order. One instance is shared by every
 * request the process serves.
 */
export class RateGate {
  private readonly capacity: number
  private readonly windowMs: number
  private tokens: number
  private lastRefill: number
  private blockedUntil = 0
  private readonly waiters: Waiter[] = []
  private timer: ReturnType<typeof setTimeout> | null = null

  constructor(options: RateGateOptions) {
    this.capacity = Math.max(1, Math.floor(options.limit))
    this.windowMs = Math.max(1, options.windowMs)
    this.tokens = this.capacity
    this.lastRefill = Date.now()
  }

  /** Milliseconds left in the current cool-down, 0 when none. */
  get coolDownRemaining(): number {
    return Math.max(0, this.blockedUntil - Date.now())
  }

  get queued(): number {
    return this.waiters.length
  }

  /**
   * Resolves once the caller may contact the upstream. The result is true when
   * a cool-down forced the caller to wait first.
   */
  async wait(signal?: AbortSignal): Promise<boolean> {
    let waited = false
    let remaining = this.coolDownRemaining
    while (remaining > 0) {
      await sleep(remaining, signal)
      waited = true
      remaining = this.coolDownRemaining
    }
    await this.acquire(signal)
    return waited
  }

  block(seconds = 60): void {
    this.blockedUntil = Date.now() + seconds * 1000
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal))
    }
    this.refill()
    if (this.waiters.length === 0 && this.tokens >= 1) {
      this.tokens -= 1
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal }
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) {
            this.waiters.splice(index, 1)
          }
          reject(abortReason(signal))
        }
        signal.addEventListener('abort', waiter.onAbort, { once: true })
      }
      this.waiters.push(waiter)
      this.schedule()
    })
  }

  private refill(): void {
    const now = Date.now()
    const elapsed = now - this.lastRefill
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.capacity) / this.windowMs)
      this.lastRefill = now
    }
  }

  private drain(): void {
    this.timer = null
    this.refill()
    while (this.waiters.length > 0 && this.tokens >= 1) {
      const waiter = this.waiters.shift()
      if (!waiter) break
      this.tokens -= 1
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort)
      }
      waiter.resolve()
    }
    if (this.waiters.length > 0) {
      this.schedule()
    }
  }

  private schedule(): void {
    if (this.timer !== null) return
    const missing = Math.max(0, 1 - this.tokens)
    const delay = Math.ceil((missing * this.windowMs) / this.capacity)
    this.timer = setTimeout(() => this.drain(), delay)
  }
}
