export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

export interface UpstreamConfig {
  /** Chat-completions base URL, `/chat/completions` is appended. */
  baseUrl: string
  apiKey: string
  /** Model sent upstream regardless of what the client asked for. */
  model: string
  timeoutMs: number
  maxRetries: number
}

export interface RateLimitConfig {
  limit: number
  windowSeconds: number
}

export interface ShortcutConfig {
  quotaCheck: boolean
  titleGeneration: boolean
  suggestionMode: boolean
  filepathExtraction: boolean
  prefixDetection: boolean
}

export interface GatewayConfig {
  host: string
  port: number
  upstream: UpstreamConfig
  rateLimit: RateLimitConfig
  shortcuts: ShortcutConfig
  logLevel: LogLevel
  requestLogging: boolean
  bodyLimit: number
}
