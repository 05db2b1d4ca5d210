import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import type { GatewayConfig, LogLevel, RateLimitConfig, ShortcutConfig, UpstreamConfig } from './types.js'

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

const HOME_OVERRIDE = process.env.KIMIGATE_HOME
export const HOME_DIR = path.resolve(HOME_OVERRIDE ?? path.join(os.homedir(), '.kimigate'))
export const CONFIG_PATH = path.join(HOME_DIR, 'config.json')

export const DEFAULT_BASE_URL = 'https://integrate.api.nvidia.com/v1'
export const DEFAULT_MODEL = 'moonshotai/kimi-k2.5'

let cachedConfig: GatewayConfig | null = null

export function defaultConfig(): GatewayConfig {
  return {
    host: '127.0.0.1',
    port: 8082,
    upstream: {
      baseUrl: DEFAULT_BASE_URL,
      apiKey: '',
      model: DEFAULT_MODEL,
      timeoutMs: 300_000,
      maxRetries: 2
    },
    rateLimit: {
      limit: 40,
      windowSeconds: 60
    },
    shortcuts: {
      quotaCheck: true,
      titleGeneration: true,
      suggestionMode: true,
      filepathExtraction: true,
      prefixDetection: true
    },
    logLevel: 'info',
    requestLogging: true,
    bodyLimit: 10 * 1024 * 1024
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value)
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback
}

function nonNegativeInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback
}

function nonEmptyString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback
  const trimmed = value.trim()
  return trimmed || fallback
}

function sanitizePort(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value < 65536 ? value : fallback
}

function sanitizeUpstream(input: unknown, fallback: UpstreamConfig): UpstreamConfig {
  if (!isRecord(input)) return { ...fallback }
  return {
    baseUrl: nonEmptyString(input.baseUrl, fallback.baseUrl).replace(/\/+$/, ''),
    apiKey: typeof input.apiKey === 'string' ? input.apiKey.trim() : fallback.apiKey,
    model: nonEmptyString(input.model, fallback.model),
    timeoutMs: positiveNumber(input.timeoutMs, fallback.timeoutMs),
    maxRetries: nonNegativeInteger(input.maxRetries, fallback.maxRetries)
  }
}

function sanitizeRateLimit(input: unknown, fallback: RateLimitConfig): RateLimitConfig {
  if (!isRecord(input)) return { ...fallback }
  return {
    limit: typeof input.limit === 'number' && Number.isInteger(input.limit) && input.limit > 0 ? input.limit : fallback.limit,
    windowSeconds: positiveNumber(input.windowSeconds, fallback.windowSeconds)
  }
}

function sanitizeShortcuts(input: unknown, fallback: ShortcutConfig): ShortcutConfig {
  const shortcuts: ShortcutConfig = { ...fallback }
  if (!isRecord(input)) return shortcuts
  for (const key of Object.keys(fallback)) {
    if (isShortcutKey(key) && typeof input[key] === 'boolean') {
      shortcuts[key] = input[key] === true
    }
  }
  return shortcuts
}

function isShortcutKey(key: string): key is keyof ShortcutConfig {
  return (
    key === 'quotaCheck' ||
    key === 'titleGeneration' ||
    key === 'suggestionMode' ||
    key === 'filepathExtraction' ||
    key === 'prefixDetection'
  )
}

/**
 * Normalizes whatever was read from disk. Unknown keys are dropped and invalid
 * values fall back to their defaults.
 */
export function sanitizeConfig(data: unknown): GatewayConfig {
  const defaults = defaultConfig()
  if (!isRecord(data)) return defaults
  return {
    host: nonEmptyString(data.host, defaults.host),
    port: sanitizePort(data.port, defaults.port),
    upstream: sanitizeUpstream(data.upstream, defaults.upstream),
    rateLimit: sanitizeRateLimit(data.rateLimit, defaults.rateLimit),
    shortcuts: sanitizeShortcuts(data.shortcuts, defaults.shortcuts),
    logLevel: isLogLevel(data.logLevel) ? data.logLevel : defaults.logLevel,
    requestLogging: typeof data.requestLogging === 'boolean' ? data.requestLogging : defaults.requestLogging,
    bodyLimit: positiveNumber(data.bodyLimit, defaults.bodyLimit)
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/**
 * Environment variables win over the file. The result is sanitized again so a
 * bad variable cannot produce an invalid config.
 */
export function applyEnvOverrides(config: GatewayConfig, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const next: GatewayConfig = {
    ...config,
    upstream: { ...config.upstream },
    rateLimit: { ...config.rateLimit },
    shortcuts: { ...config.shortcuts }
  }
  if (env.HOST) next.host = env.HOST
  const port = parseInteger(env.PORT)
  if (port !== undefined) next.port = port
  if (env.KIMIGATE_BASE_URL) next.upstream.baseUrl = env.KIMIGATE_BASE_URL
  if (env.NVIDIA_NIM_API_KEY) next.upstream.apiKey = env.NVIDIA_NIM_API_KEY
  if (env.KIMIGATE_MODEL) next.upstream.model = env.KIMIGATE_MODEL
  const limit = parseInteger(env.RATE_LIMIT)
  if (limit !== undefined) next.rateLimit.limit = limit
  const window = parseInteger(env.RATE_WINDOW)
  if (window !== undefined) next.rateLimit.windowSeconds = window
  const level = env.LOG_LEVEL?.toLowerCase()
  if (isLogLevel(level)) next.logLevel = level
  return sanitizeConfig(next)
}

function parseConfig(raw: string): GatewayConfig {
  const data: unknown = JSON.parse(raw)
  return sanitizeConfig(data)
}

export function loadConfig(): GatewayConfig {
  let fileConfig = defaultConfig()
  if (fs.existsSync(CONFIG_PATH)) {
    const raw = fs.readFileSync(CONFIG_PATH, 'utf-8')
    try {
      fileConfig = parseConfig(raw)
    } catch (err) {
      throw new Error(`invalid config file ${CONFIG_PATH}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
  cachedConfig = applyEnvOverrides(fileConfig)
  return cachedConfig
}

export function getConfig(): GatewayConfig {
  if (cachedConfig) return cachedConfig
  return loadConfig()
}

/** Writes the default config file unless one exists. Returns false when it was already there. */
export function writeDefaultConfig(): boolean {
  if (fs.existsSync(CONFIG_PATH)) return false
  fs.mkdirSync(path.dirname(CONFIG_PATH), { recursive: true })
  fs.writeFileSync(CONFIG_PATH, JSON.stringify(defaultConfig(), null, 2), 'utf-8')
  return true
}
