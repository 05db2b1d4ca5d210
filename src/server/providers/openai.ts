import { fetch } from 'undici'
import type { UpstreamConfig } from '../config/types.js'
import type { ProviderConnector, ProviderRequest, ProviderResponse } from './types.js'

export interface OpenAIConnectorOptions {
  /**
   * Optional override for complete endpoint URL. When not provided the connector
   * appends `v1/chat/completions` to the configured base URL.
   */
  endpoint?: string
  id?: string
}

export function resolveEndpoint(baseUrl: string, options?: OpenAIConnectorOptions): string {
  if (options?.endpoint) return options.endpoint
  const base = baseUrl.replace(/\/+$/, '')
  if (base.endsWith('/chat/completions')) return base
  if (base.endsWith('/v1')) return `${base}/chat/completions`
  return `${base}/v1/chat/completions`
}

interface LinkedSignal {
  signal: AbortSignal
  dispose: () => void
}

/**
 * One signal that fires on the caller's abort or after `timeoutMs`, whichever
 * comes first. The timeout spans the whole response, body included.
 */
function linkSignal(timeoutMs: number, parent?: AbortSignal): LinkedSignal {
  const controller = new AbortController()
  const timer = setTimeout(() => {
    const error = new Error(`upstream did not finish within ${timeoutMs}ms`)
    error.name = 'TimeoutError'
    controller.abort(error)
  }, timeoutMs)
  const onAbort = () => controller.abort(parent?.reason)
  if (parent?.aborted) {
    onAbort()
  } else {
    parent?.addEventListener('abort', onAbort, { once: true })
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onAbort)
    }
  }
}

export function createOpenAIConnector(
  config: UpstreamConfig,
  options?: OpenAIConnectorOptions
): ProviderConnector {
  const url = resolveEndpoint(config.baseUrl, options)

  return {
    id: options?.id ?? 'openai',
    url,
    async send(request: ProviderRequest): Promise<ProviderResponse> {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        Accept: request.stream ? 'text/event-stream' : 'application/json'
      }

      if (config.apiKey) {
        headers['Authorization'] = `Bearer ${config.apiKey}`
      }

      const body: Record<string, unknown> = {
        ...request.body,
        stream: request.stream
      }
      if (request.stream) {
        body.stream_options = { include_usage: true }
      }

      const linked = linkSignal(config.timeoutMs, request.signal)

      try {
        const res = await fetch(url, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: linked.signal
        })
        return {
          status: res.status,
          headers: res.headers,
          body: res.body,
          dispose: linked.dispose
        }
      } catch (err) {
        linked.dispose()
        throw err
      }
    }
  }
}
