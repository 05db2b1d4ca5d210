import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'
import path from 'node:path'
import process from 'node:process'
import { fileURLToPath } from 'node:url'
import { getConfig, loadConfig } from './config/manager.js'
import type { GatewayConfig } from './config/types.js'
import { registerMessagesRoute, errorBody } from './routes/messages.js'
import { NimProvider } from './providers/nim.js'
import { RateGate } from './providers/rateGate.js'
import type { ProviderConnector } from './providers/types.js'

export interface CreateServerOptions {
  /** Skips the config file and env overrides when given. */
  config?: GatewayConfig
  connector?: ProviderConnector
  gate?: RateGate
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig()

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    disableRequestLogging: true,
    bodyLimit: config.bodyLimit
  })

  if (config.requestLogging) {
    app.addHook('onRequest', (request, _reply, done) => {
      app.log.info(
        {
          reqId: request.id,
          req: {
            method: request.method,
            url: request.url,
            remoteAddress: request.ip
          }
        },
        'incoming request'
      )
      done()
    })

    app.addHook('onResponse', (request, reply, done) => {
      app.log.info(
        {
          reqId: request.id,
          res: {
            statusCode: reply.statusCode
          },
          responseTime: reply.elapsedTime
        },
        'request completed'
      )
      done()
    })
  }

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = error.statusCode ?? 500
    if (status >= 400 && status < 500) {
      reply.code(status).send(errorBody('invalid_request_error', error.message))
      return
    }
    request.log.error({ err: error }, 'unhandled error')
    reply.code(500).send(errorBody('api_error', error.message))
  })

  // One gate per process: every request shares the upstream budget
  const gate =
    options.gate ??
    new RateGate({ limit: config.rateLimit.limit, windowMs: config.rateLimit.windowSeconds * 1000 })
  const provider = new NimProvider({
    config: config.upstream,
    gate,
    logger: app.log,
    connector: options.connector
  })

  if (!config.upstream.apiKey) {
    app.log.warn('no upstream API key configured, requests will be rejected upstream')
  }

  await registerMessagesRoute(app, { provider, shortcuts: config.shortcuts })

  app.get('/', async () => {
    return {
      status: 'ok',
      provider: provider.id,
      model: provider.model
    }
  })

  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: Date.now()
    }
  })

  return app
}

export interface StartOptions {
  port?: number
  host?: string
}

export async function startServer(options: StartOptions = {}): Promise<FastifyInstance> {
  const app = await createServer()
  const config = getConfig()
  const port = options.port ?? config.port
  const host = options.host ?? config.host

  await app.listen({ port, host })
  app.log.info(`server started at http://${host}:${port}, upstream model ${config.upstream.model}`)
  return app
}

export async function main(options: StartOptions = {}): Promise<void> {
  try {
    const app = await startServer(options)

    const shutdown = async () => {
      try {
        await app.close()
        process.exit(0)
      } catch (err) {
        console.error('failed to shut down:', err)
        process.exit(1)
      }
    }

    process.on('SIGTERM', () => void shutdown())
    process.on('SIGINT', () => void shutdown())
  } catch (err) {
    console.error('failed to start server', err)
    process.exit(1)
  }
}

const __filename = fileURLToPath(import.meta.url)
if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  void main()
}
