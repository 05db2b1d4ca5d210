import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { ShortcutConfig } from '../config/types.js'
import type { NimProvider } from '../providers/nim.js'
import { UpstreamError, type ClientErrorType } from '../providers/errors.js'
import { parseMessagesRequest, parseTokenCountRequest, type ParseError } from '../protocol/normalize.js'
import { countRequestTokens } from '../protocol/tokenizer.js'
import { formatSseEvent } from '../protocol/sse.js'
import { buildShortcutResponse, classifyRequest } from '../router/classifier.js'
import type { MessagesRequest } from '../protocol/types.js'

export interface MessagesRouteOptions {
  provider: NimProvider
  /** Local answers enabled for this server; fixed at startup. */
  shortcuts: ShortcutConfig
}

export interface ErrorBody {
  type: 'error'
  error: {
    type: ClientErrorType
    message: string
  }
}

export function errorBody(type: ClientErrorType, message: string): ErrorBody {
  return { type: 'error', error: { type, message } }
}

function invalidRequest(result: ParseError): ErrorBody {
  const message = result.path ? `${result.message} (${result.path})` : result.message
  return errorBody('invalid_request_error', message)
}

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no'
}

async function streamMessages(
  provider: NimProvider,
  payload: MessagesRequest,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const inputTokens = countRequestTokens(payload)
  const controller = new AbortController()
  const onClose = () => {
    if (!reply.raw.writableFinished) {
      request.log.info('client disconnected, cancelling upstream stream')
      controller.abort()
    }
  }

  reply.hijack()
  reply.raw.writeHead(200, SSE_HEADERS)
  reply.raw.on('close', onClose)

  try {
    for await (const event of provider.stream(payload, { inputTokens, signal: controller.signal })) {
      if (controller.signal.aborted) break
      reply.raw.write(formatSseEvent(event))
    }
  } catch (err) {
    request.log.error({ err }, 'stream aborted unexpectedly')
  } finally {
    reply.raw.off('close', onClose)
    if (!reply.raw.writableEnded) {
      reply.raw.end()
    }
  }
}

export async function registerMessagesRoute(app: FastifyInstance, options: MessagesRouteOptions): Promise<void> {
  const { provider } = options

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = parseMessagesRequest(request.body)
    if (!parsed.ok) {
      reply.code(400)
      return invalidRequest(parsed)
    }
    const payload = parsed.value

    const shortcut = classifyRequest(payload, options.shortcuts)
    if (shortcut) {
      request.log.info({ shortcut: shortcut.kind }, 'answered locally')
      return buildShortcutResponse(shortcut, provider.model)
    }

    if (payload.stream) {
      await streamMessages(provider, payload, request, reply)
      return reply
    }

    const controller = new AbortController()
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort()
    }
    reply.raw.on('close', onClose)
    try {
      return await provider.complete(payload, controller.signal)
    } catch (err) {
      if (err instanceof UpstreamError) {
        reply.code(err.clientStatus)
        return errorBody(err.clientErrorType, err.message)
      }
      throw err
    } finally {
      reply.raw.off('close', onClose)
    }
  }

  const countTokensHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = parseTokenCountRequest(request.body)
    if (!parsed.ok) {
      reply.code(400)
      return invalidRequest(parsed)
    }
    return { input_tokens: countRequestTokens(parsed.value) }
  }

  app.post('/v1/messages/count_tokens', countTokensHandler)
  app.post('/anthropic/v1/messages/count_tokens', countTokensHandler)

  app.post('/v1/messages', handler)
  app.post('/anthropic/v1/messages', handler)
}
