import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'

import { InvalidStateError, StateConflictError, TaskNotFoundError } from '../core/errors.js'
import { sanitizeObject } from '../core/sanitize.js'
import type { Runtime } from '../core/service.js'
import { TASK_STATES, isTaskState, type Decision, type Task } from '../core/types.js'
import { bearerAuth } from './auth.js'

export type ServerRuntime = Pick<Runtime, 'config' | 'store' | 'engine' | 'integrations' | 'queueFor'>

interface DecisionBody {
  decision: Decision
  actor: string
  reason?: string
}

function parseDecisionBody(body: unknown): DecisionBody | string {
  if (typeof body !== 'object' || body === null) return 'Request body must be a JSON object'
  const decision = 'decision' in body ? body.decision : undefined
  const actor = 'actor' in body ? body.actor : undefined
  const reason = 'reason' in body ? body.reason : undefined

  if (decision !== 'approve' && decision !== 'reject') return 'decision must be "approve" or "reject"'
  if (typeof actor !== 'string' || actor.trim() === '') return 'actor must be a non-empty string'
  if (reason !== undefined && typeof reason !== 'string') return 'reason must be a string'
  return { decision, actor, reason }
}

function statusFor(error: FastifyError): number {
  if (error instanceof StateConflictError) return 409
  if (error instanceof TaskNotFoundError) return 404
  if (error instanceof InvalidStateError) return 503
  return error.statusCode ?? 500
}

export function createServer(runtime: ServerRuntime): FastifyInstance {
  const { config, store, engine } = runtime
  const server = Fastify({
    logger: {
      level: config.logLevel,
      formatters: {
        log: (object) => sanitizeObject(object),
      },
    },
  })

  server.register(bearerAuth, { token: config.server.authToken ?? '' })

  server.get('/health', { config: { public: true } }, async () => {
    return { status: 'ok', uptime: process.uptime() }
  })

  server.get<{ Querystring: { state?: string } }>('/tasks', async (request, reply) => {
    const { state } = request.query
    if (state === undefined) {
      const tasks: Task[] = []
      for (const each of TASK_STATES) tasks.push(...store.list(each))
      return tasks
    }
    if (!isTaskState(state)) {
      return reply
        .code(400)
        .send({ error: `Unknown state "${state}". Expected one of: ${TASK_STATES.join(', ')}`, statusCode: 400 })
    }
    return [...store.list(state)]
  })

  server.get<{ Params: { id: string } }>('/tasks/:id', async (request) => {
    const task = store.read(request.params.id)
    if (task === null) {
      throw new TaskNotFoundError(request.params.id)
    }
    return task
  })

  server.post<{ Params: { id: string } }>('/tasks/:id/decision', async (request, reply) => {
    const body = parseDecisionBody(request.body)
    if (typeof body === 'string') {
      return reply.code(400).send({ error: body, statusCode: 400 })
    }
    return engine.decide(request.params.id, body.decision, body.actor, body.reason)
  })

  server.get('/queues', async () => {
    const depths: Record<string, number> = {}
    for (const name of runtime.integrations.keys()) {
      depths[name] = runtime.queueFor(name).size()
    }
    return depths
  })

  server.setNotFoundHandler(async (_request, reply) => {
    await reply.status(404).send({ error: 'Not Found', statusCode: 404 })
  })

  server.setErrorHandler(async (error: FastifyError, _request, reply) => {
    const statusCode = statusFor(error)
    const message =
      statusCode === 503 ? 'Service Unavailable' : statusCode >= 500 ? 'Internal Server Error' : error.message
    await reply.status(statusCode).send({ error: message, statusCode })
  })

  return server
}

export async function startServer(runtime: ServerRuntime): Promise<FastifyInstance> {
  const server = createServer(runtime)

  const shutdown = async () => {
    server.log.info('Shutting down server...')
    await server.close()
    process.exit(0)
  }

  // Hooks cannot be added once the instance is listening.
  server.addHook('onClose', async () => {
    process.removeListener('SIGINT', shutdown)
    process.removeListener('SIGTERM', shutdown)
  })

  await server.listen({ host: runtime.config.server.host, port: runtime.config.server.port })

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  return server
}
