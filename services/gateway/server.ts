// server.ts: Commander HTTP API
// bots → code generation → approval → simulated tasks, all behind API-key auth
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { corsOrigins } from './config'
import type { LoggerOptions } from 'pino'
import type { GatewayServices } from './services'
import botsRoutes from './routes/bots'
import codeRoutes from './routes/code'
import systemRoutes from './routes/system'
import tasksRoutes from './routes/tasks'

export type BuildServerOptions = {
  /** pino options for the request logger, or false to silence it. */
  logger?: LoggerOptions | boolean
}

export async function buildServer(services: GatewayServices, opts: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logger ?? false })
  const origins = corsOrigins(services.config)

  await app.register(cors, {
    origin: (origin, cb) => {
      cb(null, origins === '*' || origins.includes(String(origin || '')))
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-Key'],
  })

  // Malformed JSON and other framework-level rejections share the route error shape.
  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = err.statusCode ?? 500
    if (status >= 500) {
      req.log.error({ err }, 'request failed')
      return reply.code(500).send({ ok: false, error: 'Internal' })
    }
    const error = status === 400 ? 'InvalidBody' : err.code
    return reply.code(status).send({ ok: false, error, detail: err.message })
  })

  app.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({ ok: false, error: 'NotFound', detail: `Route ${req.method} ${req.url} not found` })
  })

  app.addHook('onClose', async () => {
    services.worker.close()
  })

  await app.register(systemRoutes, { services })
  await app.register(botsRoutes, { services })
  await app.register(codeRoutes, { services })
  await app.register(tasksRoutes, { services })

  return app
}
