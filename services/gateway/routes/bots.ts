import type { FastifyInstance } from 'fastify'
import { authenticate, parseBody, sendError, type RoutesOptions } from './http'
import { validateBotCreate, validateOverride } from './schemas'

export default async function botsRoutes(fastify: FastifyInstance, { services }: RoutesOptions) {
  const { access, bots, worker } = services

  fastify.post('/api/bots', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const body = parseBody(validateBotCreate, req.body)
      const bot = bots.create({ name: body.name, skills: body.skills, description: body.description, owner: auth.email })
      req.log.info({ botId: bot.id, owner: bot.owner }, 'bot created')
      return reply.send({ ok: true, bot, message: `Bot '${bot.name}' created successfully` })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  // own bots only, unless admin
  fastify.get('/api/bots', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const rows = bots.list().filter(b => access.canAccess(auth, b.owner))
      return reply.send({ ok: true, count: rows.length, bots: rows })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  fastify.delete<{ Params: { botId: string } }>('/api/bots/:botId', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const { override_token } = parseBody(validateOverride, req.body)
      const bot = access.guard(auth, bots.get(req.params.botId), {
        sensitive: true,
        overrideToken: override_token,
        resourceName: 'Bot',
      })

      // Pending tasks are cancelled first so no completion lands on a deleted bot.
      const cancelled = worker.cancelForBot(bot.id)
      bots.delete(bot.id)
      req.log.info({ botId: bot.id, by: auth.email, cancelledTasks: cancelled.length }, 'bot deleted')
      return reply.send({
        ok: true,
        message: `Bot '${bot.name}' deleted`,
        botId: bot.id,
        cancelledTasks: cancelled.length,
      })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })
}
