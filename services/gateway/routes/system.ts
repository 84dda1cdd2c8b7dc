import type { FastifyInstance } from 'fastify'
import { authenticate, sendError, type RoutesOptions } from './http'

export const SERVICE_NAME = 'Commander'
export const SERVICE_VERSION = '1.0.0'

const ENDPOINTS = {
  health: 'GET /health',
  info: 'GET /api/info',
  createBot: 'POST /api/bots',
  listBots: 'GET /api/bots',
  deleteBot: 'DELETE /api/bots/:botId',
  generateCode: 'POST /api/code/generate',
  getCode: 'GET /api/code/:codeId',
  approveCode: 'POST /api/code/approve/:codeId',
  assignTask: 'POST /api/tasks/assign',
  listTasks: 'GET /api/tasks',
  cancelTask: 'POST /api/tasks/:taskId/cancel',
} as const

export default async function systemRoutes(fastify: FastifyInstance, { services }: RoutesOptions) {
  const { access, bots, codes, tasks, generator, identities } = services

  fastify.get('/', async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'running',
    endpoints: ENDPOINTS,
    openaiEnabled: generator.enabled,
    creatorEmail: identities.creator().email,
    timestamp: new Date().toISOString(),
  }))

  fastify.get('/health', async () => ({
    ok: true,
    status: 'healthy',
    openai: generator.enabled ? 'enabled' : 'disabled',
    database: 'in-memory',
    botsCount: bots.count(),
    codesCount: codes.count(),
    timestamp: new Date().toISOString(),
  }))

  fastify.get('/api/info', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      return reply.send({
        ok: true,
        email: auth.email,
        isAdmin: auth.isAdmin,
        openaiEnabled: generator.enabled,
        overrideTokenRequired: !auth.isAdmin,
        totals: { identities: identities.count(), bots: bots.count(), codes: codes.count(), tasks: tasks.list().length },
        serverTime: new Date().toISOString(),
      })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })
}
