import type { FastifyInstance } from 'fastify'
import { RequestError } from '../errors'
import { authenticate, parseBody, sendError, type RoutesOptions } from './http'
import { validateTaskAssign } from './schemas'

export default async function tasksRoutes(fastify: FastifyInstance, { services }: RoutesOptions) {
  const { access, bots, tasks, worker } = services

  fastify.post('/api/tasks/assign', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const body = parseBody(validateTaskAssign, req.body)
      const bot = access.guard(auth, bots.get(body.bot_id), { sensitive: false, resourceName: 'Bot' })

      const task = tasks.create({
        botId: bot.id,
        botName: bot.name,
        task: body.task,
        owner: bot.owner,
        assignedBy: auth.email,
        timeout: body.timeout,
      })
      worker.schedule(task)
      req.log.info({ taskId: task.id, botId: bot.id }, 'task assigned')
      return reply.send({
        ok: true,
        taskId: task.id,
        botId: bot.id,
        botName: bot.name,
        status: 'assigned',
        message: `Task assigned to '${bot.name}'`,
      })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  // A task is visible while its bot exists and the caller may access that bot.
  fastify.get('/api/tasks', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const rows = tasks.list().filter(t => {
        const bot = bots.get(t.botId)
        return bot !== undefined && access.canAccess(auth, bot.owner)
      })
      return reply.send({ ok: true, count: rows.length, tasks: rows })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  fastify.post<{ Params: { taskId: string } }>('/api/tasks/:taskId/cancel', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const task = access.guard(auth, tasks.get(req.params.taskId), { sensitive: false, resourceName: 'Task' })
      const cancelled = worker.cancel(task.id)
      if (!cancelled) {
        throw new RequestError('TaskNotPending', `Task is already ${task.status}`)
      }
      req.log.info({ taskId: task.id, by: auth.email }, 'task cancelled')
      return reply.send({ ok: true, task: cancelled })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })
}
