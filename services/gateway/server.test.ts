import type { FastifyInstance } from 'fastify'
import { afterEach, describe, expect, it } from 'vitest'
import type { BotRecord } from './bots-repo'
import type { CodeRecord } from './codes-repo'
import { readConfig } from './config'
import type { CodeGenerator } from './generator-engine'
import { createLogger } from './logger'
import { buildServer } from './server'
import { createServices, type GatewayServices } from './services'
import type { TaskRecord } from './tasks-repo'

const CREATOR = 'creator-test-key'
const OVERRIDE = 'override-test-token'
const ALICE = 'alice-test-key'
const BOB = 'bob-test-key'

type Method = 'GET' | 'POST' | 'DELETE'
type ErrorBody = { ok: false; error: string; detail: string; details?: string[] }

let app: FastifyInstance | undefined
let nextCode = 'class Scout {}\n'

const stubGenerator: CodeGenerator = {
  enabled: false,
  generate: async () => ({ code: nextCode, openaiUsed: false }),
}

async function setup(taskDelayMs = 60_000): Promise<{ app: FastifyInstance; services: GatewayServices }> {
  const config = readConfig({
    CREATOR_API_KEY: CREATOR,
    OVERRIDE_TOKEN: OVERRIDE,
    TASK_DELAY_MS: String(taskDelayMs),
    CORS_ORIGINS: '*',
  })
  const services = createServices(config, createLogger('silent'), { generator: stubGenerator })
  services.identities.register({ email: 'alice@example.com', password: 'pw', apiKey: ALICE })
  services.identities.register({ email: 'bob@example.com', password: 'pw', apiKey: BOB })
  app = await buildServer(services)
  return { app, services }
}

async function call<T>(server: FastifyInstance, method: Method, url: string, key?: string, payload?: object) {
  const res = await server.inject({ method, url, headers: key ? { 'x-api-key': key } : {}, payload })
  return { status: res.statusCode, body: res.json<T>() }
}

async function createBot(server: FastifyInstance, key: string, name = 'Scout'): Promise<BotRecord> {
  const { body } = await call<{ bot: BotRecord }>(server, 'POST', '/api/bots', key, { name })
  return body.bot
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

afterEach(async () => {
  await app?.close()
  app = undefined
  nextCode = 'class Scout {}\n'
})

describe('system routes', () => {
  it('describes the service without authentication', async () => {
    const { app } = await setup()
    const { status, body } = await call<Record<string, unknown>>(app, 'GET', '/')
    expect(status).toBe(200)
    expect(body).toMatchObject({
      ok: true,
      service: 'Commander',
      version: '1.0.0',
      status: 'running',
      openaiEnabled: false,
      creatorEmail: 'creator@example.com',
    })
  })

  it('reports health with store counts', async () => {
    const { app } = await setup()
    await createBot(app, ALICE)
    const { body } = await call<Record<string, unknown>>(app, 'GET', '/health')
    expect(body).toMatchObject({
      status: 'healthy',
      openai: 'disabled',
      database: 'in-memory',
      botsCount: 1,
      codesCount: 0,
    })
  })

  it('tells a non-admin that an override token is needed', async () => {
    const { app } = await setup()
    const alice = await call<Record<string, unknown>>(app, 'GET', '/api/info', ALICE)
    expect(alice.body).toMatchObject({ email: 'alice@example.com', isAdmin: false, overrideTokenRequired: true })
    const creator = await call<Record<string, unknown>>(app, 'GET', '/api/info', CREATOR)
    expect(creator.body).toMatchObject({ email: 'creator@example.com', isAdmin: true, overrideTokenRequired: false })
    expect(creator.body.totals).toEqual({ identities: 3, bots: 0, codes: 0, tasks: 0 })
  })

  it('answers unknown routes with NotFound', async () => {
    const { app } = await setup()
    const { status, body } = await call<ErrorBody>(app, 'GET', '/nope')
    expect(status).toBe(404)
    expect(body).toEqual({ ok: false, error: 'NotFound', detail: 'Route GET /nope not found' })
  })

  it('allows cross-origin preflight for the api key header', async () => {
    const { app } = await setup()
    const res = await app.inject({
      method: 'OPTIONS',
      url: '/api/bots',
      headers: {
        origin: 'http://ui.test',
        'access-control-request-method': 'POST',
        'access-control-request-headers': 'x-api-key',
      },
    })
    expect(res.statusCode).toBe(204)
    expect(res.headers['access-control-allow-origin']).toBe('http://ui.test')
    expect(res.headers['access-control-allow-headers']).toBe('Content-Type, X-API-Key')
  })
})

describe('authentication', () => {
  it('rejects a missing key', async () => {
    const { app } = await setup()
    const { status, body } = await call<ErrorBody>(app, 'GET', '/api/bots')
    expect(status).toBe(401)
    expect(body).toEqual({ ok: false, error: 'MissingCredential', detail: 'Missing X-API-Key header' })
  })

  it('rejects an unknown key, including the override token', async () => {
    const { app } = await setup()
    for (const key of ['wrong-key', OVERRIDE]) {
      const { status, body } = await call<ErrorBody>(app, 'GET', '/api/bots', key)
      expect(status).toBe(401)
      expect(body).toEqual({ ok: false, error: 'InvalidCredential', detail: 'Invalid API key' })
    }
  })
})

describe('bots', () => {
  it('creates a bot owned by the caller with defaults', async () => {
    const { app } = await setup()
    const { status, body } = await call<{ ok: boolean; bot: BotRecord; message: string }>(
      app, 'POST', '/api/bots', ALICE, { name: 'Scout', extra: 'dropped' },
    )
    expect(status).toBe(200)
    expect(body.message).toBe("Bot 'Scout' created successfully")
    expect(body.bot).toMatchObject({
      name: 'Scout',
      skills: ['general'],
      description: null,
      owner: 'alice@example.com',
      alive: true,
      tasksCompleted: 0,
    })
  })

  it('rejects an invalid body', async () => {
    const { app } = await setup()
    const { status, body } = await call<ErrorBody>(app, 'POST', '/api/bots', ALICE, { skills: 'not-a-list' })
    expect(status).toBe(400)
    expect(body.error).toBe('InvalidBody')
    expect(body.details).toEqual(["body must have required property 'name'", '/skills must be array'])
  })

  it('rejects malformed JSON', async () => {
    const { app } = await setup()
    const res = await app.inject({
      method: 'POST',
      url: '/api/bots',
      headers: { 'x-api-key': ALICE, 'content-type': 'application/json' },
      payload: '{"name":',
    })
    expect(res.statusCode).toBe(400)
    expect(res.json<ErrorBody>().error).toBe('InvalidBody')
  })

  it('lists only own bots, and everything for the admin', async () => {
    const { app } = await setup()
    await createBot(app, ALICE, 'A1')
    await createBot(app, ALICE, 'A2')
    await createBot(app, BOB, 'B1')

    const names = async (key: string) => {
      const { body } = await call<{ count: number; bots: BotRecord[] }>(app, 'GET', '/api/bots', key)
      return body.bots.map(b => b.name).sort()
    }
    expect(await names(ALICE)).toEqual(['A1', 'A2'])
    expect(await names(BOB)).toEqual(['B1'])
    expect(await names(CREATOR)).toEqual(['A1', 'A2', 'B1'])
  })

  it('guards deletion by ownership and then the override token', async () => {
    const { app } = await setup()
    const bot = await createBot(app, ALICE)
    const url = `/api/bots/${bot.id}`

    const byBob = await call<ErrorBody>(app, 'DELETE', url, BOB, { override_token: OVERRIDE })
    expect(byBob.status).toBe(403)
    expect(byBob.body.error).toBe('Forbidden')

    const noToken = await call<ErrorBody>(app, 'DELETE', url, ALICE)
    expect(noToken.status).toBe(403)
    expect(noToken.body).toEqual({ ok: false, error: 'OverrideRequired', detail: 'Override token required for non-admin users' })

    const wrongToken = await call<ErrorBody>(app, 'DELETE', url, ALICE, { override_token: 'guess-123' })
    expect(wrongToken.body).toEqual({ ok: false, error: 'OverrideRequired', detail: 'Override token required for non-admin users' })

    const ok = await call<Record<string, unknown>>(app, 'DELETE', url, ALICE, { override_token: OVERRIDE })
    expect(ok.status).toBe(200)
    expect(ok.body).toEqual({ ok: true, message: "Bot 'Scout' deleted", botId: bot.id, cancelledTasks: 0 })

    const again = await call<ErrorBody>(app, 'DELETE', url, ALICE, { override_token: OVERRIDE })
    expect(again.status).toBe(404)
    expect(again.body).toEqual({ ok: false, error: 'NotFound', detail: 'Bot not found' })
  })

  it('treats a null override token as absent', async () => {
    const { app, services } = await setup()
    const bot = await createBot(app, ALICE)
    const url = `/api/bots/${bot.id}`

    const byOwner = await call<ErrorBody>(app, 'DELETE', url, ALICE, { override_token: null })
    expect(byOwner.status).toBe(403)
    expect(byOwner.body).toEqual({ ok: false, error: 'OverrideRequired', detail: 'Override token required for non-admin users' })

    const byAdmin = await call<{ ok: boolean; botId: string }>(app, 'DELETE', url, CREATOR, { override_token: null })
    expect(byAdmin.status).toBe(200)
    expect(byAdmin.body).toMatchObject({ ok: true, botId: bot.id })
    expect(services.bots.count()).toBe(0)
  })

  it('lets the admin delete any bot without a token', async () => {
    const { app, services } = await setup()
    const bot = await createBot(app, ALICE)
    const { status } = await call(app, 'DELETE', `/api/bots/${bot.id}`, CREATOR)
    expect(status).toBe(200)
    expect(services.bots.count()).toBe(0)
  })
})

describe('code', () => {
  it('returns a preview and the full code when it is short', async () => {
    const { app } = await setup()
    nextCode = 'a'.repeat(250)
    const { status, body } = await call<Record<string, unknown>>(app, 'POST', '/api/code/generate', ALICE, {
      description: 'answers questions',
    })
    expect(status).toBe(200)
    expect(body).toMatchObject({
      ok: true,
      name: 'GeneratedBot',
      codePreview: `${'a'.repeat(200)}...`,
      fullCode: 'a'.repeat(250),
      openaiUsed: false,
      message: 'Code generated successfully',
    })
  })

  it('truncates long code in the response but stores all of it', async () => {
    const { app } = await setup()
    nextCode = 'b'.repeat(1500)
    const gen = await call<{ codeId: string; fullCode: string; codePreview: string }>(
      app, 'POST', '/api/code/generate', ALICE, { description: 'long one', bot_name: 'Long' },
    )
    expect(gen.body.fullCode).toBe(`${'b'.repeat(1000)}... [truncated]`)

    const stored = await call<{ code: CodeRecord }>(app, 'GET', `/api/code/${gen.body.codeId}`, ALICE)
    expect(stored.status).toBe(200)
    expect(stored.body.code).toMatchObject({
      name: 'Long',
      description: 'long one',
      owner: 'alice@example.com',
      approved: false,
      openaiUsed: false,
    })
    expect(stored.body.code.code).toHaveLength(1500)
  })

  it('keeps code short of the limit untouched', async () => {
    const { app } = await setup()
    nextCode = 'c'.repeat(999)
    const { body } = await call<{ fullCode: string; codePreview: string }>(app, 'POST', '/api/code/generate', ALICE, {
      description: 'edge',
    })
    expect(body.fullCode).toBe('c'.repeat(999))
  })

  it('requires a description', async () => {
    const { app } = await setup()
    const { status, body } = await call<ErrorBody>(app, 'POST', '/api/code/generate', ALICE, {})
    expect(status).toBe(400)
    expect(body.details).toEqual(["body must have required property 'description'"])
  })

  it('hides code from other users', async () => {
    const { app } = await setup()
    const gen = await call<{ codeId: string }>(app, 'POST', '/api/code/generate', ALICE, { description: 'x' })
    const byBob = await call<ErrorBody>(app, 'GET', `/api/code/${gen.body.codeId}`, BOB)
    expect(byBob.status).toBe(403)
    const missing = await call<ErrorBody>(app, 'GET', '/api/code/missing', ALICE)
    expect(missing.body).toEqual({ ok: false, error: 'NotFound', detail: 'Code not found' })
  })

  it('approves with the override token and records the approver', async () => {
    const { app } = await setup()
    const gen = await call<{ codeId: string }>(app, 'POST', '/api/code/generate', ALICE, { description: 'x', bot_name: 'Scout' })
    const url = `/api/code/approve/${gen.body.codeId}`

    const denied = await call<ErrorBody>(app, 'POST', url, ALICE, {})
    expect(denied.body.error).toBe('OverrideRequired')

    const approved = await call<Record<string, unknown>>(app, 'POST', url, ALICE, { override_token: OVERRIDE })
    expect(approved.body).toEqual({ ok: true, message: "Code 'Scout' approved", codeId: gen.body.codeId, approved: true })

    const stored = await call<{ code: CodeRecord }>(app, 'GET', `/api/code/${gen.body.codeId}`, ALICE)
    expect(stored.body.code.approved).toBe(true)
    expect(stored.body.code.approvedBy).toBe('alice@example.com')
  })
})

describe('tasks', () => {
  it('assigns a task to an owned bot and keeps it pending', async () => {
    const { app } = await setup()
    const bot = await createBot(app, ALICE)
    const { status, body } = await call<Record<string, unknown>>(app, 'POST', '/api/tasks/assign', ALICE, {
      bot_id: bot.id,
      task: 'analyze the logs',
    })
    expect(status).toBe(200)
    expect(body).toMatchObject({ ok: true, botId: bot.id, botName: 'Scout', status: 'assigned' })

    const list = await call<{ count: number; tasks: TaskRecord[] }>(app, 'GET', '/api/tasks', ALICE)
    expect(list.body.count).toBe(1)
    expect(list.body.tasks[0]).toMatchObject({
      botId: bot.id,
      task: 'analyze the logs',
      status: 'pending',
      timeout: 30,
      owner: 'alice@example.com',
      assignedBy: 'alice@example.com',
    })

    const forBob = await call<{ count: number }>(app, 'GET', '/api/tasks', BOB)
    expect(forBob.body.count).toBe(0)
  })

  it('refuses tasks for bots the caller does not own or that do not exist', async () => {
    const { app } = await setup()
    const bot = await createBot(app, ALICE)
    const byBob = await call<ErrorBody>(app, 'POST', '/api/tasks/assign', BOB, { bot_id: bot.id, task: 'x' })
    expect(byBob.status).toBe(403)
    const missing = await call<ErrorBody>(app, 'POST', '/api/tasks/assign', ALICE, { bot_id: 'missing', task: 'x' })
    expect(missing.body).toEqual({ ok: false, error: 'NotFound', detail: 'Bot not found' })
    const badTimeout = await call<ErrorBody>(app, 'POST', '/api/tasks/assign', ALICE, { bot_id: bot.id, task: 'x', timeout: 'soon' })
    expect(badTimeout.status).toBe(400)
    expect(badTimeout.body.details).toEqual(['/timeout must be integer'])
  })

  it('stores any integer timeout as given', async () => {
    const { app, services } = await setup()
    const bot = await createBot(app, ALICE)
    const assigned = await call<{ taskId: string }>(app, 'POST', '/api/tasks/assign', ALICE, {
      bot_id: bot.id,
      task: 'x',
      timeout: 7200,
    })
    expect(assigned.status).toBe(200)
    expect(services.tasks.get(assigned.body.taskId)?.timeout).toBe(7200)
  })

  it('cancels a pending task once', async () => {
    const { app } = await setup()
    const bot = await createBot(app, ALICE)
    const assigned = await call<{ taskId: string }>(app, 'POST', '/api/tasks/assign', ALICE, { bot_id: bot.id, task: 'x' })
    const url = `/api/tasks/${assigned.body.taskId}/cancel`

    const byBob = await call<ErrorBody>(app, 'POST', url, BOB)
    expect(byBob.status).toBe(403)

    const first = await call<{ task: TaskRecord }>(app, 'POST', url, ALICE)
    expect(first.status).toBe(200)
    expect(first.body.task.status).toBe('cancelled')

    const second = await call<ErrorBody>(app, 'POST', url, ALICE)
    expect(second.status).toBe(409)
    expect(second.body).toMatchObject({ ok: false, error: 'TaskNotPending', detail: 'Task is already cancelled' })
  })

  it('cancels pending tasks when their bot is deleted and hides them afterwards', async () => {
    const { app, services } = await setup()
    const bot = await createBot(app, ALICE)
    const assigned = await call<{ taskId: string }>(app, 'POST', '/api/tasks/assign', ALICE, { bot_id: bot.id, task: 'x' })

    const deleted = await call<{ cancelledTasks: number }>(app, 'DELETE', `/api/bots/${bot.id}`, CREATOR)
    expect(deleted.body.cancelledTasks).toBe(1)
    expect(services.tasks.get(assigned.body.taskId)?.status).toBe('cancelled')
    expect(services.worker.scheduledCount()).toBe(0)

    const list = await call<{ count: number }>(app, 'GET', '/api/tasks', CREATOR)
    expect(list.body.count).toBe(0)
  })

  it('completes the task after the delay and counts it on the bot', async () => {
    const { app } = await setup(0)
    const bot = await createBot(app, ALICE)
    await call(app, 'POST', '/api/tasks/assign', ALICE, { bot_id: bot.id, task: 'say hello' })
    await sleep(20)

    const tasks = await call<{ tasks: TaskRecord[] }>(app, 'GET', '/api/tasks', ALICE)
    expect(tasks.body.tasks[0]?.status).toBe('completed')
    expect(tasks.body.tasks[0]?.result).toEqual({
      success: true,
      output: 'Task completed by Scout: say hello...',
      botSkills: ['general'],
    })

    const bots = await call<{ bots: BotRecord[] }>(app, 'GET', '/api/bots', ALICE)
    expect(bots.body.bots[0]?.tasksCompleted).toBe(1)
  })
})
