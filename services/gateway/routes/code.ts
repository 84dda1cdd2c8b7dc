import type { FastifyInstance } from 'fastify'
import { authenticate, parseBody, sendError, type RoutesOptions } from './http'
import { validateCodeGenerate, validateOverride } from './schemas'

const PREVIEW_CHARS = 200
const FULL_CODE_CHARS = 1000

export function codePreview(code: string): string {
  return code.length > PREVIEW_CHARS ? `${code.slice(0, PREVIEW_CHARS)}...` : code
}

export function fullCodeExcerpt(code: string): string {
  return code.length < FULL_CODE_CHARS ? code : `${code.slice(0, FULL_CODE_CHARS)}... [truncated]`
}

export default async function codeRoutes(fastify: FastifyInstance, { services }: RoutesOptions) {
  const { access, codes, generator } = services

  fastify.post('/api/code/generate', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const body = parseBody(validateCodeGenerate, req.body)
      req.log.info({ botName: body.bot_name, description: body.description.slice(0, 50) }, 'generating code')

      const { code, openaiUsed } = await generator.generate(body.description, body.bot_name)
      const row = codes.create({
        name: body.bot_name,
        description: body.description,
        code,
        owner: auth.email,
        openaiUsed,
      })
      return reply.send({
        ok: true,
        codeId: row.id,
        name: row.name,
        codePreview: codePreview(code),
        fullCode: fullCodeExcerpt(code),
        openaiUsed,
        message: 'Code generated successfully',
      })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  fastify.get<{ Params: { codeId: string } }>('/api/code/:codeId', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const row = access.guard(auth, codes.get(req.params.codeId), { sensitive: false, resourceName: 'Code' })
      return reply.send({ ok: true, code: row })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })

  fastify.post<{ Params: { codeId: string } }>('/api/code/approve/:codeId', async (req, reply) => {
    try {
      const auth = authenticate(access, req)
      const { override_token } = parseBody(validateOverride, req.body)
      const row = access.guard(auth, codes.get(req.params.codeId), {
        sensitive: true,
        overrideToken: override_token,
        resourceName: 'Code',
      })
      codes.approve(row.id, auth.email)
      req.log.info({ codeId: row.id, by: auth.email }, 'code approved')
      return reply.send({ ok: true, message: `Code '${row.name}' approved`, codeId: row.id, approved: true })
    } catch (e: unknown) {
      return sendError(req, reply, e)
    }
  })
}
