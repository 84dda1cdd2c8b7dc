import type { FastifyReply, FastifyRequest } from 'fastify'
import type { ValidateFunction } from 'ajv'
import type { AccessControl, AuthContext } from '../access-control'
import { AccessError, RequestError, httpStatusFor } from '../errors'
import type { GatewayServices } from '../services'

export type RoutesOptions = {
  services: GatewayServices
}

export function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

export function authenticate(access: AccessControl, req: FastifyRequest): AuthContext {
  return access.resolve(firstHeader(req.headers['x-api-key']))
}

export function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
  const data = body ?? {}
  if (validate(data)) return data
  const details = (validate.errors ?? []).map(e => `${e.instancePath || 'body'} ${e.message ?? 'is invalid'}`)
  throw new RequestError('InvalidBody', 'Request body is invalid', details)
}

export function sendError(req: FastifyRequest, reply: FastifyReply, e: unknown) {
  if (e instanceof AccessError) {
    req.log.info({ code: e.code, url: req.url }, 'access denied')
    return reply.code(httpStatusFor(e.code)).send({ ok: false, error: e.code, detail: e.message })
  }
  if (e instanceof RequestError) {
    return reply.code(httpStatusFor(e.code)).send({ ok: false, error: e.code, detail: e.message, details: e.details })
  }
  req.log.error({ err: e }, 'request failed')
  return reply.code(500).send({ ok: false, error: 'Internal' })
}
