// services/gateway/access-control.ts
// API-key authentication, the override-token grant, and per-resource ownership
// checks. Everything here is synchronous and read-only.
import { createHash, timingSafeEqual } from 'node:crypto'
import { AccessError } from './errors'
import type { IdentityRepo } from './identity-repo'

export type AuthContext = Readonly<{
  email: string
  isAdmin: boolean
  apiKey: string
}>

export type OwnedResource = { owner: string }

export type GuardOptions = {
  sensitive: boolean
  overrideToken?: string | null
  /** Used in the NotFound message, e.g. "Bot not found". */
  resourceName?: string
}

const digest = (s: string) => createHash('sha256').update(s, 'utf8').digest()

// Hashing first gives both buffers the same length, which timingSafeEqual requires.
export function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b))
}

// ===== Identity resolution =====

export interface IdentityResolver {
  resolve(token: string | null | undefined): AuthContext
}

export function createIdentityResolver(identities: IdentityRepo): IdentityResolver {
  const creator = identities.creator()

  return {
    resolve(token) {
      if (!token) throw new AccessError('MissingCredential', 'Missing X-API-Key header')

      if (safeEqual(token, creator.apiKey)) {
        return { email: creator.email, isAdmin: true, apiKey: token }
      }

      const identity = identities.findByApiKey(token)
      if (!identity) throw new AccessError('InvalidCredential', 'Invalid API key')
      return { email: identity.email, isAdmin: identity.isAdmin, apiKey: token }
    },
  }
}

// ===== Override policy =====

export interface OverridePolicy {
  check(ctx: AuthContext, token?: string | null): boolean
}

export function createOverridePolicy(secret: string): OverridePolicy {
  if (!secret) throw new Error('OVERRIDE_SECRET_REQUIRED')
  return {
    check(ctx, token) {
      if (ctx.isAdmin) return true
      if (!token) return false
      return safeEqual(token, secret)
    },
  }
}

// ===== Ownership guard =====

export function canAccess(ctx: AuthContext, owner: string): boolean {
  return ctx.isAdmin || ctx.email === owner
}

export interface OwnershipGuard {
  guard<T extends OwnedResource>(ctx: AuthContext, resource: T | undefined, opts: GuardOptions): T
}

export function createOwnershipGuard(override: OverridePolicy): OwnershipGuard {
  return {
    guard(ctx, resource, opts) {
      if (!resource) {
        throw new AccessError('NotFound', `${opts.resourceName ?? 'Resource'} not found`)
      }
      if (!canAccess(ctx, resource.owner)) {
        throw new AccessError('Forbidden', 'Not authorized')
      }
      if (opts.sensitive && !override.check(ctx, opts.overrideToken)) {
        throw new AccessError('OverrideRequired', 'Override token required for non-admin users')
      }
      return resource
    },
  }
}

// ===== Facade used by the routes =====

export interface AccessControl {
  resolve(token: string | null | undefined): AuthContext
  checkOverride(ctx: AuthContext, token?: string | null): boolean
  canAccess(ctx: AuthContext, owner: string): boolean
  guard<T extends OwnedResource>(ctx: AuthContext, resource: T | undefined, opts: GuardOptions): T
}

export function createAccessControl(opts: { identities: IdentityRepo; overrideSecret: string }): AccessControl {
  const resolver = createIdentityResolver(opts.identities)
  const override = createOverridePolicy(opts.overrideSecret)
  const ownership = createOwnershipGuard(override)

  return {
    resolve: resolver.resolve,
    checkOverride: override.check,
    canAccess,
    guard: ownership.guard,
  }
}
