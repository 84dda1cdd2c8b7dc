// services/gateway/identity-repo.ts
// Registered callers, indexed by email and by API key. Keys are unique, so a
// key resolves to at most one identity.

export type Identity = Readonly<{
  email: string
  password: string
  apiKey: string
  isAdmin: boolean
  createdAt: string
}>

export type NewIdentity = {
  email: string
  password: string
  apiKey: string
  isAdmin?: boolean
}

export interface IdentityRepo {
  creator(): Identity
  register(input: NewIdentity): Identity
  remove(email: string): boolean
  findByApiKey(apiKey: string): Identity | undefined
  count(): number
}

export function createIdentityRepo(
  seed: Omit<NewIdentity, 'isAdmin'>,
  now: () => Date = () => new Date(),
): IdentityRepo {
  const byEmail = new Map<string, Identity>()
  const byKey = new Map<string, Identity>()

  function insert(input: NewIdentity): Identity {
    const email = input.email.trim()
    if (!email) throw new Error('IDENTITY_EMAIL_REQUIRED')
    if (!input.apiKey) throw new Error('IDENTITY_API_KEY_REQUIRED')
    if (byEmail.has(email)) throw new Error('IDENTITY_EMAIL_TAKEN')
    if (byKey.has(input.apiKey)) throw new Error('IDENTITY_API_KEY_TAKEN')

    const identity: Identity = Object.freeze({
      email,
      password: input.password,
      apiKey: input.apiKey,
      isAdmin: input.isAdmin === true,
      createdAt: now().toISOString(),
    })
    byEmail.set(email, identity)
    byKey.set(identity.apiKey, identity)
    return identity
  }

  const creator = insert({ ...seed, isAdmin: true })

  return {
    creator: () => creator,
    register: insert,
    remove(email) {
      if (email === creator.email) throw new Error('IDENTITY_CREATOR_PROTECTED')
      const found = byEmail.get(email)
      if (!found) return false
      byEmail.delete(email)
      byKey.delete(found.apiKey)
      return true
    },
    findByApiKey: (apiKey) => byKey.get(apiKey),
    count: () => byEmail.size,
  }
}
