import crypto from 'node:crypto'

export type BotRecord = {
  id: string
  name: string
  skills: string[]
  description: string | null
  owner: string
  createdAt: string
  alive: boolean
  tasksCompleted: number
}

export type NewBot = {
  name: string
  skills: string[]
  description: string | null
  owner: string
}

export interface BotsRepo {
  create(p: NewBot): BotRecord
  get(botId: string): BotRecord | undefined
  list(): BotRecord[]
  delete(botId: string): BotRecord | undefined
  recordCompletedTask(botId: string): BotRecord | undefined
  count(): number
}

export type RepoClock = {
  now?: () => Date
  newId?: () => string
}

const copy = (b: BotRecord): BotRecord => ({ ...b, skills: [...b.skills] })

export function createBotsRepo({ now = () => new Date(), newId = () => crypto.randomUUID() }: RepoClock = {}): BotsRepo {
  const rows = new Map<string, BotRecord>()

  return {
    create(p) {
      const row: BotRecord = {
        id: newId(),
        name: p.name,
        skills: [...p.skills],
        description: p.description,
        owner: p.owner,
        createdAt: now().toISOString(),
        alive: true,
        tasksCompleted: 0,
      }
      rows.set(row.id, row)
      return copy(row)
    },

    get(botId) {
      const row = rows.get(botId)
      return row ? copy(row) : undefined
    },

    list() {
      return [...rows.values()].map(copy)
    },

    delete(botId) {
      const row = rows.get(botId)
      if (!row) return undefined
      rows.delete(botId)
      return copy(row)
    },

    // no-op for a bot deleted while its task was running
    recordCompletedTask(botId) {
      const row = rows.get(botId)
      if (!row) return undefined
      row.tasksCompleted += 1
      return copy(row)
    },

    count: () => rows.size,
  }
}
