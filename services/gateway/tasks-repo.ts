import crypto from 'node:crypto'
import type { RepoClock } from './bots-repo'

/** pending → completed | cancelled; both targets are final. */
export type TaskStatus = 'pending' | 'completed' | 'cancelled'

export type TaskResult = {
  success: boolean
  output: string
  botSkills: string[]
}

export type TaskRecord = {
  id: string
  botId: string
  botName: string
  task: string
  owner: string
  assignedBy: string
  assignedAt: string
  status: TaskStatus
  timeout: number
  completedAt?: string
  cancelledAt?: string
  result?: TaskResult
}

export type NewTask = Pick<TaskRecord, 'botId' | 'botName' | 'task' | 'owner' | 'assignedBy' | 'timeout'>

export interface TasksRepo {
  create(p: NewTask): TaskRecord
  get(taskId: string): TaskRecord | undefined
  list(): TaskRecord[]
  pendingForBot(botId: string): TaskRecord[]
  complete(taskId: string, result: TaskResult): TaskRecord | undefined
  cancel(taskId: string): TaskRecord | undefined
}

const copy = (t: TaskRecord): TaskRecord => ({
  ...t,
  ...(t.result ? { result: { ...t.result, botSkills: [...t.result.botSkills] } } : {}),
})

export function createTasksRepo({ now = () => new Date(), newId = () => crypto.randomUUID() }: RepoClock = {}): TasksRepo {
  const rows = new Map<string, TaskRecord>()

  // Transitions only leave `pending`; a second transition returns undefined.
  function transition(taskId: string, apply: (row: TaskRecord) => void): TaskRecord | undefined {
    const row = rows.get(taskId)
    if (!row || row.status !== 'pending') return undefined
    apply(row)
    return copy(row)
  }

  return {
    create(p) {
      const row: TaskRecord = { id: newId(), ...p, assignedAt: now().toISOString(), status: 'pending' }
      rows.set(row.id, row)
      return copy(row)
    },

    get(taskId) {
      const row = rows.get(taskId)
      return row ? copy(row) : undefined
    },

    list() {
      return [...rows.values()].map(copy)
    },

    pendingForBot(botId) {
      return [...rows.values()].filter(t => t.botId === botId && t.status === 'pending').map(copy)
    },

    complete(taskId, result) {
      return transition(taskId, row => {
        row.status = 'completed'
        row.completedAt = now().toISOString()
        row.result = { ...result, botSkills: [...result.botSkills] }
      })
    },

    cancel(taskId) {
      return transition(taskId, row => {
        row.status = 'cancelled'
        row.cancelledAt = now().toISOString()
      })
    },
  }
}
