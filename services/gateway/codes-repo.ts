import crypto from 'node:crypto'
import type { RepoClock } from './bots-repo'

export type CodeRecord = {
  id: string
  name: string
  description: string
  code: string
  owner: string
  createdAt: string
  approved: boolean
  approvedAt?: string
  approvedBy?: string
  openaiUsed: boolean
}

export type NewCode = Pick<CodeRecord, 'name' | 'description' | 'code' | 'owner' | 'openaiUsed'>

export interface CodesRepo {
  create(p: NewCode): CodeRecord
  get(codeId: string): CodeRecord | undefined
  approve(codeId: string, approvedBy: string): CodeRecord | undefined
  count(): number
}

export function createCodesRepo({ now = () => new Date(), newId = () => crypto.randomUUID() }: RepoClock = {}): CodesRepo {
  const rows = new Map<string, CodeRecord>()

  return {
    create(p) {
      const row: CodeRecord = { id: newId(), ...p, createdAt: now().toISOString(), approved: false }
      rows.set(row.id, row)
      return { ...row }
    },

    get(codeId) {
      const row = rows.get(codeId)
      return row ? { ...row } : undefined
    },

    // approving twice keeps the latest approver
    approve(codeId, approvedBy) {
      const row = rows.get(codeId)
      if (!row) return undefined
      row.approved = true
      row.approvedAt = now().toISOString()
      row.approvedBy = approvedBy
      return { ...row }
    },

    count: () => rows.size,
  }
}
