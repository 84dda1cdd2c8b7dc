// Request bodies. Unknown fields are dropped, missing optional ones get defaults.
import Ajv from 'ajv'
import { DEFAULT_BOT_NAME } from '../generator'

export type BotCreateBody = {
  name: string
  skills: string[]
  description: string | null
}

export type CodeGenerateBody = {
  description: string
  bot_name: string
}

export type TaskAssignBody = {
  bot_id: string
  task: string
  timeout: number
}

export type OverrideBody = {
  override_token?: string | null
}

const ajv = new Ajv({ allErrors: true, useDefaults: true, removeAdditional: true, strict: false })

const BotCreateSchema = {
  $id: 'BotCreate',
  type: 'object',
  required: ['name'],
  additionalProperties: false,
  properties: {
    name:        { type: 'string', minLength: 1, maxLength: 100 },
    skills:      { type: 'array', items: { type: 'string', minLength: 1 }, maxItems: 50, default: ['general'] },
    description: { type: ['string', 'null'], maxLength: 2000, default: null },
  },
} as const

const CodeGenerateSchema = {
  $id: 'CodeGenerate',
  type: 'object',
  required: ['description'],
  additionalProperties: false,
  properties: {
    description: { type: 'string', minLength: 1, maxLength: 4000 },
    bot_name:    { type: 'string', minLength: 1, maxLength: 100, default: DEFAULT_BOT_NAME },
  },
} as const

const TaskAssignSchema = {
  $id: 'TaskAssign',
  type: 'object',
  required: ['bot_id', 'task'],
  additionalProperties: false,
  properties: {
    bot_id:  { type: 'string', minLength: 1 },
    task:    { type: 'string', minLength: 1, maxLength: 4000 },
    timeout: { type: 'integer', default: 30 },
  },
} as const

const OverrideSchema = {
  $id: 'Override',
  type: 'object',
  additionalProperties: false,
  properties: {
    override_token: { type: ['string', 'null'] },
  },
} as const

export const validateBotCreate = ajv.compile<BotCreateBody>(BotCreateSchema)
export const validateCodeGenerate = ajv.compile<CodeGenerateBody>(CodeGenerateSchema)
export const validateTaskAssign = ajv.compile<TaskAssignBody>(TaskAssignSchema)
export const validateOverride = ajv.compile<OverrideBody>(OverrideSchema)
