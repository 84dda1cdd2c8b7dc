// services/gateway/config.ts
import crypto from 'node:crypto'
import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import type { LogLevel } from './logger'

export type Config = {
  PORT: number
  HOST: string
  LOG_LEVEL: LogLevel
  CREATOR_EMAIL: string
  CREATOR_PASSWORD: string
  CREATOR_API_KEY: string
  OVERRIDE_TOKEN: string
  OPENAI_API_KEY: string
  OPENAI_BASE_URL: string
  OPENAI_MODEL: string
  OPENAI_TIMEOUT_MS: number
  OPENAI_RETRIES: number
  TASK_DELAY_MS: number
  CORS_ORIGINS: string
}

const ConfigSchema = {
  $id: 'CommanderConfig',
  type: 'object',
  required: ['CREATOR_API_KEY', 'OVERRIDE_TOKEN'],
  properties: {
    PORT:              { type: 'integer', minimum: 1, maximum: 65535, default: 8000 },
    HOST:              { type: 'string', minLength: 1, default: '0.0.0.0' },
    LOG_LEVEL:         { enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], default: 'info' },
    CREATOR_EMAIL:     { type: 'string', format: 'email', default: 'creator@example.com' },
    CREATOR_PASSWORD:  { type: 'string', minLength: 1, default: 'change-me' },
    CREATOR_API_KEY:   { type: 'string', minLength: 1 },
    OVERRIDE_TOKEN:    { type: 'string', minLength: 1 },
    OPENAI_API_KEY:    { type: 'string', default: '' },
    OPENAI_BASE_URL:   { type: 'string', format: 'uri', default: 'https://api.openai.com/v1' },
    OPENAI_MODEL:      { type: 'string', minLength: 1, default: 'gpt-3.5-turbo' },
    OPENAI_TIMEOUT_MS: { type: 'integer', minimum: 1000, maximum: 300000, default: 30000 },
    OPENAI_RETRIES:    { type: 'integer', minimum: 0, maximum: 5, default: 2 },
    TASK_DELAY_MS:     { type: 'integer', minimum: 0, maximum: 600000, default: 1000 },
    CORS_ORIGINS:      { type: 'string', minLength: 1, default: '*' },
  },
} as const

const CONFIG_KEYS = Object.keys(ConfigSchema.properties)

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true, strict: false })
addFormats(ajv)
const validateConfig = ajv.compile<Config>(ConfigSchema)

const randomSuffix = () => crypto.randomBytes(8).toString('hex')

export function readConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, unknown> = {}
  for (const key of CONFIG_KEYS) {
    const value = env[key]?.trim()
    if (value) raw[key] = value
  }
  // Unset secrets get a fresh value per process, so they differ on every start.
  raw.CREATOR_API_KEY ??= `creator-${randomSuffix()}`
  raw.OVERRIDE_TOKEN ??= `override-${randomSuffix()}`

  if (!validateConfig(raw)) {
    const issues = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    throw new Error(`Invalid config: ${issues.join('; ')}`)
  }
  if (raw.CREATOR_API_KEY === raw.OVERRIDE_TOKEN) {
    throw new Error('Invalid config: OVERRIDE_TOKEN must differ from CREATOR_API_KEY')
  }
  return raw
}

export function corsOrigins(config: Config): '*' | string[] {
  const list = config.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
  return list.includes('*') ? '*' : list
}

export function redactConfigForLogs(config: Config): Record<string, string | number> {
  return {
    ...config,
    CREATOR_PASSWORD: '[redacted]',
    CREATOR_API_KEY: '[set]',
    OVERRIDE_TOKEN: '[set]',
    OPENAI_API_KEY: config.OPENAI_API_KEY ? '[set]' : '[missing]',
  }
}
