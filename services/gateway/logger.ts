import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino'

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

export type { Logger }

const REDACT_PATHS = [
  'apiKey',
  'password',
  'override_token',
  'overrideToken',
  '*.apiKey',
  '*.password',
  '*.override_token',
  '*.overrideToken',
  'req.headers.authorization',
  'req.headers["x-api-key"]',
]

// Shared by the Fastify request logger and the standalone service logger.
export function loggerOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  }
}

export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  return destination ? pino(loggerOptions(level), destination) : pino(loggerOptions(level))
}
