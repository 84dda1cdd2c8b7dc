// main.ts: process entry, config → services → listen
import { readConfig, redactConfigForLogs } from './config'
import { createLogger, loggerOptions } from './logger'
import { buildServer } from './server'
import { createServices } from './services'

async function main() {
  const config = readConfig()
  const logger = createLogger(config.LOG_LEVEL)
  const services = createServices(config, logger)
  const app = await buildServer(services, { logger: loggerOptions(config.LOG_LEVEL) })

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down')
    app.close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error({ err: e }, 'shutdown failed')
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  await app.listen({ port: config.PORT, host: config.HOST })
  logger.info({ config: redactConfigForLogs(config) }, 'configuration loaded')
  logger.info(
    { creatorEmail: config.CREATOR_EMAIL, openai: services.generator.enabled ? 'enabled' : 'disabled' },
    `Commander listening on ${config.HOST}:${config.PORT}`,
  )
}

main().catch((e) => { console.error(e); process.exit(1) })
