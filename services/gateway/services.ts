import { createAccessControl, type AccessControl } from './access-control'
import { createBotsRepo, type BotsRepo } from './bots-repo'
import { createCodesRepo, type CodesRepo } from './codes-repo'
import type { Config } from './config'
import { createGeneratorEngine, type CodeGenerator } from './generator-engine'
import { createIdentityRepo, type IdentityRepo } from './identity-repo'
import type { Logger } from './logger'
import { createTaskWorker, type TaskWorker } from './task-worker'
import { createTasksRepo, type TasksRepo } from './tasks-repo'

export type GatewayServices = {
  config: Config
  logger: Logger
  identities: IdentityRepo
  access: AccessControl
  bots: BotsRepo
  codes: CodesRepo
  tasks: TasksRepo
  worker: TaskWorker
  generator: CodeGenerator
}

export function createServices(
  config: Config,
  logger: Logger,
  overrides: { generator?: CodeGenerator } = {},
): GatewayServices {
  const identities = createIdentityRepo({
    email: config.CREATOR_EMAIL,
    password: config.CREATOR_PASSWORD,
    apiKey: config.CREATOR_API_KEY,
  })
  const access = createAccessControl({ identities, overrideSecret: config.OVERRIDE_TOKEN })
  const bots = createBotsRepo()
  const codes = createCodesRepo()
  const tasks = createTasksRepo()
  const worker = createTaskWorker({ tasks, bots, delayMs: config.TASK_DELAY_MS, logger })
  const generator = overrides.generator ?? createGeneratorEngine({
    logger,
    openai: {
      apiKey: config.OPENAI_API_KEY,
      baseUrl: config.OPENAI_BASE_URL,
      model: config.OPENAI_MODEL,
      timeoutMs: config.OPENAI_TIMEOUT_MS,
      retries: config.OPENAI_RETRIES,
    },
  })

  return { config, logger, identities, access, bots, codes, tasks, worker, generator }
}
