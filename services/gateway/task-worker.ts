// services/gateway/task-worker.ts
// Simulated task execution: one cancellable timer per task id. When it fires the
// task moves pending → completed, but only if it is still pending and its bot
// still exists; the bot's counter moves with it.
import type { BotsRepo } from './bots-repo'
import type { Logger } from './logger'
import type { TaskRecord, TasksRepo } from './tasks-repo'

export interface TaskWorker {
  schedule(task: TaskRecord): void
  cancel(taskId: string): TaskRecord | undefined
  cancelForBot(botId: string): TaskRecord[]
  scheduledCount(): number
  close(): void
}

export type TaskWorkerDeps = {
  tasks: TasksRepo
  bots: BotsRepo
  delayMs: number
  logger: Logger
}

const OUTPUT_PREVIEW_CHARS = 50

export function createTaskWorker({ tasks, bots, delayMs, logger }: TaskWorkerDeps): TaskWorker {
  const timers = new Map<string, NodeJS.Timeout>()

  function run(taskId: string) {
    timers.delete(taskId)
    const task = tasks.get(taskId)
    if (!task || task.status !== 'pending') return

    const bot = bots.get(task.botId)
    if (!bot) {
      tasks.cancel(taskId)
      logger.warn({ taskId, botId: task.botId }, 'bot gone before task finished, task cancelled')
      return
    }

    const done = tasks.complete(taskId, {
      success: true,
      output: `Task completed by ${bot.name}: ${task.task.slice(0, OUTPUT_PREVIEW_CHARS)}...`,
      botSkills: bot.skills,
    })
    if (!done) return
    bots.recordCompletedTask(bot.id)
    logger.info({ taskId, botId: bot.id }, 'task completed')
  }

  function clear(taskId: string) {
    const timer = timers.get(taskId)
    if (timer) clearTimeout(timer)
    timers.delete(taskId)
  }

  return {
    schedule(task) {
      if (timers.has(task.id)) return
      timers.set(task.id, setTimeout(() => run(task.id), delayMs))
    },

    cancel(taskId) {
      clear(taskId)
      return tasks.cancel(taskId)
    },

    cancelForBot(botId) {
      const cancelled: TaskRecord[] = []
      for (const task of tasks.pendingForBot(botId)) {
        clear(task.id)
        const row = tasks.cancel(task.id)
        if (row) cancelled.push(row)
      }
      return cancelled
    },

    scheduledCount: () => timers.size,

    close() {
      for (const timer of timers.values()) clearTimeout(timer)
      timers.clear()
    },
  }
}
