// generator-engine.ts
import { createChatCompletion, type ChatMessage } from '../../lib/openai'
import { normalizeJs, postValidateBotJs, stripMarkdownFences } from '../../lib/botjs-validate'
import { renderBotTemplate, toClassName } from './generator'
import type { Logger } from './logger'

export type GeneratedCode = { code: string; openaiUsed: boolean }

export interface CodeGenerator {
  readonly enabled: boolean
  generate(description: string, botName: string): Promise<GeneratedCode>
}

export type OpenAiSettings = {
  apiKey: string
  baseUrl: string
  model: string
  timeoutMs: number
  retries: number
}

export type GeneratorEngineOptions = {
  openai: OpenAiSettings
  logger: Logger
  maxKB?: number
  fetchImpl?: typeof fetch
  backoffsMs?: number[]
  now?: () => Date
}

const SYSTEM_PROMPT = 'You are a JavaScript expert. Output only valid JavaScript code.'

export function buildMessages(description: string, className: string): ChatMessage[] {
  const user = `Create a JavaScript class named ${className} with:
1. A constructor taking 'name' and 'skills' parameters
2. An async execute method taking a 'task' parameter
3. execute returns an object with 'ok' and 'result' keys
4. Based on this description: ${description}

Requirements:
- Plain CommonJS script for Node.js, ending with: module.exports = ${className};
- Handle errors inside execute
- No require, import, eval, process or other modules

Return ONLY the code, no explanations.`
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ]
}

export function createGeneratorEngine(opts: GeneratorEngineOptions): CodeGenerator {
  const enabled = opts.openai.apiKey.trim().length > 0
  const now = opts.now ?? (() => new Date())

  async function fromModel(description: string, className: string): Promise<string> {
    const raw = await createChatCompletion(buildMessages(description, className), {
      ...opts.openai,
      maxTokens: 800,
      temperature: 0.7,
      fetchImpl: opts.fetchImpl,
      backoffsMs: opts.backoffsMs,
    })
    const code = normalizeJs(stripMarkdownFences(raw)) + '\n'
    postValidateBotJs(code, className, opts.maxKB)
    return code
  }

  return {
    enabled,
    async generate(description, botName) {
      const className = toClassName(botName)
      if (!enabled) return { code: renderBotTemplate(className, now()), openaiUsed: false }

      try {
        return { code: await fromModel(description, className), openaiUsed: true }
      } catch (e: unknown) {
        opts.logger.warn({ err: e, botName: className }, 'model generation failed, using template')
        return { code: renderBotTemplate(className, now()), openaiUsed: false }
      }
    },
  }
}
