// lib/openai.ts
// Minimal chat-completions client over fetch, with timeout and retry on 429/5xx.

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string }

export type ChatCompletionOptions = {
  apiKey: string
  baseUrl: string
  model: string
  timeoutMs: number
  retries: number
  maxTokens: number
  temperature?: number
  backoffsMs?: number[]
  fetchImpl?: typeof fetch
}

export class OpenAiError extends Error {
  readonly status: number
  readonly retriable: boolean

  constructor(code: string, status = 0, retriable = false) {
    super(code)
    this.name = 'OpenAiError'
    this.status = status
    this.retriable = retriable
  }
}

const DEFAULT_BACKOFFS_MS = [800, 1600]

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

// gpt-5 models reject a custom temperature and take max_completion_tokens instead.
export function buildPayload(messages: ChatMessage[], opts: Pick<ChatCompletionOptions, 'model' | 'maxTokens' | 'temperature'>) {
  const payload: Record<string, unknown> = { model: opts.model, messages }
  if (opts.model.startsWith('gpt-5')) {
    payload.max_completion_tokens = opts.maxTokens
  } else {
    payload.max_tokens = opts.maxTokens
    payload.temperature = opts.temperature ?? 0.7
  }
  return payload
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

export function readCompletionContent(body: unknown): string {
  if (!isRecord(body)) throw new OpenAiError('OPENAI_BAD_BODY')
  if (isRecord(body.error)) {
    const message = typeof body.error.message === 'string' ? body.error.message : 'unknown'
    throw new OpenAiError(`OPENAI_BODY_ERROR_${message.slice(0, 200)}`)
  }
  const choices = body.choices
  if (!Array.isArray(choices) || choices.length === 0) throw new OpenAiError('OPENAI_BAD_BODY_NO_CHOICES')
  const first: unknown = choices[0]
  const message = isRecord(first) ? first.message : undefined
  const content = isRecord(message) && typeof message.content === 'string' ? message.content.trim() : ''
  if (!content) throw new OpenAiError('OPENAI_EMPTY_CONTENT')
  return content
}

async function requestOnce(url: string, payload: Record<string, unknown>, opts: ChatCompletionOptions): Promise<string> {
  const fetchImpl = opts.fetchImpl ?? fetch
  const ac = new AbortController()
  const timer = setTimeout(() => ac.abort(), opts.timeoutMs)
  try {
    const res = await fetchImpl(url, {
      method: 'POST',
      headers: { authorization: `Bearer ${opts.apiKey}`, 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: ac.signal,
    })
    if (!res.ok) {
      const txt = await res.text().catch(() => '')
      const retriable = res.status === 429 || res.status >= 500
      throw new OpenAiError(`OPENAI_HTTP_${res.status}_${txt.slice(0, 180)}`, res.status, retriable)
    }
    const body: unknown = await res.json()
    return readCompletionContent(body)
  } catch (e: unknown) {
    if (e instanceof OpenAiError) throw e
    if (e instanceof Error && e.name === 'AbortError') throw new OpenAiError('OPENAI_TIMEOUT', 0, true)
    // fetch rejects with TypeError on network failure
    if (e instanceof TypeError) throw new OpenAiError(`OPENAI_NETWORK_${e.message}`, 0, true)
    throw e
  } finally {
    clearTimeout(timer)
  }
}

export async function createChatCompletion(messages: ChatMessage[], opts: ChatCompletionOptions): Promise<string> {
  if (!opts.apiKey) throw new OpenAiError('OPENAI_API_KEY_MISSING')
  const url = `${opts.baseUrl.replace(/\/+$/, '')}/chat/completions`
  const payload = buildPayload(messages, opts)
  const backoffs = opts.backoffsMs ?? DEFAULT_BACKOFFS_MS

  for (let attempt = 0; ; attempt++) {
    try {
      return await requestOnce(url, payload, opts)
    } catch (e: unknown) {
      const retriable = e instanceof OpenAiError && e.retriable
      if (!retriable || attempt >= opts.retries) throw e
      await sleep(backoffs[Math.min(attempt, backoffs.length - 1)] ?? 0)
    }
  }
}
