// lib/botjs-validate.ts
import * as acorn from 'acorn'
import * as walk from 'acorn-walk'

const FORBIDDEN_IDENTIFIERS = new Set(['eval', 'Function', 'require', 'process', 'child_process', 'Worker'])

export class BotJsValidationError extends Error {
  readonly details: string[]

  constructor(details: string[]) {
    super(`BOT_JS_INVALID: ${details.join('; ')}`)
    this.name = 'BotJsValidationError'
    this.details = details
  }
}

/** BOM, CRLF and control characters other than \n and \t are dropped. */
export function normalizeJs(s: string): string {
  let out = s
  if (out.charCodeAt(0) === 0xfeff) out = out.slice(1)
  out = out.replace(/\r\n/g, '\n')
  out = out.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
  return out.trim()
}

export function stripMarkdownFences(code: string): string {
  // Several fenced blocks: the longest one is the code, the rest is commentary.
  const fences = [...code.matchAll(/```[a-zA-Z]*\n?([\s\S]*?)```/g)].map(m => m[1] ?? '')
  const picked = fences.sort((a, b) => b.length - a.length)[0]
  if (picked !== undefined) return picked.trim()
  return code.replace(/```[a-zA-Z]*\s*/g, '').trim()
}

function isModuleExports(node: acorn.Pattern): boolean {
  return (
    node.type === 'MemberExpression' &&
    node.object.type === 'Identifier' &&
    node.object.name === 'module' &&
    node.property.type === 'Identifier' &&
    node.property.name === 'exports'
  )
}

/**
 * Checks that `js` is a CommonJS script declaring `class <className>` with an
 * `execute` method and assigning `module.exports`.
 */
export function postValidateBotJs(js: string, className: string, maxKB = 64): void {
  if (!js.trim()) throw new BotJsValidationError(['code is empty'])

  const sizeKB = Buffer.byteLength(js, 'utf8') / 1024
  if (sizeKB > maxKB) throw new BotJsValidationError([`code is ${Math.ceil(sizeKB)}KB, limit is ${maxKB}KB`])

  let ast: acorn.Program
  try {
    ast = acorn.parse(js, { ecmaVersion: 2022, sourceType: 'script' })
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e)
    throw new BotJsValidationError([`syntax error: ${message}`])
  }

  let hasClass = false
  let hasExecute = false
  let hasExport = false
  const forbidden = new Set<string>()
  let usesDynamicImport = false

  walk.simple(ast, {
    ClassDeclaration(node) {
      if (node.id?.name !== className) return
      hasClass = true
      for (const member of node.body.body) {
        if (member.type === 'MethodDefinition' && member.key.type === 'Identifier' && member.key.name === 'execute') {
          hasExecute = true
        }
      }
    },
    AssignmentExpression(node) {
      if (isModuleExports(node.left)) hasExport = true
      if (node.left.type === 'MemberExpression' && node.left.object.type === 'MemberExpression') {
        const inner = node.left.object
        if (inner.object.type === 'Identifier' && inner.object.name === 'module') hasExport = true
      }
    },
    Identifier(node) {
      if (FORBIDDEN_IDENTIFIERS.has(node.name)) forbidden.add(node.name)
    },
    ImportExpression() {
      usesDynamicImport = true
    },
  })

  const errors: string[] = []
  if (!hasClass) errors.push(`class ${className} is required`)
  if (hasClass && !hasExecute) errors.push(`class ${className} must define execute(task)`)
  if (!hasExport) errors.push('module.exports assignment is required')
  if (forbidden.size) errors.push(`forbidden identifiers: ${[...forbidden].sort().join(', ')}`)
  if (usesDynamicImport) errors.push('dynamic import() is not allowed')

  if (errors.length) throw new BotJsValidationError(errors)
}
