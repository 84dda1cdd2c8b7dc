// services/gateway/errors.ts

export type AccessErrorCode =
  | 'MissingCredential'
  | 'InvalidCredential'
  | 'Forbidden'
  | 'OverrideRequired'
  | 'NotFound'

export type RequestErrorCode = 'InvalidBody' | 'TaskNotPending'

export type ErrorCode = AccessErrorCode | RequestErrorCode

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  MissingCredential: 401,
  InvalidCredential: 401,
  Forbidden: 403,
  OverrideRequired: 403,
  NotFound: 404,
  InvalidBody: 400,
  TaskNotPending: 409,
}

export function httpStatusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code]
}

/** Terminal, caller-fixable failure raised by the access-control layer. */
export class AccessError extends Error {
  readonly code: AccessErrorCode

  constructor(code: AccessErrorCode, message: string) {
    super(message)
    this.name = 'AccessError'
    this.code = code
  }
}

export class RequestError extends Error {
  readonly code: RequestErrorCode
  readonly details: string[]

  constructor(code: RequestErrorCode, message: string, details: string[] = []) {
    super(message)
    this.name = 'RequestError'
    this.code = code
    this.details = details
  }
}
