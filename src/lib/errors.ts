import type { ErrorCode } from './error-codes.js'

export class HarnessError extends Error {
  code: ErrorCode
  details?: Record<string, unknown> | undefined

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'HarnessError'
    this.code = code
    this.details = details
  }
}

export const isHarnessError = (error: unknown, code?: ErrorCode): error is HarnessError =>
  error instanceof HarnessError && (code === undefined || error.code === code)

/**
 * Message of anything thrown, including errors created in another realm (page scripts),
 * which fail `instanceof Error`.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message)
  }
  return String(error)
}
