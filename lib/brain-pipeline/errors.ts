/**
 * Brain Pipeline Errors
 *
 * One error class with a discriminating code. Callers branch on `code`
 * rather than on the class.
 */

export type BrainErrorCode =
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNREACHABLE'
  | 'CONNECTION_LOST'
  | 'UNKNOWN_COMMAND_TYPE'
  | 'INVALID_PARAMETERS'
  | 'MALFORMED_MESSAGE'
  | 'HANDLER_ERROR'
  | 'SHUTDOWN'
  | 'DUPLICATE_CORRELATION'
  | 'BIND_FAILED'

export class BrainPipelineError extends Error {
  readonly code: BrainErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: BrainErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'BrainPipelineError'
    this.code = code
    this.details = details
  }
}

export function isBrainPipelineError(err: unknown, code?: BrainErrorCode): err is BrainPipelineError {
  if (!(err instanceof BrainPipelineError)) return false
  return code === undefined || err.code === code
}

export function timeoutError(correlationId: string, timeoutMs: number): BrainPipelineError {
  return new BrainPipelineError('TIMEOUT', `Request ${correlationId} timed out after ${timeoutMs}ms`, {
    correlationId,
    timeoutMs,
  })
}

export function cancelledError(correlationId: string, reason = 'cancelled'): BrainPipelineError {
  return new BrainPipelineError('CANCELLED', `Request ${correlationId} ${reason}`, { correlationId })
}

export function unreachableError(target: string): BrainPipelineError {
  return new BrainPipelineError('UNREACHABLE', `Agent ${target} disconnected`, { target })
}

/** Best-effort message extraction for log lines and failure results */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
