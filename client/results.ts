import type { z } from 'zod'
import type { RpcMethod } from '../shared/rpc-protocol.js'
import { ProtocolViolationError } from './errors.js'

export function parseResult<S extends z.ZodTypeAny>(schema: S, result: unknown, method: RpcMethod): z.output<S> {
  const parsed = schema.safeParse(result)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
    throw new ProtocolViolationError(`Unexpected ${method} result${where}: ${issue?.message ?? 'invalid shape'}`, {
      cause: parsed.error,
    })
  }
  return parsed.data
}

export const DEFAULT_TIMEOUT_MS = 30_000

/** Timeouts travel as whole milliseconds. */
export function toTimeoutMs(timeoutMs: number | undefined, name = 'timeoutMs'): number {
  const value = timeoutMs ?? DEFAULT_TIMEOUT_MS
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number of milliseconds, got ${value}`)
  }
  return Math.floor(value)
}
