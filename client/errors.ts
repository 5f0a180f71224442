import { RpcErrorCode, type RpcErrorObject } from '../shared/rpc-protocol.js'

export type BsptermErrorKind =
  | 'connection_failure'
  | 'protocol_violation'
  | 'terminal_not_found'
  | 'timed_out'
  | 'rpc_error'
  | 'tracking_stopped'
  | 'config'

export class BsptermError extends Error {
  constructor(
    public readonly kind: BsptermErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'BsptermError'
  }
}

/** The stream could not be opened, or was lost. Reconnect explicitly before retrying. */
export class ConnectionFailureError extends BsptermError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection_failure', message, options)
    this.name = 'ConnectionFailureError'
  }
}

export class ConnectionClosedError extends ConnectionFailureError {
  constructor(message = 'Connection closed by server') {
    super(message)
    this.name = 'ConnectionClosedError'
  }
}

/** A frame could not be decoded or does not have the shape the protocol promises. */
export class ProtocolViolationError extends BsptermError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol_violation', message, options)
    this.name = 'ProtocolViolationError'
  }
}

type ServerErrorKind = 'terminal_not_found' | 'timed_out' | 'rpc_error'

abstract class ServerReportedError extends BsptermError {
  readonly code: number
  readonly data: unknown
  readonly method: string

  protected constructor(kind: ServerErrorKind, error: RpcErrorObject, method: string) {
    super(kind, error.message)
    this.code = error.code
    this.data = error.data
    this.method = method
  }
}

export class TerminalNotFoundError extends ServerReportedError {
  constructor(error: RpcErrorObject, method: string) {
    super('terminal_not_found', error, method)
    this.name = 'TerminalNotFoundError'
  }
}

export class OperationTimedOutError extends ServerReportedError {
  constructor(error: RpcErrorObject, method: string) {
    super('timed_out', error, method)
    this.name = 'OperationTimedOutError'
  }
}

/** Any other server-reported failure; code, message and data are kept as sent. */
export class RpcProtocolError extends ServerReportedError {
  constructor(error: RpcErrorObject, method: string) {
    super('rpc_error', error, method)
    this.name = 'RpcProtocolError'
  }
}

export class TrackingStoppedError extends BsptermError {
  constructor(readerId: string) {
    super('tracking_stopped', `Tracking session ${readerId} has been stopped`)
    this.name = 'TrackingStoppedError'
  }
}

export class ConfigError extends BsptermError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options)
    this.name = 'ConfigError'
  }
}

export type ErrorCodeClass =
  | { kind: 'terminal_not_found' }
  | { kind: 'timed_out' }
  | { kind: 'unknown_code'; code: number }

export function classifyErrorCode(code: number): ErrorCodeClass {
  switch (code) {
    case RpcErrorCode.TERMINAL_NOT_FOUND:
      return { kind: 'terminal_not_found' }
    case RpcErrorCode.TIMEOUT:
      return { kind: 'timed_out' }
    default:
      return { kind: 'unknown_code', code }
  }
}

export function errorFromRpcError(error: RpcErrorObject, method: string): BsptermError {
  const classified = classifyErrorCode(error.code)
  switch (classified.kind) {
    case 'terminal_not_found':
      return new TerminalNotFoundError(error, method)
    case 'timed_out':
      return new OperationTimedOutError(error, method)
    case 'unknown_code':
      return new RpcProtocolError(error, method)
  }
}

export function isBsptermError(err: unknown): err is BsptermError {
  return err instanceof BsptermError
}
