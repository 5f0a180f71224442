import { describe, it, expect } from 'vitest'
import {
  BsptermError,
  ConnectionClosedError,
  ConnectionFailureError,
  OperationTimedOutError,
  RpcProtocolError,
  TerminalNotFoundError,
  TrackingStoppedError,
  classifyErrorCode,
  errorFromRpcError,
  isBsptermError,
} from '../../../client/errors.js'

describe('classifyErrorCode', () => {
  it('maps the host codes to their classes', () => {
    expect(classifyErrorCode(-32000)).toEqual({ kind: 'terminal_not_found' })
    expect(classifyErrorCode(-32001)).toEqual({ kind: 'timed_out' })
  })

  it('keeps unknown codes', () => {
    expect(classifyErrorCode(-32602)).toEqual({ kind: 'unknown_code', code: -32602 })
    expect(classifyErrorCode(-32002)).toEqual({ kind: 'unknown_code', code: -32002 })
  })
})

describe('errorFromRpcError', () => {
  it('builds TerminalNotFoundError for -32000', () => {
    const err = errorFromRpcError({ code: -32000, message: 'Terminal not found: t9' }, 'terminal.read')
    expect(err).toBeInstanceOf(TerminalNotFoundError)
    expect(err.kind).toBe('terminal_not_found')
    expect(err.message).toBe('Terminal not found: t9')
    expect(err.name).toBe('TerminalNotFoundError')
  })

  it('builds OperationTimedOutError for -32001', () => {
    const err = errorFromRpcError({ code: -32001, message: 'Timeout' }, 'terminal.wait_for')
    expect(err).toBeInstanceOf(OperationTimedOutError)
    expect(err.kind).toBe('timed_out')
  })

  it('preserves code, message and data for other codes', () => {
    const err = errorFromRpcError({ code: -32602, message: 'Invalid params', data: { field: 'pattern' } }, 'terminal.wait_for')
    expect(err).toBeInstanceOf(RpcProtocolError)
    if (!(err instanceof RpcProtocolError)) return
    expect(err.code).toBe(-32602)
    expect(err.message).toBe('Invalid params')
    expect(err.data).toEqual({ field: 'pattern' })
    expect(err.method).toBe('terminal.wait_for')
  })
})

describe('error hierarchy', () => {
  it('makes a closed connection a connection failure', () => {
    const err = new ConnectionClosedError()
    expect(err).toBeInstanceOf(ConnectionFailureError)
    expect(err.kind).toBe('connection_failure')
    expect(err.message).toBe('Connection closed by server')
  })

  it('names the stopped reader', () => {
    expect(new TrackingStoppedError('reader-3').message).toBe('Tracking session reader-3 has been stopped')
  })

  it('recognizes library errors', () => {
    expect(isBsptermError(new TrackingStoppedError('r'))).toBe(true)
    expect(isBsptermError(new BsptermError('config', 'x'))).toBe(true)
    expect(isBsptermError(new Error('x'))).toBe(false)
    expect(isBsptermError('x')).toBe(false)
  })
})
