// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { formatEndpoint, type ConnectionEndpoint } from '../../../client/connection-info.js'
import {
  ConnectionClosedError,
  ConnectionFailureError,
  OperationTimedOutError,
  ProtocolViolationError,
  RpcProtocolError,
  TerminalNotFoundError,
} from '../../../client/errors.js'
import { RpcClient } from '../../../client/rpc-client.js'
import { FakeHost, HostError } from '../../helpers/fake-host.js'

vi.mock('../../../client/logger', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }
  logger.child.mockReturnValue(logger)
  return { logger }
})

function frame(value: unknown): string {
  return `${JSON.stringify(value)}\n`
}

describe('RpcClient', () => {
  let host: FakeHost
  let endpoint: ConnectionEndpoint
  let client: RpcClient

  beforeEach(async () => {
    host = new FakeHost({
      'session.list': () => [],
      'terminal.read': (params) => {
        if (params.terminal_id === 'gone') throw new HostError(-32000, 'Terminal not found: gone')
        return { text: `screen of ${String(params.terminal_id)}`, cursor_row: 0, cursor_col: 0, rows: 24, cols: 80 }
      },
    })
    endpoint = await host.listenTcp()
    client = new RpcClient({ endpoint })
  })

  afterEach(async () => {
    client.disconnect()
    await host.close()
  })

  it('connects lazily and numbers requests from 1', async () => {
    expect(client.connectionState).toBe('idle')
    await client.call('session.list', {})
    await client.call('session.list', {})
    await client.call('session.list', {})

    expect(client.connectionState).toBe('open')
    expect(host.ids()).toEqual([1, 2, 3])
    expect(host.requests[0]).toEqual({ jsonrpc: '2.0', id: 1, method: 'session.list', params: {} })
    expect(host.connectionCount).toBe(1)
  })

  it('resolves concurrent calls with their own results', async () => {
    const results = await Promise.all([
      client.call('terminal.read', { terminal_id: 'a' }),
      client.call('terminal.read', { terminal_id: 'b' }),
      client.call('terminal.read', { terminal_id: 'c' }),
    ])

    expect(results.map((r) => (r && typeof r === 'object' && 'text' in r ? r.text : null))).toEqual([
      'screen of a',
      'screen of b',
      'screen of c',
    ])
    expect(client.pendingCount).toBe(0)
  })

  it('correlates responses by id when they arrive out of order', async () => {
    const held: unknown[] = []
    host.intercept = (request, socket) => {
      held.push(request.id)
      if (held.length === 2) {
        socket.write(frame({ jsonrpc: '2.0', id: held[1], result: 'second' }))
        socket.write(frame({ jsonrpc: '2.0', id: held[0], result: 'first' }))
      }
      return true
    }

    const [first, second] = await Promise.all([
      client.call('session.list', {}),
      client.call('session.list', {}),
    ])
    expect(first).toBe('first')
    expect(second).toBe('second')
  })

  it('maps error codes and keeps the connection usable', async () => {
    await expect(client.call('terminal.read', { terminal_id: 'gone' })).rejects.toBeInstanceOf(TerminalNotFoundError)
    await expect(client.call('notify.toast', { message: 'x', level: 'info' })).rejects.toMatchObject({
      name: 'RpcProtocolError',
      code: -32601,
      method: 'notify.toast',
    })

    expect(client.connectionState).toBe('open')
    await expect(client.call('session.list', {})).resolves.toEqual([])
  })

  it('settles the oldest call when an error arrives without an id', async () => {
    host.intercept = (_request, socket) => {
      socket.write(frame({ error: { code: -32001, message: 'deadline exceeded' } }))
      return true
    }

    const err = await client.call('terminal.wait_for', { terminal_id: 't1', pattern: '\\$', timeout_ms: 10 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(OperationTimedOutError)
    expect(client.connectionState).toBe('open')
  })

  it('treats a null id parse error as the oldest call failing', async () => {
    host.intercept = (_request, socket) => {
      socket.write(frame({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } }))
      return true
    }

    const err = await client.call('session.list', {}).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(RpcProtocolError)
    expect(err).toMatchObject({ code: -32700, message: 'Parse error' })
  })

  it('fails every pending call on a response with an unknown id', async () => {
    host.intercept = (request, socket) => {
      if (request.id === 2) socket.write(frame({ jsonrpc: '2.0', id: 99, result: null }))
      return true
    }

    const first = expect(client.call('session.list', {})).rejects.toBeInstanceOf(ProtocolViolationError)
    const second = expect(client.call('session.list', {})).rejects.toThrow('Response id 99 matches no outstanding request')
    await first
    await second

    expect(client.connectionState).toBe('failed')
    expect(client.pendingCount).toBe(0)
  })

  it('stays failed until reconnected, keeping ids increasing', async () => {
    host.intercept = (_request, socket) => {
      socket.write('not json\n')
      return true
    }
    await expect(client.call('session.list', {})).rejects.toThrow(/^Undecodable frame from host: not json$/)

    await expect(client.call('session.list', {})).rejects.toThrow(ConnectionFailureError)
    await expect(client.call('session.list', {})).rejects.toThrow('was lost; reconnect before retrying')
    expect(host.ids()).toEqual([1])

    host.intercept = null
    await client.reconnect()
    await client.call('session.list', {})
    expect(host.ids()).toEqual([1, 2])
  })

  it('rejects a frame that is not a response object', async () => {
    host.intercept = (_request, socket) => {
      socket.write('[1,2,3]\n')
      return true
    }
    await expect(client.call('session.list', {})).rejects.toBeInstanceOf(ProtocolViolationError)
  })

  it('rejects pending calls when the host closes the connection', async () => {
    host.intercept = (_request, socket) => {
      socket.end()
      return true
    }

    const err = await client.call('session.list', {}).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConnectionClosedError)
    expect(err).toMatchObject({ message: 'Connection closed by server' })
    expect(client.connectionState).toBe('failed')
  })

  it('rejects pending calls on disconnect', async () => {
    host.intercept = () => true
    const pending = expect(client.call('session.list', {})).rejects.toThrow('Connection closed by client')
    await vi.waitFor(() => expect(host.requests).toHaveLength(1))

    client.disconnect()
    await pending
    expect(client.connectionState).toBe('idle')
  })

  it('reconnects while a dial is still in flight', async () => {
    const first = client.connect().catch((err: unknown) => err)
    expect(client.connectionState).toBe('connecting')

    await client.reconnect()

    expect(client.connectionState).toBe('open')
    const aborted = await first
    expect(aborted).toBeInstanceOf(ConnectionFailureError)
    expect(aborted).toHaveProperty('message', `Connection attempt to ${formatEndpoint(endpoint)} was aborted`)
    await expect(client.call('session.list', {})).resolves.toEqual([])
  })

  it('dials afresh after a disconnect interrupts the first dial', async () => {
    const first = client.connect().catch((err: unknown) => err)
    client.disconnect()
    expect(client.connectionState).toBe('idle')

    await expect(client.call('session.list', {})).resolves.toEqual([])
    expect(await first).toBeInstanceOf(ConnectionFailureError)
    expect(client.connectionState).toBe('open')
    expect(host.ids()).toEqual([1])
  })

  it('reassembles frames split across writes', async () => {
    host.intercept = (request, socket) => {
      const text = frame({ jsonrpc: '2.0', id: request.id, result: { output: 'split' } })
      socket.write(text.slice(0, 10))
      setTimeout(() => socket.write(text.slice(10)), 20)
      return true
    }
    await expect(client.call('session.list', {})).resolves.toEqual({ output: 'split' })
  })

  it('drops the connection when a frame outgrows the limit', async () => {
    const small = new RpcClient({ endpoint, maxFrameBytes: 64 })
    host.intercept = (_request, socket) => {
      socket.write('x'.repeat(100))
      return true
    }
    await expect(small.call('session.list', {})).rejects.toThrow('Frame exceeds 64 bytes without a newline delimiter')
    expect(small.connectionState).toBe('failed')
    small.disconnect()
  })

  it('reports an unreachable host as a connection failure', async () => {
    const unreachable = new RpcClient({ endpoint: { kind: 'unix', path: '/nonexistent/bspterm-0.sock' } })
    await expect(unreachable.call('session.list', {})).rejects.toThrow(
      /^Failed to connect to \/nonexistent\/bspterm-0\.sock: /,
    )
    expect(unreachable.connectionState).toBe('idle')
  })
})

describe('RpcClient over a Unix socket', () => {
  it('talks to the host through the socket path', async () => {
    const host = new FakeHost({ 'session.list': () => [{ id: 't1', name: 'shell', type: 'local', connected: true }] })
    const endpoint = await host.listenUnix()
    const client = new RpcClient({ endpoint })

    await expect(client.call('session.list', {})).resolves.toEqual([
      { id: 't1', name: 'shell', type: 'local', connected: true },
    ])

    client.disconnect()
    await host.close()
  })
})
