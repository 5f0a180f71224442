/**
 * SocketTransport: one stream connection (TCP or Unix socket) to the host application.
 *
 * Frames are single JSON documents terminated by one `\n`. Partial reads are accumulated
 * until a delimiter arrives; each complete frame is handed to `onFrame`. The transport never
 * reconnects on its own: once the peer goes away it stays `failed` until `disconnect()`.
 */

import net from 'net'
import { formatEndpoint, type ConnectionEndpoint } from './connection-info.js'
import { ConnectionClosedError, ConnectionFailureError, ProtocolViolationError, type BsptermError } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'

const NEWLINE = 0x0a
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024

export type TransportState = 'idle' | 'connecting' | 'open' | 'failed'

export type TransportHandlers = {
  onFrame: (frame: string) => void
  /** Called once per lost connection with the error every waiter should see. */
  onClose: (err: BsptermError) => void
}

export type SocketTransportOptions = {
  maxFrameBytes?: number
  logger?: Logger
}

export class SocketTransport {
  private socket: net.Socket | null = null
  private dialing: net.Socket | null = null
  private connecting: Promise<void> | null = null
  private buffer: Buffer = Buffer.alloc(0)
  private failure: BsptermError | null = null
  private readonly maxFrameBytes: number
  private readonly log: Logger

  constructor(
    readonly endpoint: ConnectionEndpoint,
    private readonly handlers: TransportHandlers,
    options: SocketTransportOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES
    this.log = (options.logger ?? rootLogger).child({ component: 'transport', endpoint: formatEndpoint(endpoint) })
  }

  get state(): TransportState {
    if (this.failure) return 'failed'
    if (this.socket) return 'open'
    if (this.connecting) return 'connecting'
    return 'idle'
  }

  connect(): Promise<void> {
    if (this.failure) {
      return Promise.reject(
        new ConnectionFailureError(`Connection to ${formatEndpoint(this.endpoint)} was lost; reconnect before retrying`, {
          cause: this.failure,
        }),
      )
    }
    if (this.socket) return Promise.resolve()
    if (!this.connecting) {
      const attempt: Promise<void> = this.open().finally(() => {
        if (this.connecting === attempt) this.connecting = null
      })
      this.connecting = attempt
    }
    return this.connecting
  }

  disconnect(): void {
    // The aborted dial still rejects its own callers; the next connect() dials afresh.
    this.dialing?.destroy()
    this.dialing = null
    this.connecting = null
    const socket = this.socket
    this.socket = null
    this.failure = null
    this.buffer = Buffer.alloc(0)
    if (!socket) return
    socket.removeAllListeners()
    // A late 'error' from a destroyed socket must not become an uncaught exception.
    socket.on('error', (err) => this.log.debug({ err }, 'Socket error after disconnect'))
    socket.destroy()
    this.log.debug('Disconnected')
    this.handlers.onClose(new ConnectionClosedError('Connection closed by client'))
  }

  sendFrame(json: string): Promise<void> {
    const socket = this.socket
    if (!socket) {
      return Promise.reject(new ConnectionFailureError(`Not connected to ${formatEndpoint(this.endpoint)}`))
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(`${json}\n`, 'utf8', (err) => {
        if (err) {
          reject(new ConnectionFailureError(`Failed to write to ${formatEndpoint(this.endpoint)}: ${err.message}`, { cause: err }))
          return
        }
        resolve()
      })
    })
  }

  /** Tears the connection down after a fatal protocol error; waiters receive `err`. */
  fail(err: BsptermError): void {
    const socket = this.socket
    if (!socket) return
    this.socket = null
    this.buffer = Buffer.alloc(0)
    this.failure = err
    socket.removeAllListeners()
    socket.on('error', (socketErr) => this.log.debug({ err: socketErr }, 'Socket error after failure'))
    socket.destroy()
    this.handlers.onClose(err)
  }

  private open(): Promise<void> {
    const target = formatEndpoint(this.endpoint)
    return new Promise<void>((resolve, reject) => {
      const socket = this.endpoint.kind === 'tcp'
        ? net.createConnection({ host: this.endpoint.host, port: this.endpoint.port })
        : net.createConnection({ path: this.endpoint.path })

      this.dialing = socket

      const onConnectError = (err: Error) => {
        socket.off('close', onAbort)
        if (this.dialing === socket) this.dialing = null
        socket.destroy()
        this.log.warn({ err }, 'Connection failed')
        reject(new ConnectionFailureError(`Failed to connect to ${target}: ${err.message}`, { cause: err }))
      }
      const onAbort = () => {
        socket.off('error', onConnectError)
        if (this.dialing === socket) this.dialing = null
        reject(new ConnectionFailureError(`Connection attempt to ${target} was aborted`))
      }

      socket.once('error', onConnectError)
      socket.once('close', onAbort)
      socket.once('connect', () => {
        socket.off('error', onConnectError)
        socket.off('close', onAbort)
        if (this.dialing === socket) this.dialing = null
        this.attach(socket)
        this.log.debug('Connected')
        resolve()
      })
    })
  }

  private attach(socket: net.Socket): void {
    this.socket = socket
    this.buffer = Buffer.alloc(0)
    socket.setNoDelay(true)
    socket.on('data', (chunk: Buffer) => this.onData(socket, chunk))
    socket.on('error', (err) => {
      if (this.socket !== socket) return
      this.log.warn({ err }, 'Socket error')
      this.fail(new ConnectionFailureError(`Connection to ${formatEndpoint(this.endpoint)} failed: ${err.message}`, { cause: err }))
    })
    socket.on('close', () => {
      if (this.socket !== socket) return
      if (this.buffer.length > 0) {
        this.log.warn({ pendingBytes: this.buffer.length }, 'Peer closed mid-frame')
      }
      this.log.debug('Peer closed connection')
      this.fail(new ConnectionClosedError())
    })
  }

  private onData(socket: net.Socket, chunk: Buffer): void {
    if (this.socket !== socket) return
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk

    let newlineIdx = this.buffer.indexOf(NEWLINE)
    while (newlineIdx !== -1) {
      const frame = this.buffer.subarray(0, newlineIdx).toString('utf8').trim()
      this.buffer = this.buffer.subarray(newlineIdx + 1)
      if (frame) this.handlers.onFrame(frame)
      // onFrame may have torn the connection down.
      if (this.socket !== socket) return
      newlineIdx = this.buffer.indexOf(NEWLINE)
    }

    if (this.buffer.length > this.maxFrameBytes) {
      const err = new ProtocolViolationError(
        `Frame exceeds ${this.maxFrameBytes} bytes without a newline delimiter`,
      )
      this.log.error({ bufferedBytes: this.buffer.length }, err.message)
      this.fail(err)
    }
  }
}
