import {
  JSONRPC_VERSION,
  RpcResponseSchema,
  type RpcMethod,
  type RpcMethodParams,
  type RpcRequest,
} from '../shared/rpc-protocol.js'
import { formatEndpoint, resolveEndpoint, type ConnectionEndpoint } from './connection-info.js'
import { errorFromRpcError, ProtocolViolationError, type BsptermError } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { SocketTransport, type SocketTransportOptions } from './transport.js'

type PendingCall = {
  method: RpcMethod
  startedAt: number
  resolve: (result: unknown) => void
  reject: (err: Error) => void
}

export type RpcClientOptions = SocketTransportOptions & {
  endpoint?: ConnectionEndpoint
}

/**
 * JSON-RPC correlator over a single connection.
 *
 * Ids start at 1 and only ever grow, across reconnects too. Each call owns one pending entry
 * keyed by id, so independent async callers can share the connection; the host answers in
 * the order it received requests.
 */
export class RpcClient {
  readonly endpoint: ConnectionEndpoint
  private readonly transport: SocketTransport
  private readonly pending = new Map<number, PendingCall>()
  private lastId = 0
  private readonly log: Logger

  constructor(options: RpcClientOptions = {}) {
    this.endpoint = options.endpoint ?? resolveEndpoint()
    this.log = (options.logger ?? rootLogger).child({ component: 'rpc', endpoint: formatEndpoint(this.endpoint) })
    this.transport = new SocketTransport(
      this.endpoint,
      {
        onFrame: (frame) => this.onFrame(frame),
        onClose: (err) => this.rejectAll(err),
      },
      options,
    )
  }

  get pendingCount(): number {
    return this.pending.size
  }

  get connectionState() {
    return this.transport.state
  }

  connect(): Promise<void> {
    return this.transport.connect()
  }

  disconnect(): void {
    this.transport.disconnect()
  }

  reconnect(): Promise<void> {
    this.transport.disconnect()
    return this.transport.connect()
  }

  async call<M extends RpcMethod>(method: M, params: RpcMethodParams[M]): Promise<unknown> {
    await this.transport.connect()

    this.lastId += 1
    const request: RpcRequest<M> = { jsonrpc: JSONRPC_VERSION, method, params, id: this.lastId }
    const id = request.id

    const response = new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { method, startedAt: Date.now(), resolve, reject })
    })

    this.log.debug({ id, method }, 'RPC request')
    try {
      await this.transport.sendFrame(JSON.stringify(request))
    } catch (err) {
      // Still pending means nothing else settled this call; otherwise the close that broke
      // the write already rejected it and that error is the one to surface.
      if (this.pending.delete(id)) throw err
    }
    return response
  }

  private onFrame(frame: string): void {
    let raw: unknown
    try {
      raw = JSON.parse(frame)
    } catch (err) {
      this.violation(new ProtocolViolationError(`Undecodable frame from host: ${truncate(frame)}`, { cause: err }))
      return
    }

    const parsed = RpcResponseSchema.safeParse(raw)
    if (!parsed.success) {
      this.violation(new ProtocolViolationError(`Frame is not a JSON-RPC response: ${truncate(frame)}`, { cause: parsed.error }))
      return
    }
    const response = parsed.data

    const entry = this.takePending(response.id)
    if (!entry) {
      this.violation(new ProtocolViolationError(`Response id ${String(response.id)} matches no outstanding request`))
      return
    }
    const [id, call] = entry
    const elapsedMs = Date.now() - call.startedAt

    if (response.error) {
      this.log.debug({ id, method: call.method, elapsedMs, code: response.error.code }, 'RPC error response')
      call.reject(errorFromRpcError(response.error, call.method))
      return
    }

    this.log.debug({ id, method: call.method, elapsedMs }, 'RPC response')
    call.resolve(response.result)
  }

  // Responses without an id (the host could not parse the request) answer the oldest call.
  private takePending(id: number | string | null | undefined): [number, PendingCall] | undefined {
    if (id === null || id === undefined) {
      const oldest = this.pending.entries().next()
      if (oldest.done) return undefined
      this.pending.delete(oldest.value[0])
      return oldest.value
    }
    if (typeof id !== 'number') return undefined
    const call = this.pending.get(id)
    if (!call) return undefined
    this.pending.delete(id)
    return [id, call]
  }

  private violation(err: ProtocolViolationError): void {
    this.log.error({ err, pending: this.pending.size }, 'Protocol violation; dropping connection')
    this.transport.fail(err)
    // fail() is a no-op when the socket is already gone; make sure nobody keeps waiting.
    this.rejectAll(err)
  }

  private rejectAll(err: BsptermError): void {
    if (!this.pending.size) return
    const calls = [...this.pending.values()]
    this.pending.clear()
    for (const call of calls) call.reject(err)
  }
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text
}
