import type { ToastLevel } from '../shared/rpc-protocol.js'
import { resolveConfig, type ClientConfig, type ResolveConfigOptions } from './config.js'
import { RpcClient, type RpcClientOptions } from './rpc-client.js'
import {
  addSshToGroup,
  connectSsh,
  connectTelnet,
  currentTerminal,
  getCurrentGroup,
  getTerminal,
  listSessions,
  newTerminal,
  splitRightClone,
  terminalFromSession,
  toast,
  type AddSshToGroupOptions,
  type SessionInfo,
  type SplitCloneOptions,
  type SshOptions,
  type TelnetOptions,
} from './sessions.js'
import { Terminal, type GroupInfo } from './terminal.js'

export type CreateClientOptions = ResolveConfigOptions & Omit<RpcClientOptions, 'endpoint'> & {
  config?: ClientConfig
}

/**
 * Entry point for scripts: one connection to the host, shared by every terminal handle it
 * hands out. Construct once, pass it around, `close()` when done.
 */
export class BsptermClient {
  readonly rpc: RpcClient

  constructor(readonly config: ClientConfig, options: Omit<RpcClientOptions, 'endpoint'> = {}) {
    this.rpc = new RpcClient({ ...options, endpoint: config.endpoint })
  }

  /** Wraps a known terminal id without asking the host. */
  terminal(id: string): Terminal {
    return new Terminal(this.rpc, { id, connected: true, type: 'unknown' })
  }

  currentTerminal(terminalId?: string): Promise<Terminal> {
    return currentTerminal(this.rpc, { terminalId: terminalId ?? this.config.currentTerminalId })
  }

  getTerminal(terminalId: string): Promise<Terminal> {
    return getTerminal(this.rpc, terminalId)
  }

  listSessions(): Promise<SessionInfo[]> {
    return listSessions(this.rpc)
  }

  connectSession(session: SessionInfo): Terminal {
    return terminalFromSession(this.rpc, session)
  }

  getCurrentGroup(terminalId?: string): Promise<GroupInfo> {
    return getCurrentGroup(this.rpc, terminalId ?? this.config.currentTerminalId)
  }

  addSshToGroup(options: AddSshToGroupOptions): Promise<string> {
    return addSshToGroup(this.rpc, options)
  }

  newTerminal(options: { ssh?: SshOptions; telnet?: TelnetOptions } = {}): Promise<Terminal> {
    return newTerminal(this.rpc, options)
  }

  connectSsh(options: SshOptions): Promise<Terminal> {
    return connectSsh(this.rpc, options)
  }

  connectTelnet(options: TelnetOptions): Promise<Terminal> {
    return connectTelnet(this.rpc, options)
  }

  splitRightClone(options: SplitCloneOptions = {}): Promise<Terminal> {
    return splitRightClone(this.rpc, { ...options, terminalId: options.terminalId ?? this.config.currentTerminalId })
  }

  toast(message: string, level?: ToastLevel): Promise<void> {
    return toast(this.rpc, message, level)
  }

  close(): void {
    this.rpc.disconnect()
  }
}

export function createClient(options: CreateClientOptions = {}): BsptermClient {
  const { config, env, ppid, homeDir, ...rpcOptions } = options
  return new BsptermClient(config ?? resolveConfig({ env, ppid, homeDir }), rpcOptions)
}

export { RpcClient } from './rpc-client.js'
export type { RpcClientOptions } from './rpc-client.js'
export { SocketTransport, DEFAULT_MAX_FRAME_BYTES } from './transport.js'
export type { TransportState } from './transport.js'
export { Terminal } from './terminal.js'
export type {
  CommandOptions,
  GroupInfo,
  MarkedCommandResult,
  ScreenSnapshot,
  TerminalInfo,
  TimeoutOptions,
} from './terminal.js'
export { TrackingSession, withTracking } from './tracking-session.js'
export type { TrackedChunk } from './tracking-session.js'
export {
  addSshToGroup,
  connectSsh,
  connectTelnet,
  currentTerminal,
  getCurrentGroup,
  getTerminal,
  listSessions,
  newTerminal,
  splitRightClone,
  terminalFromSession,
  toast,
} from './sessions.js'
export type { AddSshToGroupOptions, SessionInfo, SplitCloneOptions, SshOptions, TelnetOptions } from './sessions.js'
export { resolveConfig, readReconnectedTerminals, configFilePath } from './config.js'
export type { ClientConfig, ReconnectedTerminal, ResolveConfigOptions } from './config.js'
export { resolveEndpoint, parseEndpointOverride, defaultSocketPath, formatEndpoint } from './connection-info.js'
export type { ConnectionEndpoint } from './connection-info.js'
export {
  BsptermError,
  ConfigError,
  ConnectionClosedError,
  ConnectionFailureError,
  OperationTimedOutError,
  ProtocolViolationError,
  RpcProtocolError,
  TerminalNotFoundError,
  TrackingStoppedError,
  classifyErrorCode,
  errorFromRpcError,
  isBsptermError,
} from './errors.js'
export type { BsptermErrorKind, ErrorCodeClass } from './errors.js'
export { RpcErrorCode } from '../shared/rpc-protocol.js'
export type { SessionKind, ToastLevel } from '../shared/rpc-protocol.js'
export { logger, setLogLevel, withLogContext } from './logger.js'
