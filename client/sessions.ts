import {
  AddSshResultSchema,
  GroupInfoResultSchema,
  SessionListResultSchema,
  SplitCloneResultSchema,
  TerminalInfoResultSchema,
  ToastLevelSchema,
  normalizeSessionKind,
  type RpcMethod,
  type SessionKind,
  type SshConnectParams,
  type TelnetConnectParams,
  type ToastLevel,
} from '../shared/rpc-protocol.js'
import { parseResult, toTimeoutMs } from './results.js'
import type { RpcClient } from './rpc-client.js'
import { Terminal, toGroupInfo, type GroupInfo } from './terminal.js'

export type SessionInfo = {
  id: string
  name: string
  type: SessionKind
  connected: boolean
}

export type SshOptions = {
  host: string
  port?: number
  username?: string
  password?: string
  privateKeyPath?: string
  passphrase?: string
}

export type TelnetOptions = {
  host: string
  port?: number
  username?: string
  password?: string
}

export type AddSshToGroupOptions = {
  groupId: string
  name: string
  host: string
  port?: number
  username?: string
  password?: string
}

export type SplitCloneOptions = {
  terminalId?: string
  waitForLogin?: boolean
  loginTimeoutMs?: number
}

const DEFAULT_SSH_PORT = 22
const DEFAULT_TELNET_PORT = 23

function terminalFromResult(client: RpcClient, result: unknown, method: RpcMethod, kind?: SessionKind): Terminal {
  const info = parseResult(TerminalInfoResultSchema, result, method)
  return new Terminal(client, {
    id: info.id,
    connected: info.connected ?? true,
    type: kind ?? normalizeSessionKind(info.type),
  })
}

function sshParams(options: SshOptions): SshConnectParams {
  const params: SshConnectParams = { host: options.host, port: options.port ?? DEFAULT_SSH_PORT }
  if (options.username) params.username = options.username
  if (options.password) params.password = options.password
  if (options.privateKeyPath) params.private_key_path = options.privateKeyPath
  if (options.passphrase) params.passphrase = options.passphrase
  return params
}

function telnetParams(options: TelnetOptions): TelnetConnectParams {
  const params: TelnetConnectParams = { host: options.host, port: options.port ?? DEFAULT_TELNET_PORT }
  if (options.username) params.username = options.username
  if (options.password) params.password = options.password
  return params
}

export async function listSessions(client: RpcClient): Promise<SessionInfo[]> {
  const sessions = parseResult(SessionListResultSchema, await client.call('session.list', {}), 'session.list')
  return sessions.map((s) => ({ id: s.id, name: s.name, type: normalizeSessionKind(s.type), connected: s.connected }))
}

export function terminalFromSession(client: RpcClient, session: SessionInfo): Terminal {
  return new Terminal(client, { id: session.id, connected: session.connected, type: session.type })
}

export async function getTerminal(client: RpcClient, terminalId: string): Promise<Terminal> {
  return terminalFromResult(client, await client.call('session.current', { terminal_id: terminalId }), 'session.current')
}

/**
 * The terminal the script was launched from: `terminalId` when given, else the host's
 * focused terminal.
 */
export async function currentTerminal(client: RpcClient, options: { terminalId?: string } = {}): Promise<Terminal> {
  const params = options.terminalId ? { terminal_id: options.terminalId } : {}
  return terminalFromResult(client, await client.call('session.current', params), 'session.current')
}

export async function getCurrentGroup(client: RpcClient, terminalId?: string): Promise<GroupInfo> {
  const params = terminalId ? { terminal_id: terminalId } : {}
  const result = parseResult(
    GroupInfoResultSchema,
    await client.call('session.get_current_group', params),
    'session.get_current_group',
  )
  return toGroupInfo(result)
}

/** Stores an SSH session in a session group without opening a window; resolves with its id. */
export async function addSshToGroup(client: RpcClient, options: AddSshToGroupOptions): Promise<string> {
  const params: {
    group_id: string
    name: string
    host: string
    port: number
    username?: string
    password?: string
  } = {
    group_id: options.groupId,
    name: options.name,
    host: options.host,
    port: options.port ?? DEFAULT_SSH_PORT,
  }
  if (options.username) params.username = options.username
  if (options.password) params.password = options.password

  const result = parseResult(AddSshResultSchema, await client.call('session.add_ssh_to_group', params), 'session.add_ssh_to_group')
  return result.session_id
}

export async function newTerminal(client: RpcClient, options: { ssh?: SshOptions; telnet?: TelnetOptions } = {}): Promise<Terminal> {
  const params: { ssh?: SshConnectParams; telnet?: TelnetConnectParams } = {}
  if (options.ssh) params.ssh = sshParams(options.ssh)
  if (options.telnet) params.telnet = telnetParams(options.telnet)
  return terminalFromResult(client, await client.call('session.new_terminal', params), 'session.new_terminal')
}

/** Background SSH connection, no window. */
export async function connectSsh(client: RpcClient, options: SshOptions): Promise<Terminal> {
  return terminalFromResult(client, await client.call('session.create_ssh', sshParams(options)), 'session.create_ssh', 'ssh')
}

/** Background Telnet connection, no window. */
export async function connectTelnet(client: RpcClient, options: TelnetOptions): Promise<Terminal> {
  return terminalFromResult(
    client,
    await client.call('session.create_telnet', telnetParams(options)),
    'session.create_telnet',
    'telnet',
  )
}

/**
 * Splits the pane holding the terminal to the right and opens a clone of its session there.
 * With `waitForLogin`, resolves only after the clone finished its auto-login.
 */
export async function splitRightClone(client: RpcClient, options: SplitCloneOptions = {}): Promise<Terminal> {
  const loginTimeoutMs = options.waitForLogin ? toTimeoutMs(options.loginTimeoutMs, 'loginTimeoutMs') : undefined
  const terminalId = options.terminalId ?? (await currentTerminal(client)).id
  const result = parseResult(
    SplitCloneResultSchema,
    await client.call('pane.split_right_clone', { terminal_id: terminalId }),
    'pane.split_right_clone',
  )
  const clone = new Terminal(client, { id: result.new_terminal_id, connected: true, type: 'unknown' })
  if (loginTimeoutMs !== undefined) await clone.waitForLogin({ timeoutMs: loginTimeoutMs })
  return clone
}

export async function toast(client: RpcClient, message: string, level: ToastLevel = 'info'): Promise<void> {
  const parsedLevel = ToastLevelSchema.safeParse(level)
  if (!parsedLevel.success) {
    throw new RangeError(`Toast level must be one of ${ToastLevelSchema.options.join(', ')}, got "${String(level)}"`)
  }
  await client.call('notify.toast', { message, level: parsedLevel.data })
}
