import {
  ContentResultSchema,
  GroupInfoResultSchema,
  MarkedCommandResultSchema,
  OutputResultSchema,
  ScreenResultSchema,
  TrackStartResultSchema,
  type SessionKind,
} from '../shared/rpc-protocol.js'
import { parseResult, toTimeoutMs } from './results.js'
import type { RpcClient } from './rpc-client.js'
import { TrackingSession, withTracking } from './tracking-session.js'

export type ScreenSnapshot = {
  text: string
  cursorRow: number
  cursorCol: number
  rows: number
  cols: number
}

/** `exitCode` is only present when the host reported one; absent never means 0. */
export type MarkedCommandResult = {
  commandId: string
  output: string
  exitCode?: number
}

export type GroupInfo = {
  groupId?: string
  sessionId?: string
}

export type CommandOptions = {
  timeoutMs?: number
  /** Regex (host syntax) that marks the prompt; the host default is `[$#>]\s*$`. */
  promptPattern?: string
}

export type TimeoutOptions = {
  timeoutMs?: number
}

export type TerminalInfo = {
  id: string
  connected: boolean
  type: SessionKind
}

export function toGroupInfo(raw: { group_id?: string | null; session_id?: string | null }): GroupInfo {
  const info: GroupInfo = {}
  if (raw.group_id) info.groupId = raw.group_id
  if (raw.session_id) info.sessionId = raw.session_id
  return info
}

/**
 * A terminal hosted by the application. Cheap to construct; it holds only the id. Calls on
 * an id the host has released fail with `TerminalNotFoundError`.
 */
export class Terminal implements TerminalInfo {
  readonly id: string
  readonly connected: boolean
  readonly type: SessionKind

  constructor(
    private readonly client: RpcClient,
    info: TerminalInfo,
  ) {
    this.id = info.id
    this.connected = info.connected
    this.type = info.type
  }

  async send(data: string): Promise<void> {
    await this.client.call('terminal.send', { terminal_id: this.id, data })
  }

  async read(): Promise<ScreenSnapshot> {
    const screen = parseResult(
      ScreenResultSchema,
      await this.client.call('terminal.read', { terminal_id: this.id }),
      'terminal.read',
    )
    return {
      text: screen.text,
      cursorRow: screen.cursor_row,
      cursorCol: screen.cursor_col,
      rows: screen.rows,
      cols: screen.cols,
    }
  }

  screen(): Promise<ScreenSnapshot> {
    return this.read()
  }

  /** Resolves with the content the pattern matched in; the host enforces the deadline. */
  async waitFor(pattern: string, options: TimeoutOptions = {}): Promise<string> {
    const timeoutMs = toTimeoutMs(options.timeoutMs)
    const result = parseResult(
      ContentResultSchema,
      await this.client.call('terminal.wait_for', { terminal_id: this.id, pattern, timeout_ms: timeoutMs }),
      'terminal.wait_for',
    )
    return result.content
  }

  /** Output as captured, including the command echo and the trailing prompt. */
  async run(command: string, options: CommandOptions = {}): Promise<string> {
    const result = parseResult(
      OutputResultSchema,
      await this.client.call('terminal.run', this.commandParams(command, options)),
      'terminal.run',
    )
    return result.output
  }

  /** Like `run`, with the host stripping the echo and the prompt. */
  async sendcmd(command: string, options: CommandOptions = {}): Promise<string> {
    const result = parseResult(
      OutputResultSchema,
      await this.client.call('terminal.sendcmd', { ...this.commandParams(command, options), strip_echo: true }),
      'terminal.sendcmd',
    )
    return result.output
  }

  async runMarked(command: string, options: CommandOptions = {}): Promise<MarkedCommandResult> {
    const result = parseResult(
      MarkedCommandResultSchema,
      await this.client.call('terminal.run_marked', this.commandParams(command, options)),
      'terminal.run_marked',
    )
    const marked: MarkedCommandResult = { commandId: result.command_id, output: result.output }
    if (typeof result.exit_code === 'number') marked.exitCode = result.exit_code
    return marked
  }

  /** Output of an earlier `runMarked` command, kept by the host after it completed. */
  async readCommandOutput(commandId: string): Promise<string> {
    const result = parseResult(
      OutputResultSchema,
      await this.client.call('terminal.read_command_output', { terminal_id: this.id, command_id: commandId }),
      'terminal.read_command_output',
    )
    return result.output
  }

  /** Output captured between `startMs` and `endMs` after the host began tracking this terminal. */
  async readTimeRange(startMs: number, endMs: number): Promise<string> {
    const result = parseResult(
      ContentResultSchema,
      await this.client.call('terminal.read_time_range', {
        terminal_id: this.id,
        start_ms: toTimeoutMs(startMs, 'startMs'),
        end_ms: toTimeoutMs(endMs, 'endMs'),
      }),
      'terminal.read_time_range',
    )
    return result.content
  }

  /**
   * Waits for the host's auto-login rules to finish. Call it on a freshly cloned terminal
   * before sending commands, or they race the scripted login.
   */
  async waitForLogin(options: TimeoutOptions = {}): Promise<void> {
    const timeoutMs = toTimeoutMs(options.timeoutMs)
    await this.client.call('terminal.wait_for_login', { terminal_id: this.id, timeout_ms: timeoutMs })
  }

  async close(): Promise<void> {
    await this.client.call('terminal.close', { terminal_id: this.id })
  }

  async track(): Promise<TrackingSession> {
    const result = parseResult(
      TrackStartResultSchema,
      await this.client.call('terminal.track_start', { terminal_id: this.id }),
      'terminal.track_start',
    )
    return new TrackingSession(this.client, this.id, result.reader_id)
  }

  withTracking<T>(fn: (session: TrackingSession) => Promise<T>): Promise<T> {
    return withTracking(this, fn)
  }

  async currentGroup(): Promise<GroupInfo> {
    const result = parseResult(
      GroupInfoResultSchema,
      await this.client.call('session.get_current_group', { terminal_id: this.id }),
      'session.get_current_group',
    )
    return toGroupInfo(result)
  }

  private commandParams(command: string, options: CommandOptions) {
    const params: { terminal_id: string; command: string; timeout_ms: number; prompt_pattern?: string } = {
      terminal_id: this.id,
      command,
      timeout_ms: toTimeoutMs(options.timeoutMs),
    }
    if (options.promptPattern) params.prompt_pattern = options.promptPattern
    return params
  }
}
