/**
 * BSPTerm scripting protocol: JSON-RPC 2.0 over newline-delimited frames.
 *
 * Client→Server: TypeScript parameter types only (the host validates).
 * Server→Client: Zod schemas, since the client shapes every result into a typed entity
 * and a mismatch means the host speaks a different protocol version.
 */
import { z } from 'zod'

export const JSONRPC_VERSION = '2.0'

// ──────────────────────────────────────────────────────────────
// Error codes
// ──────────────────────────────────────────────────────────────

export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TERMINAL_NOT_FOUND: -32000,
  TIMEOUT: -32001,
  DISCONNECTED: -32002,
} as const

// ──────────────────────────────────────────────────────────────
// Envelope
// ──────────────────────────────────────────────────────────────

export const RpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
})

export type RpcErrorObject = z.infer<typeof RpcErrorObjectSchema>

export const RpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: RpcErrorObjectSchema.nullable().optional(),
})

export type RpcResponse = z.infer<typeof RpcResponseSchema>

export type RpcRequest<M extends RpcMethod = RpcMethod> = {
  jsonrpc: typeof JSONRPC_VERSION
  method: M
  params: RpcMethodParams[M]
  id: number
}

// ──────────────────────────────────────────────────────────────
// Shared enums
// ──────────────────────────────────────────────────────────────

export const SESSION_KINDS = ['local', 'ssh', 'telnet', 'unknown'] as const

export type SessionKind = (typeof SESSION_KINDS)[number]

export function normalizeSessionKind(raw: string | undefined): SessionKind {
  if (raw === 'local' || raw === 'ssh' || raw === 'telnet') return raw
  return 'unknown'
}

export const ToastLevelSchema = z.enum(['info', 'success', 'warning', 'error'])

export type ToastLevel = z.infer<typeof ToastLevelSchema>

// ──────────────────────────────────────────────────────────────
// Method parameters
// ──────────────────────────────────────────────────────────────

export type SshConnectParams = {
  host: string
  port: number
  username?: string
  password?: string
  private_key_path?: string
  passphrase?: string
}

export type TelnetConnectParams = {
  host: string
  port: number
  username?: string
  password?: string
}

type TerminalRef = { terminal_id: string }

type CommandParams = TerminalRef & {
  command: string
  timeout_ms: number
  strip_echo?: boolean
  prompt_pattern?: string
}

type ReaderRef = TerminalRef & { reader_id: string }

export type RpcMethodParams = {
  'session.list': Record<string, never>
  'session.current': { terminal_id?: string }
  'session.get_current_group': { terminal_id?: string }
  'session.add_ssh_to_group': {
    group_id: string
    name: string
    host: string
    port: number
    username?: string
    password?: string
  }
  'session.new_terminal': { ssh?: SshConnectParams; telnet?: TelnetConnectParams }
  'session.create_ssh': SshConnectParams
  'session.create_telnet': TelnetConnectParams
  'pane.split_right_clone': TerminalRef
  'terminal.send': TerminalRef & { data: string }
  'terminal.read': TerminalRef
  'terminal.wait_for': TerminalRef & { pattern: string; timeout_ms: number }
  'terminal.run': CommandParams
  'terminal.sendcmd': CommandParams
  'terminal.run_marked': CommandParams
  'terminal.read_command_output': TerminalRef & { command_id: string }
  'terminal.read_time_range': TerminalRef & { start_ms: number; end_ms: number }
  'terminal.wait_for_login': TerminalRef & { timeout_ms: number }
  'terminal.close': TerminalRef
  'terminal.track_start': TerminalRef
  'terminal.track_read': ReaderRef
  'terminal.track_stop': ReaderRef
  'notify.toast': { message: string; level: ToastLevel }
}

export type RpcMethod = keyof RpcMethodParams

// ──────────────────────────────────────────────────────────────
// Result schemas
// ──────────────────────────────────────────────────────────────

export const SessionInfoResultSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  connected: z.boolean(),
})

export const SessionListResultSchema = z.array(SessionInfoResultSchema)

export const TerminalInfoResultSchema = z.object({
  id: z.string().min(1),
  connected: z.boolean().optional(),
  type: z.string().optional(),
})

export const ScreenResultSchema = z.object({
  text: z.string(),
  cursor_row: z.number().int().nonnegative(),
  cursor_col: z.number().int().nonnegative(),
  rows: z.number().int().nonnegative(),
  cols: z.number().int().nonnegative(),
})

export const ContentResultSchema = z.object({
  content: z.string(),
})

export const OutputResultSchema = z.object({
  output: z.string(),
})

export const MarkedCommandResultSchema = z.object({
  command_id: z.string(),
  output: z.string(),
  exit_code: z.number().int().nullable().optional(),
})

export const TrackStartResultSchema = z.object({
  reader_id: z.string().min(1),
})

export const TrackReadResultSchema = z.object({
  content: z.string(),
  has_more: z.boolean().optional(),
})

export const TrackStopResultSchema = z
  .object({
    success: z.boolean().optional(),
  })
  .nullish()

export const SplitCloneResultSchema = z.object({
  new_terminal_id: z.string().min(1),
})

export const GroupInfoResultSchema = z.object({
  group_id: z.string().nullable().optional(),
  session_id: z.string().nullable().optional(),
})

export const AddSshResultSchema = z.object({
  session_id: z.string().min(1),
})
