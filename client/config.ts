import fs from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { parseEndpointOverride, resolveEndpoint, type ConnectionEndpoint } from './connection-info.js'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

export type ClientConfig = {
  endpoint: ConnectionEndpoint
  currentTerminalId?: string
}

const ClientConfigFileSchema = z.object({
  socket: z.string().min(1).optional(),
  currentTerminal: z.string().min(1).optional(),
})

type ClientConfigFile = z.infer<typeof ClientConfigFileSchema>

export function configFilePath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.bspterm', 'client.json')
}

function loadConfigFile(file: string): ClientConfigFile {
  if (!fs.existsSync(file)) return {}
  try {
    const parsed = ClientConfigFileSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')))
    if (parsed.success) return parsed.data
    logger.warn({ file, issues: parsed.error.issues }, 'Ignoring invalid client config file')
  } catch (err) {
    logger.warn({ err, file }, 'Ignoring unreadable client config file')
  }
  return {}
}

export type ResolveConfigOptions = {
  env?: NodeJS.ProcessEnv
  ppid?: number
  homeDir?: string
}

/** Environment first, then `~/.bspterm/client.json`, then the per-parent-process socket. */
export function resolveConfig(options: ResolveConfigOptions = {}): ClientConfig {
  const envVars = options.env ?? process.env
  const file = loadConfigFile(configFilePath(options.homeDir))

  const endpoint = parseEndpointOverride(envVars.BSPTERM_SOCKET)
    ?? parseEndpointOverride(file.socket)
    ?? resolveEndpoint({ ...envVars, BSPTERM_SOCKET: undefined }, options.ppid)

  const currentTerminalId = envVars.BSPTERM_CURRENT_TERMINAL || file.currentTerminal
  return currentTerminalId ? { endpoint, currentTerminalId } : { endpoint }
}

const ReconnectedTerminalSchema = z.object({
  terminal_id: z.string(),
  host: z.string().optional(),
  group_id: z.string().optional(),
  group_name: z.string().optional(),
})

export type ReconnectedTerminal = {
  terminalId: string
  host?: string
  groupId?: string
  groupName?: string
}

/**
 * Terminals the host reports as back online, passed to device-online hook scripts through
 * `BSPTERM_RECONNECTED_TERMINALS`.
 */
export function readReconnectedTerminals(envVars: NodeJS.ProcessEnv = process.env): ReconnectedTerminal[] {
  const raw = envVars.BSPTERM_RECONNECTED_TERMINALS
  if (!raw) return []

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError('Invalid JSON in BSPTERM_RECONNECTED_TERMINALS', { cause: err })
  }

  const parsed = z.array(ReconnectedTerminalSchema).safeParse(json)
  if (!parsed.success) {
    throw new ConfigError('BSPTERM_RECONNECTED_TERMINALS must be an array of { terminal_id, host?, group_id?, group_name? }', {
      cause: parsed.error,
    })
  }

  return parsed.data.map((t) => {
    const entry: ReconnectedTerminal = { terminalId: t.terminal_id }
    if (t.host) entry.host = t.host
    if (t.group_id) entry.groupId = t.group_id
    if (t.group_name) entry.groupName = t.group_name
    return entry
  })
}
