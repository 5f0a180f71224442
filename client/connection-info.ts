import path from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'

export type ConnectionEndpoint =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'unix'; path: string }

const TCP_SCHEME = 'tcp://'
const DEFAULT_TMP_DIR = '/tmp'

const PortSchema = z.coerce.number().int().min(1).max(65535)

function parseTcpAddress(address: string, raw: string): ConnectionEndpoint {
  const sep = address.lastIndexOf(':')
  if (sep <= 0) throw new ConfigError(`Invalid socket address "${raw}": expected tcp://host:port`)

  let host = address.slice(0, sep)
  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1)
  const portText = address.slice(sep + 1)
  const port = PortSchema.safeParse(portText)
  if (!host || !portText || !port.success) {
    throw new ConfigError(`Invalid socket address "${raw}": bad port "${portText}"`)
  }
  return { kind: 'tcp', host, port: port.data }
}

export function parseEndpointOverride(value: string | undefined): ConnectionEndpoint | undefined {
  if (!value) return undefined
  if (value.startsWith(TCP_SCHEME)) return parseTcpAddress(value.slice(TCP_SCHEME.length), value)
  return { kind: 'unix', path: value }
}

export function defaultSocketPath(envVars: NodeJS.ProcessEnv = process.env, ppid: number = process.ppid): string {
  const runtimeDir = envVars.XDG_RUNTIME_DIR || envVars.TMPDIR || DEFAULT_TMP_DIR
  return path.join(runtimeDir, `bspterm-${ppid}.sock`)
}

/**
 * Resolves where the host application listens: `BSPTERM_SOCKET` when set (`tcp://host:port`
 * or a socket path), otherwise the socket the host created for our parent process.
 */
export function resolveEndpoint(
  envVars: NodeJS.ProcessEnv = process.env,
  ppid: number = process.ppid,
): ConnectionEndpoint {
  return parseEndpointOverride(envVars.BSPTERM_SOCKET) ?? { kind: 'unix', path: defaultSocketPath(envVars, ppid) }
}

export function formatEndpoint(endpoint: ConnectionEndpoint): string {
  if (endpoint.kind === 'unix') return endpoint.path
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host
  return `${TCP_SCHEME}${host}:${endpoint.port}`
}
