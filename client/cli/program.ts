import { ToastLevelSchema } from '../../shared/rpc-protocol.js'
import { readReconnectedTerminals } from '../config.js'
import type { BsptermClient } from '../index.js'
import { withLogContext } from '../logger.js'
import type { Terminal } from '../terminal.js'
import { getFlag, getNumberFlag, getStringFlag, isTruthy, parseArgs, type ParsedArgs } from './args.js'
import { runCommand as followCommand } from './commands/follow.js'
import { runCommand as sendKeysCommand } from './commands/sendKeys.js'
import { writeError, writeJson, writeText } from './output.js'
import { resolveTarget } from './targets.js'

type Flags = ParsedArgs['flags']

const aliases: Record<string, string> = {
  ls: 'list-sessions',
  'list-panes': 'list-sessions',
  'capture-pane': 'capture',
  'kill-pane': 'close',
  'display-message': 'toast',
  'split-window': 'split-clone',
}

const DEFAULT_FOLLOW_INTERVAL_MS = 500
const DEFAULT_FOLLOW_DURATION_MS = 10_000

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function requireFlag(flags: Flags, ...names: string[]): string {
  const value = getStringFlag(flags, ...names)
  if (value === undefined) throw new UsageError(`--${names[names.length - 1]} is required`)
  return value
}

function requireText(args: string[], what: string): string {
  const text = args.join(' ')
  if (!text) throw new UsageError(`${what} required`)
  return text
}

function wantsJson(flags: Flags): boolean {
  return isTruthy(getFlag(flags, 'j', 'json'))
}

async function resolveTerminal(client: BsptermClient, flags: Flags): Promise<Terminal> {
  const target = getStringFlag(flags, 't', 'target', 'terminal')
  if (!target) return client.currentTerminal()

  const { terminalId, message } = resolveTarget(target, await client.listSessions())
  if (!terminalId) throw new UsageError(message ?? 'target not resolved')
  if (message) writeError(message)
  return client.terminal(terminalId)
}

function commandOptions(flags: Flags) {
  const options: { timeoutMs?: number; promptPattern?: string } = {}
  const timeoutMs = getNumberFlag(flags, 'T', 'timeout')
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs
  const promptPattern = getStringFlag(flags, 'prompt')
  if (promptPattern) options.promptPattern = promptPattern
  return options
}

function connectOptions(flags: Flags) {
  const options: { host: string; port?: number; username?: string; password?: string } = {
    host: requireFlag(flags, 'host'),
  }
  const port = getNumberFlag(flags, 'port')
  if (port !== undefined) options.port = port
  const username = getStringFlag(flags, 'u', 'user')
  if (username) options.username = username
  const password = getStringFlag(flags, 'password')
  if (password) options.password = password
  return options
}

function describeTerminal(terminal: Terminal): string {
  return `${terminal.id}\t${terminal.type}\t${terminal.connected ? 'connected' : 'disconnected'}`
}

async function dispatch(command: string, flags: Flags, args: string[], client: BsptermClient): Promise<void> {
  switch (command) {
    case 'list-sessions': {
      const sessions = await client.listSessions()
      if (wantsJson(flags)) {
        writeJson(sessions)
        return
      }
      const lines = sessions.map((s) => `${s.id}\t${s.name}\t${s.type}\t${s.connected ? 'connected' : 'disconnected'}`)
      if (lines.length) writeText(lines.join('\n'))
      return
    }
    case 'current': {
      const terminal = await resolveTerminal(client, flags)
      if (wantsJson(flags)) {
        writeJson({ id: terminal.id, type: terminal.type, connected: terminal.connected })
        return
      }
      writeText(describeTerminal(terminal))
      return
    }
    case 'send-keys': {
      const terminal = await resolveTerminal(client, flags)
      const literal = isTruthy(getFlag(flags, 'l', 'literal'))
      if (!args.length) throw new UsageError('keys required')
      const result = await sendKeysCommand({ keys: args, literal }, terminal)
      if (wantsJson(flags)) writeJson(result)
      return
    }
    case 'capture': {
      const terminal = await resolveTerminal(client, flags)
      const screen = await terminal.read()
      if (wantsJson(flags)) {
        writeJson(screen)
        return
      }
      writeText(screen.text)
      return
    }
    case 'wait-for': {
      const pattern = requireFlag(flags, 'p', 'pattern')
      const terminal = await resolveTerminal(client, flags)
      writeText(await terminal.waitFor(pattern, commandOptions(flags)))
      return
    }
    case 'run':
    case 'sendcmd': {
      const commandLine = requireText(args, 'command')
      const terminal = await resolveTerminal(client, flags)
      const output = command === 'run'
        ? await terminal.run(commandLine, commandOptions(flags))
        : await terminal.sendcmd(commandLine, commandOptions(flags))
      writeText(output)
      return
    }
    case 'run-marked': {
      const commandLine = requireText(args, 'command')
      const terminal = await resolveTerminal(client, flags)
      const result = await terminal.runMarked(commandLine, commandOptions(flags))
      if (wantsJson(flags)) {
        writeJson(result)
        return
      }
      writeText(result.output)
      if (result.exitCode !== undefined) writeError(`exit code: ${result.exitCode}`)
      return
    }
    case 'read-range': {
      const terminal = await resolveTerminal(client, flags)
      const startMs = getNumberFlag(flags, 'start')
      const endMs = getNumberFlag(flags, 'end')
      if (startMs === undefined || endMs === undefined) throw new UsageError('--start and --end are required')
      writeText(await terminal.readTimeRange(startMs, endMs))
      return
    }
    case 'follow': {
      const terminal = await resolveTerminal(client, flags)
      await followCommand(
        {
          intervalMs: getNumberFlag(flags, 'interval') ?? DEFAULT_FOLLOW_INTERVAL_MS,
          durationMs: getNumberFlag(flags, 'duration') ?? DEFAULT_FOLLOW_DURATION_MS,
          write: (chunk) => process.stdout.write(chunk),
        },
        terminal,
      )
      return
    }
    case 'wait-login': {
      const terminal = await resolveTerminal(client, flags)
      await terminal.waitForLogin(commandOptions(flags))
      return
    }
    case 'split-clone': {
      const terminalId = getStringFlag(flags, 't', 'target', 'terminal')
        ? (await resolveTerminal(client, flags)).id
        : undefined
      const clone = await client.splitRightClone({
        terminalId,
        waitForLogin: isTruthy(getFlag(flags, 'w', 'wait-login')),
        loginTimeoutMs: getNumberFlag(flags, 'T', 'timeout'),
      })
      writeText(clone.id)
      return
    }
    case 'group': {
      const terminal = await resolveTerminal(client, flags)
      const group = await terminal.currentGroup()
      if (wantsJson(flags)) {
        writeJson(group)
        return
      }
      writeText(`${group.groupId ?? ''}\t${group.sessionId ?? ''}`)
      return
    }
    case 'add-ssh': {
      const sessionId = await client.addSshToGroup({
        groupId: requireFlag(flags, 'group'),
        name: requireFlag(flags, 'name'),
        ...connectOptions(flags),
      })
      writeText(sessionId)
      return
    }
    case 'ssh':
    case 'telnet': {
      const terminal = command === 'ssh'
        ? await client.connectSsh(connectOptions(flags))
        : await client.connectTelnet(connectOptions(flags))
      writeText(terminal.id)
      return
    }
    case 'close': {
      if (!getStringFlag(flags, 't', 'target', 'terminal')) throw new UsageError('-t is required')
      const terminal = await resolveTerminal(client, flags)
      await terminal.close()
      return
    }
    case 'toast': {
      const level = ToastLevelSchema.safeParse(getStringFlag(flags, 'level') ?? 'info')
      if (!level.success) throw new UsageError(`--level must be one of ${ToastLevelSchema.options.join(', ')}`)
      await client.toast(requireText(args, 'message'), level.data)
      return
    }
    case 'reconnected': {
      const terminals = readReconnectedTerminals()
      if (wantsJson(flags)) {
        writeJson(terminals)
        return
      }
      if (terminals.length) {
        writeText(terminals.map((t) => `${t.terminalId}\t${t.host ?? ''}\t${t.groupName ?? ''}`).join('\n'))
      }
      return
    }
    default:
      throw new UsageError(`unknown command: ${command}`)
  }
}

/** Runs one CLI invocation and resolves with its exit code. The client is closed afterwards. */
export async function runCli(argv: string[], createClient: () => BsptermClient): Promise<number> {
  const parsed = parseArgs(argv)
  if (!parsed.command) {
    writeError('command required')
    return 1
  }

  const command = aliases[parsed.command] ?? parsed.command
  const client = createClient()
  try {
    await withLogContext({ command }, () => dispatch(command, parsed.flags, parsed.args, client))
    return 0
  } catch (err) {
    writeError(err)
    return 1
  } finally {
    client.close()
  }
}
