export type ParsedArgs = {
  command?: string
  flags: Record<string, string | boolean>
  args: string[]
}

const SHORT_BOOLEAN_FLAGS = new Set([
  'j', // print json instead of text
  'l', // send-keys --literal
  'w', // split-clone --wait-login
])

const FLAGS_ALLOWING_DASH_PREFIX_VALUES = new Set([
  'terminal',
  't',
  'target',
])

const COMMAND_FLAG_KEYS_ALLOWING_DASH_PREFIX_VALUES: Partial<Record<string, Set<string>>> = {
  // Patterns and prompts are regexes and may legitimately start with a dash.
  'wait-for': new Set(['p', 'pattern']),
  run: new Set(['prompt']),
  sendcmd: new Set(['prompt']),
  'run-marked': new Set(['prompt']),
}

// Everything from the first positional word on is the command line to send, dashes included.
const COMMANDS_TAKING_TRAILING_ARGV = new Set(['run', 'sendcmd', 'run-marked'])

function isNegativeNumericToken(token: string): boolean {
  return /^-\d+(?:\.\d+)?(?:[eE][-+]?\d+)?$/.test(token)
}

function allowsDashPrefixedValue(command: string | undefined, key: string): boolean {
  if (FLAGS_ALLOWING_DASH_PREFIX_VALUES.has(key)) return true
  if (!command) return false
  return COMMAND_FLAG_KEYS_ALLOWING_DASH_PREFIX_VALUES[command]?.has(key) ?? false
}

function canUseAsFlagValue(token: string | undefined, key: string, command: string | undefined): token is string {
  if (!token) return false
  if (token === '--') return false
  return !token.startsWith('-') || isNegativeNumericToken(token) || allowsDashPrefixedValue(command, key)
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const args: string[] = []
  let command: string | undefined
  let i = 0

  while (i < argv.length) {
    const token = argv[i]
    if (!command && !token.startsWith('-')) {
      command = token
      i += 1
      continue
    }

    if (token === '--') {
      args.push(...argv.slice(i + 1))
      break
    }

    if (token.startsWith('--')) {
      const raw = token.slice(2)
      const eqIndex = raw.indexOf('=')
      if (eqIndex >= 0) {
        const key = raw.slice(0, eqIndex)
        const value = raw.slice(eqIndex + 1)
        flags[key] = value
        i += 1
        continue
      }
      const key = raw
      const next = argv[i + 1]
      if (canUseAsFlagValue(next, key, command)) {
        flags[key] = next
        i += 2
        continue
      }
      flags[key] = true
      i += 1
      continue
    }

    if (token.startsWith('-') && token.length > 1) {
      const key = token.slice(1)
      if (SHORT_BOOLEAN_FLAGS.has(key)) {
        flags[key] = true
        i += 1
        continue
      }
      const next = argv[i + 1]
      if (canUseAsFlagValue(next, key, command)) {
        flags[key] = next
        i += 2
        continue
      }
      flags[key] = true
      i += 1
      continue
    }

    if (command && COMMANDS_TAKING_TRAILING_ARGV.has(command)) {
      args.push(...argv.slice(i))
      break
    }
    args.push(token)
    i += 1
  }

  return { command, flags, args }
}

type Flags = ParsedArgs['flags']

export function getFlag(flags: Flags, ...names: string[]): string | boolean | undefined {
  for (const name of names) {
    if (flags[name] !== undefined) return flags[name]
  }
  return undefined
}

export function getStringFlag(flags: Flags, ...names: string[]): string | undefined {
  const value = getFlag(flags, ...names)
  return typeof value === 'string' ? value : undefined
}

export function isTruthy(value: unknown): boolean {
  return value === true || value === 'true' || value === '1' || value === 'yes'
}

export function getNumberFlag(flags: Flags, ...names: string[]): number | undefined {
  const raw = getStringFlag(flags, ...names)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) throw new RangeError(`--${names[names.length - 1]} expects a number, got "${raw}"`)
  return value
}
