import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import path from 'path'
import { createRequire } from 'module'
import pino, { type DestinationStream, type LevelWithSilent } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

export type Logger = pino.Logger

/** Fields mixed into every record written while the CLI runs one command. */
export type LogContext = {
  command?: string
}

type RotationOptions = {
  size?: `${number}${'B' | 'K' | 'M' | 'G'}`
  maxFiles?: number
}

type LeveledStream = { stream: DestinationStream; level: LevelWithSilent }

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
const DEBUG_FILE_NAME = 'client-debug.jsonl'

const require = createRequire(import.meta.url)
const contextStore = new AsyncLocalStorage<LogContext>()

function levelFrom(raw: string | undefined, fallback: LevelWithSilent): LevelWithSilent {
  return LEVELS.find((candidate) => candidate === raw) ?? fallback
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return contextStore.run({ ...contextStore.getStore(), ...context }, fn)
}

/**
 * The debug file is opt-in: `LOG_DEBUG_PATH` names the file, `BSPTERM_LOG_DIR` a directory
 * for `client-debug.jsonl`. With neither set, logging never touches the disk.
 */
export function resolveDebugLogPath(envVars: NodeJS.ProcessEnv = process.env): string | null {
  const file = envVars.LOG_DEBUG_PATH?.trim()
  if (file) return path.resolve(file)
  const dir = envVars.BSPTERM_LOG_DIR?.trim()
  return dir ? path.join(path.resolve(dir), DEBUG_FILE_NAME) : null
}

export function createDebugFileStream(filePath: string, rotation: RotationOptions = {}): RotatingFileStream {
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), {
    path: dir,
    size: rotation.size ?? '10M',
    maxFiles: rotation.maxFiles ?? 5,
  })
}

function recordOptions(envVars: NodeJS.ProcessEnv) {
  return {
    level: levelFrom(envVars.LOG_LEVEL, 'debug'),
    base: {
      app: 'bspterm-client',
      env: envVars.NODE_ENV || 'development',
      version: envVars.npm_package_version,
      pid: process.pid,
    },
    formatters: {
      level: (label: string, number: number) => ({ level: number, severity: label }),
    },
    // A fresh object per record: pino writes into what mixin() returns.
    mixin: () => ({ ...contextStore.getStore() }),
    timestamp: pino.stdTimeFunctions.isoTime,
  }
}

// stdout belongs to the script, so the console side of the logger is stderr.
function stderrStream(pretty: boolean): DestinationStream {
  if (!pretty) return pino.destination(2)
  const pinoPretty = require('pino-pretty') as typeof import('pino-pretty')
  return pinoPretty({ colorize: true, translateTime: 'SYS:standard', destination: 2 })
}

function openDebugFile(filePath: string, report: (err: unknown, message: string) => void): RotatingFileStream | null {
  let stream: RotatingFileStream
  try {
    stream = createDebugFileStream(filePath)
  } catch (err) {
    report(err, 'Debug log file disabled')
    return null
  }
  let reported = false
  const onProblem = (err: Error) => {
    if (reported) return
    reported = true
    report(err, 'Debug log file stream failed')
  }
  stream.on('error', onProblem)
  stream.on('warning', onProblem)
  return stream
}

/**
 * Records go to stderr at `LOG_CONSOLE_LEVEL` (warn by default) and, when configured, to the
 * rotating debug file at debug. Pass `destination` to capture every record in one stream.
 */
export function createLogger(destination?: DestinationStream, envVars: NodeJS.ProcessEnv = process.env): Logger {
  const options = recordOptions(envVars)
  if (destination) return pino(options, destination)

  const nodeEnv = envVars.NODE_ENV || 'development'
  const console = stderrStream(nodeEnv !== 'production' && nodeEnv !== 'test')
  const streams: LeveledStream[] = [{ stream: console, level: levelFrom(envVars.LOG_CONSOLE_LEVEL, 'warn') }]

  const debugLogPath = resolveDebugLogPath(envVars)
  if (debugLogPath) {
    const consoleOnly = pino(options, console)
    const file = openDebugFile(debugLogPath, (err, message) => consoleOnly.warn({ err, filePath: debugLogPath }, message))
    if (file) streams.push({ stream: file, level: 'debug' })
  }

  return pino(options, pino.multistream(streams))
}

export const logger = createLogger()

export function setLogLevel(nextLevel: LevelWithSilent): void {
  logger.level = nextLevel
}
