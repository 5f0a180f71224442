import { isBsptermError } from '../errors.js'

export function writeText(text: string) {
  if (text.endsWith('\n')) {
    process.stdout.write(text)
    return
  }
  process.stdout.write(`${text}\n`)
}

export function writeJson(data: unknown, pretty = true) {
  const payload = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data)
  writeText(payload)
}

export function formatError(err: unknown): string {
  if (isBsptermError(err) && 'code' in err && typeof err.code === 'number') {
    return `${err.name} [${err.code}]: ${err.message}`
  }
  if (err instanceof Error) return err.message
  return String(err)
}

export function writeError(err: unknown) {
  process.stderr.write(`${formatError(err)}\n`)
}
