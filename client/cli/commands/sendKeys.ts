import { translateKeys } from '../keys.js'
import type { Terminal } from '../../terminal.js'

export async function runCommand(opts: { keys: string[]; literal?: boolean }, terminal: Pick<Terminal, 'send'>) {
  const data = opts.literal ? opts.keys.join(' ') : translateKeys(opts.keys)
  await terminal.send(data)
  return { status: 'ok', bytes: Buffer.byteLength(data, 'utf8') }
}
