// tmux key names understood by `send-keys`; anything else is sent as typed.
const KEYMAP: Record<string, string> = {
  ENTER: '\r',
  'C-C': '\x03',
  'C-D': '\x04',
  ESCAPE: '\x1b',
  TAB: '\t',
  BTAB: '\x1b[Z',
  BSPACE: '\x7f',
  DC: '\x1b[3~',
  HOME: '\x1b[H',
  END: '\x1b[F',
  PPAGE: '\x1b[5~',
  NPAGE: '\x1b[6~',
  UP: '\x1b[A',
  DOWN: '\x1b[B',
  LEFT: '\x1b[D',
  RIGHT: '\x1b[C',
  SPACE: ' ',
}

function translateCtrlLetterChord(token: string): string | undefined {
  const match = /^C-([A-Z])$/.exec(token)
  if (!match) return undefined
  return String.fromCharCode(match[1].charCodeAt(0) - 64)
}

// Meta chords reach the remote shell as ESC followed by the key.
function translateMetaChord(key: string): string | undefined {
  const match = /^M-(.)$/i.exec(key)
  if (!match) return undefined
  return `\x1b${match[1]}`
}

export function translateKey(key: string): string {
  const upper = key.toUpperCase()
  const mapped = KEYMAP[upper]
  if (mapped) return mapped
  return translateCtrlLetterChord(upper) ?? translateMetaChord(key) ?? key
}

export function translateKeys(keys: string[]): string {
  return keys.map(translateKey).join('')
}
