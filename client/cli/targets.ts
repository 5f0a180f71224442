import type { SessionInfo } from '../sessions.js'

type ResolveResult = { terminalId?: string; message?: string }

/**
 * Resolves a `-t` target against the session list: exact id, then unique display name, then
 * list index. Anything else is passed through, since background connections are not listed.
 */
export function resolveTarget(target: string, sessions: SessionInfo[]): ResolveResult {
  const clean = target.trim()
  if (!clean) return { message: 'target not resolved' }

  if (sessions.some((s) => s.id === clean)) return { terminalId: clean }

  const byName = sessions.filter((s) => s.name === clean)
  if (byName.length === 1) return { terminalId: byName[0].id, message: 'session name matched' }
  if (byName.length > 1) {
    return { message: `target is ambiguous: ${byName.map((s) => s.id).join(', ')}` }
  }

  if (/^\d+$/.test(clean)) {
    const session = sessions[Number(clean)]
    if (session) return { terminalId: session.id, message: 'session index used' }
  }

  return { terminalId: clean, message: 'target not listed; using it as a terminal id' }
}
