import { setTimeout as sleep } from 'timers/promises'
import { withTracking, type Trackable } from '../../tracking-session.js'

export type FollowOptions = {
  intervalMs: number
  durationMs: number
  write: (chunk: string) => void
}

/** Streams a terminal's new output for `durationMs`; the tracking session is always released. */
export async function runCommand(opts: FollowOptions, terminal: Trackable): Promise<{ bytes: number }> {
  return withTracking(terminal, async (session) => {
    const deadline = Date.now() + opts.durationMs
    let bytes = 0
    for (;;) {
      const chunk = await session.drain()
      if (chunk) {
        bytes += Buffer.byteLength(chunk, 'utf8')
        opts.write(chunk)
      }
      const remaining = deadline - Date.now()
      if (remaining <= 0) return { bytes }
      await sleep(Math.min(opts.intervalMs, remaining))
    }
  })
}
