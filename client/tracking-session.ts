import { TrackReadResultSchema, TrackStopResultSchema } from '../shared/rpc-protocol.js'
import { TrackingStoppedError } from './errors.js'
import { logger } from './logger.js'
import { parseResult } from './results.js'
import type { RpcClient } from './rpc-client.js'

export type TrackedChunk = {
  content: string
  hasMore: boolean
}

/**
 * Host-side cursor over one terminal's output. Every read returns only what was appended
 * since the previous read on the same reader.
 *
 * States: active → stopped. Once stopped, reads fail locally without touching the socket.
 * A release that fails leaves the session active so `stop()` can be retried.
 */
export class TrackingSession {
  private isStopped = false
  private stopping: Promise<void> | null = null

  constructor(
    private readonly client: RpcClient,
    readonly terminalId: string,
    readonly readerId: string,
  ) {}

  get stopped(): boolean {
    return this.isStopped
  }

  async readNew(): Promise<string> {
    const chunk = await this.readNewWithStatus()
    return chunk.content
  }

  async readNewWithStatus(): Promise<TrackedChunk> {
    if (this.isStopped) throw new TrackingStoppedError(this.readerId)
    const result = parseResult(
      TrackReadResultSchema,
      await this.client.call('terminal.track_read', { terminal_id: this.terminalId, reader_id: this.readerId }),
      'terminal.track_read',
    )
    return { content: result.content, hasMore: result.has_more ?? false }
  }

  /** Reads until the host reports the cursor caught up. */
  async drain(): Promise<string> {
    let content = ''
    for (;;) {
      const chunk = await this.readNewWithStatus()
      content += chunk.content
      if (!chunk.hasMore) return content
    }
  }

  stop(): Promise<void> {
    if (this.isStopped) return Promise.resolve()
    if (!this.stopping) {
      this.stopping = this.release().finally(() => {
        this.stopping = null
      })
    }
    return this.stopping
  }

  private async release(): Promise<void> {
    const result = parseResult(
      TrackStopResultSchema,
      await this.client.call('terminal.track_stop', { terminal_id: this.terminalId, reader_id: this.readerId }),
      'terminal.track_stop',
    )
    if (result?.success === false) {
      logger.debug({ terminalId: this.terminalId, readerId: this.readerId }, 'Reader already released by host')
    }
    this.isStopped = true
  }
}

export type Trackable = {
  track(): Promise<TrackingSession>
}

/**
 * Scoped tracking: `fn` receives an active session, which is stopped exactly once when `fn`
 * settles. If `fn` throws, its error is rethrown even when the release fails as well.
 */
export async function withTracking<T>(target: Trackable, fn: (session: TrackingSession) => Promise<T>): Promise<T> {
  const session = await target.track()
  let result: T
  try {
    result = await fn(session)
  } catch (err) {
    await session.stop().catch((stopErr: unknown) => {
      logger.warn({ err: stopErr, terminalId: session.terminalId, readerId: session.readerId }, 'Failed to stop tracking session')
    })
    throw err
  }
  await session.stop()
  return result
}
