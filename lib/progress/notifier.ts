import type { ChannelRegistry } from '@/lib/progress/channel-registry'
import { LOG_MESSAGE_EVENT } from '@/lib/schemas/generate'
import { debug, info, warn } from '@/lib/utils/logger'

export type ProgressReporter = (message: string) => void

export interface LogMessagePayload {
  message: string
}

/**
 * Routes progress lines to the push channel of the session that started the
 * job. Delivery is fire-and-forget: a missing or broken channel is logged and
 * the job carries on.
 */
export class ProgressNotifier {
  constructor(private readonly registry: ChannelRegistry) {}

  /**
   * @param sink - receives every line as well, e.g. the job's log buffer
   */
  reporter(sessionId: string | undefined, sink?: (message: string) => void): ProgressReporter {
    return (message: string) => {
      info({ type: 'progress', session_id: sessionId }, message)
      sink?.(message)
      if (sessionId) this.deliver(sessionId, message)
    }
  }

  deliver(sessionId: string, message: string): boolean {
    const payload: LogMessagePayload = { message }
    try {
      const delivered = this.registry.send(sessionId, LOG_MESSAGE_EVENT, payload)
      if (!delivered) {
        debug({ session_id: sessionId }, 'No open channel for session, progress line not pushed')
      }
      return delivered
    } catch (err) {
      warn({ session_id: sessionId, err }, 'Failed to push progress line')
      return false
    }
  }
}
