/**
 * Session-keyed push channels
 *
 * One channel per browser session. Registering a second channel for the same
 * session replaces the first; the earlier channel's unregister call becomes a
 * no-op so a late disconnect can't evict its replacement.
 */

export interface PushChannel {
  send(event: string, data: unknown): void
  close(): void
  readonly closed: boolean
}

export class ChannelRegistry {
  private readonly channels = new Map<string, PushChannel>()

  get size(): number {
    return this.channels.size
  }

  register(sessionId: string, channel: PushChannel): () => void {
    const previous = this.channels.get(sessionId)
    this.channels.set(sessionId, channel)
    if (previous && previous !== channel) {
      previous.close()
    }
    return () => {
      if (this.channels.get(sessionId) === channel) {
        this.channels.delete(sessionId)
      }
    }
  }

  lookup(sessionId: string): PushChannel | undefined {
    const channel = this.channels.get(sessionId)
    if (channel?.closed) {
      this.channels.delete(sessionId)
      return undefined
    }
    return channel
  }

  /**
   * Delivers to the one channel registered for `sessionId`.
   * Returns false when the session has no open channel.
   */
  send(sessionId: string, event: string, data: unknown): boolean {
    const channel = this.lookup(sessionId)
    if (!channel) return false
    channel.send(event, data)
    return true
  }

  clear(): void {
    for (const channel of this.channels.values()) {
      channel.close()
    }
    this.channels.clear()
  }
}
