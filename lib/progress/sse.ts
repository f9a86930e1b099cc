import type { PushChannel } from '@/lib/progress/channel-registry'

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const

export const HEARTBEAT_MS = 15_000

export function formatSseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`
}

export interface SseChannel extends PushChannel {
  stream: ReadableStream<Uint8Array>
}

/**
 * A push channel backed by a `text/event-stream` body. Writes after close or
 * after the client went away are dropped.
 */
export function createSseChannel(options: { heartbeatMs?: number; onClose?: () => void } = {}): SseChannel {
  const { heartbeatMs = HEARTBEAT_MS, onClose } = options
  const encoder = new TextEncoder()
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null
  let heartbeat: ReturnType<typeof setInterval> | undefined
  let closed = false

  const write = (chunk: string) => {
    if (closed || !controller) return
    controller.enqueue(encoder.encode(chunk))
  }

  const shutdown = () => {
    if (closed) return
    closed = true
    if (heartbeat) clearInterval(heartbeat)
    onClose?.()
  }

  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c
      // Opens the stream for proxies that buffer until the first byte
      write(': connected\n\n')
      if (heartbeatMs > 0) {
        heartbeat = setInterval(() => write(': ping\n\n'), heartbeatMs)
      }
    },
    cancel() {
      shutdown()
    }
  })

  return {
    stream,
    get closed() {
      return closed
    },
    send(event, data) {
      write(formatSseEvent(event, data))
    },
    close() {
      if (closed) return
      const c = controller
      shutdown()
      c?.close()
    }
  }
}
