import { useCallback, useEffect, useState } from 'react'
import { v4 as uuidv4 } from 'uuid'
import { LOG_MESSAGE_EVENT } from '@/lib/schemas/generate'

interface UseProgressLogOptions {
  /** Overrides the generated session id, mainly for tests */
  sessionId?: string
  endpoint?: string
}

interface UseProgressLogReturn {
  sessionId: string
  lines: string[]
  isConnected: boolean
  clear: () => void
}

function readMessage(data: string): string | null {
  try {
    const parsed: unknown = JSON.parse(data)
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message
    }
  } catch (err) {
    console.error('Malformed log_message event:', err)
  }
  return null
}

/**
 * Opens this tab's progress stream. The returned `sessionId` must be sent as
 * `sid` with the generate request so its log lines come back here.
 */
export function useProgressLog(options: UseProgressLogOptions = {}): UseProgressLogReturn {
  const { endpoint = '/events' } = options
  const [sessionId] = useState(() => options.sessionId ?? uuidv4())
  const [lines, setLines] = useState<string[]>([])
  const [isConnected, setIsConnected] = useState(false)

  useEffect(() => {
    const source = new EventSource(`${endpoint}?sid=${encodeURIComponent(sessionId)}`)

    const onLog = (event: MessageEvent<string>) => {
      const message = readMessage(event.data)
      if (message !== null) {
        setLines(prev => [...prev, message])
      }
    }

    source.onopen = () => setIsConnected(true)
    // EventSource reconnects by itself; just reflect the state
    source.onerror = () => setIsConnected(false)
    source.addEventListener(LOG_MESSAGE_EVENT, onLog)

    return () => {
      source.removeEventListener(LOG_MESSAGE_EVENT, onLog)
      source.close()
      setIsConnected(false)
    }
  }, [endpoint, sessionId])

  const clear = useCallback(() => setLines([]), [])

  return { sessionId, lines, isConnected, clear }
}
