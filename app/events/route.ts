export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import type { NextRequest } from 'next/server'
import { badRequest } from '@/lib/api/helpers'
import { getRuntime } from '@/lib/jobs/runtime'
import { SSE_HEADERS, createSseChannel } from '@/lib/progress/sse'
import { SessionIdSchema } from '@/lib/schemas/generate'
import { debug } from '@/lib/utils/logger'

/**
 * GET /events?sid=<session-id>
 *
 * The browser opens this once per tab; `log_message` events for jobs started
 * with the same sid arrive here.
 */
export async function GET(request: NextRequest) {
  const parsed = SessionIdSchema.safeParse(request.nextUrl.searchParams.get('sid'))
  if (!parsed.success) {
    return badRequest('sid must be 1-128 letters, digits, _ or -')
  }
  const sessionId = parsed.data
  const { registry } = getRuntime()

  let unregister = () => {}
  const channel = createSseChannel({
    onClose: () => {
      unregister()
      debug({ session_id: sessionId }, 'Progress channel closed')
    }
  })
  unregister = registry.register(sessionId, channel)
  request.signal.addEventListener('abort', () => channel.close(), { once: true })
  debug({ session_id: sessionId, channels: registry.size }, 'Progress channel opened')

  return new Response(channel.stream, { status: 200, headers: SSE_HEADERS })
}
