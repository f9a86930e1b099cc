export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import type { NextRequest } from 'next/server'
import { formString, handleError, readForm, success } from '@/lib/api/helpers'
import { getRuntime } from '@/lib/jobs/runtime'

/**
 * POST /generate_json?sid=<session-id>
 *
 * Runs the whole job before answering; progress for the job goes out on the
 * session's event stream in the meantime.
 */
export async function POST(request: NextRequest) {
  try {
    const form = await readForm(request)
    const result = await getRuntime().orchestrator.run({
      queries: formString(form, 'queries'),
      total_papers: formString(form, 'total_papers'),
      title: formString(form, 'title'),
      sid: request.nextUrl.searchParams.get('sid') ?? formString(form, 'sid')
    })

    return success({
      json_data: result.content,
      filename: result.filename
    })
  } catch (error) {
    return handleError(error, 'generate_json')
  }
}
