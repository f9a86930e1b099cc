export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import type { NextRequest } from 'next/server'
import { formString, handleError, readForm } from '@/lib/api/helpers'
import { DeliveryError, DocumentNotFoundError } from '@/lib/errors'
import { getRuntime } from '@/lib/jobs/runtime'
import { contentDisposition, parseDownloadFilename } from '@/lib/utils/filename'

function attachment(content: string, filename: string): Response {
  return new Response(content, {
    status: 200,
    headers: {
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Disposition': contentDisposition(filename),
      'Cache-Control': 'no-store'
    }
  })
}

// GET /download_json?filename=<name>.json
export async function GET(request: NextRequest) {
  try {
    const filename = parseDownloadFilename(request.nextUrl.searchParams.get('filename'))
    const document = getRuntime().store.get(filename)
    if (!document) {
      throw new DocumentNotFoundError(filename)
    }
    return attachment(document.content, filename)
  } catch (error) {
    return handleError(error, 'download_json')
  }
}

// POST /download_json?filename=<name>.json with the JSON text in `jsonval`
export async function POST(request: NextRequest) {
  try {
    const filename = parseDownloadFilename(request.nextUrl.searchParams.get('filename'))
    const form = await readForm(request)
    const content = formString(form, 'jsonval')
    if (!content) {
      throw new DeliveryError('jsonval field is required', 'MISSING_CONTENT')
    }
    try {
      JSON.parse(content)
    } catch {
      throw new DeliveryError('jsonval is not valid JSON', 'INVALID_CONTENT')
    }
    return attachment(content, filename)
  } catch (error) {
    return handleError(error, 'download_json')
  }
}
