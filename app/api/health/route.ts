export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import { NextResponse } from 'next/server'
import { getRuntime } from '@/lib/jobs/runtime'

export async function GET() {
  const { registry, store } = getRuntime()
  return NextResponse.json({
    status: 'ok',
    channels: registry.size,
    documents: store.size,
    timestamp: new Date().toISOString()
  })
}
