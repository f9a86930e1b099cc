import { useCallback, useRef, useState } from 'react'
import { toast } from 'sonner'
import { GenerateResponseSchema } from '@/lib/schemas/generate'

export type JobStatus = 'idle' | 'running' | 'done' | 'error'

export interface BibliographyFormValues {
  queries: string
  totalPapers: number | string
  title: string
}

export interface GeneratedBibliography {
  filename: string
  jsonData: string
  downloadUrl: string
}

interface UseBibliographyJobReturn {
  status: JobStatus
  result: GeneratedBibliography | null
  error: string | null
  generate: (values: BibliographyFormValues) => Promise<void>
}

export function downloadUrlFor(filename: string): string {
  return `/download_json?filename=${encodeURIComponent(filename)}`
}

export function useBibliographyJob(sessionId: string): UseBibliographyJobReturn {
  const [status, setStatus] = useState<JobStatus>('idle')
  const [result, setResult] = useState<GeneratedBibliography | null>(null)
  const [error, setError] = useState<string | null>(null)
  const inFlight = useRef(0)

  const generate = useCallback(async (values: BibliographyFormValues) => {
    const ticket = ++inFlight.current
    setStatus('running')
    setResult(null)
    setError(null)

    const body = new FormData()
    body.append('queries', values.queries)
    body.append('total_papers', String(values.totalPapers))
    body.append('title', values.title)

    try {
      const response = await fetch(`/generate_json?sid=${encodeURIComponent(sessionId)}`, {
        method: 'POST',
        body
      })
      const payload = GenerateResponseSchema.safeParse(await response.json().catch(() => null))
      if (!payload.success) {
        throw new Error(`Unexpected response (HTTP ${response.status})`)
      }
      if ('error' in payload.data) {
        throw new Error(payload.data.error)
      }
      if (ticket !== inFlight.current) return

      setResult({
        filename: payload.data.filename,
        jsonData: payload.data.json_data,
        downloadUrl: downloadUrlFor(payload.data.filename)
      })
      setStatus('done')
    } catch (err) {
      if (ticket !== inFlight.current) return
      const message = err instanceof Error ? err.message : 'Error generating JSON'
      setError(message)
      setStatus('error')
      toast.error('Error generating JSON', { description: message })
    }
  }, [sessionId])

  return { status, result, error, generate }
}
