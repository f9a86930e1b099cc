'use client'

import { useState, type FormEvent } from 'react'
import { Download, FileJson, Loader2 } from 'lucide-react'
import { ProgressLog } from '@/components/bibliography/ProgressLog'
import { useBibliographyJob } from '@/hooks/useBibliographyJob'
import { useProgressLog } from '@/hooks/useProgressLog'
import { cn } from '@/lib/utils'

const inputClass =
  'w-full rounded-lg border bg-background px-3 py-2 text-sm outline-none focus-visible:ring-2 focus-visible:ring-primary/40'

export default function BibliographyForm() {
  const { sessionId, lines, isConnected, clear } = useProgressLog()
  const { status, result, generate } = useBibliographyJob(sessionId)
  const [queries, setQueries] = useState('')
  const [totalPapers, setTotalPapers] = useState('100')
  const [title, setTitle] = useState('')

  const isRunning = status === 'running'

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    clear()
    await generate({ queries, totalPapers, title })
  }

  return (
    <div className="space-y-6">
      <form onSubmit={handleSubmit} className="space-y-4 rounded-xl border p-6">
        <label className="block space-y-1">
          <span className="text-sm font-medium">Queries</span>
          <textarea
            name="queries"
            required
            rows={3}
            className={inputClass}
            placeholder="visual semantic SLAM, semantic aware dynamic SLAM"
            value={queries}
            onChange={e => setQueries(e.target.value)}
          />
          <span className="text-xs text-muted-foreground">Separate queries with commas.</span>
        </label>

        <div className="grid gap-4 sm:grid-cols-2">
          <label className="block space-y-1">
            <span className="text-sm font-medium">Total papers</span>
            <input
              name="total_papers"
              type="number"
              min={1}
              step={1}
              required
              className={inputClass}
              value={totalPapers}
              onChange={e => setTotalPapers(e.target.value)}
            />
          </label>
          <label className="block space-y-1">
            <span className="text-sm font-medium">Title</span>
            <input
              name="title"
              required
              className={inputClass}
              placeholder="Semantic SLAM"
              value={title}
              onChange={e => setTitle(e.target.value)}
            />
          </label>
        </div>

        <button
          type="submit"
          disabled={isRunning}
          className={cn(
            'inline-flex items-center gap-2 rounded-lg bg-primary px-4 py-2 text-sm font-medium text-primary-foreground',
            isRunning && 'opacity-60'
          )}
        >
          {isRunning ? <Loader2 className="h-4 w-4 animate-spin" /> : <FileJson className="h-4 w-4" />}
          {isRunning ? 'Generating…' : 'Generate JSON'}
        </button>
      </form>

      <ProgressLog lines={lines} isConnected={isConnected} />

      {result && (
        <a
          href={result.downloadUrl}
          download={result.filename}
          className="inline-flex items-center gap-2 rounded-lg border px-4 py-2 text-sm font-medium"
        >
          <Download className="h-4 w-4" />
          Download {result.filename}
        </a>
      )}
    </div>
  )
}
