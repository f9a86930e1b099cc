'use client'

import { useEffect, useRef } from 'react'
import { Terminal } from 'lucide-react'
import { cn } from '@/lib/utils'

interface ProgressLogProps {
  lines: string[]
  isConnected: boolean
  className?: string
}

export function ProgressLog({ lines, isConnected, className }: ProgressLogProps) {
  const bottomRef = useRef<HTMLDivElement>(null)

  // Keep the newest line in view
  useEffect(() => {
    bottomRef.current?.scrollIntoView({ block: 'end' })
  }, [lines.length])

  if (lines.length === 0) return null

  return (
    <section className={cn('rounded-xl border bg-muted/40', className)} aria-live="polite">
      <header className="flex items-center justify-between border-b px-4 py-2 text-sm">
        <span className="flex items-center gap-2 font-medium">
          <Terminal className="h-4 w-4" />
          Progress
        </span>
        <span className={cn('text-xs', isConnected ? 'text-emerald-600' : 'text-muted-foreground')}>
          {isConnected ? 'live' : 'reconnecting…'}
        </span>
      </header>
      <div className="max-h-80 overflow-y-auto px-4 py-3 font-mono text-xs leading-relaxed">
        {lines.map((line, index) => (
          <div key={index}>{line}</div>
        ))}
        <div ref={bottomRef} />
      </div>
    </section>
  )
}
