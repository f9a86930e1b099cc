import type { PaperSource } from '@/contracts/paper-source'
import { JobFailureError, ValidationError, errorMessage } from '@/lib/errors'
import { buildBibliographyDocument, serializeDocument } from '@/lib/jobs/document'
import type { DocumentStore } from '@/lib/jobs/document-store'
import type { ProgressNotifier } from '@/lib/progress/notifier'
import { GenerateRequestSchema, type GenerateRequest, type RawGenerateRequest } from '@/lib/schemas/generate'
import { aggregatePapers, type AggregationResult, type QueryFailure } from '@/lib/search/aggregator'
import { titleToFilename } from '@/lib/utils/filename'
import { createTimer, logJobMetrics } from '@/lib/utils/logger'
import type { RetryOptions } from '@/lib/utils/retry'

export interface Job {
  sessionId?: string
  queries: string[]
  totalPapers: number
  title: string
  filename: string
  logLines: string[]
  startedAt: number
}

export interface GenerateResult {
  filename: string
  content: string
  paperCount: number
  failures: QueryFailure[]
}

export interface JobSettings {
  pageSize: number
  pageDelayMs: number
  retry: Omit<RetryOptions, 'onRetry' | 'shouldRetry'>
}

export interface JobOrchestratorDeps {
  source: PaperSource
  notifier: ProgressNotifier
  store: DocumentStore
  settings: JobSettings
}

export interface ValidatedRequest extends GenerateRequest {
  filename: string
}

/**
 * Validates the generate form. Throws `ValidationError` before any job state
 * exists.
 */
export function parseGenerateRequest(raw: RawGenerateRequest): ValidatedRequest {
  const result = GenerateRequestSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.errors[0]
    const message = result.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join(', ')
    throw new ValidationError(message, 'INVALID_REQUEST', issue?.path.join('.'))
  }

  const filename = titleToFilename(result.data.title)
  if (!filename) {
    throw new ValidationError('title: must contain at least one letter or digit', 'INVALID_REQUEST', 'title')
  }
  return { ...result.data, filename }
}

export class JobOrchestrator {
  constructor(private readonly deps: JobOrchestratorDeps) {}

  async run(raw: RawGenerateRequest): Promise<GenerateResult> {
    const request = parseGenerateRequest(raw)
    const job: Job = {
      sessionId: request.sid,
      queries: request.queries,
      totalPapers: request.total_papers,
      title: request.title,
      filename: request.filename,
      logLines: [],
      startedAt: Date.now()
    }
    return this.execute(job)
  }

  private async execute(job: Job): Promise<GenerateResult> {
    const { source, notifier, store, settings } = this.deps
    const report = notifier.reporter(job.sessionId, line => job.logLines.push(line))
    const timer = createTimer()

    report(`[${job.title}] Starting: ${job.queries.length} queries, up to ${job.totalPapers} papers`)

    let aggregation: AggregationResult
    try {
      aggregation = await aggregatePapers(job.queries, job.totalPapers, {
        source,
        label: job.title,
        report,
        pageSize: settings.pageSize,
        pageDelayMs: settings.pageDelayMs,
        retry: settings.retry
      })
    } catch (err) {
      report(`[${job.title}] Failed to generate JSON: ${errorMessage(err)}`)
      logJobMetrics({
        session_id: job.sessionId,
        title: job.title,
        queries: job.queries.length,
        requested: job.totalPapers,
        papers: 0,
        failed_queries: err instanceof JobFailureError ? err.failedQueries.length : job.queries.length,
        duration_ms: timer.end()
      })
      throw err
    }

    const document = buildBibliographyDocument(job.title, aggregation.papers, aggregation.queryHits)
    const content = serializeDocument(document)
    store.put({
      filename: job.filename,
      content,
      paperCount: document.papers.length,
      createdAt: Date.now()
    })

    report(`[${job.title}] JSON ready: ${job.filename} (${document.papers.length} papers, ${aggregation.requestCount} requests)`)
    logJobMetrics({
      session_id: job.sessionId,
      title: job.title,
      queries: job.queries.length,
      requested: job.totalPapers,
      papers: document.papers.length,
      failed_queries: aggregation.failures.length,
      duration_ms: timer.end()
    })

    return {
      filename: job.filename,
      content,
      paperCount: document.papers.length,
      failures: aggregation.failures
    }
  }
}
