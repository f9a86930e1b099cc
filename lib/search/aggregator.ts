/**
 * Multi-query paper aggregation
 *
 * Queries run one after another in the order given; each is paged from
 * offset 0 until the result set is full, the source reports no more results,
 * or the query fails after retries. A failed query is reported and skipped.
 */

import type { PaperSource } from '@/contracts/paper-source'
import { JobFailureError, errorMessage } from '@/lib/errors'
import type { Paper } from '@/lib/schemas/paper'
import type { ProgressReporter } from '@/lib/progress/notifier'
import { ResultSet } from '@/lib/search/result-set'
import { logSearchMetrics } from '@/lib/utils/logger'
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, sleep, type RetryOptions } from '@/lib/utils/retry'

export interface AggregateOptions {
  source: PaperSource
  /** Prefix for progress lines, normally the bibliography title */
  label: string
  report?: ProgressReporter
  pageSize?: number
  pageDelayMs?: number
  retry?: Omit<RetryOptions, 'onRetry' | 'shouldRetry'>
}

export interface QueryFailure {
  query: string
  error: string
}

export interface AggregationResult {
  papers: Paper[]
  /** Ids each query returned that ended up in `papers` */
  queryHits: Map<string, string[]>
  failures: QueryFailure[]
  requestCount: number
}

const noop: ProgressReporter = () => {}

export async function aggregatePapers(
  queries: readonly string[],
  totalPapers: number,
  options: AggregateOptions
): Promise<AggregationResult> {
  const {
    source,
    label,
    report = noop,
    pageSize = source.maxPageSize,
    pageDelayMs = 0,
    retry = DEFAULT_RETRY_OPTIONS
  } = options

  const results = new ResultSet(totalPapers)
  const queryHits = new Map<string, string[]>()
  const failures: QueryFailure[] = []
  let requestCount = 0

  for (const [index, query] of queries.entries()) {
    if (results.isFull) {
      report(`[${label}] Requested total reached, skipping query (${index + 1}/${queries.length}): '${query}'`)
      continue
    }

    report(`[${label}] Processing query (${index + 1}/${queries.length}): '${query}'`)

    const hits = queryHits.get(query) ?? []
    queryHits.set(query, hits)
    const startedAt = Date.now()
    let offset: number | null = 0
    let requests = 0
    let retries = 0
    let fetched = 0
    let added = 0
    let failure: string | undefined

    while (offset !== null && !results.isFull) {
      if (requests > 0) await sleep(pageDelayMs)

      const pageOffset: number = offset
      try {
        const batch = await retryWithBackoff(
          () => {
            requests++
            requestCount++
            return source.search(query, { offset: pageOffset, limit: pageSize })
          },
          {
            ...retry,
            onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
              retries++
              report(`[${label}] '${query}': attempt ${attempt}/${maxAttempts} failed (${errorMessage(error)}), retrying in ${delayMs}ms`)
            }
          }
        )

        for (const paper of batch.papers) {
          const outcome = results.add(paper)
          if (outcome === 'full') break
          if (outcome === 'added') added++
          if (!hits.includes(paper.paperId)) hits.push(paper.paperId)
        }
        fetched += batch.papers.length
        report(`[${label}] '${query}': fetched ${batch.papers.length} papers (${fetched} for this query). Total so far: ${results.size}/${totalPapers}. Requests: ${requests}`)

        offset = batch.papers.length > 0 ? batch.nextOffset : null
      } catch (error) {
        failure = errorMessage(error)
        failures.push({ query, error: failure })
        report(`[${label}] Query '${query}' failed after retries: ${failure}. Continuing with remaining queries.`)
        break
      }
    }

    if (!failure) {
      report(`[${label}] '${query}': done after ${requests} requests`)
    }

    logSearchMetrics({
      query,
      duration_ms: Date.now() - startedAt,
      requests,
      results_count: fetched,
      added_count: added,
      retry_count: retries,
      failed: failure !== undefined,
      error: failure
    })
  }

  report(`[${label}] Total unique papers after removing duplicates: ${results.size}`)

  if (results.size === 0) {
    const failed = failures.map(f => f.query)
    const message = failed.length > 0
      ? `No papers could be fetched; failed queries: ${failed.join(', ')}`
      : 'No papers found for the given queries'
    throw new JobFailureError(message, failed)
  }

  return {
    papers: results.toArray(),
    queryHits,
    failures,
    requestCount
  }
}
