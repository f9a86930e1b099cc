import type { Paper } from '@/lib/schemas/paper'

export type { Paper }

export interface PageRequest {
  offset: number
  limit: number
  signal?: AbortSignal
}

export interface PaperBatch {
  papers: Paper[]
  /** Offset of the next page, or `null` once the query has no more results */
  nextOffset: number | null
  /** Upstream's estimate of total matches, when reported */
  total?: number
}

export interface PaperSource {
  /** Matches the adapter's upstream, e.g. 'semantic_scholar' */
  id: string
  /**
   * Fetch one page for a query. Rejects with an `ExternalApiError` subclass
   * (`RateLimitError`, `PaperSourceNotFoundError`, `TransientNetworkError`,
   * `PaperSourceRejectedError`).
   */
  search: (query: string, page: PageRequest) => Promise<PaperBatch>
  /** Largest page the upstream accepts */
  maxPageSize: number
}
