import type { PageRequest, PaperBatch, PaperSource } from '@/contracts/paper-source'
import {
  PaperSourceNotFoundError,
  PaperSourceRejectedError,
  RateLimitError,
  TransientNetworkError,
  isExternalApiError
} from '@/lib/errors'
import { PaperSchema, PaperSearchResponseSchema, type Paper } from '@/lib/schemas/paper'
import { debug } from '@/lib/utils/logger'

// Paper plus one hop of references and citations, enough to draw the graph
export const SEARCH_FIELDS = [
  'title', 'url', 'paperId', 'citationCount', 'publicationDate', 'authors',
  'references.title', 'references.url', 'references.paperId',
  'references.citationCount', 'references.publicationDate', 'references.authors',
  'citations.title', 'citations.url', 'citations.paperId',
  'citations.citationCount', 'citations.publicationDate', 'citations.authors'
].join(',')

export const MAX_PAGE_SIZE = 100
// Relevance search only pages through the first 1000 matches
export const SEARCH_WINDOW = 1_000

export interface SemanticScholarOptions {
  apiKey: string
  baseUrl: string
  timeoutMs: number
  fields?: string
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined
  const seconds = Number(header)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1_000 : undefined
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 200)
  } catch {
    return response.statusText
  }
}

// HTTP helper with timeout, mapping failures to the paper-source error taxonomy
async function fetchJSON(url: string, init: RequestInit & { timeoutMs: number }): Promise<unknown> {
  const { timeoutMs, signal, ...rest } = init
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    let response: Response
    try {
      response = await fetch(url, { ...rest, signal: controller.signal })
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error ? err.message : String(err)
      throw new TransientNetworkError(`Request failed: ${reason}`)
    }

    if (response.status === 429) {
      throw new RateLimitError(
        `Error 429: ${await readBody(response)}`,
        parseRetryAfter(response.headers.get('retry-after'))
      )
    }
    if (response.status === 404) {
      throw new PaperSourceNotFoundError(`Error 404: ${await readBody(response)}`)
    }
    if (response.status >= 500) {
      throw new TransientNetworkError(`Error ${response.status}: ${await readBody(response)}`, response.status)
    }
    if (!response.ok) {
      throw new PaperSourceRejectedError(`Error ${response.status}: ${await readBody(response)}`, response.status)
    }

    try {
      return await response.json()
    } catch {
      throw new PaperSourceRejectedError('Response body is not valid JSON', response.status)
    }
  } catch (err) {
    if (isExternalApiError(err)) throw err
    throw new TransientNetworkError(err instanceof Error ? err.message : String(err))
  } finally {
    clearTimeout(timeoutId)
    signal?.removeEventListener('abort', onAbort)
  }
}

export function buildSearchUrl(baseUrl: string, query: string, offset: number, limit: number, fields: string = SEARCH_FIELDS): string {
  const params = new URLSearchParams({
    query,
    fields,
    limit: String(limit),
    offset: String(offset)
  })
  return `${baseUrl.replace(/\/+$/, '')}/paper/search?${params.toString()}`
}

export function createSemanticScholarSource(options: SemanticScholarOptions): PaperSource {
  const fields = options.fields ?? SEARCH_FIELDS

  async function search(query: string, page: PageRequest): Promise<PaperBatch> {
    const offset = Math.max(0, Math.floor(page.offset))
    if (offset >= SEARCH_WINDOW) {
      return { papers: [], nextOffset: null }
    }
    const limit = Math.min(Math.max(1, Math.floor(page.limit)), MAX_PAGE_SIZE, SEARCH_WINDOW - offset)

    const body = await fetchJSON(buildSearchUrl(options.baseUrl, query, offset, limit, fields), {
      timeoutMs: options.timeoutMs,
      signal: page.signal,
      headers: { 'x-api-key': options.apiKey }
    })

    const envelope = PaperSearchResponseSchema.safeParse(body)
    if (!envelope.success) {
      throw new PaperSourceRejectedError(`Unexpected search response: ${envelope.error.issues[0]?.message ?? 'invalid shape'}`)
    }

    const papers: Paper[] = []
    for (const record of envelope.data.data) {
      const parsed = PaperSchema.safeParse(record)
      if (parsed.success) {
        papers.push(parsed.data)
      } else {
        debug({ query, offset }, 'Skipping search record without a paperId')
      }
    }

    const { next, total } = envelope.data
    const nextOffset = envelope.data.data.length > 0 && next !== undefined && next < SEARCH_WINDOW ? next : null
    return { papers, nextOffset, total }
  }

  return {
    id: 'semantic_scholar',
    maxPageSize: MAX_PAGE_SIZE,
    search
  }
}
