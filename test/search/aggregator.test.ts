import { describe, expect, test } from 'vitest'
import { aggregatePapers } from '@/lib/search/aggregator'
import { JobFailureError, PaperSourceRejectedError, RateLimitError, TransientNetworkError } from '@/lib/errors'
import { FAST_RETRY, makePaper, scriptedSource } from '../fixtures/papers'

function collector() {
  const lines: string[] = []
  return { lines, report: (line: string) => { lines.push(line) } }
}

describe('aggregatePapers', () => {
  test('merges overlapping queries in first-seen order', async () => {
    const { source } = scriptedSource({
      A: [[makePaper('p1'), makePaper('p2'), makePaper('p3')]],
      B: [[makePaper('p3'), makePaper('p4'), makePaper('p5')]]
    })

    const result = await aggregatePapers(['A', 'B'], 5, { source, label: 'T', retry: FAST_RETRY })

    expect(result.papers.map(p => p.paperId)).toEqual(['p1', 'p2', 'p3', 'p4', 'p5'])
    expect(result.queryHits.get('A')).toEqual(['p1', 'p2', 'p3'])
    expect(result.queryHits.get('B')).toEqual(['p3', 'p4', 'p5'])
    expect(result.failures).toEqual([])
    expect(result.requestCount).toBe(2)
  })

  test('stops at the requested total and skips later queries', async () => {
    const { source, search } = scriptedSource({
      A: [
        [makePaper('p1'), makePaper('p2')],
        [makePaper('p3'), makePaper('p4')],
        [makePaper('p5'), makePaper('p6')]
      ],
      B: [[makePaper('p7')]]
    })
    const { lines, report } = collector()

    const result = await aggregatePapers(['A', 'B'], 3, { source, label: 'T', report, retry: FAST_RETRY })

    expect(result.papers.map(p => p.paperId)).toEqual(['p1', 'p2', 'p3'])
    expect(search).toHaveBeenCalledTimes(2)
    expect(search.mock.calls.map(([query, page]) => [query, page.offset])).toEqual([['A', 0], ['A', 2]])
    expect(lines).toContain("[T] Requested total reached, skipping query (2/2): 'B'")
  })

  test('follows nextOffset across pages', async () => {
    const { source, search } = scriptedSource({
      A: [[makePaper('p1'), makePaper('p2')], [makePaper('p3')]]
    })

    const result = await aggregatePapers(['A'], 10, { source, label: 'T', pageSize: 2, retry: FAST_RETRY })

    expect(result.papers).toHaveLength(3)
    expect(search.mock.calls.map(([, page]) => page)).toEqual([
      { offset: 0, limit: 2 },
      { offset: 2, limit: 2 }
    ])
  })

  test('reports progress after each batch', async () => {
    const { source } = scriptedSource({ A: [[makePaper('p1'), makePaper('p2')]] })
    const { lines, report } = collector()

    await aggregatePapers(['A'], 5, { source, label: 'NeRF SLAM', report, retry: FAST_RETRY })

    expect(lines).toEqual([
      "[NeRF SLAM] Processing query (1/1): 'A'",
      "[NeRF SLAM] 'A': fetched 2 papers (2 for this query). Total so far: 2/5. Requests: 1",
      "[NeRF SLAM] 'A': done after 1 requests",
      '[NeRF SLAM] Total unique papers after removing duplicates: 2'
    ])
  })

  test('skips a query that keeps failing and continues with the rest', async () => {
    const { source, search } = scriptedSource({
      A: [new TransientNetworkError('boom'), new TransientNetworkError('boom'), new TransientNetworkError('boom')],
      B: [[makePaper('p4')]]
    })
    const { lines, report } = collector()

    const result = await aggregatePapers(['A', 'B'], 5, { source, label: 'T', report, retry: FAST_RETRY })

    expect(result.papers.map(p => p.paperId)).toEqual(['p4'])
    expect(result.failures).toEqual([{ query: 'A', error: 'boom' }])
    expect(search.mock.calls.filter(([query]) => query === 'A')).toHaveLength(3)
    expect(lines).toContain("[T] 'A': attempt 1/3 failed (boom), retrying in 0ms")
    expect(lines).toContain("[T] 'A': attempt 2/3 failed (boom), retrying in 0ms")
    expect(lines).toContain("[T] Query 'A' failed after retries: boom. Continuing with remaining queries.")
  })

  test('retries after a rate limit and keeps the page', async () => {
    const { source, search } = scriptedSource({
      A: [new RateLimitError('Error 429: slow down'), [makePaper('p1')]]
    })
    const { lines, report } = collector()

    const result = await aggregatePapers(['A'], 5, { source, label: 'T', report, retry: FAST_RETRY })

    expect(result.papers.map(p => p.paperId)).toEqual(['p1'])
    expect(search).toHaveBeenCalledTimes(2)
    expect(result.requestCount).toBe(2)
    expect(lines).toContain("[T] 'A': attempt 1/3 failed (Error 429: slow down), retrying in 0ms")
  })

  test('does not retry a rejected request', async () => {
    const { source, search } = scriptedSource({
      A: [new PaperSourceRejectedError('Error 400: bad query', 400)],
      B: [[makePaper('p1')]]
    })

    const result = await aggregatePapers(['A', 'B'], 5, { source, label: 'T', retry: FAST_RETRY })

    expect(search.mock.calls.filter(([query]) => query === 'A')).toHaveLength(1)
    expect(result.failures).toEqual([{ query: 'A', error: 'Error 400: bad query' }])
  })

  test('fails the job when every query fails', async () => {
    const { source } = scriptedSource({
      A: [new PaperSourceRejectedError('nope')],
      B: [new PaperSourceRejectedError('nope')]
    })

    const run = aggregatePapers(['A', 'B'], 5, { source, label: 'T', retry: FAST_RETRY })

    await expect(run).rejects.toBeInstanceOf(JobFailureError)
    await expect(run).rejects.toMatchObject({
      message: 'No papers could be fetched; failed queries: A, B',
      failedQueries: ['A', 'B']
    })
  })

  test('fails the job when no query has results', async () => {
    const { source } = scriptedSource({ A: [[]] })

    await expect(aggregatePapers(['A'], 5, { source, label: 'T', retry: FAST_RETRY }))
      .rejects.toThrow('No papers found for the given queries')
  })

  test('result never exceeds the total and has unique ids', async () => {
    const ids = ['p1', 'p2', 'p3', 'p2', 'p4', 'p1', 'p5', 'p6']

    for (const total of [1, 3, 5, 7, 20]) {
      const { source } = scriptedSource({
        A: [ids.slice(0, 4).map(id => makePaper(id))],
        B: [ids.slice(4).map(id => makePaper(id))],
        C: [[makePaper('p3'), makePaper('p7')]]
      })
      const result = await aggregatePapers(['A', 'B', 'C'], total, { source, label: 'T', retry: FAST_RETRY })
      const resultIds = result.papers.map(p => p.paperId)
      expect(resultIds.length).toBeLessThanOrEqual(total)
      expect(new Set(resultIds).size).toBe(resultIds.length)
    }
  })
})
