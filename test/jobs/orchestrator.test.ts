import { beforeEach, describe, expect, test } from 'vitest'
import { JobFailureError, PaperSourceRejectedError, ValidationError } from '@/lib/errors'
import { DocumentStore } from '@/lib/jobs/document-store'
import { JobOrchestrator, parseGenerateRequest } from '@/lib/jobs/orchestrator'
import { ChannelRegistry } from '@/lib/progress/channel-registry'
import { ProgressNotifier } from '@/lib/progress/notifier'
import type { PaperSource } from '@/contracts/paper-source'
import { FAST_RETRY, fakeChannel, makePaper, scriptedSource } from '../fixtures/papers'

function messagesOf(channel: ReturnType<typeof fakeChannel>): string[] {
  return channel.send.mock.calls.map(([, data]) =>
    typeof data === 'object' && data !== null && 'message' in data ? String(data.message) : ''
  )
}

describe('parseGenerateRequest', () => {
  test('splits and trims queries', () => {
    const request = parseGenerateRequest({ queries: ' NeRF , SLAM,, ', total_papers: '25', title: ' NeRF SLAM ' })

    expect(request).toEqual({
      queries: ['NeRF', 'SLAM'],
      total_papers: 25,
      title: 'NeRF SLAM',
      sid: undefined,
      filename: 'NeRF_SLAM.json'
    })
  })

  test('rejects empty query lists', () => {
    expect(() => parseGenerateRequest({ queries: ' , ', total_papers: '5', title: 'T' }))
      .toThrow('queries: at least one non-empty query is required')
  })

  test('rejects non-positive or non-integer totals', () => {
    expect(() => parseGenerateRequest({ queries: 'a', total_papers: '0', title: 'T' }))
      .toThrow('total_papers: total_papers must be a positive integer')
    expect(() => parseGenerateRequest({ queries: 'a', total_papers: '2.5', title: 'T' }))
      .toThrow('total_papers: total_papers must be an integer')
    expect(() => parseGenerateRequest({ queries: 'a', total_papers: 'abc', title: 'T' }))
      .toThrow(ValidationError)
    expect(() => parseGenerateRequest({ queries: 'a', title: 'T' })).toThrow(ValidationError)
  })

  test('rejects titles that yield no filename', () => {
    expect(() => parseGenerateRequest({ queries: 'a', total_papers: '5', title: '///' }))
      .toThrow('title: must contain at least one letter or digit')
  })

  test('gives titles in other scripts their own filenames', () => {
    const first = parseGenerateRequest({ queries: 'a', total_papers: '5', title: 'нейронные поля' })
    const second = parseGenerateRequest({ queries: 'a', total_papers: '5', title: '深度 学习' })

    expect(parseGenerateRequest({ queries: 'a', total_papers: '5', title: '神经网络' }).filename).toBe('神经网络.json')
    expect(first.filename).toBe('нейронные_поля.json')
    expect(second.filename).toBe('深度_学习.json')
  })

  test('rejects malformed session ids', () => {
    expect(() => parseGenerateRequest({ queries: 'a', total_papers: '5', title: 'T', sid: 'bad sid!' }))
      .toThrow(ValidationError)
  })
})

describe('JobOrchestrator', () => {
  let registry: ChannelRegistry
  let store: DocumentStore

  beforeEach(() => {
    registry = new ChannelRegistry()
    store = new DocumentStore({ maxSize: 10, maxAgeMs: 60_000 })
  })

  function orchestrator(source: PaperSource) {
    return new JobOrchestrator({
      source,
      notifier: new ProgressNotifier(registry),
      store,
      settings: { pageSize: 100, pageDelayMs: 0, retry: FAST_RETRY }
    })
  }

  test('generates, stores and reports a bibliography', async () => {
    const channel = fakeChannel()
    registry.register('tab', channel)
    const { source } = scriptedSource({
      A: [[makePaper('p1'), makePaper('p2')]],
      B: [[makePaper('p2'), makePaper('p3'), makePaper('p4')]]
    })

    const result = await orchestrator(source).run({ queries: 'A, B', total_papers: '3', title: 'NeRF SLAM', sid: 'tab' })

    expect(result.filename).toBe('NeRF_SLAM.json')
    expect(result.paperCount).toBe(3)
    expect(result.failures).toEqual([])

    const doc = JSON.parse(result.content)
    expect(doc.title).toBe('NeRF SLAM')
    expect(doc.papers.map((p: { paperId: string }) => p.paperId)).toEqual(['p1', 'p2', 'p3'])
    expect(doc.queries).toEqual({ A: ['p1', 'p2'], B: ['p2', 'p3'] })

    expect(store.get('NeRF_SLAM.json')?.content).toBe(result.content)

    const messages = messagesOf(channel)
    expect(messages[0]).toBe('[NeRF SLAM] Starting: 2 queries, up to 3 papers')
    expect(messages[messages.length - 1]).toBe('[NeRF SLAM] JSON ready: NeRF_SLAM.json (3 papers, 2 requests)')
  })

  test('a job whose queries all fail leaves nothing behind', async () => {
    const channel = fakeChannel()
    registry.register('tab', channel)
    const { source } = scriptedSource({ A: [new PaperSourceRejectedError('Error 400: bad query')] })

    const error = await orchestrator(source)
      .run({ queries: 'A', total_papers: '5', title: 'T', sid: 'tab' })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(JobFailureError)
    expect(store.size).toBe(0)
    const messages = messagesOf(channel)
    expect(messages[messages.length - 1]).toBe('[T] Failed to generate JSON: No papers could be fetched; failed queries: A')
  })

  test('invalid input fails before any search', async () => {
    const { source, search } = scriptedSource({})

    await expect(orchestrator(source).run({ queries: 'A', total_papers: '-1', title: 'T' }))
      .rejects.toBeInstanceOf(ValidationError)
    expect(search).not.toHaveBeenCalled()
  })

  test('runs without a session', async () => {
    const { source } = scriptedSource({ A: [[makePaper('p1')]] })

    const result = await orchestrator(source).run({ queries: 'A', total_papers: 5, title: 'Solo' })

    expect(result.paperCount).toBe(1)
    expect(store.get('Solo.json')).toBeDefined()
  })

  test('concurrent jobs keep their progress to their own sessions', async () => {
    const one = fakeChannel()
    const two = fakeChannel()
    registry.register('one', one)
    registry.register('two', two)
    const { source } = scriptedSource({
      A: [[makePaper('p1')], [makePaper('p2')]],
      B: [[makePaper('p3')]]
    })
    const jobs = orchestrator(source)

    await Promise.all([
      jobs.run({ queries: 'A', total_papers: '10', title: 'First', sid: 'one' }),
      jobs.run({ queries: 'B', total_papers: '10', title: 'Second', sid: 'two' })
    ])

    expect(messagesOf(one).every(m => m.startsWith('[First]'))).toBe(true)
    expect(messagesOf(two).every(m => m.startsWith('[Second]'))).toBe(true)
    expect(messagesOf(one).length).toBeGreaterThan(0)
    expect(store.size).toBe(2)
  })
})
