// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { act, cleanup, renderHook } from '@testing-library/react'
import { useProgressLog } from '@/hooks/useProgressLog'

type Listener = (event: MessageEvent<string>) => void

class MockEventSource {
  static instances: MockEventSource[] = []

  readonly url: string
  onopen: (() => void) | null = null
  onerror: (() => void) | null = null
  closed = false
  private readonly listeners = new Map<string, Set<Listener>>()

  constructor(url: string) {
    this.url = url
    MockEventSource.instances.push(this)
  }

  addEventListener(type: string, listener: Listener) {
    const set = this.listeners.get(type) ?? new Set<Listener>()
    set.add(listener)
    this.listeners.set(type, set)
  }

  removeEventListener(type: string, listener: Listener) {
    this.listeners.get(type)?.delete(listener)
  }

  close() {
    this.closed = true
  }

  emit(type: string, data: string) {
    const event = new MessageEvent<string>(type, { data })
    for (const listener of this.listeners.get(type) ?? []) listener(event)
  }
}

function latestSource(): MockEventSource {
  const source = MockEventSource.instances[MockEventSource.instances.length - 1]
  if (!source) throw new Error('no EventSource opened')
  return source
}

describe('useProgressLog', () => {
  beforeEach(() => {
    MockEventSource.instances = []
    vi.stubGlobal('EventSource', MockEventSource)
  })

  afterEach(() => {
    cleanup()
    vi.unstubAllGlobals()
  })

  test('opens the stream for its session id', () => {
    const { result } = renderHook(() => useProgressLog({ sessionId: 'tab-1' }))

    expect(result.current.sessionId).toBe('tab-1')
    expect(latestSource().url).toBe('/events?sid=tab-1')
  })

  test('generates a session id when none is given', () => {
    const { result, rerender } = renderHook(() => useProgressLog())
    const first = result.current.sessionId

    rerender()

    expect(first).toMatch(/^[0-9a-f-]{36}$/)
    expect(result.current.sessionId).toBe(first)
  })

  test('appends log_message lines in order', () => {
    const { result } = renderHook(() => useProgressLog({ sessionId: 'tab-1' }))
    const source = latestSource()

    act(() => {
      source.onopen?.()
      source.emit('log_message', JSON.stringify({ message: '[T] Starting' }))
      source.emit('log_message', JSON.stringify({ message: '[T] JSON ready' }))
    })

    expect(result.current.isConnected).toBe(true)
    expect(result.current.lines).toEqual(['[T] Starting', '[T] JSON ready'])
  })

  test('ignores malformed events', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    const { result } = renderHook(() => useProgressLog({ sessionId: 'tab-1' }))

    act(() => {
      latestSource().emit('log_message', 'not json')
      latestSource().emit('log_message', JSON.stringify({ text: 'wrong shape' }))
    })

    expect(result.current.lines).toEqual([])
    expect(consoleError).toHaveBeenCalledTimes(1)
    consoleError.mockRestore()
  })

  test('clear empties the log', () => {
    const { result } = renderHook(() => useProgressLog({ sessionId: 'tab-1' }))

    act(() => latestSource().emit('log_message', JSON.stringify({ message: 'line' })))
    act(() => result.current.clear())

    expect(result.current.lines).toEqual([])
  })

  test('closes the stream on unmount', () => {
    const { unmount } = renderHook(() => useProgressLog({ sessionId: 'tab-1' }))
    const source = latestSource()

    unmount()

    expect(source.closed).toBe(true)
  })
})
