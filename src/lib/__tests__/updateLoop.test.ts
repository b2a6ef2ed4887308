import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { createUpdateLoop } from '@/lib/updateLoop'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function makeLoop(intervalMs = 10) {
  const handlers = {
    onStart: vi.fn(),
    onStop: vi.fn(),
    onPause: vi.fn(),
    onUpdate: vi.fn(),
    getIntervalMs: () => intervalMs,
  }
  return { loop: createUpdateLoop(handlers), handlers }
}

describe('createUpdateLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('updates once per interval while running', () => {
    const { loop, handlers } = makeLoop()

    loop.start()
    vi.advanceTimersByTime(35)

    expect(handlers.onStart).toHaveBeenCalledTimes(1)
    expect(handlers.onUpdate).toHaveBeenCalledTimes(3)
    expect(loop.isRunning()).toBe(true)
  })

  it('ignores a second start while running', () => {
    const { loop, handlers } = makeLoop()

    loop.start()
    loop.start()
    vi.advanceTimersByTime(10)

    expect(handlers.onStart).toHaveBeenCalledTimes(1)
    expect(handlers.onUpdate).toHaveBeenCalledTimes(1)
  })

  it('holds updates while paused and resumes on start', () => {
    const { loop, handlers } = makeLoop()

    loop.start()
    loop.pause()
    vi.advanceTimersByTime(50)

    expect(handlers.onPause).toHaveBeenCalledTimes(1)
    expect(handlers.onUpdate).not.toHaveBeenCalled()
    expect(loop.isPaused()).toBe(true)

    loop.start()
    vi.advanceTimersByTime(20)

    expect(loop.isPaused()).toBe(false)
    expect(handlers.onUpdate).toHaveBeenCalledTimes(2)
  })

  it('stops for good', () => {
    const { loop, handlers } = makeLoop()

    loop.start()
    vi.advanceTimersByTime(10)
    loop.stop()
    loop.stop()
    vi.advanceTimersByTime(50)

    expect(handlers.onStop).toHaveBeenCalledTimes(1)
    expect(handlers.onUpdate).toHaveBeenCalledTimes(1)
    expect(loop.isRunning()).toBe(false)
  })
})
