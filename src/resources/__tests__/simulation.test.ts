import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import type { SimulationFrame } from '@/resources/simulation'
import { startLifeSystem } from '@/system'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

async function startTestSystem() {
  const started = await startLifeSystem({
    width: 8,
    height: 8,
    initialState: 'empty',
    seed: 'test-seed',
    speed: 0.5,
    tickIntervalMs: 10,
  })
  const frames: SimulationFrame[] = []
  started.system.simulation.onFrame((frame) => frames.push(frame))
  return { ...started, frames }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('simulation resource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('publishes a full frame and syncs the store on mutation', async () => {
    const { system, halt, frames } = await startTestSystem()

    system.simulation.insertGlider(0, 0)

    expect(frames).toHaveLength(1)
    expect(frames[0].type).toBe('full')
    expect(frames[0].event).toBe('universe/patternInserted')
    expect(system.runtimeStore.store.getState().living).toBe(5)

    await halt()
  })

  it('sets cells through the simulation', async () => {
    const { system, halt, frames } = await startTestSystem()

    system.simulation.setCells([
      [0, 0],
      [7, 7],
    ])

    expect(frames.map((frame) => frame.event)).toEqual(['universe/cellsSet'])
    expect(system.runtimeStore.store.getState().living).toBe(2)

    await halt()
  })

  it('ticks once the accumulator reaches one', async () => {
    const { system, halt, frames } = await startTestSystem()
    vi.useFakeTimers()

    system.simulation.start()
    expect(system.runtimeStore.store.getState().isRunning).toBe(true)

    vi.advanceTimersByTime(10)
    expect(frames).toHaveLength(0)

    vi.advanceTimersByTime(10)
    expect(frames).toHaveLength(1)
    expect(frames[0].type).toBe('diff')
    expect(frames[0].generation).toBe(2)
    expect(system.universe.generation()).toBe(2)
    expect(system.runtimeStore.store.getState().generation).toBe(2)

    vi.useRealTimers()
    await halt()
  })

  it('stops ticking while paused and picks up again on resume', async () => {
    const { system, halt, frames } = await startTestSystem()
    vi.useFakeTimers()

    system.simulation.start()
    system.simulation.pause()
    expect(system.simulation.isPaused()).toBe(true)

    vi.advanceTimersByTime(100)
    expect(frames).toHaveLength(0)

    system.simulation.resume()
    vi.advanceTimersByTime(20)
    expect(frames).toHaveLength(1)

    vi.useRealTimers()
    await halt()
  })

  it('validates speed and ticks every update at full speed', async () => {
    const { system, halt, frames } = await startTestSystem()
    vi.useFakeTimers()

    expect(() => system.simulation.setSpeed(2)).toThrow()
    expect(() => system.simulation.setSpeed(0)).toThrow()
    expect(system.simulation.getSpeed()).toBe(0.5)

    system.simulation.setSpeed(1)
    system.simulation.start()
    vi.advanceTimersByTime(30)

    expect(frames.map((frame) => frame.generation)).toEqual([2, 3, 4])
    expect(system.runtimeStore.store.getState().speed).toBe(1)

    vi.useRealTimers()
    await halt()
  })

  it('steps manually with a diff of the flipped cells', async () => {
    const { system, halt, frames } = await startTestSystem()

    system.simulation.toggleCell(3, 2)
    system.simulation.toggleCell(3, 3)
    system.simulation.toggleCell(3, 4)
    system.simulation.step()

    const last = frames[frames.length - 1]
    expect(last.type).toBe('diff')
    if (last.type === 'diff') {
      expect(last.changed).toBe(4)
      expect(Array.from(last.diff.subarray(0, 5))).toEqual([19, 26, 28, 35, -1])
    }

    await halt()
  })

  it('stops the loop on halt', async () => {
    const { system, halt, frames } = await startTestSystem()
    vi.useFakeTimers()

    system.simulation.start()
    system.simulation.halt()

    vi.advanceTimersByTime(100)
    expect(frames).toHaveLength(0)
    expect(system.simulation.isRunning()).toBe(false)

    vi.useRealTimers()
    await halt()
  })

  it('refuses to start on invalid configuration', async () => {
    await expect(startLifeSystem({ width: 0 })).rejects.toThrow()
  })
})
