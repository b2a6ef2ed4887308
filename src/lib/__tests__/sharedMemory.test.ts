import { describe, it, expect } from 'vitest'
import {
  bufferViewIndexes,
  calculateBufferLayout,
  createUniverseBuffer,
  createUniverseViews,
  getActiveBufferIndex,
  getActiveCells,
  getInactiveCells,
  swapBuffers,
} from '@/lib/sharedMemory'

describe('calculateBufferLayout', () => {
  it('places the int32 regions first and both generations after', () => {
    expect(calculateBufferLayout(16)).toEqual({
      totalBytes: 108,
      cellCount: 16,
      bufferIndexOffset: 0,
      statsOffset: 4,
      diffOffset: 12,
      cells0Offset: 76,
      cells1Offset: 92,
    })
  })

  it('keeps the diff region 4-byte aligned for odd cell counts', () => {
    const layout = calculateBufferLayout(7)

    expect(layout.diffOffset % 4).toBe(0)
    expect(layout.totalBytes).toBe(12 + 7 * 4 + 7 * 2)
  })
})

describe('universe views', () => {
  it('swaps which generation is active', () => {
    const { buffer, layout } = createUniverseBuffer(4, false)
    const views = createUniverseViews(buffer, layout)

    expect(getActiveBufferIndex(views)).toBe(bufferViewIndexes.front)
    expect(getActiveCells(views)).toBe(views.cells0)
    expect(getInactiveCells(views)).toBe(views.cells1)

    swapBuffers(views)

    expect(getActiveBufferIndex(views)).toBe(bufferViewIndexes.back)
    expect(getActiveCells(views)).toBe(views.cells1)
    expect(getInactiveCells(views)).toBe(views.cells0)
  })

  it('maps every view onto the same block', () => {
    const { buffer, layout } = createUniverseBuffer(4, true)
    const views = createUniverseViews(buffer, layout)

    views.cells1[2] = 1
    views.diff[0] = 9

    expect(new Uint8Array(buffer)[layout.cells1Offset + 2]).toBe(1)
    expect(new Int32Array(buffer, layout.diffOffset, 1)[0]).toBe(9)
  })
})
