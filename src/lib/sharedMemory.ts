/**
 * Engine Memory Utilities
 *
 * The universe keeps every buffer it owns inside one contiguous block so a
 * host can read it without copying: hand over `buffer` once, then build
 * views from the byte offsets in the layout.
 *
 * Core concepts:
 * - SharedArrayBuffer when the host provides one, ArrayBuffer otherwise
 * - Double buffering: the tick reads the front generation, writes the back
 *   one, then swaps, so no cell ever sees a half-updated neighbourhood
 * - Atomic index: the active generation is published with Atomics.store
 */

export function isSharedArrayBufferSupported(): boolean {
  return typeof SharedArrayBuffer !== "undefined";
}

export const bufferViewIndexes = {
  front: 0,
  back: 1,
} as const;

export type BufferViewIndex = 0 | 1;

export type EngineBuffer = ArrayBuffer | SharedArrayBuffer;

/**
 * Memory layout for a universe of `cellCount` cells.
 */
export type UniverseBufferLayout = {
  /** Total size of the buffer in bytes */
  totalBytes: number;

  /** Number of cells (width * height) */
  cellCount: number;

  /** Offset to the active generation index (Uint32, 1 element) */
  bufferIndexOffset: number;

  /** Offset to statistics (Uint32, StatsIndex elements) */
  statsOffset: number;

  /** Offset to the diff buffer (Int32, cellCount elements) */
  diffOffset: number;

  /** Offset to generation buffer 0 (Uint8, cellCount elements) */
  cells0Offset: number;

  /** Offset to generation buffer 1 (Uint8, cellCount elements) */
  cells1Offset: number;
};

/**
 * Statistics indices in the stats array
 */
export const StatsIndex = {
  GENERATION: 0,
  CHANGED_COUNT: 1,
} as const;

const STATS_LENGTH = Object.keys(StatsIndex).length;

/**
 * Calculate memory layout for a given number of cells.
 *
 * Memory layout:
 * - [0-4): Active generation index (Uint32)
 * - [4-12): Statistics (Uint32 × 2)
 * - [12-...): Diff (Int32, cellCount elements)
 * - [...-...): Cells buffer 0 (Uint8, cellCount elements)
 * - [...-...): Cells buffer 1 (Uint8, cellCount elements)
 *
 * Int32 regions come first so they stay 4-byte aligned.
 */
export function calculateBufferLayout(cellCount: number): UniverseBufferLayout {
  let offset = 0;

  const bufferIndexOffset = offset;
  offset += 4;

  const statsOffset = offset;
  offset += STATS_LENGTH * 4;

  const diffOffset = offset;
  offset += cellCount * 4;

  const cells0Offset = offset;
  offset += cellCount;

  const cells1Offset = offset;
  offset += cellCount;

  return {
    totalBytes: offset,
    cellCount,
    bufferIndexOffset,
    statsOffset,
    diffOffset,
    cells0Offset,
    cells1Offset,
  };
}

/**
 * Allocate the block for a universe of `cellCount` cells.
 */
export function createUniverseBuffer(
  cellCount: number,
  shared: boolean = isSharedArrayBufferSupported()
): {
  buffer: EngineBuffer;
  layout: UniverseBufferLayout;
} {
  const layout = calculateBufferLayout(cellCount);
  const buffer = shared
    ? new SharedArrayBuffer(layout.totalBytes)
    : new ArrayBuffer(layout.totalBytes);

  return { buffer, layout };
}

/**
 * Typed array views over a universe buffer
 */
export type UniverseViews = {
  /** Which cells buffer holds the current generation (0 or 1) */
  bufferIndex: Uint32Array;

  /** Statistics counters */
  stats: Uint32Array;

  /** Changed indices of the last tick, sentinel terminated */
  diff: Int32Array;

  cells0: Uint8Array;

  cells1: Uint8Array;
};

export function createUniverseViews(
  buffer: EngineBuffer,
  layout: UniverseBufferLayout
): UniverseViews {
  return {
    bufferIndex: new Uint32Array(buffer, layout.bufferIndexOffset, 1),
    stats: new Uint32Array(buffer, layout.statsOffset, STATS_LENGTH),
    diff: new Int32Array(buffer, layout.diffOffset, layout.cellCount),
    cells0: new Uint8Array(buffer, layout.cells0Offset, layout.cellCount),
    cells1: new Uint8Array(buffer, layout.cells1Offset, layout.cellCount),
  };
}

export function getActiveBufferIndex(views: UniverseViews): number {
  return Atomics.load(views.bufferIndex, 0);
}

export function setActiveBufferIndex(
  views: UniverseViews,
  bufferIndex: BufferViewIndex
) {
  Atomics.store(views.bufferIndex, 0, bufferIndex);
}

/**
 * The generation readers should look at
 */
export function getActiveCells(views: UniverseViews): Uint8Array {
  return getActiveBufferIndex(views) === bufferViewIndexes.front
    ? views.cells0
    : views.cells1;
}

/**
 * The generation the next tick writes into
 */
export function getInactiveCells(views: UniverseViews): Uint8Array {
  return getActiveBufferIndex(views) === bufferViewIndexes.front
    ? views.cells1
    : views.cells0;
}

/**
 * Byte offset of the active generation inside the buffer
 */
export function getActiveCellsOffset(
  views: UniverseViews,
  layout: UniverseBufferLayout
): number {
  return getActiveBufferIndex(views) === bufferViewIndexes.front
    ? layout.cells0Offset
    : layout.cells1Offset;
}

/**
 * Publish the back buffer as the current generation
 */
export function swapBuffers(views: UniverseViews): void {
  const currentIndex = getActiveBufferIndex(views);
  const newIndex =
    currentIndex === bufferViewIndexes.front
      ? bufferViewIndexes.back
      : bufferViewIndexes.front;
  setActiveBufferIndex(views, newIndex);
}
