import { Cell } from "./vocabulary/keywords";
import { DIFF_SENTINEL } from "./diff";

/**
 * Grid Logic - Pure Functions
 *
 * The grid is a flat row-major Uint8Array, index = row * width + col.
 * Rows and columns wrap (torus), so there are no edges to special-case.
 *
 * Nothing here allocates on the hot path; the caller owns every buffer.
 */

// ============================================================================
// INDEXING
// ============================================================================

/**
 * Non-negative modulo. Floors first so fractional coordinates land on a cell.
 */
export const wrap = (value: number, size: number): number => {
  const n = Math.floor(value) % size;
  return n < 0 ? n + size : n;
};

export const getIndex = (width: number, row: number, col: number): number =>
  row * width + col;

/**
 * Index of (row, col) after wrapping both onto the torus. Expects finite
 * numbers; the universe validates coordinates before they get here.
 */
export const getWrappedIndex = (
  width: number,
  height: number,
  row: number,
  col: number
): number => getIndex(width, wrap(row, height), wrap(col, width));

// ============================================================================
// RULE
// ============================================================================

/**
 * B3/S23: a live cell survives with 2 or 3 neighbours, a dead cell is
 * born with exactly 3.
 */
export const nextCellState = (cell: number, liveNeighbors: number): Cell => {
  if (cell === Cell.Alive) {
    return liveNeighbors === 2 || liveNeighbors === 3 ? Cell.Alive : Cell.Dead;
  }
  return liveNeighbors === 3 ? Cell.Alive : Cell.Dead;
};

// ============================================================================
// STEP
// ============================================================================

/**
 * Compute the next generation of `current` into `next` and record every
 * changed index in `diff`, ascending. The rest of `diff` is filled with
 * the sentinel, so no entry survives from an earlier tick.
 *
 * `current` is only read and `next` is only written, so every cell sees
 * the same generation.
 *
 * @returns number of changed cells
 */
export const stepGrid = (
  current: Uint8Array,
  next: Uint8Array,
  diff: Int32Array,
  width: number,
  height: number
): number => {
  let changed = 0;

  for (let row = 0; row < height; row++) {
    const north = ((row + height - 1) % height) * width;
    const here = row * width;
    const south = ((row + 1) % height) * width;

    for (let col = 0; col < width; col++) {
      const west = (col + width - 1) % width;
      const east = (col + 1) % width;

      const liveNeighbors =
        current[north + west] +
        current[north + col] +
        current[north + east] +
        current[here + west] +
        current[here + east] +
        current[south + west] +
        current[south + col] +
        current[south + east];

      const index = here + col;
      const cell = current[index];
      const nextCell = nextCellState(cell, liveNeighbors);
      next[index] = nextCell;

      if (nextCell !== cell) {
        diff[changed++] = index;
      }
    }
  }

  diff.fill(DIFF_SENTINEL, changed);

  return changed;
};

// ============================================================================
// QUERIES
// ============================================================================

export const countAlive = (cells: Uint8Array): number => {
  let alive = 0;
  for (let i = 0; i < cells.length; i++) {
    alive += cells[i];
  }
  return alive;
};
