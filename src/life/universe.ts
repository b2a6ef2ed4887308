import {
  createUniverseBuffer,
  createUniverseViews,
  getActiveCells,
  getActiveCellsOffset,
  getInactiveCells,
  isSharedArrayBufferSupported,
  StatsIndex,
  swapBuffers,
} from "@/lib/sharedMemory";
import { createSeededRNG, generateRandomSeed } from "@/lib/seededRandom";
import { readDiff, resetDiff } from "./diff";
import { InvalidCoordinateError, InvalidUniverseOptionsError } from "./errors";
import { countAlive, getWrappedIndex, stepGrid } from "./grid";
import { getPattern, parsePattern, stampPattern } from "./patterns";
import {
  Cell,
  initialStateKeywords,
  patternKeywords,
  randomDomainKeywords,
} from "./vocabulary/keywords";
import type { PatternDefinition } from "./vocabulary/schemas/patterns";
import {
  coordinateSchema,
  universeOptionsSchema,
  type Coordinate,
  type RandomSource,
  type UniverseOptions,
  type UniverseSnapshot,
} from "./vocabulary/schemas/universe";

/**
 * Universe - the Game of Life grid engine
 *
 * Owns one memory block holding two generations and the diff of the last
 * tick. Every view it hands out is a borrowed, read-only window into that
 * block and is only valid until the next call on the universe:
 *
 * - cells() alternates between the two generation buffers on every tick
 * - diff() is meaningful right after tick() and is emptied by any mutator,
 *   after which the renderer must re-read cells() in full
 *
 * Coordinates passed to mutators are wrapped onto the torus, so no call can
 * write outside the grid. Non-finite coordinates throw
 * InvalidCoordinateError before anything is written.
 *
 * @example
 * const universe = createUniverse({ width: 64, height: 64, initialState: "empty" });
 * universe.insertGlider(0, 0);
 * universe.tick();
 * forEachChanged(universe.diff(), (index) => repaint(index));
 */
export const createUniverse = (options: UniverseOptions = {}) => {
  const parsed = universeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidUniverseOptionsError(parsed.error.issues);
  }

  const { width, height, initialState, seed } = parsed.data;
  const cellCount = width * height;

  const random: RandomSource =
    parsed.data.random ??
    createSeededRNG(seed ?? generateRandomSeed()).domain(
      randomDomainKeywords.randomize
    ).next;

  const { buffer, layout } = createUniverseBuffer(
    cellCount,
    parsed.data.shared ?? isSharedArrayBufferSupported()
  );
  const views = createUniverseViews(buffer, layout);

  // ============================================
  // Internal helpers
  // ============================================

  const fillRandom = (cells: Uint8Array) => {
    for (let i = 0; i < cells.length; i++) {
      cells[i] = random() < 0.5 ? Cell.Alive : Cell.Dead;
    }
  };

  // The diff only describes tick-to-tick changes
  const invalidateDiff = () => {
    resetDiff(views.diff);
    views.stats[StatsIndex.CHANGED_COUNT] = 0;
  };

  const resetGeneration = () => {
    views.stats[StatsIndex.GENERATION] = 1;
  };

  const assertCoordinate = (row: number, col: number) => {
    if (!coordinateSchema.safeParse([row, col]).success) {
      throw new InvalidCoordinateError(row, col);
    }
  };

  const insert = (pattern: string | PatternDefinition, row: number, col: number) => {
    assertCoordinate(row, col);
    const parsedPattern =
      typeof pattern === "string" ? getPattern(pattern) : parsePattern(pattern);
    stampPattern(getActiveCells(views), width, height, parsedPattern, row, col);
    invalidateDiff();
  };

  // ============================================
  // Initialization
  // ============================================

  resetGeneration();
  resetDiff(views.diff);
  if (initialState === initialStateKeywords.random) {
    fillRandom(getActiveCells(views));
  }

  // ============================================
  // API
  // ============================================

  const api = {
    width: () => width,
    height: () => height,

    /** Starts at 1; tick() advances it, randomize() and clear() reset it */
    generation: () => views.stats[StatsIndex.GENERATION],

    living: () => countAlive(getActiveCells(views)),

    /** View over the current generation, width * height bytes of 0/1 */
    cells: (): Uint8Array => getActiveCells(views),

    /** Changed indices of the last tick, ascending, -1 terminated */
    diff: (): Int32Array => views.diff,

    changedCount: () => views.stats[StatsIndex.CHANGED_COUNT],

    /** The whole block, for hosts that build their own views */
    memory: () => ({ buffer, layout }),

    /** Byte offset of the current generation inside memory().buffer */
    cellsOffset: () => getActiveCellsOffset(views, layout),

    diffOffset: () => layout.diffOffset,

    /** Copy of the current generation */
    getCells: (): Uint8Array => getActiveCells(views).slice(),

    snapshot: (): UniverseSnapshot => ({
      width,
      height,
      generation: views.stats[StatsIndex.GENERATION],
      cells: getActiveCells(views).slice(),
      diff: readDiff(views.diff),
    }),

    tick: () => {
      const changed = stepGrid(
        getActiveCells(views),
        getInactiveCells(views),
        views.diff,
        width,
        height
      );
      swapBuffers(views);
      views.stats[StatsIndex.GENERATION] += 1;
      views.stats[StatsIndex.CHANGED_COUNT] = changed;
    },

    toggleCell: (row: number, col: number) => {
      assertCoordinate(row, col);
      getActiveCells(views)[getWrappedIndex(width, height, row, col)] ^= 1;
      invalidateDiff();
    },

    /** Set every listed [row, col] alive */
    setCells: (coordinates: ReadonlyArray<Coordinate>) => {
      for (const [row, col] of coordinates) {
        assertCoordinate(row, col);
      }
      const cells = getActiveCells(views);
      for (const [row, col] of coordinates) {
        cells[getWrappedIndex(width, height, row, col)] = Cell.Alive;
      }
      invalidateDiff();
    },

    insertGlider: (row: number, col: number) => {
      insert(patternKeywords.glider, row, col);
    },

    insertPulsar: (row: number, col: number) => {
      insert(patternKeywords.pulsar, row, col);
    },

    /** Overlay a library pattern (by id) or a custom definition */
    insertPattern: insert,

    randomize: () => {
      fillRandom(getActiveCells(views));
      resetGeneration();
      invalidateDiff();
    },

    clear: () => {
      getActiveCells(views).fill(Cell.Dead);
      resetGeneration();
      invalidateDiff();
    },
  };

  return api;
};

export type Universe = ReturnType<typeof createUniverse>;
