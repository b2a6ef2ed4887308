export { createUniverse, type Universe } from "./life/universe";
export {
  DIFF_SENTINEL,
  applyDiff,
  diffLength,
  forEachChanged,
  readDiff,
} from "./life/diff";
export {
  countAlive,
  getIndex,
  nextCellState,
  stepGrid,
  wrap,
} from "./life/grid";
export { getPattern, parsePattern, stampPattern } from "./life/patterns";
export { patternLibrary, type PatternId } from "./life/patternLibrary";
export { renderTextFrame, toRows } from "./life/textFrame";
export {
  InvalidCoordinateError,
  InvalidUniverseOptionsError,
  PatternParseError,
  UnknownPatternError,
} from "./life/errors";
export { Cell, patternKeywords, eventKeywords } from "./life/vocabulary/keywords";
export type {
  Coordinate,
  InitialState,
  RandomSource,
  UniverseOptions,
  UniverseSnapshot,
} from "./life/vocabulary/schemas/universe";
export type {
  Pattern,
  PatternDefinition,
} from "./life/vocabulary/schemas/patterns";
export type { UniverseBufferLayout } from "./lib/sharedMemory";
export {
  createLifeSystemConfig,
  startLifeSystem,
  systemConfig,
  SystemStartError,
  type LifeSystem,
} from "./system";
export { InvalidConfigError, parseLifeConfig } from "./resources/config";
export type { SimulationFrame } from "./resources/simulation";
