import { PatternParseError, UnknownPatternError } from "./errors";
import { getWrappedIndex } from "./grid";
import { isPatternId, patternLibrary } from "./patternLibrary";
import { Cell } from "./vocabulary/keywords";
import {
  patternDefinitionSchema,
  type Pattern,
  type PatternDefinition,
} from "./vocabulary/schemas/patterns";

const ALIVE_GLYPH = "O";

const parsedLibrary = new Map<string, Pattern>();

/**
 * Turn plaintext rows into alive-cell offsets.
 */
export const parsePattern = (definition: PatternDefinition): Pattern => {
  const result = patternDefinitionSchema.safeParse(definition);
  if (!result.success) {
    throw new PatternParseError(definition.id, result.error.issues);
  }

  const { id, name, rows } = result.data;
  const offsets: Array<readonly [number, number]> = [];

  rows.forEach((line, row) => {
    for (let col = 0; col < line.length; col++) {
      if (line[col] === ALIVE_GLYPH) {
        offsets.push([row, col]);
      }
    }
  });

  return {
    id,
    name,
    width: Math.max(...rows.map((line) => line.length)),
    height: rows.length,
    offsets,
  };
};

/**
 * Parsed library pattern, cached after the first lookup.
 */
export const getPattern = (id: string): Pattern => {
  const cached = parsedLibrary.get(id);
  if (cached) return cached;

  if (!isPatternId(id)) {
    throw new UnknownPatternError(id);
  }

  const pattern = parsePattern(patternLibrary[id]);
  parsedLibrary.set(id, pattern);
  return pattern;
};

/**
 * Overlay `pattern` with its bounding box at (row, col). Alive cells are
 * written through the same toroidal wrap the step uses; every other cell
 * keeps its state.
 */
export const stampPattern = (
  cells: Uint8Array,
  width: number,
  height: number,
  pattern: Pattern,
  row: number,
  col: number
): void => {
  for (const [dr, dc] of pattern.offsets) {
    cells[getWrappedIndex(width, height, row + dr, col + dc)] = Cell.Alive;
  }
};
