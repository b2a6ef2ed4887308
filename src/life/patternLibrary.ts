import { patternKeywords } from "./vocabulary/keywords";
import type { PatternDefinition } from "./vocabulary/schemas/patterns";

/**
 * Built-in patterns, bounding box anchored at the top-left cell.
 */

export const glider: PatternDefinition = {
  id: patternKeywords.glider,
  name: "Glider",
  description: "Travels one cell down and one cell right every 4 generations",
  period: 4,
  rows: [
    ".O.",
    "..O",
    "OOO",
  ],
};

export const pulsar: PatternDefinition = {
  id: patternKeywords.pulsar,
  name: "Pulsar",
  description: "Period 3 oscillator, 48 cells, symmetric in both axes",
  period: 3,
  rows: [
    "..OOO...OOO..",
    ".............",
    "O....O.O....O",
    "O....O.O....O",
    "O....O.O....O",
    "..OOO...OOO..",
    ".............",
    "..OOO...OOO..",
    "O....O.O....O",
    "O....O.O....O",
    "O....O.O....O",
    ".............",
    "..OOO...OOO..",
  ],
};

export const blinker: PatternDefinition = {
  id: patternKeywords.blinker,
  name: "Blinker",
  description: "Period 2 oscillator, flips between a row and a column",
  period: 2,
  rows: ["OOO"],
};

export const block: PatternDefinition = {
  id: patternKeywords.block,
  name: "Block",
  description: "Still life",
  period: 1,
  rows: ["OO", "OO"],
};

export const beacon: PatternDefinition = {
  id: patternKeywords.beacon,
  name: "Beacon",
  description: "Period 2 oscillator made of two diagonal blocks",
  period: 2,
  rows: ["OO..", "OO..", "..OO", "..OO"],
};

export const toad: PatternDefinition = {
  id: patternKeywords.toad,
  name: "Toad",
  description: "Period 2 oscillator",
  period: 2,
  rows: [".OOO", "OOO."],
};

export const lwss: PatternDefinition = {
  id: patternKeywords.lwss,
  name: "Lightweight spaceship",
  description: "Travels two cells left every 4 generations",
  period: 4,
  rows: [".O..O", "O....", "O...O", "OOOO."],
};

export const patternLibrary = {
  [patternKeywords.glider]: glider,
  [patternKeywords.pulsar]: pulsar,
  [patternKeywords.blinker]: blinker,
  [patternKeywords.block]: block,
  [patternKeywords.beacon]: beacon,
  [patternKeywords.toad]: toad,
  [patternKeywords.lwss]: lwss,
} as const satisfies Record<string, PatternDefinition>;

export type PatternId = keyof typeof patternLibrary;

export const isPatternId = (id: string): id is PatternId =>
  Object.prototype.hasOwnProperty.call(patternLibrary, id);
