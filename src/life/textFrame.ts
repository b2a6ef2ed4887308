import { Cell } from "./vocabulary/keywords";

export type TextFrameGlyphs = {
  alive: string;
  dead: string;
};

export const defaultGlyphs: TextFrameGlyphs = { alive: "O", dead: "." };

/**
 * One string per grid row, same glyphs as pattern definitions by default.
 */
export const toRows = (
  cells: Uint8Array,
  width: number,
  height: number,
  glyphs: TextFrameGlyphs = defaultGlyphs
): string[] => {
  const rows: string[] = [];
  for (let row = 0; row < height; row++) {
    let line = "";
    for (let col = 0; col < width; col++) {
      line += cells[row * width + col] === Cell.Alive ? glyphs.alive : glyphs.dead;
    }
    rows.push(line);
  }
  return rows;
};

export const renderTextFrame = (
  cells: Uint8Array,
  width: number,
  height: number,
  glyphs: TextFrameGlyphs = defaultGlyphs
): string => toRows(cells, width, height, glyphs).join("\n");
