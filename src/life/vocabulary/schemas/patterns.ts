import { z } from "zod";

/**
 * Pattern Schemas
 *
 * Patterns are written as plaintext rows: `O` is an alive cell, `.` is a
 * dead one. Rows may be shorter than the widest row; the missing tail is
 * dead. Dead cells are never stamped, so insertion is an overlay.
 */

export const patternRowSchema = z
  .string()
  .regex(/^[.O]*$/, "pattern rows may only contain '.' and 'O'");

export const patternDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  period: z.number().int().positive().optional(), // Oscillation or travel period
  rows: z.array(patternRowSchema).min(1),
});

export type PatternDefinition = z.infer<typeof patternDefinitionSchema>;

/**
 * Parsed pattern: alive cell offsets relative to the bounding box origin.
 */
export type Pattern = {
  id: string;
  name: string;
  width: number;
  height: number;
  offsets: ReadonlyArray<readonly [row: number, col: number]>;
};
