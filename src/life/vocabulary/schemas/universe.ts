import { z } from "zod";
import { initialStateKeywords } from "../keywords";

/**
 * Universe Schemas - Construction options and copy-out snapshots
 */

export const DEFAULT_WIDTH = 64;
export const DEFAULT_HEIGHT = 64;

export const initialStateSchema = z.enum([
  initialStateKeywords.random, // Every cell drawn from the random source
  initialStateKeywords.empty, // Every cell dead
]);

export type InitialState = z.infer<typeof initialStateSchema>;

export const seedSchema = z.union([z.string(), z.number()]);

/**
 * Any function returning a number in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export const randomSourceSchema = z.custom<RandomSource>(
  (value) => typeof value === "function",
  { message: "random must be a function returning a number in [0, 1)" }
);

/**
 * Options accepted by createUniverse.
 *
 * `random` wins over `seed` when both are given.
 */
export const universeOptionsSchema = z.object({
  width: z.number().int().positive().default(DEFAULT_WIDTH),
  height: z.number().int().positive().default(DEFAULT_HEIGHT),
  initialState: initialStateSchema.default(initialStateKeywords.random),
  seed: seedSchema.optional(),
  random: randomSourceSchema.optional(),
  shared: z.boolean().optional(), // Back the buffers with a SharedArrayBuffer
});

export type UniverseOptions = z.input<typeof universeOptionsSchema>;

/**
 * A row/column pair. Any finite value is wrapped onto the torus; NaN and
 * infinities are rejected.
 */
export const coordinateSchema = z.tuple([
  z.number().finite(),
  z.number().finite(),
]);

export type Coordinate = z.infer<typeof coordinateSchema>;

/**
 * Snapshot - copy-out of the engine-owned buffers for consumers that do
 * not share memory with the engine.
 */
export type UniverseSnapshot = {
  width: number;
  height: number;
  generation: number;
  cells: Uint8Array; // Copy of the current generation
  diff: number[]; // Indices changed by the most recent tick, ascending
};
