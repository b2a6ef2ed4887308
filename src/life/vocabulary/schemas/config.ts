import { z } from "zod";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, initialStateSchema } from "./universe";

/**
 * Runtime configuration, read from the environment:
 *
 * - LIFE_WIDTH / LIFE_HEIGHT: grid size in cells
 * - LIFE_INITIAL_STATE: "random" or "empty"
 * - LIFE_SEED: master seed; a fresh one is generated when unset
 * - LIFE_SPEED: generations per update, accumulated (0.2 = one tick every 5 updates)
 * - LIFE_TICK_INTERVAL_MS: delay between updates of the simulation loop
 * - LIFE_MAX_GENERATIONS: stop the demo after this many generations (0 = never)
 */
export const lifeConfigSchema = z.object({
  width: z.coerce.number().int().positive().default(DEFAULT_WIDTH),
  height: z.coerce.number().int().positive().default(DEFAULT_HEIGHT),
  initialState: initialStateSchema.default("random"),
  seed: z.string().min(1).optional(),
  speed: z.coerce.number().gt(0).max(1).default(0.2),
  tickIntervalMs: z.coerce.number().int().nonnegative().default(16),
  maxGenerations: z.coerce.number().int().nonnegative().default(0),
});

export type LifeConfig = z.infer<typeof lifeConfigSchema>;
export type LifeConfigInput = z.input<typeof lifeConfigSchema>;

export const lifeEnvSchema = z.object({
  LIFE_WIDTH: z.string().optional(),
  LIFE_HEIGHT: z.string().optional(),
  LIFE_INITIAL_STATE: z.string().optional(),
  LIFE_SEED: z.string().optional(),
  LIFE_SPEED: z.string().optional(),
  LIFE_TICK_INTERVAL_MS: z.string().optional(),
  LIFE_MAX_GENERATIONS: z.string().optional(),
});
