import { defineResource, StartedResource } from "braided";
import type { ZodIssue } from "zod";
import {
  lifeConfigSchema,
  lifeEnvSchema,
  type LifeConfig,
  type LifeConfigInput,
} from "@/life/vocabulary/schemas/config";

export class InvalidConfigError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

const emptyToUndefined = (value: string | undefined) =>
  value === undefined || value.trim() === "" ? undefined : value;

/**
 * Build a validated config from environment variables, overrides winning.
 */
export function parseLifeConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: LifeConfigInput = {}
): LifeConfig {
  const vars = lifeEnvSchema.parse(env);

  const fromEnv = {
    width: emptyToUndefined(vars.LIFE_WIDTH),
    height: emptyToUndefined(vars.LIFE_HEIGHT),
    initialState: emptyToUndefined(vars.LIFE_INITIAL_STATE),
    seed: emptyToUndefined(vars.LIFE_SEED),
    speed: emptyToUndefined(vars.LIFE_SPEED),
    tickIntervalMs: emptyToUndefined(vars.LIFE_TICK_INTERVAL_MS),
    maxGenerations: emptyToUndefined(vars.LIFE_MAX_GENERATIONS),
  };

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = lifeConfigSchema.safeParse({ ...fromEnv, ...defined });
  if (!result.success) {
    throw new InvalidConfigError(result.error.issues);
  }
  return result.data;
}

/**
 * Config resource factory. Tests and embedders pass overrides; the
 * default `config` resource reads process.env only.
 */
export const createConfigResource = (overrides: LifeConfigInput = {}) =>
  defineResource({
    start: (): LifeConfig => {
      const config = parseLifeConfig(process.env, overrides);
      console.log(
        `[config] ${config.width}x${config.height}, initial: ${config.initialState}, speed: ${config.speed}`
      );
      return config;
    },
    halt: () => {
      // No cleanup needed for config
    },
  });

export const config = createConfigResource();

export type ConfigResource = StartedResource<typeof config>;
