import { haltSystem, startSystem, StartedSystem } from "braided";
import type { LifeConfigInput } from "./life/vocabulary/schemas/config";
import { config, createConfigResource } from "./resources/config";
import { randomness } from "./resources/randomness";
import { runtimeStore } from "./resources/runtimeStore";
import { simulation } from "./resources/simulation";
import { universe } from "./resources/universe";

export const systemConfig = {
  config,
  randomness,
  runtimeStore,
  universe,
  simulation,
};

/**
 * Same resources with config overrides layered over the environment.
 */
export const createLifeSystemConfig = (overrides: LifeConfigInput = {}) => ({
  ...systemConfig,
  config: createConfigResource(overrides),
});

export type LifeSystemConfig = ReturnType<typeof createLifeSystemConfig>;
export type LifeSystem = StartedSystem<LifeSystemConfig>;

export class SystemStartError extends Error {
  readonly errors: ReadonlyMap<string, unknown>;

  constructor(errors: ReadonlyMap<string, unknown>) {
    super(
      `System started with ${errors.size} error(s): ${Array.from(errors.keys()).join(", ")}`
    );
    this.name = "SystemStartError";
    this.errors = errors;
  }
}

/**
 * Start every resource in dependency order. Resources that did start are
 * halted again when any of them failed.
 */
export async function startLifeSystem(overrides: LifeConfigInput = {}) {
  const lifeSystemConfig = createLifeSystemConfig(overrides);
  const { system, errors } = await startSystem(lifeSystemConfig);

  if (errors.size > 0) {
    errors.forEach((error, resourceId) => {
      console.error(`[system] ${resourceId} failed to start:`, error);
    });
    await haltSystem(lifeSystemConfig, system);
    throw new SystemStartError(errors);
  }

  return {
    system,
    halt: () => haltSystem(lifeSystemConfig, system),
  };
}
