import { defineResource, StartedResource } from "braided";
import { createUniverse } from "@/life/universe";
import { randomDomainKeywords } from "@/life/vocabulary/keywords";
import type { ConfigResource } from "./config";
import type { RandomnessResource } from "./randomness";

/**
 * Universe Resource
 *
 * Depends on: config (dimensions, initial state), randomness (fill stream)
 * Used by: simulation
 */
export const universe = defineResource({
  dependencies: ["config", "randomness"],
  start: ({
    config,
    randomness,
  }: {
    config: ConfigResource;
    randomness: RandomnessResource;
  }) => {
    const instance = createUniverse({
      width: config.width,
      height: config.height,
      initialState: config.initialState,
      random: randomness.domain(randomDomainKeywords.randomize).next,
    });

    console.log(
      `[universe] Created ${instance.width()}x${instance.height()} (${config.initialState}), ${instance.living()} alive`
    );

    return instance;
  },
  halt: () => {
    // Memory is released with the instance
  },
});

export type UniverseResource = StartedResource<typeof universe>;
