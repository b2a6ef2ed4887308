/**
 * Randomness Resource - Hierarchical Seeded RNG
 *
 * One master seed per run, domain streams per consumer. The seed comes
 * from config (LIFE_SEED) or is generated, and is logged so any run can
 * be replayed.
 *
 * Domains:
 * - randomize: initial fill and randomize() of the universe
 * - placement: where the demo drops patterns
 */

import { defineResource, StartedResource } from "braided";
import {
  createSeededRNG,
  generateRandomSeed,
  type DomainRNG,
} from "@/lib/seededRandom";
import type { ConfigResource } from "./config";

export interface RandomnessResource {
  getMasterSeed(): string;

  domain(name: string): DomainRNG;

  getDomains(): string[];
}

export const randomness = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }): RandomnessResource => {
    const seed = config.seed ?? generateRandomSeed();
    const rng = createSeededRNG(seed);

    console.log(
      `[randomness] Initialized with seed: "${seed}" (${rng.getMasterSeedNumber()})`
    );

    return {
      getMasterSeed: () => rng.getMasterSeed(),
      domain: (name: string) => rng.domain(name),
      getDomains: () => rng.getDomains(),
    };
  },
  halt: () => {
    // No cleanup needed - RNG holds no handles
  },
});

export type RandomnessResourceInstance = StartedResource<typeof randomness>;
