import { defineResource, StartedResource } from "braided";
import { createStore, type StoreApi } from "zustand/vanilla";
import type { ConfigResource } from "./config";

/**
 * Runtime state read by whoever drives or displays the simulation.
 * The simulation resource is the only writer.
 */
export type LifeRuntimeState = {
  generation: number;
  living: number;
  changed: number; // Cells flipped by the last tick
  isRunning: boolean;
  isPaused: boolean;
  speed: number;
};

export type RuntimeStoreApi = StoreApi<LifeRuntimeState>;

export const runtimeStore = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }) => {
    const initialState: LifeRuntimeState = {
      generation: 1,
      living: 0,
      changed: 0,
      isRunning: false,
      isPaused: false,
      speed: config.speed,
    };

    const store: RuntimeStoreApi = createStore<LifeRuntimeState>()(
      () => initialState
    );

    const update = (patch: Partial<LifeRuntimeState>) => {
      store.setState(patch);
    };

    return { store, update };
  },
  halt: () => {
    // No cleanup needed for zustand store
  },
});

export type RuntimeStoreResource = StartedResource<typeof runtimeStore>;
