import { defineResource, StartedResource } from "braided";
import { z } from "zod";
import { createSubscription } from "@/lib/state";
import { createUpdateLoop } from "@/lib/updateLoop";
import type { Universe } from "@/life/universe";
import { eventKeywords } from "@/life/vocabulary/keywords";
import type { Coordinate } from "@/life/vocabulary/schemas/universe";
import type { ConfigResource } from "./config";
import type { RuntimeStoreResource } from "./runtimeStore";
import type { UniverseResource } from "./universe";

/**
 * Frames published to renderers.
 *
 * - diff: a tick happened; patch the cells listed in `diff`
 * - full: the grid was mutated outside a tick; redraw all of `cells`
 *
 * Both carry views into universe memory, valid until the next engine call.
 */
export const simulationFrameSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("diff"),
    event: z.literal(eventKeywords.universe.ticked),
    generation: z.number(),
    changed: z.number(),
    cells: z.instanceof(Uint8Array),
    diff: z.instanceof(Int32Array),
  }),
  z.object({
    type: z.literal("full"),
    event: z.string(),
    generation: z.number(),
    cells: z.instanceof(Uint8Array),
  }),
]);

export type SimulationFrame = z.infer<typeof simulationFrameSchema>;

export const speedSchema = z.number().gt(0).max(1);

/**
 * Simulation Resource
 *
 * Drives the universe from a timer loop with a speed throttle: every
 * update adds `speed` to an accumulator and a tick runs once it reaches 1,
 * so speed 0.2 ticks on every fifth update.
 *
 * Depends on: config, universe, runtimeStore
 */
export const simulation = defineResource({
  dependencies: ["config", "universe", "runtimeStore"],
  start: ({
    config,
    universe,
    runtimeStore,
  }: {
    config: ConfigResource;
    universe: UniverseResource;
    runtimeStore: RuntimeStoreResource;
  }) => {
    let speed = config.speed;
    let accumulator = 0;

    const frameSubscription = createSubscription<SimulationFrame>();

    const syncStore = () => {
      runtimeStore.update({
        generation: universe.generation(),
        living: universe.living(),
        changed: universe.changedCount(),
        isRunning: updateLoop.isRunning(),
        isPaused: updateLoop.isPaused(),
        speed,
      });
    };

    const publishDiff = () => {
      frameSubscription.notify({
        type: "diff",
        event: eventKeywords.universe.ticked,
        generation: universe.generation(),
        changed: universe.changedCount(),
        cells: universe.cells(),
        diff: universe.diff(),
      });
    };

    const publishFull = (event: string) => {
      frameSubscription.notify({
        type: "full",
        event,
        generation: universe.generation(),
        cells: universe.cells(),
      });
    };

    const tick = () => {
      universe.tick();
      syncStore();
      publishDiff();
    };

    const updateLoop = createUpdateLoop({
      onStart: () => {
        console.log("[simulation] Started");
        syncStore();
      },
      onStop: () => {
        console.log("[simulation] Stopped");
        syncStore();
      },
      onPause: () => {
        syncStore();
      },
      onUpdate: () => {
        accumulator += speed;
        if (accumulator >= 1) {
          accumulator = 0;
          tick();
        }
      },
      getIntervalMs: () => config.tickIntervalMs,
    });

    /**
     * Run a mutation and publish a full frame, since mutations may touch
     * any number of cells the diff does not track.
     */
    const mutate = (event: string, mutation: (universe: Universe) => void) => {
      mutation(universe);
      syncStore();
      publishFull(event);
    };

    const stop = () => {
      updateLoop.stop();
      accumulator = 0;
    };

    syncStore();

    return {
      start: () => updateLoop.start(),
      stop,
      pause: () => updateLoop.pause(),
      resume: () => updateLoop.start(),
      isRunning: () => updateLoop.isRunning(),
      isPaused: () => updateLoop.isPaused(),

      /** Advance one generation now, regardless of the loop state */
      step: () => tick(),

      getSpeed: () => speed,
      setSpeed: (newSpeed: number) => {
        speed = speedSchema.parse(newSpeed);
        syncStore();
        console.log(`[simulation] Speed set to ${speed}`);
      },

      toggleCell: (row: number, col: number) =>
        mutate(eventKeywords.universe.cellToggled, (u) => u.toggleCell(row, col)),
      setCells: (coordinates: ReadonlyArray<Coordinate>) =>
        mutate(eventKeywords.universe.cellsSet, (u) => u.setCells(coordinates)),
      insertGlider: (row: number, col: number) =>
        mutate(eventKeywords.universe.patternInserted, (u) =>
          u.insertGlider(row, col)
        ),
      insertPulsar: (row: number, col: number) =>
        mutate(eventKeywords.universe.patternInserted, (u) =>
          u.insertPulsar(row, col)
        ),
      insertPattern: (patternId: string, row: number, col: number) =>
        mutate(eventKeywords.universe.patternInserted, (u) =>
          u.insertPattern(patternId, row, col)
        ),
      randomize: () =>
        mutate(eventKeywords.universe.randomized, (u) => u.randomize()),
      clear: () => mutate(eventKeywords.universe.cleared, (u) => u.clear()),

      /** Subscribe to frames; returns the unsubscribe function */
      onFrame: (callback: (frame: SimulationFrame) => void) =>
        frameSubscription.subscribe(callback),

      /** Publish the current grid as a full frame (initial draw) */
      refresh: () => publishFull(eventKeywords.simulation.refreshed),

      halt: () => {
        stop();
        frameSubscription.clear();
      },
    };
  },
  halt: ({ halt }) => {
    halt();
  },
});

export type SimulationResource = StartedResource<typeof simulation>;
