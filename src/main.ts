/**
 * Terminal demo: runs the simulation and redraws the grid in place.
 *
 * LIFE_* environment variables configure it (see schemas/config.ts).
 * With LIFE_INITIAL_STATE=empty a few gliders and a pulsar are dropped
 * at seeded positions so there is something to watch.
 */

import { renderTextFrame } from "./life/textFrame";
import {
  initialStateKeywords,
  randomDomainKeywords,
} from "./life/vocabulary/keywords";
import { startLifeSystem } from "./system";

const CURSOR_HOME = "\x1b[H";
const CLEAR_SCREEN = "\x1b[2J";

async function main() {
  const { system, halt } = await startLifeSystem();
  const { config, simulation, runtimeStore, randomness, universe } = system;

  const draw = () => {
    const { generation, living, changed } = runtimeStore.store.getState();
    process.stdout.write(
      `${CURSOR_HOME}${renderTextFrame(universe.cells(), universe.width(), universe.height(), { alive: "#", dead: " " })}\n` +
        `generation ${generation}  alive ${living}  changed ${changed}\n`
    );
  };

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    halt()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[main] Failed to halt system", error);
        process.exit(1);
      });
  };

  simulation.onFrame(() => {
    draw();
    if (
      config.maxGenerations > 0 &&
      runtimeStore.store.getState().generation >= config.maxGenerations
    ) {
      shutdown();
    }
  });

  if (config.initialState === initialStateKeywords.empty) {
    const placement = randomness.domain(randomDomainKeywords.placement);
    for (let i = 0; i < 4; i++) {
      simulation.insertGlider(
        placement.intRange(0, config.height),
        placement.intRange(0, config.width)
      );
    }
    simulation.insertPulsar(
      placement.intRange(0, config.height),
      placement.intRange(0, config.width)
    );
  }

  process.stdout.write(CLEAR_SCREEN);
  simulation.refresh();
  simulation.start();

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("[main] Failed to start", error);
  process.exit(1);
});
