/**
 * Vocabulary - Single Source of Truth for Life keywords
 *
 * Cell states, pattern ids and event names live here so the engine,
 * the resources and the tests all speak the same words.
 */

// ============================================
// Cell States
// ============================================

/**
 * One byte per cell, so the whole grid can be handed out as a flat
 * Uint8Array without conversion.
 */
export const Cell = {
  Dead: 0,
  Alive: 1,
} as const;

export type Cell = (typeof Cell)[keyof typeof Cell];

// ============================================
// Initial State Keywords
// ============================================

export const initialStateKeywords = {
  random: "random",
  empty: "empty",
} as const;

// ============================================
// Pattern Keywords
// ============================================

export const patternKeywords = {
  glider: "glider",
  pulsar: "pulsar",
  blinker: "blinker",
  block: "block",
  beacon: "beacon",
  toad: "toad",
  lwss: "lwss",
} as const;

// ============================================
// Event Keywords
// ============================================

export const eventKeywords = {
  universe: {
    ticked: "universe/ticked",
    cellToggled: "universe/cellToggled",
    patternInserted: "universe/patternInserted",
    randomized: "universe/randomized",
    cleared: "universe/cleared",
    cellsSet: "universe/cellsSet",
  },
  simulation: {
    refreshed: "simulation/refreshed",
  },
} as const;

// ============================================
// Randomness Domains
// ============================================

export const randomDomainKeywords = {
  randomize: "randomize",
  placement: "placement",
} as const;
