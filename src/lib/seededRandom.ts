/**
 * Seeded Random Number Generator (RNG)
 *
 * A single master seed yields independent, reproducible streams per
 * domain, so reseeding one consumer never shifts another's sequence.
 *
 * @example
 * const rng = createSeededRNG("glider-gun");
 * const fill = rng.domain("randomize");
 * fill.chance(0.5); // Same answer for the same seed, every run
 */

/**
 * cyrb53 string hash
 */
function hashString(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;

  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }

  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);

  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Mulberry32 - returns values in [0, 1) like Math.random()
 */
function createPRNG(seed: number) {
  let state = seed;

  return function next(): number {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface DomainRNG {
  /** Next number in [0, 1) */
  next(): number;

  /** Random integer in [min, max) */
  intRange(min: number, max: number): number;

  /** True with the given probability (0-1) */
  chance(probability: number): boolean;
}

function createDomainRNG(seed: number): DomainRNG {
  const prng = createPRNG(seed);

  return {
    next: () => prng(),

    intRange: (min: number, max: number) => {
      return Math.floor(min + prng() * (max - min));
    },

    chance: (probability: number) => {
      return prng() < probability;
    },
  };
}

export interface SeededRNG {
  getMasterSeed(): string;

  getMasterSeedNumber(): number;

  /** Get or create a domain-specific RNG */
  domain(name: string): DomainRNG;

  getDomains(): string[];
}

export function createSeededRNG(masterSeed: string | number): SeededRNG {
  const masterSeedStr = String(masterSeed);
  const masterSeedNum =
    typeof masterSeed === "number" ? masterSeed : hashString(masterSeedStr);

  const domains = new Map<string, DomainRNG>();

  return {
    getMasterSeed: () => masterSeedStr,
    getMasterSeedNumber: () => masterSeedNum,

    domain: (name: string) => {
      const existing = domains.get(name);
      if (existing) return existing;

      // Domain seed = hash("masterSeed:domainName")
      const created = createDomainRNG(hashString(`${masterSeedStr}:${name}`));
      domains.set(name, created);
      return created;
    },

    getDomains: () => Array.from(domains.keys()),
  };
}

/**
 * Fresh seed for runs that did not ask for one: timestamp + random suffix
 */
export function generateRandomSeed(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}
