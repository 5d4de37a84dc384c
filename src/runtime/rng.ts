export const SEED_ENV = "SCREENSAVER_SEED";

export interface RandomGenerator {
  /** Uniform in [0, 1). */
  next(): number;
  /** 32-bit seed the sequence started from; passing it back replays the run. */
  readonly seed: number;
}

/** FNV-1a over UTF-16 code units. */
const hashSeedText = (text: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

const freshSeed = (): number => Math.floor(Math.random() * 2 ** 32);

/**
 * Turns a configured seed into a 32-bit one. Numeric text such as the value
 * of `SCREENSAVER_SEED=42` means the number, other text is hashed, and an
 * absent or blank seed draws a fresh one for this launch.
 */
export const resolveSeed = (
  seed: string | number | undefined,
  fallback: () => number = freshSeed,
): number => {
  if (typeof seed === "number") {
    return Number.isFinite(seed) ? seed >>> 0 : fallback() >>> 0;
  }
  const text = seed?.trim() ?? "";
  if (text.length === 0) {
    return fallback() >>> 0;
  }
  return /^\d+$/.test(text) ? Number(text) >>> 0 : hashSeedText(text);
};

/** mulberry32 stepped from `seed`. */
export const createRandomGenerator = (seed?: string | number): RandomGenerator => {
  const start = resolveSeed(seed);
  let state = start;
  return {
    seed: start,
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
};
