/**
 * Seeded pseudo-random source for scene draws and incidental drift.
 *
 * A single linear stream: every helper consumes exactly one draw, so a fixed
 * seed plus a fixed sequence of choices replays the same playthrough.
 */

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  /** Uniform pick; consumes one draw */
  pick<T>(items: readonly T[]): T;
  /** True with probability p; consumes one draw */
  chance(p: number): boolean;
  /** Restarts the stream as if freshly created with `seed` */
  reseed(seed: number): void;
}

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed: number): RandomSource {
  let next = mulberry32(seed);

  return {
    next() {
      return next();
    },

    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
      }
      return items[Math.floor(next() * items.length)];
    },

    chance(p: number) {
      return next() < p;
    },

    reseed(newSeed: number) {
      next = mulberry32(newSeed);
    },
  };
}
