/**
 * Returns a float in [0, 1). Math.random satisfies this signature.
 */
export type RandomSource = () => number;

/**
 * Seeded mulberry32 generator so training runs and simulated games can be
 * replayed.
 */
export function createRandom(seed: number = Date.now()): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(random() * maxExclusive));
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomInt(random, items.length)];
}
