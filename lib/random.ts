/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** mulberry32: small, fast and reproducible for a given 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pickIndex(length: number, random: RandomSource): number {
  if (length <= 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return Math.min(length - 1, Math.floor(random() * length));
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  return items[pickIndex(items.length, random)];
}
