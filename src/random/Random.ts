/**
 * Source of uniform floats in [0, 1). `Math.random` in production,
 * a seeded generator in tests.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * High-quality integer hash (murmurhash3 finalizer).
 */
function hash32(v: number): number {
  v = Math.imul(v ^ (v >>> 16), 0x85ebca6b) >>> 0;
  v = Math.imul(v ^ (v >>> 13), 0xc2b2ae35) >>> 0;
  return (v ^ (v >>> 16)) >>> 0;
}

/**
 * Deterministic counter-based generator. The same seed always yields
 * the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let counter = 0;
  return () => {
    const v = hash32((seed + Math.imul(counter++, 0x9e3779b9)) >>> 0);
    return v / 4294967296;
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(rng() * (max - min + 1));
}

/** True with the given percent chance (0 never, 100 always). */
export function roll(rng: RandomSource, chancePercent: number): boolean {
  if (chancePercent <= 0) return false;
  if (chancePercent >= 100) return true;
  return rng() * 100 < chancePercent;
}

/**
 * Pick an index with probability proportional to its weight, by
 * walking the cumulative sum. Infinite weights outrank every finite one
 * and share the pick evenly. Falls back to a uniform pick when the weights
 * carry no usable mass.
 */
export function weightedIndex(rng: RandomSource, weights: readonly number[]): number {
  if (weights.length === 0) {
    throw new Error("weightedIndex: no candidates");
  }

  const infinite: number[] = [];
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] === Infinity) infinite.push(i);
  }
  if (infinite.length > 0) {
    return infinite[randomInt(rng, 0, infinite.length - 1)];
  }

  let total = 0;
  const cumulative = new Array<number>(weights.length);
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i];
    total += Number.isFinite(w) && w > 0 ? w : 0;
    cumulative[i] = total;
  }

  if (!(total > 0) || !Number.isFinite(total)) {
    return randomInt(rng, 0, weights.length - 1);
  }

  const target = rng() * total;
  // Binary search for the first cumulative value above the target
  let lo = 0;
  let hi = cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (cumulative[mid] > target) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}
