/**
 * Source of uniform integers in the closed range [0, maxInclusive].
 */
export type RandomInt = (maxInclusive: number) => number;

const scale = (unit: number, maxInclusive: number): number =>
  Math.floor(unit * (maxInclusive + 1));

export const mathRandomInt: RandomInt = (maxInclusive) => scale(Math.random(), maxInclusive);

/**
 * Deterministic source (mulberry32) for reproducible draws, e.g. `--seed`
 * on the command line or fixed-seed tests.
 *
 * Two 32-bit outputs make one 53-bit unit, so every integer up to
 * Number.MAX_SAFE_INTEGER stays reachable.
 */
export const seededRandomInt = (seed: number): RandomInt => {
  let state = seed >>> 0;
  const next32 = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
  const nextUnit = (): number => {
    const high = next32() >>> 5; // 27 bits
    const low = next32() >>> 6; // 26 bits
    return (high * 2 ** 26 + low) / 2 ** 53;
  };
  return (maxInclusive) => scale(nextUnit(), maxInclusive);
};
