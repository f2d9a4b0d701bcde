/**
 * Randomness contract shared by every package.
 *
 * Nothing in the workspace reads a process-global generator: every random
 * choice goes through a `RandomSource` handed in by the caller.
 */

/**
 * A source of uniformly distributed doubles in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: RandomSource, min: number, max: number): number {
  return Math.floor(rng.next() * (max - min + 1)) + min;
}

/**
 * Random integer in [0, bound)
 */
export function intBelow(rng: RandomSource, bound: number): number {
  return Math.floor(rng.next() * bound);
}

/**
 * Random double in [min, max)
 */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * Boolean with given probability of being true
 */
export function probability(rng: RandomSource, chance: number): boolean {
  return rng.next() < chance;
}

/**
 * Fair coin flip
 */
export function coinFlip(rng: RandomSource): boolean {
  return rng.next() < 0.5;
}

/**
 * Random choice from a non-empty array
 */
export function choice<T>(rng: RandomSource, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[intBelow(rng, array.length)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(rng: RandomSource, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}
