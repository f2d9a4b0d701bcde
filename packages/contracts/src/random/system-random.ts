/**
 * Unseeded randomness.
 *
 * Everything in the substrate reads an explicit `RandomSource`; this module
 * only supplies a fresh seed for callers that have none, such as reloading
 * a serialized point set whose generator is stochastic.
 */

import { SeededRandom } from "./seeded-random";

let seedCounter = 0;

/**
 * Seed derived from the clock and a per-process counter, used when Web
 * Crypto is absent.
 */
function clockSeed(): number {
  seedCounter = (seedCounter + 0x9e3779b9) >>> 0;
  return new SeededRandom((Date.now() ^ seedCounter) >>> 0).nextUint32();
}

/**
 * Unsigned 32-bit seed from Web Crypto, else from the clock.
 */
export function randomSeed(): number {
  const source = globalThis.crypto;
  if (typeof source?.getRandomValues === "function") {
    const [value] = source.getRandomValues(new Uint32Array(1));
    if (value !== undefined) return value >>> 0;
  }
  return clockSeed();
}

/**
 * A fresh generator with an unpredictable seed.
 */
export function createSystemRandom(): SeededRandom {
  return new SeededRandom(randomSeed());
}
