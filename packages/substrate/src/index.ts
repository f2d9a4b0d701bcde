/**
 * @evoforge/substrate
 *
 * Bounded numeric, geometric and color types, point-set generators and
 * cellular-automaton rules for an evolutionary procedural-content
 * generator. Every random choice reads an explicit `RandomSource`.
 *
 * @example
 * ```typescript
 * import { SeededRandom } from "@evoforge/contracts";
 * import { PointSet, validateSubstrateConfig } from "@evoforge/substrate";
 *
 * const config = validateSubstrateConfig({ poissonAttempts: 20 }).getOrThrow();
 * const rng = new SeededRandom(42);
 * const points = PointSet.generate(rng, { config });
 * ```
 */

export * from "./automata";
export * from "./color";
export * from "./core";
export * from "./point-sets";
export * from "./registry";
export * from "./serialization";
