/**
 * Point-Set Generators
 *
 * A generator is a small tagged descriptor. It is what gets stored and
 * serialized; the points themselves are rebuilt from it.
 */

import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import {
  coinFlipMutation,
  emit,
  type GenContext,
  type VariantFamily,
} from "../core/context/generation";
import type { SNPoint } from "../core/geometry/sn-point";
import { Angle, UnsignedNormFloat } from "../core/numeric/continuous";
import { BooleanValue, Byte, Nibble } from "../core/numeric/discrete";
import { randomSignedNormaliser } from "../core/numeric/normalisers";
import {
  fibonacciRingSizes,
  hexGridPoints,
  linearRingSizes,
  moorePoints,
  originPoints,
  ringPoints,
  sparseGridPoints,
  spiralPoints,
  squaredRingSizes,
  takeRingSizes,
  triGridPoints,
  uniformGridPoints,
  uniformPoints,
  vonNeumannPoints,
} from "./layouts";
import { poissonDisk } from "./poisson";

/** Largest number of points a point set may hold. */
export const MAX_POINTS = 256;

// =============================================================================
// DESCRIPTORS
// =============================================================================

export interface GridCounts {
  readonly xCount: Nibble;
  readonly yCount: Nibble;
}

export type PointSetGenerator =
  | { readonly type: "Origin" }
  | { readonly type: "Moore" }
  | { readonly type: "VonNeumann" }
  | ({ readonly type: "UniformGrid" } & GridCounts)
  | ({ readonly type: "SparseGrid"; readonly xMod: BooleanValue; readonly yMod: BooleanValue } & GridCounts)
  | ({ readonly type: "HexGrid" } & GridCounts)
  | ({ readonly type: "TriGrid" } & GridCounts)
  | { readonly type: "UniformDistribution"; readonly count: Byte }
  | { readonly type: "Poisson"; readonly count: Byte; readonly radius: UnsignedNormFloat }
  | {
      readonly type: "Spiral";
      readonly count: Byte;
      readonly scalar: UnsignedNormFloat;
      readonly maximum: Angle;
      readonly linear: BooleanValue;
      /** Halved so that one unsigned value spans both square roots and squares. */
      readonly nonlinearityHalved: UnsignedNormFloat;
    }
  | { readonly type: "RandomRings"; readonly maxRings: Nibble }
  | { readonly type: "LinearIncreasingRings"; readonly maxCount: Byte; readonly ringSizeDelta: Nibble }
  | { readonly type: "FibonacciRings"; readonly maxCount: Byte }
  | { readonly type: "SquaredRings"; readonly maxCount: Byte };

export type PointSetGeneratorType = PointSetGenerator["type"];

export const POINT_SET_GENERATOR_TYPES = [
  "Origin",
  "Moore",
  "VonNeumann",
  "UniformGrid",
  "SparseGrid",
  "HexGrid",
  "TriGrid",
  "UniformDistribution",
  "Poisson",
  "Spiral",
  "RandomRings",
  "LinearIncreasingRings",
  "FibonacciRings",
  "SquaredRings",
] as const satisfies readonly PointSetGeneratorType[];

export const ORIGIN_GENERATOR: PointSetGenerator = { type: "Origin" };

// =============================================================================
// RANDOM DESCRIPTORS
// =============================================================================

/** Every variant but Origin, which only serves as the fallback. */
const RANDOM_TYPES = POINT_SET_GENERATOR_TYPES.slice(1);

function randomGridCounts(rng: RandomSource): GridCounts {
  return { xCount: Nibble.random(rng), yCount: Nibble.random(rng) };
}

/**
 * Fresh random descriptor of the given variant.
 */
export function randomGeneratorOfType(
  type: PointSetGeneratorType,
  rng: RandomSource,
): PointSetGenerator {
  switch (type) {
    case "Origin":
    case "Moore":
    case "VonNeumann":
      return { type };
    case "UniformGrid":
    case "HexGrid":
    case "TriGrid":
      return { type, ...randomGridCounts(rng) };
    case "SparseGrid":
      return {
        type,
        ...randomGridCounts(rng),
        xMod: BooleanValue.random(rng),
        yMod: BooleanValue.random(rng),
      };
    case "UniformDistribution":
      return { type, count: Byte.random(rng) };
    case "Poisson":
      return { type, count: Byte.random(rng), radius: UnsignedNormFloat.random(rng) };
    case "Spiral":
      return {
        type,
        count: Byte.random(rng),
        scalar: UnsignedNormFloat.random(rng),
        maximum: Angle.random(rng),
        linear: BooleanValue.random(rng),
        nonlinearityHalved: UnsignedNormFloat.random(rng),
      };
    case "RandomRings":
      return { type, maxRings: Nibble.random(rng) };
    case "LinearIncreasingRings":
      return { type, maxCount: Byte.random(rng), ringSizeDelta: Nibble.random(rng) };
    case "FibonacciRings":
    case "SquaredRings":
      return { type, maxCount: Byte.random(rng) };
  }
}

/**
 * Random descriptor of any variant except Origin.
 */
export function randomPointSetGenerator(rng: RandomSource): PointSetGenerator {
  const type = RANDOM_TYPES[intBelow(rng, RANDOM_TYPES.length)] ?? "Moore";
  return randomGeneratorOfType(type, rng);
}

// =============================================================================
// MUTATION
// =============================================================================

/**
 * Mutate one parameter of the descriptor; parameterless variants are
 * replaced by a random descriptor.
 */
function tweakGenerator(
  generator: PointSetGenerator,
  rng: RandomSource,
  ctx?: GenContext,
): PointSetGenerator {
  const pick = (fields: number): number => intBelow(rng, fields);

  switch (generator.type) {
    case "Origin":
    case "Moore":
    case "VonNeumann":
      return randomPointSetGenerator(rng);
    case "UniformGrid":
    case "HexGrid":
    case "TriGrid":
      return pick(2) === 0
        ? { ...generator, xCount: generator.xCount.mutate(rng, ctx) }
        : { ...generator, yCount: generator.yCount.mutate(rng, ctx) };
    case "SparseGrid":
      switch (pick(4)) {
        case 0:
          return { ...generator, xCount: generator.xCount.mutate(rng, ctx) };
        case 1:
          return { ...generator, yCount: generator.yCount.mutate(rng, ctx) };
        case 2:
          return { ...generator, xMod: generator.xMod.mutate(rng, ctx) };
        default:
          return { ...generator, yMod: generator.yMod.mutate(rng, ctx) };
      }
    case "UniformDistribution":
      return { ...generator, count: generator.count.mutate(rng, ctx) };
    case "Poisson":
      return pick(2) === 0
        ? { ...generator, count: generator.count.mutate(rng, ctx) }
        : { ...generator, radius: generator.radius.mutate(rng, ctx) };
    case "Spiral":
      switch (pick(5)) {
        case 0:
          return { ...generator, count: generator.count.mutate(rng, ctx) };
        case 1:
          return { ...generator, scalar: generator.scalar.mutate(rng, ctx) };
        case 2:
          return { ...generator, maximum: generator.maximum.mutate(rng, ctx) };
        case 3:
          return { ...generator, linear: generator.linear.mutate(rng, ctx) };
        default:
          return { ...generator, nonlinearityHalved: generator.nonlinearityHalved.mutate(rng, ctx) };
      }
    case "RandomRings":
      return { ...generator, maxRings: generator.maxRings.mutate(rng, ctx) };
    case "LinearIncreasingRings":
      return pick(2) === 0
        ? { ...generator, maxCount: generator.maxCount.mutate(rng, ctx) }
        : { ...generator, ringSizeDelta: generator.ringSizeDelta.mutate(rng, ctx) };
    case "FibonacciRings":
    case "SquaredRings":
      return { ...generator, maxCount: generator.maxCount.mutate(rng, ctx) };
  }
}

/**
 * Coin flip between a fresh random descriptor and a one-parameter tweak.
 */
export function mutatePointSetGenerator(
  generator: PointSetGenerator,
  rng: RandomSource,
  ctx?: GenContext,
): PointSetGenerator {
  return coinFlipMutation(
    rng,
    () => randomPointSetGenerator(rng),
    () => tweakGenerator(generator, rng, ctx),
  );
}

// =============================================================================
// POINT GENERATION
// =============================================================================

function buildPoints(
  generator: PointSetGenerator,
  rng: RandomSource,
  ctx?: GenContext,
): SNPoint[] {
  switch (generator.type) {
    case "Origin":
      return originPoints();
    case "Moore":
      return moorePoints();
    case "VonNeumann":
      return vonNeumannPoints();
    case "UniformGrid":
      return uniformGridPoints(generator.xCount.value + 1, generator.yCount.value + 1);
    case "SparseGrid":
      return sparseGridPoints(
        generator.xCount.value + 1,
        generator.yCount.value + 1,
        generator.xMod.value ? 1 : 0,
        generator.yMod.value ? 1 : 0,
      );
    case "HexGrid":
      return hexGridPoints(generator.xCount.value + 1, generator.yCount.value + 1);
    case "TriGrid":
      return triGridPoints(generator.xCount.value + 1, generator.yCount.value + 1);
    case "UniformDistribution":
      return uniformPoints(rng, Math.max(generator.count.value, 2));
    case "Poisson": {
      const count = generator.count.value;
      return poissonDisk(
        rng,
        {
          count: Math.max(count, 4),
          radius: Math.max((2 * generator.radius.value) / Math.max(Math.sqrt(count), 2), 0.01),
          normaliser: randomSignedNormaliser(rng),
        },
        ctx,
      );
    }
    case "Spiral":
      return spiralPoints({
        count: Math.max(generator.count.value, 1),
        scalar: generator.scalar.value,
        maximum: generator.maximum.value,
        linear: generator.linear.value,
        nonlinearity: generator.nonlinearityHalved.value * 2,
      });
    case "RandomRings":
      return ringPoints(
        Array.from({ length: generator.maxRings.value + 1 }, () => Nibble.random(rng).value + 1),
      );
    case "LinearIncreasingRings":
      return ringPoints(
        takeRingSizes(generator.maxCount.value, linearRingSizes(generator.ringSizeDelta.value)),
      );
    case "FibonacciRings":
      return ringPoints(takeRingSizes(generator.maxCount.value, fibonacciRingSizes()));
    case "SquaredRings":
      return ringPoints(takeRingSizes(generator.maxCount.value, squaredRingSizes()));
  }
}

/**
 * Run a generator. Every variant yields between 1 and 256 points; anything
 * else is an invariant violation.
 */
export function generatePoints(
  generator: PointSetGenerator,
  rng: RandomSource,
  ctx?: GenContext,
): SNPoint[] {
  const points = buildPoints(generator, rng, ctx);
  invariant(
    points.length > 0 && points.length <= MAX_POINTS,
    `Generator ${generator.type} produced ${points.length} points`,
    { generator: generator.type, count: points.length },
  );
  return points;
}

export const PointSetGenerators: VariantFamily<PointSetGenerator> = {
  KEY: "PointSetGenerator",
  generate(rng: RandomSource, ctx?: GenContext): PointSetGenerator {
    emit(ctx, "generate", "PointSetGenerator");
    return randomPointSetGenerator(rng);
  },
  mutate(current: PointSetGenerator, rng: RandomSource, ctx?: GenContext): PointSetGenerator {
    emit(ctx, "mutate", "PointSetGenerator");
    return mutatePointSetGenerator(current, rng, ctx);
  },
};
