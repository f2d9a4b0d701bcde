/**
 * Distance functions over the signed unit square.
 *
 * Euclidean and Manhattan are halved so the distance between the origin and
 * a unit-axis point is 0.5.
 */

import { choice, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext, type VariantFamily } from "../context/generation";
import { UnsignedNormFloat } from "../numeric/continuous";
import type { UnsignedNormaliser } from "../numeric/normalisers";
import type { SNPoint } from "./sn-point";

export const DISTANCE_FUNCTIONS = ["euclidean", "manhattan", "chebyshev", "minimum"] as const;

export type DistanceFunction = (typeof DISTANCE_FUNCTIONS)[number];

export function calculateDistance(fn: DistanceFunction, a: SNPoint, b: SNPoint): number {
  const dx = Math.abs(b.x.value - a.x.value);
  const dy = Math.abs(b.y.value - a.y.value);
  switch (fn) {
    case "euclidean":
      return Math.hypot(dx, dy) * 0.5;
    case "manhattan":
      return (dx + dy) * 0.5;
    case "chebyshev":
      return Math.max(dx, dy);
    case "minimum":
      return Math.min(dx, dy);
  }
}

/**
 * Distance folded into [0, 1] by an unsigned normaliser.
 */
export function calculateNormalisedDistance(
  fn: DistanceFunction,
  a: SNPoint,
  b: SNPoint,
  normaliser: UnsignedNormaliser,
  rng: RandomSource,
): UnsignedNormFloat {
  return UnsignedNormFloat.normalise(normaliser, calculateDistance(fn, a, b), rng);
}

export const DistanceFunctions: VariantFamily<DistanceFunction> = {
  KEY: "DistanceFunction",
  generate(rng: RandomSource, ctx?: GenContext): DistanceFunction {
    emit(ctx, "generate", "DistanceFunction");
    return choice(rng, DISTANCE_FUNCTIONS);
  },
  mutate(_current: DistanceFunction, rng: RandomSource, ctx?: GenContext): DistanceFunction {
    emit(ctx, "mutate", "DistanceFunction");
    return choice(rng, DISTANCE_FUNCTIONS);
  },
};
