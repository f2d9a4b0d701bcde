/**
 * Type Registry
 *
 * Every generatable type keyed by the event key it reports. Collaborators
 * that build values by name (prefetch queues, fuzzers, UIs) look them up
 * here and close over their own randomness source.
 *
 * @example
 * ```typescript
 * const make = () => SUBSTRATE_REGISTRY.PointSet(rng);
 * ```
 */

import type { RandomSource } from "@evoforge/contracts";
import { IndivAutomataRule, LifeLikeAutomataRule, LifeLikeTable } from "./automata/life-like";
import { ElementaryAutomataRule } from "./automata/elementary";
import { NeighbourCountAutomataRule } from "./automata/neighbour-count";
import { PixelNeighbourhoods } from "./automata/neighbourhood";
import { ModulusReseeder } from "./automata/reseeder";
import { BitColors } from "./color/bit-color";
import { ColorBlendFunctions } from "./color/blend";
import { CMYKColor } from "./color/cmyk";
import { HSVColor } from "./color/hsv";
import { LABColor } from "./color/lab";
import { ByteColor, FloatColor, NibbleColor } from "./color/rgba";
import type { GenContext } from "./core/context/generation";
import { DistanceFunctions } from "./core/geometry/distance";
import { IterativeResult } from "./core/geometry/iterative";
import { SNComplex } from "./core/geometry/sn-complex";
import { SNPoint } from "./core/geometry/sn-point";
import { Angle, SignedNormFloat, UnsignedNormFloat } from "./core/numeric/continuous";
import { BooleanValue, Byte, Nibble, SInt, UInt } from "./core/numeric/discrete";
import { SignedNormalisers, UnsignedNormalisers } from "./core/numeric/normalisers";
import { PointSetGenerators } from "./point-sets/generator";
import { PointSet } from "./point-sets/point-set";

export type GenerateFn = (rng: RandomSource, ctx?: GenContext) => unknown;

export const SUBSTRATE_REGISTRY = {
  // Scalars
  [BooleanValue.KEY]: (rng, ctx) => BooleanValue.generate(rng, ctx),
  [Nibble.KEY]: (rng, ctx) => Nibble.generate(rng, ctx),
  [Byte.KEY]: (rng, ctx) => Byte.generate(rng, ctx),
  [UInt.KEY]: (rng, ctx) => UInt.generate(rng, ctx),
  [SInt.KEY]: (rng, ctx) => SInt.generate(rng, ctx),
  [UnsignedNormFloat.KEY]: (rng, ctx) => UnsignedNormFloat.generate(rng, ctx),
  [SignedNormFloat.KEY]: (rng, ctx) => SignedNormFloat.generate(rng, ctx),
  [Angle.KEY]: (rng, ctx) => Angle.generate(rng, ctx),
  SignedNormaliser: (rng, ctx) => SignedNormalisers.generate(rng, ctx),
  UnsignedNormaliser: (rng, ctx) => UnsignedNormalisers.generate(rng, ctx),

  // Geometry
  [SNPoint.KEY]: (rng, ctx) => SNPoint.generate(rng, ctx),
  [SNComplex.KEY]: (rng, ctx) => SNComplex.generate(rng, ctx),
  DistanceFunction: (rng, ctx) => DistanceFunctions.generate(rng, ctx),
  [IterativeResult.KEY]: (rng, ctx) => IterativeResult.generate(rng, ctx),

  // Colors
  BitColor: (rng, ctx) => BitColors.generate(rng, ctx),
  [NibbleColor.KEY]: (rng, ctx) => NibbleColor.generate(rng, ctx),
  [ByteColor.KEY]: (rng, ctx) => ByteColor.generate(rng, ctx),
  [FloatColor.KEY]: (rng, ctx) => FloatColor.generate(rng, ctx),
  [HSVColor.KEY]: (rng, ctx) => HSVColor.generate(rng, ctx),
  [CMYKColor.KEY]: (rng, ctx) => CMYKColor.generate(rng, ctx),
  [LABColor.KEY]: (rng, ctx) => LABColor.generate(rng, ctx),
  ColorBlendFunction: (rng, ctx) => ColorBlendFunctions.generate(rng, ctx),

  // Point sets
  PointSetGenerator: (rng, ctx) => PointSetGenerators.generate(rng, ctx),
  [PointSet.KEY]: (rng, ctx) => PointSet.generate(rng, ctx),

  // Automata
  [ElementaryAutomataRule.KEY]: (rng, ctx) => ElementaryAutomataRule.generate(rng, ctx),
  PixelNeighbourhood: (rng, ctx) => PixelNeighbourhoods.generate(rng, ctx),
  [NeighbourCountAutomataRule.KEY]: (rng, ctx) => NeighbourCountAutomataRule.generate(rng, ctx),
  [LifeLikeTable.KEY]: (rng, ctx) => LifeLikeTable.generate(rng, ctx),
  [IndivAutomataRule.KEY]: (rng, ctx) => IndivAutomataRule.generate(rng, ctx),
  [LifeLikeAutomataRule.KEY]: (rng, ctx) => LifeLikeAutomataRule.generate(rng, ctx),
  [ModulusReseeder.KEY]: (rng, ctx) => ModulusReseeder.generate(rng, ctx),
} satisfies Record<string, GenerateFn>;

export type SubstrateTypeKey = keyof typeof SUBSTRATE_REGISTRY;

export function isSubstrateTypeKey(key: string): key is SubstrateTypeKey {
  return Object.hasOwn(SUBSTRATE_REGISTRY, key);
}
