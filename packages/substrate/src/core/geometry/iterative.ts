/**
 * Escape-time iteration over the complex plane.
 */

import { coinFlip, type RandomSource } from "@evoforge/contracts";
import { coinFlipMutation, emit, type GenContext } from "../context/generation";
import { Byte } from "../numeric/discrete";
import type { SignedNormaliser } from "../numeric/normalisers";
import { SNComplex } from "./sn-complex";

/**
 * Unbounded complex value used while iterating.
 */
export interface ComplexValue {
  readonly re: number;
  readonly im: number;
}

export interface EscapeTimeResult {
  readonly z: ComplexValue;
  readonly iterations: number;
}

/**
 * Iterate `z = iterate(z, i)` until `escape(z, i)` holds or the budget runs
 * out. The escape test runs before each step, so an escaping seed reports 0.
 */
export function escapeTimeSystem(
  c: ComplexValue,
  maxIterations: number,
  iterate: (z: ComplexValue, i: number) => ComplexValue,
  escape: (z: ComplexValue, i: number) => boolean,
): EscapeTimeResult {
  let z = c;
  for (let i = 0; i < maxIterations; i++) {
    if (escape(z, i)) {
      return { z, iterations: i };
    }
    z = iterate(z, i);
  }
  return { z, iterations: maxIterations };
}

/**
 * Final value and iteration count of an escape-time run, packed into
 * bounded types.
 */
export class IterativeResult {
  static readonly KEY = "IterativeResult";

  constructor(
    readonly zFinal: SNComplex,
    readonly iterFinal: Byte,
  ) {}

  static fromEscapeTime(
    result: EscapeTimeResult,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): IterativeResult {
    return new IterativeResult(
      SNComplex.normalised(result.z.re, result.z.im, normaliser, rng),
      Byte.saturating(result.iterations),
    );
  }

  static generate(rng: RandomSource, ctx?: GenContext): IterativeResult {
    emit(ctx, "generate", IterativeResult.KEY);
    return new IterativeResult(SNComplex.generate(rng, ctx), Byte.generate(rng, ctx));
  }

  mutate(rng: RandomSource, ctx?: GenContext): IterativeResult {
    emit(ctx, "mutate", IterativeResult.KEY);
    return coinFlipMutation(
      rng,
      () => IterativeResult.generate(rng, ctx),
      () =>
        coinFlip(rng)
          ? new IterativeResult(this.zFinal.mutate(rng, ctx), this.iterFinal)
          : new IterativeResult(this.zFinal, this.iterFinal.mutate(rng, ctx)),
    );
  }

  update(ctx?: GenContext): IterativeResult {
    emit(ctx, "update", IterativeResult.KEY);
    return this;
  }
}
