/**
 * Complex number with both parts bounded to [-1, 1] (the unit square of the
 * complex plane, not the unit disk).
 */

import { invariant, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext } from "../context/generation";
import { Angle, SignedNormFloat, type UnsignedNormFloat } from "../numeric/continuous";
import type { SignedNormaliser } from "../numeric/normalisers";
import { SNPoint } from "./sn-point";

export class SNComplex {
  static readonly KEY = "SNComplex";
  static readonly ZERO = new SNComplex(SignedNormFloat.ZERO, SignedNormFloat.ZERO);

  private constructor(
    readonly re: SignedNormFloat,
    readonly im: SignedNormFloat,
  ) {}

  static of(re: number, im: number): SNComplex {
    invariant(
      re >= -1 && re <= 1 && im >= -1 && im <= 1,
      `Invalid SNComplex value: (${re}, ${im})`,
      { re, im },
    );
    return new SNComplex(SignedNormFloat.of(re), SignedNormFloat.of(im));
  }

  static fromSignedFloats(re: SignedNormFloat, im: SignedNormFloat): SNComplex {
    return new SNComplex(re, im);
  }

  static normalised(
    re: number,
    im: number,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): SNComplex {
    return new SNComplex(
      SignedNormFloat.normalise(normaliser, re, rng),
      SignedNormFloat.normalise(normaliser, im, rng),
    );
  }

  static fromSNPoint(point: SNPoint): SNComplex {
    return new SNComplex(point.x, point.y);
  }

  static random(rng: RandomSource): SNComplex {
    return new SNComplex(SignedNormFloat.random(rng), SignedNormFloat.random(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): SNComplex {
    emit(ctx, "generate", SNComplex.KEY);
    return SNComplex.random(rng);
  }

  toSNPoint(): SNPoint {
    return SNPoint.fromComplex(this);
  }

  /**
   * Argument measured from the imaginary axis, matching `SNPoint.toAngle`.
   */
  toAngle(): Angle {
    return Angle.of(Math.atan2(this.re.value, this.im.value));
  }

  magnitude(): number {
    return Math.hypot(this.re.value, this.im.value);
  }

  normalisedAdd(
    other: SNComplex,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): SNComplex {
    return SNComplex.normalised(
      this.re.value + other.re.value,
      this.im.value + other.im.value,
      normaliser,
      rng,
    );
  }

  lerp(other: SNComplex, t: UnsignedNormFloat): SNComplex {
    return new SNComplex(this.re.lerp(other.re, t), this.im.lerp(other.im, t));
  }

  mutate(rng: RandomSource, ctx?: GenContext): SNComplex {
    emit(ctx, "mutate", SNComplex.KEY);
    return SNComplex.random(rng);
  }

  update(ctx?: GenContext): SNComplex {
    emit(ctx, "update", SNComplex.KEY);
    return this;
  }

  equals(other: SNComplex): boolean {
    return this.re.value === other.re.value && this.im.value === other.im.value;
  }

  toString(): string {
    return `(${this.re.toString()}, ${this.im.toString()})`;
  }

  toJSON(): string {
    return this.toString();
  }
}
