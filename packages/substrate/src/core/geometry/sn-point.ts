/**
 * A point confined to the signed unit square [-1, 1]².
 */

import { invariant, type RandomSource } from "@evoforge/contracts";
import { emit, resolveConfig, type GenContext } from "../context/generation";
import { Angle, SignedNormFloat, UnsignedNormFloat } from "../numeric/continuous";
import type { SignedNormaliser } from "../numeric/normalisers";
import type { SNComplex } from "./sn-complex";

export class SNPoint {
  static readonly KEY = "SNPoint";
  static readonly ZERO = new SNPoint(SignedNormFloat.ZERO, SignedNormFloat.ZERO);

  private constructor(
    readonly x: SignedNormFloat,
    readonly y: SignedNormFloat,
  ) {}

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  static of(x: number, y: number): SNPoint {
    invariant(
      x >= -1 && x <= 1 && y >= -1 && y <= 1,
      `Invalid SNPoint value: (${x}, ${y})`,
      { x, y },
    );
    return new SNPoint(SignedNormFloat.of(x), SignedNormFloat.of(y));
  }

  static fromSignedFloats(x: SignedNormFloat, y: SignedNormFloat): SNPoint {
    return new SNPoint(x, y);
  }

  static normalised(
    x: number,
    y: number,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): SNPoint {
    return new SNPoint(
      SignedNormFloat.normalise(normaliser, x, rng),
      SignedNormFloat.normalise(normaliser, y, rng),
    );
  }

  /**
   * Map a point from an arbitrary rectangle onto the unit square.
   */
  static fromRange(
    value: { readonly x: number; readonly y: number },
    min: { readonly x: number; readonly y: number },
    max: { readonly x: number; readonly y: number },
  ): SNPoint {
    return new SNPoint(
      SignedNormFloat.fromRange(value.x, min.x, max.x),
      SignedNormFloat.fromRange(value.y, min.y, max.y),
    );
  }

  /**
   * Polar form back to cartesian; angle 0 points along +y.
   */
  static fromPolarComponents(theta: Angle, rho: UnsignedNormFloat): SNPoint {
    return SNPoint.of(
      rho.value * Math.sin(theta.value),
      rho.value * Math.cos(theta.value),
    );
  }

  static fromComplex(value: SNComplex): SNPoint {
    return new SNPoint(value.re, value.im);
  }

  static random(rng: RandomSource): SNPoint {
    return new SNPoint(SignedNormFloat.random(rng), SignedNormFloat.random(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): SNPoint {
    emit(ctx, "generate", SNPoint.KEY);
    return SNPoint.random(rng);
  }

  // ===========================================================================
  // METRICS
  // ===========================================================================

  distanceTo(other: SNPoint): number {
    return Math.hypot(this.x.value - other.x.value, this.y.value - other.y.value);
  }

  /**
   * Angle of the vector from the origin, measured from +y.
   */
  toAngle(): Angle {
    return Angle.of(Math.atan2(this.x.value, this.y.value));
  }

  // ===========================================================================
  // ARITHMETIC
  // ===========================================================================

  abs(): SNPoint {
    return new SNPoint(this.x.abs(), this.y.abs());
  }

  invertX(): SNPoint {
    return new SNPoint(this.x.invert(), this.y);
  }

  average(other: SNPoint): SNPoint {
    return new SNPoint(this.x.average(other.x), this.y.average(other.y));
  }

  normalisedAdd(other: SNPoint, normaliser: SignedNormaliser, rng: RandomSource): SNPoint {
    return new SNPoint(
      this.x.normalisedAdd(other.x, normaliser, rng),
      this.y.normalisedAdd(other.y, normaliser, rng),
    );
  }

  normalisedSub(other: SNPoint, normaliser: SignedNormaliser, rng: RandomSource): SNPoint {
    return new SNPoint(
      this.x.normalisedSub(other.x, normaliser, rng),
      this.y.normalisedSub(other.y, normaliser, rng),
    );
  }

  /**
   * Displacement from `other` divided by their distance, floored at
   * `minDistance` so near-duplicates cannot blow the vector up. The floor
   * defaults to the context's `minSubtractDistance`.
   */
  subtractNormalised(other: SNPoint, minDistance?: number, ctx?: GenContext): SNPoint {
    const floor = minDistance ?? resolveConfig(ctx).minSubtractDistance;
    invariant(floor > 0, `Invalid minimum distance: ${floor}`);
    const divisor = Math.max(this.distanceTo(other), floor);
    return new SNPoint(
      SignedNormFloat.clamped((this.x.value - other.x.value) / divisor),
      SignedNormFloat.clamped((this.y.value - other.y.value) / divisor),
    );
  }

  scale(factor: SignedNormFloat): SNPoint {
    return new SNPoint(this.x.multiply(factor), this.y.multiply(factor));
  }

  scaleUnsigned(factor: UnsignedNormFloat): SNPoint {
    return new SNPoint(this.x.multiplyUnsigned(factor), this.y.multiplyUnsigned(factor));
  }

  scalePoint(other: SNPoint): SNPoint {
    return new SNPoint(this.x.multiply(other.x), this.y.multiply(other.y));
  }

  // ===========================================================================
  // POLAR
  // ===========================================================================

  /**
   * Pack (θ, ρ) into a point: x holds θ scaled from (-π, π], y holds ρ
   * (clamped to 1) scaled from [0, 1].
   */
  toPolar(): SNPoint {
    const theta = this.toAngle();
    const rho = UnsignedNormFloat.clamped(Math.hypot(this.x.value, this.y.value));
    return new SNPoint(theta.toSigned(), rho.toSigned());
  }

  /**
   * Inverse of `toPolar` for points inside the unit disk.
   */
  fromPolar(): SNPoint {
    return SNPoint.fromPolarComponents(this.x.toAngle(), this.y.toUnsigned());
  }

  // ===========================================================================
  // CAPABILITIES
  // ===========================================================================

  mutate(rng: RandomSource, ctx?: GenContext): SNPoint {
    emit(ctx, "mutate", SNPoint.KEY);
    return SNPoint.random(rng);
  }

  update(ctx?: GenContext): SNPoint {
    emit(ctx, "update", SNPoint.KEY);
    return this;
  }

  equals(other: SNPoint): boolean {
    return this.x.value === other.x.value && this.y.value === other.y.value;
  }

  toString(): string {
    return `(${this.x.toString()}, ${this.y.toString()})`;
  }

  toJSON(): string {
    return this.toString();
  }
}
