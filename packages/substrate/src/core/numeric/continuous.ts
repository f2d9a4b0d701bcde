/**
 * Continuous bounded types.
 *
 * - `UnsignedNormFloat` lives in [0, 1]
 * - `SignedNormFloat` lives in [-1, 1]
 * - `Angle` lives in (-π, π]
 *
 * `of` asserts the range and is meant for trusted values. Values that come
 * out of arbitrary arithmetic go through a normaliser instead.
 */

import { invariant, uniform, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext } from "../context/generation";
import type { Nibble } from "./discrete";
import { clamp, fract, lerp, mapRange, TAU } from "./math";
import {
  normaliseSigned,
  normaliseUnsigned,
  signedSawtooth,
  signedSin,
  signedSinRepeating,
  signedTriangle,
  unsignedSawtooth,
  unsignedSin,
  unsignedSinRepeating,
  unsignedTriangle,
  type SignedNormaliser,
  type UnsignedNormaliser,
} from "./normalisers";

// =============================================================================
// UNSIGNED NORMALIZED FLOAT
// =============================================================================

export class UnsignedNormFloat {
  static readonly KEY = "UnsignedNormFloat";
  static readonly ZERO = new UnsignedNormFloat(0);
  static readonly ONE = new UnsignedNormFloat(1);

  private constructor(readonly value: number) {}

  static of(value: number): UnsignedNormFloat {
    invariant(value >= 0 && value <= 1, `Invalid UnsignedNormFloat value: ${value}`, {
      value,
    });
    return new UnsignedNormFloat(value);
  }

  static clamped(value: number): UnsignedNormFloat {
    return new UnsignedNormFloat(clamp(Number.isNaN(value) ? 0 : value, 0, 1));
  }

  /**
   * Keep in-range values, resample anything else.
   */
  static randomClamped(value: number, rng: RandomSource): UnsignedNormFloat {
    return value >= 0 && value <= 1
      ? new UnsignedNormFloat(value)
      : UnsignedNormFloat.random(rng);
  }

  static fromRange(value: number, min: number, max: number): UnsignedNormFloat {
    return new UnsignedNormFloat(mapRange(value, [min, max], [0, 1]));
  }

  static sawtooth(value: number): UnsignedNormFloat {
    return new UnsignedNormFloat(unsignedSawtooth(value));
  }

  static triangle(value: number): UnsignedNormFloat {
    return new UnsignedNormFloat(unsignedTriangle(value));
  }

  static sin(value: number): UnsignedNormFloat {
    return new UnsignedNormFloat(unsignedSin(value));
  }

  static sinRepeating(value: number): UnsignedNormFloat {
    return new UnsignedNormFloat(unsignedSinRepeating(value));
  }

  static normalise(
    kind: UnsignedNormaliser,
    value: number,
    rng: RandomSource,
  ): UnsignedNormFloat {
    return new UnsignedNormFloat(normaliseUnsigned(kind, value, rng));
  }

  static random(rng: RandomSource): UnsignedNormFloat {
    return new UnsignedNormFloat(rng.next());
  }

  static generate(rng: RandomSource, ctx?: GenContext): UnsignedNormFloat {
    emit(ctx, "generate", UnsignedNormFloat.KEY);
    return UnsignedNormFloat.random(rng);
  }

  average(other: UnsignedNormFloat): UnsignedNormFloat {
    return new UnsignedNormFloat((this.value + other.value) * 0.5);
  }

  multiply(other: UnsignedNormFloat): UnsignedNormFloat {
    return new UnsignedNormFloat(this.value * other.value);
  }

  lerp(other: UnsignedNormFloat, t: UnsignedNormFloat): UnsignedNormFloat {
    return UnsignedNormFloat.clamped(lerp(this.value, other.value, t.value));
  }

  sawtoothAdd(other: UnsignedNormFloat | number): UnsignedNormFloat {
    return UnsignedNormFloat.sawtooth(this.value + toNumber(other));
  }

  triangleAdd(other: UnsignedNormFloat | number): UnsignedNormFloat {
    return UnsignedNormFloat.triangle(this.value + toNumber(other));
  }

  subdivideSawtooth(divisor: Nibble): UnsignedNormFloat {
    return UnsignedNormFloat.sawtooth(this.value * divisor.value);
  }

  subdivideTriangle(divisor: Nibble): UnsignedNormFloat {
    return UnsignedNormFloat.triangle(this.value * divisor.value);
  }

  toAngle(): Angle {
    return Angle.fromRange(this.value, 0, 1);
  }

  toSigned(): SignedNormFloat {
    return SignedNormFloat.fromRange(this.value, 0, 1);
  }

  mutate(rng: RandomSource, ctx?: GenContext): UnsignedNormFloat {
    emit(ctx, "mutate", UnsignedNormFloat.KEY);
    return UnsignedNormFloat.random(rng);
  }

  update(ctx?: GenContext): UnsignedNormFloat {
    emit(ctx, "update", UnsignedNormFloat.KEY);
    return this;
  }

  equals(other: UnsignedNormFloat): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }

  toString(): string {
    return this.value.toFixed(4);
  }
}

// =============================================================================
// SIGNED NORMALIZED FLOAT
// =============================================================================

export class SignedNormFloat {
  static readonly KEY = "SignedNormFloat";
  static readonly ZERO = new SignedNormFloat(0);
  static readonly ONE = new SignedNormFloat(1);
  static readonly NEG_ONE = new SignedNormFloat(-1);

  private constructor(readonly value: number) {}

  static of(value: number): SignedNormFloat {
    invariant(value >= -1 && value <= 1, `Invalid SignedNormFloat value: ${value}`, {
      value,
    });
    return new SignedNormFloat(value);
  }

  static clamped(value: number): SignedNormFloat {
    return new SignedNormFloat(clamp(Number.isNaN(value) ? 0 : value, -1, 1));
  }

  static randomClamped(value: number, rng: RandomSource): SignedNormFloat {
    return value >= -1 && value <= 1
      ? new SignedNormFloat(value)
      : SignedNormFloat.random(rng);
  }

  static fromRange(value: number, min: number, max: number): SignedNormFloat {
    return new SignedNormFloat(mapRange(value, [min, max], [-1, 1]));
  }

  static sawtooth(value: number): SignedNormFloat {
    return new SignedNormFloat(signedSawtooth(value));
  }

  static triangle(value: number): SignedNormFloat {
    return new SignedNormFloat(signedTriangle(value));
  }

  static sin(value: number): SignedNormFloat {
    return new SignedNormFloat(signedSin(value));
  }

  static sinRepeating(value: number): SignedNormFloat {
    return new SignedNormFloat(signedSinRepeating(value));
  }

  static tanh(value: number): SignedNormFloat {
    return new SignedNormFloat(Math.tanh(Number.isNaN(value) ? 0 : value));
  }

  static fractional(value: number): SignedNormFloat {
    return new SignedNormFloat(Number.isFinite(value) ? fract(value) : 0);
  }

  static normalise(
    kind: SignedNormaliser,
    value: number,
    rng: RandomSource,
  ): SignedNormFloat {
    return new SignedNormFloat(normaliseSigned(kind, value, rng));
  }

  static random(rng: RandomSource): SignedNormFloat {
    return new SignedNormFloat(uniform(rng, -1, 1));
  }

  static generate(rng: RandomSource, ctx?: GenContext): SignedNormFloat {
    emit(ctx, "generate", SignedNormFloat.KEY);
    return SignedNormFloat.random(rng);
  }

  abs(): SignedNormFloat {
    return new SignedNormFloat(Math.abs(this.value));
  }

  /**
   * Magnitude with the requested sign (`true` is positive).
   */
  forceSign(positive: boolean): SignedNormFloat {
    const magnitude = Math.abs(this.value);
    return new SignedNormFloat(positive ? magnitude : -magnitude);
  }

  invert(): SignedNormFloat {
    return new SignedNormFloat(-this.value);
  }

  average(other: SignedNormFloat): SignedNormFloat {
    return new SignedNormFloat((this.value + other.value) * 0.5);
  }

  multiply(other: SignedNormFloat): SignedNormFloat {
    return new SignedNormFloat(this.value * other.value);
  }

  multiplyUnsigned(other: UnsignedNormFloat): SignedNormFloat {
    return new SignedNormFloat(this.value * other.value);
  }

  lerp(other: SignedNormFloat, t: UnsignedNormFloat): SignedNormFloat {
    return SignedNormFloat.clamped(lerp(this.value, other.value, t.value));
  }

  normalisedAdd(
    other: SignedNormFloat,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): SignedNormFloat {
    return SignedNormFloat.normalise(normaliser, this.value + other.value, rng);
  }

  normalisedSub(
    other: SignedNormFloat,
    normaliser: SignedNormaliser,
    rng: RandomSource,
  ): SignedNormFloat {
    return SignedNormFloat.normalise(normaliser, this.value - other.value, rng);
  }

  /**
   * Fractional part of `value * divisor`, keeping the sign.
   */
  subdivide(divisor: Nibble): SignedNormFloat {
    return new SignedNormFloat(fract(this.value * divisor.value));
  }

  toAngle(): Angle {
    return Angle.fromRange(this.value, -1, 1);
  }

  toUnsigned(): UnsignedNormFloat {
    return UnsignedNormFloat.fromRange(this.value, -1, 1);
  }

  mutate(rng: RandomSource, ctx?: GenContext): SignedNormFloat {
    emit(ctx, "mutate", SignedNormFloat.KEY);
    return SignedNormFloat.random(rng);
  }

  update(ctx?: GenContext): SignedNormFloat {
    emit(ctx, "update", SignedNormFloat.KEY);
    return this;
  }

  equals(other: SignedNormFloat): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }

  toString(): string {
    return this.value.toFixed(4);
  }
}

// =============================================================================
// ANGLE
// =============================================================================

/**
 * Reduce any finite radian value into (-π, π].
 */
export function wrapAngle(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const turns = fract((value + Math.PI) / TAU);
  let wrapped = turns * TAU - Math.PI;
  // a negative remainder lands one turn low
  if (turns < 0) wrapped += TAU;
  return wrapped <= -Math.PI ? Math.PI : wrapped;
}

export class Angle {
  static readonly KEY = "Angle";
  static readonly ZERO = new Angle(0);

  private constructor(readonly value: number) {}

  /**
   * Any real value is accepted and wrapped.
   */
  static of(value: number): Angle {
    return new Angle(wrapAngle(value));
  }

  static fromRange(value: number, min: number, max: number): Angle {
    return Angle.of(mapRange(value, [min, max], [-Math.PI, Math.PI]));
  }

  static random(rng: RandomSource): Angle {
    return Angle.of(uniform(rng, -Math.PI, Math.PI));
  }

  static generate(rng: RandomSource, ctx?: GenContext): Angle {
    emit(ctx, "generate", Angle.KEY);
    return Angle.random(rng);
  }

  add(other: Angle): Angle {
    return Angle.of(this.value + other.value);
  }

  sub(other: Angle): Angle {
    return Angle.of(this.value - other.value);
  }

  average(other: Angle): Angle {
    return Angle.of((this.value + other.value) * 0.5);
  }

  /**
   * Interpolate along the shorter arc.
   */
  lerp(other: Angle, t: UnsignedNormFloat): Angle {
    const a = this.value;
    const b = other.value;
    const diff = b - a;
    if (diff > Math.PI) {
      return Angle.of(lerp(a + TAU, b, t.value));
    }
    if (diff < -Math.PI) {
      return Angle.of(lerp(a, b + TAU, t.value));
    }
    return Angle.of(lerp(a, b, t.value));
  }

  toSigned(): SignedNormFloat {
    return SignedNormFloat.fromRange(this.value, -Math.PI, Math.PI);
  }

  toUnsigned(): UnsignedNormFloat {
    return UnsignedNormFloat.fromRange(this.value, -Math.PI, Math.PI);
  }

  mutate(rng: RandomSource, ctx?: GenContext): Angle {
    emit(ctx, "mutate", Angle.KEY);
    return Angle.random(rng);
  }

  update(ctx?: GenContext): Angle {
    emit(ctx, "update", Angle.KEY);
    return this;
  }

  equals(other: Angle): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }

  toString(): string {
    return this.value.toFixed(4);
  }
}

function toNumber(value: UnsignedNormFloat | number): number {
  return typeof value === "number" ? value : value.value;
}
