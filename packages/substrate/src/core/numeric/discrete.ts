/**
 * Discrete bounded types: booleans, nibbles, bytes and 32-bit words.
 *
 * Every integer type defines division and modulus by zero as returning the
 * zero divisor, so arithmetic over evolved values is total.
 */

import { coinFlip, intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext } from "../context/generation";

const UINT32_RANGE = 0x100000000;

function randomUint32(rng: RandomSource): number {
  return intBelow(rng, UINT32_RANGE) >>> 0;
}

// =============================================================================
// BOOLEAN
// =============================================================================

export class BooleanValue {
  static readonly KEY = "Boolean";
  static readonly TRUE = new BooleanValue(true);
  static readonly FALSE = new BooleanValue(false);

  private constructor(readonly value: boolean) {}

  static of(value: boolean): BooleanValue {
    return value ? BooleanValue.TRUE : BooleanValue.FALSE;
  }

  static random(rng: RandomSource): BooleanValue {
    return BooleanValue.of(coinFlip(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): BooleanValue {
    emit(ctx, "generate", BooleanValue.KEY);
    return BooleanValue.random(rng);
  }

  not(): BooleanValue {
    return BooleanValue.of(!this.value);
  }

  /**
   * Coin flip between resampling and flipping.
   */
  mutate(rng: RandomSource, ctx?: GenContext): BooleanValue {
    emit(ctx, "mutate", BooleanValue.KEY);
    return coinFlip(rng) ? BooleanValue.random(rng) : this.not();
  }

  update(ctx?: GenContext): BooleanValue {
    emit(ctx, "update", BooleanValue.KEY);
    return this;
  }

  toJSON(): boolean {
    return this.value;
  }
}

// =============================================================================
// NIBBLE
// =============================================================================

/**
 * Integer modulo 16.
 */
export class Nibble {
  static readonly KEY = "Nibble";
  static readonly MODULUS = 16;
  static readonly ZERO = new Nibble(0);
  static readonly MAX = new Nibble(15);

  private constructor(readonly value: number) {}

  static of(value: number): Nibble {
    invariant(
      Number.isInteger(value) && value >= 0 && value < Nibble.MODULUS,
      `Invalid Nibble value: ${value}`,
      { value },
    );
    return new Nibble(value);
  }

  /**
   * Reduce any integer modulo 16 (negative inputs wrap upward).
   */
  static circular(value: number): Nibble {
    invariant(Number.isInteger(value), `Invalid Nibble value: ${value}`, { value });
    return new Nibble(((value % Nibble.MODULUS) + Nibble.MODULUS) % Nibble.MODULUS);
  }

  static random(rng: RandomSource): Nibble {
    return new Nibble(intBelow(rng, Nibble.MODULUS));
  }

  static generate(rng: RandomSource, ctx?: GenContext): Nibble {
    emit(ctx, "generate", Nibble.KEY);
    return Nibble.random(rng);
  }

  circularAdd(other: Nibble): Nibble {
    return Nibble.circular(this.value + other.value);
  }

  circularMultiply(other: Nibble): Nibble {
    return Nibble.circular(this.value * other.value);
  }

  divide(other: Nibble): Nibble {
    return other.value === 0 ? other : new Nibble(Math.floor(this.value / other.value));
  }

  modulus(other: Nibble): Nibble {
    return other.value === 0 ? other : new Nibble(this.value % other.value);
  }

  /**
   * Step up, step down (both wrapping) or resample, with equal odds.
   */
  mutate(rng: RandomSource, ctx?: GenContext): Nibble {
    emit(ctx, "mutate", Nibble.KEY);
    switch (intBelow(rng, 3)) {
      case 0:
        return Nibble.circular(this.value + 1);
      case 1:
        return Nibble.circular(this.value - 1);
      default:
        return Nibble.random(rng);
    }
  }

  update(ctx?: GenContext): Nibble {
    emit(ctx, "update", Nibble.KEY);
    return this;
  }

  equals(other: Nibble): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }
}

// =============================================================================
// BYTE
// =============================================================================

/**
 * Wrapping unsigned 8-bit integer.
 */
export class Byte {
  static readonly KEY = "Byte";
  static readonly ZERO = new Byte(0);
  static readonly MAX = new Byte(255);

  private constructor(readonly value: number) {}

  static of(value: number): Byte {
    invariant(
      Number.isInteger(value) && value >= 0 && value <= 255,
      `Invalid Byte value: ${value}`,
      { value },
    );
    return new Byte(value);
  }

  /**
   * Keep the low 8 bits of any integer.
   */
  static wrapping(value: number): Byte {
    invariant(Number.isInteger(value), `Invalid Byte value: ${value}`, { value });
    return new Byte(value & 0xff);
  }

  /**
   * Truncate and pin to 0..255. NaN becomes 0; infinities saturate.
   */
  static saturating(value: number): Byte {
    if (Number.isNaN(value)) return Byte.ZERO;
    return new Byte(Math.min(255, Math.max(0, Math.trunc(value))));
  }

  static random(rng: RandomSource): Byte {
    return new Byte(intBelow(rng, 256));
  }

  static generate(rng: RandomSource, ctx?: GenContext): Byte {
    emit(ctx, "generate", Byte.KEY);
    return Byte.random(rng);
  }

  circularAdd(other: Byte): Byte {
    return Byte.wrapping(this.value + other.value);
  }

  /**
   * Add a signed offset, wrapping modulo 256.
   */
  circularAddInt(offset: number): Byte {
    return Byte.wrapping(this.value + offset);
  }

  /**
   * Add a signed offset, saturating at 0 and 255.
   */
  clampedAddInt(offset: number): Byte {
    return Byte.saturating(this.value + offset);
  }

  circularMultiply(other: Byte): Byte {
    return Byte.wrapping(this.value * other.value);
  }

  divide(other: Byte): Byte {
    return other.value === 0 ? other : new Byte(Math.floor(this.value / other.value));
  }

  modulus(other: Byte): Byte {
    return other.value === 0 ? other : new Byte(this.value % other.value);
  }

  invertWrapped(): Byte {
    return new Byte(255 - this.value);
  }

  /**
   * Wrapping step, saturating step, or resample.
   */
  mutate(rng: RandomSource, ctx?: GenContext): Byte {
    emit(ctx, "mutate", Byte.KEY);
    switch (intBelow(rng, 5)) {
      case 0:
        return this.circularAddInt(1);
      case 1:
        return this.circularAddInt(-1);
      case 2:
        return this.clampedAddInt(1);
      case 3:
        return this.clampedAddInt(-1);
      default:
        return Byte.random(rng);
    }
  }

  update(ctx?: GenContext): Byte {
    emit(ctx, "update", Byte.KEY);
    return this;
  }

  equals(other: Byte): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }
}

// =============================================================================
// 32-BIT WORDS
// =============================================================================

/**
 * Wrapping unsigned 32-bit integer.
 */
export class UInt {
  static readonly KEY = "UInt";
  static readonly ZERO = new UInt(0);

  private constructor(readonly value: number) {}

  static of(value: number): UInt {
    invariant(
      Number.isInteger(value) && value >= 0 && value <= 0xffffffff,
      `Invalid UInt value: ${value}`,
      { value },
    );
    return new UInt(value);
  }

  static wrapping(value: number): UInt {
    return new UInt(value >>> 0);
  }

  static random(rng: RandomSource): UInt {
    return new UInt(randomUint32(rng));
  }

  static generate(rng: RandomSource, ctx?: GenContext): UInt {
    emit(ctx, "generate", UInt.KEY);
    return UInt.random(rng);
  }

  circularAdd(other: UInt): UInt {
    return new UInt((this.value + other.value) >>> 0);
  }

  circularMultiply(other: UInt): UInt {
    return new UInt(Math.imul(this.value, other.value) >>> 0);
  }

  divide(other: UInt): UInt {
    return other.value === 0 ? other : new UInt(Math.floor(this.value / other.value));
  }

  modulus(other: UInt): UInt {
    return other.value === 0 ? other : new UInt(this.value % other.value);
  }

  mutate(rng: RandomSource, ctx?: GenContext): UInt {
    emit(ctx, "mutate", UInt.KEY);
    return UInt.random(rng);
  }

  update(ctx?: GenContext): UInt {
    emit(ctx, "update", UInt.KEY);
    return this;
  }

  toJSON(): number {
    return this.value;
  }
}

/**
 * Wrapping signed 32-bit integer.
 */
export class SInt {
  static readonly KEY = "SInt";
  static readonly ZERO = new SInt(0);

  private constructor(readonly value: number) {}

  static of(value: number): SInt {
    invariant(
      Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff,
      `Invalid SInt value: ${value}`,
      { value },
    );
    return new SInt(value);
  }

  static wrapping(value: number): SInt {
    return new SInt(value | 0);
  }

  static random(rng: RandomSource): SInt {
    return new SInt(randomUint32(rng) | 0);
  }

  static generate(rng: RandomSource, ctx?: GenContext): SInt {
    emit(ctx, "generate", SInt.KEY);
    return SInt.random(rng);
  }

  circularAdd(other: SInt): SInt {
    return new SInt((this.value + other.value) | 0);
  }

  circularMultiply(other: SInt): SInt {
    return new SInt(Math.imul(this.value, other.value));
  }

  /**
   * Truncating division; the one overflowing case wraps to the minimum.
   */
  divide(other: SInt): SInt {
    return other.value === 0 ? other : new SInt(Math.trunc(this.value / other.value) | 0);
  }

  modulus(other: SInt): SInt {
    return other.value === 0 ? other : new SInt((this.value % other.value) | 0);
  }

  mutate(rng: RandomSource, ctx?: GenContext): SInt {
    emit(ctx, "mutate", SInt.KEY);
    return SInt.random(rng);
  }

  update(ctx?: GenContext): SInt {
    emit(ctx, "update", SInt.KEY);
    return this;
  }

  toJSON(): number {
    return this.value;
  }
}
