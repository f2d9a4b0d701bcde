/**
 * Bounded numeric type tests
 */

import { describe, expect, it } from "vitest";
import { InvariantViolationError, SeededRandom, uniform } from "@evoforge/contracts";
import {
  Angle,
  BooleanValue,
  Byte,
  mapRange,
  Nibble,
  normaliseSigned,
  normaliseUnsigned,
  SIGNED_NORMALISERS,
  SignedNormFloat,
  SInt,
  UInt,
  UNSIGNED_NORMALISERS,
  UnsignedNormFloat,
} from "../src";
import { sequence } from "./helpers";

const AWKWARD_INPUTS = [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, 1e-320, -0];

describe("normalisers", () => {
  it("keep every signed policy inside [-1, 1]", () => {
    const rng = new SeededRandom(11);
    for (const kind of SIGNED_NORMALISERS) {
      for (let i = 0; i < 500; i++) {
        const value = normaliseSigned(kind, uniform(rng, -50, 50), rng);
        expect(value).toBeGreaterThanOrEqual(-1);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it("keep every unsigned policy inside [0, 1]", () => {
    const rng = new SeededRandom(12);
    for (const kind of UNSIGNED_NORMALISERS) {
      for (let i = 0; i < 500; i++) {
        const value = normaliseUnsigned(kind, uniform(rng, -50, 50), rng);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it("treat NaN, infinities and subnormals as zero", () => {
    const rng = new SeededRandom(3);
    for (const input of AWKWARD_INPUTS) {
      expect(normaliseSigned("clamp", input, rng)).toBe(0);
      expect(normaliseSigned("tanh", input, rng)).toBe(0);
      expect(normaliseUnsigned("clamp", input, rng)).toBe(0);
    }
  });

  it("wrap with the sawtooth", () => {
    expect(UnsignedNormFloat.sawtooth(1.25).value).toBe(0.25);
    expect(UnsignedNormFloat.sawtooth(-0.25).value).toBe(0.75);
    expect(UnsignedNormFloat.sawtooth(1).value).toBe(0);
    expect(SignedNormFloat.sawtooth(1.5).value).toBe(-0.5);
  });

  it("reflect with the triangle", () => {
    expect(UnsignedNormFloat.triangle(1).value).toBe(1);
    expect(UnsignedNormFloat.triangle(1.5).value).toBe(0.5);
    expect(UnsignedNormFloat.triangle(2).value).toBe(0);
    expect(SignedNormFloat.triangle(1).value).toBe(1);
    expect(SignedNormFloat.triangle(2).value).toBe(0);
    expect(SignedNormFloat.triangle(3).value).toBe(-1);
  });

  it("resample only out-of-range values under the random policy", () => {
    expect(normaliseSigned("random", 0.3, sequence([0.75]))).toBe(0.3);
    expect(normaliseSigned("random", 3, sequence([0.75]))).toBe(0.5);
    expect(normaliseUnsigned("random", -2, sequence([0.125]))).toBe(0.125);
  });
});

describe("UnsignedNormFloat / SignedNormFloat", () => {
  it("rejects out-of-range values in of()", () => {
    expect(() => UnsignedNormFloat.of(1.5)).toThrow(InvariantViolationError);
    expect(() => SignedNormFloat.of(-1.01)).toThrow(InvariantViolationError);
  });

  it("clamps instead of throwing in clamped()", () => {
    expect(UnsignedNormFloat.clamped(4).value).toBe(1);
    expect(SignedNormFloat.clamped(-4).value).toBe(-1);
    expect(SignedNormFloat.clamped(Number.NaN).value).toBe(0);
  });

  it("converts between signed and unsigned ranges", () => {
    expect(SignedNormFloat.of(0.5).toUnsigned().value).toBe(0.75);
    expect(UnsignedNormFloat.of(0.75).toSigned().value).toBe(0.5);
    expect(SignedNormFloat.NEG_ONE.toUnsigned().value).toBe(0);
  });

  it("forces the sign of the magnitude", () => {
    expect(SignedNormFloat.of(0.3).forceSign(false).value).toBe(-0.3);
    expect(SignedNormFloat.of(-0.3).forceSign(true).value).toBe(0.3);
  });

  it("subdivides to the fractional part", () => {
    expect(SignedNormFloat.of(0.75).subdivide(Nibble.of(2)).value).toBe(0.5);
    expect(UnsignedNormFloat.of(0.75).subdivideSawtooth(Nibble.of(2)).value).toBe(0.5);
  });

  it("maps ranges and refuses values outside the source", () => {
    expect(mapRange(5, [0, 10], [-1, 1])).toBe(0);
    expect(() => mapRange(11, [0, 10], [-1, 1])).toThrow(InvariantViolationError);
    expect(() => mapRange(0, [1, 1], [0, 1])).toThrow(InvariantViolationError);
  });
});

describe("Angle", () => {
  it("wraps into (-π, π]", () => {
    expect(Angle.of(2.5 * Math.PI).value).toBeCloseTo(Math.PI / 2, 12);
    expect(Angle.of(-Math.PI).value).toBe(Math.PI);
    expect(Angle.of(-2.5 * Math.PI).value).toBeCloseTo(-Math.PI / 2, 12);
    expect(Angle.of(0).value).toBe(0);
    expect(Angle.of(Math.PI / 2).value).toBeCloseTo(Math.PI / 2, 12);
    expect(Angle.of(Number.NaN).value).toBe(0);
  });

  it("stays in range for arbitrary input", () => {
    const rng = new SeededRandom(5);
    for (let i = 0; i < 1000; i++) {
      const value = Angle.of(uniform(rng, -100, 100)).value;
      expect(value).toBeGreaterThan(-Math.PI);
      expect(value).toBeLessThanOrEqual(Math.PI);
    }
  });

  it("interpolates along the shorter arc", () => {
    const mid = Angle.of(3).lerp(Angle.of(-3), UnsignedNormFloat.of(0.25));
    expect(mid.value).toBeCloseTo(3 + (2 * Math.PI - 6) * 0.25, 10);
  });
});

describe("integer types", () => {
  it("wraps nibbles modulo 16", () => {
    expect(Nibble.circular(-1).value).toBe(15);
    expect(Nibble.circular(35).value).toBe(3);
    expect(Nibble.of(9).circularAdd(Nibble.of(9)).value).toBe(2);
    expect(() => Nibble.of(16)).toThrow(InvariantViolationError);
  });

  it("defines division and modulus by zero as the zero divisor", () => {
    expect(Nibble.of(3).divide(Nibble.ZERO).value).toBe(0);
    expect(Nibble.of(7).divide(Nibble.of(2)).value).toBe(3);
    expect(Byte.of(200).modulus(Byte.ZERO).value).toBe(0);
    expect(UInt.of(10).divide(UInt.ZERO).value).toBe(0);
    expect(SInt.of(-7).modulus(SInt.ZERO).value).toBe(0);
  });

  it("wraps and saturates bytes", () => {
    expect(Byte.wrapping(261).value).toBe(5);
    expect(Byte.of(250).circularAddInt(10).value).toBe(4);
    expect(Byte.of(250).clampedAddInt(10).value).toBe(255);
    expect(Byte.of(3).clampedAddInt(-10).value).toBe(0);
    expect(Byte.of(200).circularMultiply(Byte.of(2)).value).toBe(144);
    expect(Byte.of(55).invertWrapped().value).toBe(200);
  });

  it("saturates non-finite values into range", () => {
    expect(Byte.saturating(Number.NaN).value).toBe(0);
    expect(Byte.saturating(Number.POSITIVE_INFINITY).value).toBe(255);
    expect(Byte.saturating(Number.NEGATIVE_INFINITY).value).toBe(0);
    expect(Byte.saturating(17.9).value).toBe(17);
    expect(Byte.of(4).clampedAddInt(Number.NaN).value).toBe(0);
  });

  it("wraps 32-bit words", () => {
    expect(UInt.wrapping(-1).value).toBe(0xffffffff);
    expect(UInt.of(0xffffffff).circularAdd(UInt.of(2)).value).toBe(1);
    expect(SInt.wrapping(0x80000000).value).toBe(-0x80000000);
    expect(SInt.of(-0x80000000).divide(SInt.of(-1)).value).toBe(-0x80000000);
    expect(SInt.of(-7).divide(SInt.of(2)).value).toBe(-3);
  });

  it("steps nibbles by mutation", () => {
    expect(Nibble.of(15).mutate(sequence([0.1])).value).toBe(0);
    expect(Nibble.of(0).mutate(sequence([0.5])).value).toBe(15);
  });

  it("flips booleans", () => {
    expect(BooleanValue.TRUE.not()).toBe(BooleanValue.FALSE);
    expect(BooleanValue.of(true)).toBe(BooleanValue.TRUE);
    // coin flip false -> flip
    expect(BooleanValue.TRUE.mutate(sequence([0.9])).value).toBe(false);
  });
});
