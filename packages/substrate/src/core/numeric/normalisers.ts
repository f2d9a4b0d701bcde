/**
 * Normalisers
 *
 * Policies that fold an arbitrary float back into [-1, 1] or [0, 1].
 * Each family is a closed set of tags with one evaluation function.
 * Inputs that are NaN, infinite or subnormal are treated as 0 by every
 * policy.
 */

import { choice, uniform, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext, type VariantFamily } from "../context/generation";
import { clamp, fract, nonNormalToZero } from "./math";

// =============================================================================
// TAGS
// =============================================================================

export const SIGNED_NORMALISERS = [
  "sawtooth",
  "triangle",
  "sin",
  "sinRepeating",
  "tanh",
  "clamp",
  "fractional",
  "random",
] as const;

export type SignedNormaliser = (typeof SIGNED_NORMALISERS)[number];

export const UNSIGNED_NORMALISERS = [
  "sawtooth",
  "triangle",
  "sin",
  "sinRepeating",
  "clamp",
  "random",
] as const;

export type UnsignedNormaliser = (typeof UNSIGNED_NORMALISERS)[number];

export function randomSignedNormaliser(rng: RandomSource): SignedNormaliser {
  return choice(rng, SIGNED_NORMALISERS);
}

export function randomUnsignedNormaliser(rng: RandomSource): UnsignedNormaliser {
  return choice(rng, UNSIGNED_NORMALISERS);
}

// =============================================================================
// UNSIGNED [0, 1]
// =============================================================================

/** Wrap into [0, 1); 1 itself wraps to 0. */
export function unsignedSawtooth(input: number): number {
  const value = nonNormalToZero(input);
  return clamp(fract(value) + (value < 0 ? 1 : 0), 0, 1);
}

/** Reflect back and forth across [0, 1]. */
export function unsignedTriangle(input: number): number {
  const value = nonNormalToZero(input);
  const s = (value - 1) / 2;
  return clamp(Math.abs(fract(s) + (s < 0 ? 1 : 0) - 0.5) * 2, 0, 1);
}

export function unsignedSin(input: number): number {
  const value = nonNormalToZero(input);
  return clamp(Math.sin((value - 0.5) * Math.PI) / 2 + 0.5, 0, 1);
}

export function unsignedSinRepeating(input: number): number {
  const value = nonNormalToZero(input);
  return clamp(Math.sin((value + 0.5) * Math.PI * 2) / 2 + 0.5, 0, 1);
}

export function normaliseUnsigned(
  kind: UnsignedNormaliser,
  value: number,
  rng: RandomSource,
): number {
  const v = nonNormalToZero(value);
  switch (kind) {
    case "sawtooth":
      return unsignedSawtooth(v);
    case "triangle":
      return unsignedTriangle(v);
    case "sin":
      return unsignedSin(v);
    case "sinRepeating":
      return unsignedSinRepeating(v);
    case "clamp":
      return clamp(v, 0, 1);
    case "random":
      return v < 0 || v > 1 ? rng.next() : v;
  }
}

// =============================================================================
// SIGNED [-1, 1]
// =============================================================================

/** Wrap into [-1, 1); 1 itself wraps to -1. */
export function signedSawtooth(input: number): number {
  const value = nonNormalToZero(input);
  const s = (value + 1) / 2;
  return clamp((fract(s) + (s < 0 ? 1 : 0)) * 2 - 1, -1, 1);
}

/** Reflect back and forth across [-1, 1]. */
export function signedTriangle(input: number): number {
  const value = nonNormalToZero(input);
  const s = (value - 1) / 4;
  return clamp(Math.abs(fract(s) + (s < 0 ? 1 : 0) - 0.5) * 4 - 1, -1, 1);
}

export function signedSin(input: number): number {
  const value = nonNormalToZero(input);
  return Math.sin(value / (2 * Math.PI));
}

export function signedSinRepeating(input: number): number {
  const value = nonNormalToZero(input);
  return Math.sin(value * Math.PI);
}

export function normaliseSigned(
  kind: SignedNormaliser,
  value: number,
  rng: RandomSource,
): number {
  const v = nonNormalToZero(value);
  switch (kind) {
    case "sawtooth":
      return signedSawtooth(v);
    case "triangle":
      return signedTriangle(v);
    case "sin":
      return signedSin(v);
    case "sinRepeating":
      return signedSinRepeating(v);
    case "tanh":
      return Math.tanh(v);
    case "clamp":
      return clamp(v, -1, 1);
    case "fractional":
      return fract(v);
    case "random":
      return v < -1 || v > 1 ? uniform(rng, -1, 1) : v;
  }
}

// =============================================================================
// CAPABILITIES
// =============================================================================

export const SignedNormalisers: VariantFamily<SignedNormaliser> = {
  KEY: "SignedNormaliser",
  generate(rng: RandomSource, ctx?: GenContext): SignedNormaliser {
    emit(ctx, "generate", "SignedNormaliser");
    return randomSignedNormaliser(rng);
  },
  mutate(_current: SignedNormaliser, rng: RandomSource, ctx?: GenContext): SignedNormaliser {
    emit(ctx, "mutate", "SignedNormaliser");
    return randomSignedNormaliser(rng);
  },
};

export const UnsignedNormalisers: VariantFamily<UnsignedNormaliser> = {
  KEY: "UnsignedNormaliser",
  generate(rng: RandomSource, ctx?: GenContext): UnsignedNormaliser {
    emit(ctx, "generate", "UnsignedNormaliser");
    return randomUnsignedNormaliser(rng);
  },
  mutate(_current: UnsignedNormaliser, rng: RandomSource, ctx?: GenContext): UnsignedNormaliser {
    emit(ctx, "mutate", "UnsignedNormaliser");
    return randomUnsignedNormaliser(rng);
  },
};
