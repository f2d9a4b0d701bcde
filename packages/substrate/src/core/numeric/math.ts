/**
 * Scalar helpers shared by the bounded numeric types.
 */

import { invariant } from "@evoforge/contracts";

export const TAU = Math.PI * 2;

/** Smallest positive normal double. */
const MIN_NORMAL = 2.2250738585072014e-308;

/**
 * Fractional part, keeping the sign of the input.
 */
export function fract(value: number): number {
  return value % 1;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Replace NaN, infinities and subnormals with 0.
 */
export function nonNormalToZero(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) < MIN_NORMAL) {
    return 0;
  }
  return value;
}

/**
 * Linearly map `value` from one closed range onto another.
 * Both ranges must be non-empty and the value must lie inside the source.
 */
export function mapRange(
  value: number,
  from: readonly [number, number],
  to: readonly [number, number],
): number {
  const [fromMin, fromMax] = from;
  const [toMin, toMax] = to;
  invariant(fromMin < fromMax, `Invalid source range: [${fromMin}, ${fromMax}]`);
  invariant(toMin < toMax, `Invalid target range: [${toMin}, ${toMax}]`);
  invariant(
    fromMin <= value && value <= fromMax,
    `Value ${value} outside source range [${fromMin}, ${fromMax}]`,
    { value, from: [fromMin, fromMax] },
  );
  const out = ((value - fromMin) / (fromMax - fromMin)) * (toMax - toMin) + toMin;
  return clamp(out, toMin, toMax);
}
