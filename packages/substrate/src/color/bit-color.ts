/**
 * 3-bit RGB colors.
 *
 * The eight values are ordered Black, Red, Green, Blue, Cyan, Magenta,
 * Yellow, White; that order is the color's index. Channel algebra works on
 * a bit mask with red as bit 0, green as bit 1 and blue as bit 2.
 */

import { coinFlip, intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext, type VariantFamily } from "../core/context/generation";

export const BitColor = {
  Black: 0,
  Red: 1,
  Green: 2,
  Blue: 3,
  Cyan: 4,
  Magenta: 5,
  Yellow: 6,
  White: 7,
} as const;

export type BitColor = (typeof BitColor)[keyof typeof BitColor];

export type BitComponents = readonly [r: boolean, g: boolean, b: boolean];

export const BIT_COLORS: readonly [BitColor, ...BitColor[]] = [
  BitColor.Black,
  BitColor.Red,
  BitColor.Green,
  BitColor.Blue,
  BitColor.Cyan,
  BitColor.Magenta,
  BitColor.Yellow,
  BitColor.White,
];

export const BIT_COLOR_NAMES = [
  "Black",
  "Red",
  "Green",
  "Blue",
  "Cyan",
  "Magenta",
  "Yellow",
  "White",
] as const;

/** Channel mask per color index. */
const COLOR_TO_MASK = [0b000, 0b001, 0b010, 0b100, 0b110, 0b101, 0b011, 0b111] as const;

/** Color per channel mask. */
const MASK_TO_COLOR = [
  BitColor.Black,
  BitColor.Red,
  BitColor.Green,
  BitColor.Yellow,
  BitColor.Blue,
  BitColor.Magenta,
  BitColor.Cyan,
  BitColor.White,
] as const;

// =============================================================================
// INDEX & COMPONENTS
// =============================================================================

export function isBitColor(value: unknown): value is BitColor {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 7;
}

export function bitColorFromIndex(index: number): BitColor {
  invariant(isBitColor(index), `Tried to convert index ${index} to BitColor`, { index });
  return index;
}

export function bitColorToMask(color: BitColor): number {
  return COLOR_TO_MASK[color];
}

export function bitColorFromMask(mask: number): BitColor {
  const color = MASK_TO_COLOR[mask & 0b111];
  invariant(color !== undefined, `Invalid channel mask: ${mask}`);
  return color;
}

export function bitColorToComponents(color: BitColor): BitComponents {
  const mask = bitColorToMask(color);
  return [(mask & 0b001) !== 0, (mask & 0b010) !== 0, (mask & 0b100) !== 0];
}

export function bitColorFromComponents([r, g, b]: BitComponents): BitColor {
  return bitColorFromMask((r ? 0b001 : 0) | (g ? 0b010 : 0) | (b ? 0b100 : 0));
}

// =============================================================================
// CHANNEL ALGEBRA
// =============================================================================

/**
 * Whether the two colors share any channel.
 */
export function hasColor(a: BitColor, b: BitColor): boolean {
  return (bitColorToMask(a) & bitColorToMask(b)) !== 0;
}

/** Channel union. */
export function giveColor(a: BitColor, b: BitColor): BitColor {
  return bitColorFromMask(bitColorToMask(a) | bitColorToMask(b));
}

/** Channels of `a` not in `b`. */
export function takeColor(a: BitColor, b: BitColor): BitColor {
  return bitColorFromMask(bitColorToMask(a) & ~bitColorToMask(b));
}

export function xorColor(a: BitColor, b: BitColor): BitColor {
  return bitColorFromMask(bitColorToMask(a) ^ bitColorToMask(b));
}

/** Channels on which `a` and `b` agree. */
export function eqColor(a: BitColor, b: BitColor): BitColor {
  return bitColorFromMask(~(bitColorToMask(a) ^ bitColorToMask(b)));
}

// =============================================================================
// RANDOMNESS
// =============================================================================

export function randomBitColor(rng: RandomSource): BitColor {
  return bitColorFromMask(intBelow(rng, 8));
}

/**
 * Each channel is resampled with probability 1/2.
 */
export function mutateBitColor(color: BitColor, rng: RandomSource): BitColor {
  const [r, g, b] = bitColorToComponents(color);
  const resample = (channel: boolean): boolean => (coinFlip(rng) ? coinFlip(rng) : channel);
  return bitColorFromComponents([resample(r), resample(g), resample(b)]);
}

export const BitColors: VariantFamily<BitColor> = {
  KEY: "BitColor",
  generate(rng: RandomSource, ctx?: GenContext): BitColor {
    emit(ctx, "generate", "BitColor");
    return randomBitColor(rng);
  },
  mutate(current: BitColor, rng: RandomSource, ctx?: GenContext): BitColor {
    emit(ctx, "mutate", "BitColor");
    return mutateBitColor(current, rng);
  },
};
