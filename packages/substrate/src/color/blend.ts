/**
 * Two-input blend functions over float colors.
 */

import { choice, coinFlip, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext, type VariantFamily } from "../core/context/generation";
import { FloatColor } from "./rgba";

export const COLOR_BLEND_FUNCTIONS = ["dissolve", "overlay", "screenDodge"] as const;

export type ColorBlendFunction = (typeof COLOR_BLEND_FUNCTIONS)[number];

const overlayChannel = (a: number, b: number): number =>
  a < 0.5 ? 2 * a * b : 1 - 2 * (1 - a) * (1 - b);

const screenChannel = (a: number, b: number): number => 1 - (1 - a) * (1 - b);

function blendChannels(a: FloatColor, b: FloatColor, channel: (a: number, b: number) => number): FloatColor {
  return FloatColor.clamped(
    channel(a.r.value, b.r.value),
    channel(a.g.value, b.g.value),
    channel(a.b.value, b.b.value),
    (a.a.value + b.a.value) * 0.5,
  );
}

/**
 * `dissolve` picks one input whole; the others blend per channel and
 * average the alphas.
 */
export function blendColors(
  fn: ColorBlendFunction,
  a: FloatColor,
  b: FloatColor,
  rng: RandomSource,
): FloatColor {
  switch (fn) {
    case "dissolve":
      return coinFlip(rng) ? a : b;
    case "overlay":
      return blendChannels(a, b, overlayChannel);
    case "screenDodge":
      return blendChannels(a, b, screenChannel);
  }
}

export const ColorBlendFunctions: VariantFamily<ColorBlendFunction> = {
  KEY: "ColorBlendFunction",
  generate(rng: RandomSource, ctx?: GenContext): ColorBlendFunction {
    emit(ctx, "generate", "ColorBlendFunction");
    return choice(rng, COLOR_BLEND_FUNCTIONS);
  },
  mutate(_current: ColorBlendFunction, rng: RandomSource, ctx?: GenContext): ColorBlendFunction {
    emit(ctx, "mutate", "ColorBlendFunction");
    return choice(rng, COLOR_BLEND_FUNCTIONS);
  },
};
