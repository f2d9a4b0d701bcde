/**
 * Pixel Neighbourhoods
 *
 * Fixed offset patterns read by the automaton rules. The offsets live in
 * `neighbourhoods.json` and are validated once when the module loads.
 */

import { choice, SubstrateError, type RandomSource } from "@evoforge/contracts";
import { z } from "zod";
import { emit, type GenContext, type VariantFamily } from "../core/context/generation";
import type { BitColor } from "../color/bit-color";
import rawNeighbourhoods from "./neighbourhoods.json";

export const PIXEL_NEIGHBOURHOODS = [
  "Vertical",
  "Horizontal",
  "DiagLeft",
  "DiagRight",
  "Melt",
  "BigMelt",
  "VonNeumann",
  "AntiVonNeumann",
  "Cross",
  "Moore",
  "Spiral",
  "Diamond",
  "Circle",
  "Flower",
  "Square",
] as const;

export type PixelNeighbourhood = (typeof PIXEL_NEIGHBOURHOODS)[number];

/** Cell displacement `[dx, dy]` from the cell being evaluated. */
export type Offset = readonly [dx: number, dy: number];

/**
 * Reads the color of the cell at an offset from the one being evaluated.
 * Edge handling (wrap, clamp) is the caller's choice.
 */
export type NeighbourSampler = (offset: Offset) => BitColor;

const OffsetSchema = z.tuple([z.number().int(), z.number().int()]);

const NeighbourhoodTableSchema = z.record(
  z.enum(PIXEL_NEIGHBOURHOODS),
  z.array(OffsetSchema).min(1),
);

function loadNeighbourhoods(): Readonly<Record<PixelNeighbourhood, readonly Offset[]>> {
  const parsed = NeighbourhoodTableSchema.safeParse(rawNeighbourhoods);
  if (!parsed.success) {
    throw SubstrateError.decodeFailed("Invalid neighbourhood table", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

const NEIGHBOURHOOD_OFFSETS = loadNeighbourhoods();

export function neighbourhoodOffsets(neighbourhood: PixelNeighbourhood): readonly Offset[] {
  return NEIGHBOURHOOD_OFFSETS[neighbourhood];
}

export function neighbourhoodSize(neighbourhood: PixelNeighbourhood): number {
  return NEIGHBOURHOOD_OFFSETS[neighbourhood].length;
}

export const PixelNeighbourhoods: VariantFamily<PixelNeighbourhood> = {
  KEY: "PixelNeighbourhood",
  generate(rng: RandomSource, ctx?: GenContext): PixelNeighbourhood {
    emit(ctx, "generate", "PixelNeighbourhood");
    return choice(rng, PIXEL_NEIGHBOURHOODS);
  },
  mutate(_current: PixelNeighbourhood, rng: RandomSource, ctx?: GenContext): PixelNeighbourhood {
    emit(ctx, "mutate", "PixelNeighbourhood");
    return choice(rng, PIXEL_NEIGHBOURHOODS);
  },
};
