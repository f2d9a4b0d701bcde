/**
 * Serialized Forms
 *
 * zod schemas for the JSON shape of every serializable type. Each schema
 * validates the raw value and transforms it into the bounded type, so a
 * successful parse never trips a constructor invariant.
 */

import { z } from "zod";
import { SNComplex } from "../core/geometry/sn-complex";
import { SNPoint } from "../core/geometry/sn-point";
import { Angle, SignedNormFloat, UnsignedNormFloat } from "../core/numeric/continuous";
import { BooleanValue, Byte, Nibble } from "../core/numeric/discrete";
import { bitColorFromIndex } from "../color/bit-color";
import { CMYKColor } from "../color/cmyk";
import { HSVColor } from "../color/hsv";
import { LABColor } from "../color/lab";
import { ByteColor, FloatColor, NibbleColor } from "../color/rgba";
import { ElementaryAutomataRule } from "../automata/elementary";

// =============================================================================
// SCALARS
// =============================================================================

const unitNumber = z
  .number()
  .min(0, { error: "Expected a value in [0, 1]" })
  .max(1, { error: "Expected a value in [0, 1]" });

const signedUnitNumber = z
  .number()
  .min(-1, { error: "Expected a value in [-1, 1]" })
  .max(1, { error: "Expected a value in [-1, 1]" });

export const UnsignedNormFloatSchema = unitNumber.transform((v) => UnsignedNormFloat.of(v));

export const SignedNormFloatSchema = signedUnitNumber.transform((v) => SignedNormFloat.of(v));

/** Any finite radian value; wrapped on load. */
export const AngleSchema = z.number().transform((v) => Angle.of(v));

export const BooleanSchema = z.boolean().transform((v) => BooleanValue.of(v));

export const NibbleSchema = z
  .number()
  .int({ error: "Nibble must be an integer" })
  .min(0, { error: "Nibble must be in 0..15" })
  .max(15, { error: "Nibble must be in 0..15" })
  .transform((v) => Nibble.of(v));

export const ByteSchema = z
  .number()
  .int({ error: "Byte must be an integer" })
  .min(0, { error: "Byte must be in 0..255" })
  .max(255, { error: "Byte must be in 0..255" })
  .transform((v) => Byte.of(v));

// =============================================================================
// POINTS
// =============================================================================

const PAIR_PATTERN = /^\(\s*(-?[\d.]+)\s*,\s*(-?[\d.]+)\s*\)$/;

/**
 * `"(x, y)"` text, each component re-validated to [-1, 1].
 */
const signedPairSchema = z
  .string()
  .regex(PAIR_PATTERN, { error: 'Expected "(x, y)"' })
  .transform((text): [number, number] => {
    const match = PAIR_PATTERN.exec(text);
    return [Number(match?.[1]), Number(match?.[2])];
  })
  .pipe(z.tuple([signedUnitNumber, signedUnitNumber]));

export const SNPointSchema = signedPairSchema.transform(([x, y]) => SNPoint.of(x, y));

export const SNComplexSchema = signedPairSchema.transform(([re, im]) => SNComplex.of(re, im));

// =============================================================================
// COLORS
// =============================================================================

export const BitColorSchema = z
  .number()
  .int({ error: "BitColor must be an integer" })
  .min(0, { error: "BitColor must be in 0..7" })
  .max(7, { error: "BitColor must be in 0..7" })
  .transform((v) => bitColorFromIndex(v));

export const NibbleColorSchema = z
  .object({ r: NibbleSchema, g: NibbleSchema, b: NibbleSchema, a: NibbleSchema })
  .transform(({ r, g, b, a }) => new NibbleColor(r, g, b, a));

export const ByteColorSchema = z
  .object({ r: ByteSchema, g: ByteSchema, b: ByteSchema, a: ByteSchema })
  .transform(({ r, g, b, a }) => new ByteColor(r, g, b, a));

export const FloatColorSchema = z
  .object({
    r: UnsignedNormFloatSchema,
    g: UnsignedNormFloatSchema,
    b: UnsignedNormFloatSchema,
    a: UnsignedNormFloatSchema,
  })
  .transform(({ r, g, b, a }) => new FloatColor(r, g, b, a));

export const HSVColorSchema = z
  .object({
    h: AngleSchema,
    s: UnsignedNormFloatSchema,
    v: UnsignedNormFloatSchema,
    a: UnsignedNormFloatSchema,
  })
  .transform(({ h, s, v, a }) => new HSVColor(h, s, v, a));

export const CMYKColorSchema = z
  .object({
    c: UnsignedNormFloatSchema,
    m: UnsignedNormFloatSchema,
    y: UnsignedNormFloatSchema,
    k: UnsignedNormFloatSchema,
    a: UnsignedNormFloatSchema,
  })
  .transform(({ c, m, y, k, a }) => new CMYKColor(c, m, y, k, a));

export const LABColorSchema = z
  .object({
    l: SignedNormFloatSchema,
    a: signedUnitNumber,
    b: signedUnitNumber,
    alpha: UnsignedNormFloatSchema,
  })
  .transform(({ l, a, b, alpha }) => new LABColor(l, SNComplex.of(a, b), alpha));

// =============================================================================
// POINT-SET GENERATORS
// =============================================================================

const gridCounts = { xCount: NibbleSchema, yCount: NibbleSchema };

export const PointSetGeneratorSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Origin") }),
  z.object({ type: z.literal("Moore") }),
  z.object({ type: z.literal("VonNeumann") }),
  z.object({ type: z.literal("UniformGrid"), ...gridCounts }),
  z.object({
    type: z.literal("SparseGrid"),
    ...gridCounts,
    xMod: BooleanSchema,
    yMod: BooleanSchema,
  }),
  z.object({ type: z.literal("HexGrid"), ...gridCounts }),
  z.object({ type: z.literal("TriGrid"), ...gridCounts }),
  z.object({ type: z.literal("UniformDistribution"), count: ByteSchema }),
  z.object({ type: z.literal("Poisson"), count: ByteSchema, radius: UnsignedNormFloatSchema }),
  z.object({
    type: z.literal("Spiral"),
    count: ByteSchema,
    scalar: UnsignedNormFloatSchema,
    maximum: AngleSchema,
    linear: BooleanSchema,
    nonlinearityHalved: UnsignedNormFloatSchema,
  }),
  z.object({ type: z.literal("RandomRings"), maxRings: NibbleSchema }),
  z.object({
    type: z.literal("LinearIncreasingRings"),
    maxCount: ByteSchema,
    ringSizeDelta: NibbleSchema,
  }),
  z.object({ type: z.literal("FibonacciRings"), maxCount: ByteSchema }),
  z.object({ type: z.literal("SquaredRings"), maxCount: ByteSchema }),
]);

// =============================================================================
// AUTOMATA
// =============================================================================

export const ElementaryAutomataRuleSchema = z
  .object({ pattern: z.array(BooleanSchema).length(8, { error: "Pattern needs 8 entries" }) })
  .transform(({ pattern }) =>
    ElementaryAutomataRule.fromWolframCode(
      pattern.reduce((code, bit, i) => (bit.value ? code | (1 << i) : code), 0),
    ),
  );
