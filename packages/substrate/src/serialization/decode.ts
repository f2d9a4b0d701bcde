/**
 * Decoders
 *
 * Every decoder returns a `Result`; malformed input becomes a
 * `DECODE_FAILED` error and is never thrown.
 *
 * @example
 * ```typescript
 * const point = decodeSNPoint("(0.5, -0.25)");
 * if (point.isOk()) draw(point.value);
 * ```
 */

import {
  createSystemRandom,
  Result,
  SubstrateError,
  type RandomSource,
} from "@evoforge/contracts";
import type { z } from "zod";
import type { GenContext } from "../core/context/generation";
import type { SNComplex } from "../core/geometry/sn-complex";
import type { SNPoint } from "../core/geometry/sn-point";
import type { ByteColor, FloatColor } from "../color/rgba";
import type { PointSetGenerator } from "../point-sets/generator";
import { PointSet } from "../point-sets/point-set";
import {
  ByteColorSchema,
  FloatColorSchema,
  PointSetGeneratorSchema,
  SNComplexSchema,
  SNPointSchema,
} from "./schemas";

/**
 * Parse `input` with `schema`, folding zod issues into one decode error.
 */
export function decodeWith<S extends z.ZodType>(
  schema: S,
  input: unknown,
  what: string,
): Result<z.output<S>, SubstrateError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return Result.err(
      SubstrateError.decodeFailed(
        `Invalid ${what}: ${issues.map((issue) => issue.message).join("; ")}`,
        { issues },
      ),
    );
  }
  return Result.ok(parsed.data);
}

/**
 * Parse JSON text, reporting syntax errors as decode failures.
 */
export function parseJson(text: string): Result<unknown, SubstrateError> {
  return Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e) =>
      SubstrateError.decodeFailed("Malformed JSON", {
        reason: e instanceof Error ? e.message : String(e),
      }),
  );
}

export function decodeSNPoint(input: unknown): Result<SNPoint, SubstrateError> {
  return decodeWith(SNPointSchema, input, "SNPoint");
}

export function decodeSNComplex(input: unknown): Result<SNComplex, SubstrateError> {
  return decodeWith(SNComplexSchema, input, "SNComplex");
}

export function decodePointSetGenerator(input: unknown): Result<PointSetGenerator, SubstrateError> {
  return decodeWith(PointSetGeneratorSchema, input, "PointSetGenerator");
}

/**
 * Rebuild a point set from its generator descriptor. Stochastic generators
 * draw from `rng`, which defaults to a fresh unseeded source.
 */
export function decodePointSet(
  input: unknown,
  rng: RandomSource = createSystemRandom(),
  ctx?: GenContext,
): Result<PointSet, SubstrateError> {
  return decodePointSetGenerator(input).map((generator) =>
    PointSet.fromGenerator(generator, rng, ctx),
  );
}

export function decodePointSetJson(
  text: string,
  rng?: RandomSource,
  ctx?: GenContext,
): Result<PointSet, SubstrateError> {
  return parseJson(text).flatMap((input) => decodePointSet(input, rng, ctx));
}

export function decodeFloatColor(input: unknown): Result<FloatColor, SubstrateError> {
  return decodeWith(FloatColorSchema, input, "FloatColor");
}

export function decodeByteColor(input: unknown): Result<ByteColor, SubstrateError> {
  return decodeWith(ByteColorSchema, input, "ByteColor");
}
