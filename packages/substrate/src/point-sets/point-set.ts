/**
 * Point Set
 *
 * An immutable list of 1 to 256 points together with the generator that
 * produced it. Clones share the frozen backing array; `replace` swaps in a
 * new one.
 */

import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { emit, trace, type GenContext } from "../core/context/generation";
import { SNPoint } from "../core/geometry/sn-point";
import type { Byte } from "../core/numeric/discrete";
import {
  generatePoints,
  MAX_POINTS,
  mutatePointSetGenerator,
  ORIGIN_GENERATOR,
  randomPointSetGenerator,
  type PointSetGenerator,
} from "./generator";
import { originPoints } from "./layouts";

export class PointSet {
  static readonly KEY = "PointSet";

  private constructor(
    private readonly data: readonly SNPoint[],
    readonly generator: PointSetGenerator,
  ) {}

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  static of(points: readonly SNPoint[], generator: PointSetGenerator): PointSet {
    invariant(
      points.length > 0 && points.length <= MAX_POINTS,
      `Point set must hold 1..${MAX_POINTS} points, got ${points.length}`,
      { count: points.length },
    );
    return new PointSet(Object.freeze([...points]), generator);
  }

  /**
   * The single origin point.
   */
  static origin(): PointSet {
    return PointSet.of(originPoints(), ORIGIN_GENERATOR);
  }

  static fromGenerator(
    generator: PointSetGenerator,
    rng: RandomSource,
    ctx?: GenContext,
  ): PointSet {
    const points = generatePoints(generator, rng, ctx);
    trace(ctx, "PointSet", `${generator.type} produced ${points.length} points`);
    return PointSet.of(points, generator);
  }

  static generate(rng: RandomSource, ctx?: GenContext): PointSet {
    emit(ctx, "generate", PointSet.KEY);
    return PointSet.fromGenerator(randomPointSetGenerator(rng), rng, ctx);
  }

  // ===========================================================================
  // ACCESS
  // ===========================================================================

  get points(): readonly SNPoint[] {
    return this.data;
  }

  get length(): number {
    return this.data.length;
  }

  at(index: number | Byte): SNPoint {
    const i = typeof index === "number" ? index : index.value;
    const point = this.data[i];
    invariant(point !== undefined, `Point index ${i} out of range for ${this.data.length} points`);
    return point;
  }

  /**
   * Points scaled down to offsets of one cell in a `width` by `height`
   * raster.
   */
  getOffsets(width: number, height: number): SNPoint[] {
    const unit = SNPoint.of(1 / width, 1 / height);
    return this.data.map((p) => p.scalePoint(unit));
  }

  replace(points: readonly SNPoint[]): PointSet {
    return PointSet.of(points, this.generator);
  }

  clone(): PointSet {
    return new PointSet(this.data, this.generator);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Nearest point other than an exact copy of `other`, or `other` itself
   * when every point coincides with it.
   */
  getClosestPoint(other: SNPoint): SNPoint {
    return this.extremeFrom(other, (candidate, best) => candidate < best);
  }

  /**
   * Farthest point other than an exact copy of `other`, or `other` itself.
   */
  getFurthestPoint(other: SNPoint): SNPoint {
    return this.extremeFrom(other, (candidate, best) => candidate > best);
  }

  /**
   * Up to `n` points ordered by distance, exact matches first. Ties keep
   * their original order.
   */
  getNClosestPoints(other: SNPoint, n: number): SNPoint[] {
    const keyed = this.data.map((point) => ({ point, distance: point.distanceTo(other) }));
    keyed.sort((a, b) => a.distance - b.distance);
    return keyed.slice(0, Math.max(n, 0)).map(({ point }) => point);
  }

  getRandomPoint(rng: RandomSource): SNPoint {
    return this.at(intBelow(rng, this.data.length));
  }

  private extremeFrom(other: SNPoint, better: (candidate: number, best: number) => boolean): SNPoint {
    let best: SNPoint | undefined;
    let bestDistance = 0;

    for (const point of this.data) {
      if (point.equals(other)) continue;
      const distance = point.distanceTo(other);
      if (best === undefined || better(distance, bestDistance)) {
        best = point;
        bestDistance = distance;
      }
    }
    return best ?? other;
  }

  // ===========================================================================
  // CAPABILITIES
  // ===========================================================================

  /**
   * Mutate the generator and rebuild the points from it.
   */
  mutate(rng: RandomSource, ctx?: GenContext): PointSet {
    emit(ctx, "mutate", PointSet.KEY);
    return PointSet.fromGenerator(mutatePointSetGenerator(this.generator, rng, ctx), rng, ctx);
  }

  update(ctx?: GenContext): PointSet {
    emit(ctx, "update", PointSet.KEY);
    return this;
  }

  toJSON(): PointSetGenerator {
    return this.generator;
  }
}
