/**
 * Deterministic point layouts: fixed neighbourhoods, grids, spirals and
 * concentric rings. Random inputs (ring sizes, uniform scatter) are drawn
 * by the caller or take an explicit source.
 */

import type { RandomSource } from "@evoforge/contracts";
import { SNPoint } from "../core/geometry/sn-point";
import { TAU } from "../core/numeric/math";

// =============================================================================
// FIXED SETS
// =============================================================================

export function originPoints(): SNPoint[] {
  return [SNPoint.ZERO];
}

export function moorePoints(): SNPoint[] {
  return [
    SNPoint.of(-1, -1),
    SNPoint.of(-1, 0),
    SNPoint.of(-1, 1),
    SNPoint.of(0, -1),
    SNPoint.of(0, 1),
    SNPoint.of(1, -1),
    SNPoint.of(1, 0),
    SNPoint.of(1, 1),
  ];
}

export function vonNeumannPoints(): SNPoint[] {
  return [SNPoint.of(1, 0), SNPoint.of(-1, 0), SNPoint.of(0, 1), SNPoint.of(0, -1)];
}

export function uniformPoints(rng: RandomSource, count: number): SNPoint[] {
  return Array.from({ length: count }, () => SNPoint.random(rng));
}

// =============================================================================
// GRIDS
// =============================================================================

/** Centre of cell `index` when [-1, 1] is cut into cells of width `ratio`. */
const cellCentre = (index: number, ratio: number, offset: number = 0.5): number =>
  2 * (ratio * index + ratio * offset) - 1;

/**
 * Cell centres of an `xCount` by `yCount` grid, column by column.
 */
export function uniformGridPoints(xCount: number, yCount: number): SNPoint[] {
  const xRatio = 1 / xCount;
  const yRatio = 1 / yCount;
  const points: SNPoint[] = [];

  for (let x = 0; x < xCount; x++) {
    for (let y = 0; y < yCount; y++) {
      points.push(SNPoint.of(cellCentre(x, xRatio), cellCentre(y, yRatio)));
    }
  }
  return points;
}

/**
 * Grid with odd counts that skips every cell whose parities match
 * `(xMod, yMod)`.
 */
export function sparseGridPoints(
  xCount: number,
  yCount: number,
  xMod: 0 | 1,
  yMod: 0 | 1,
): SNPoint[] {
  const xs = xCount % 2 === 0 ? xCount + 1 : xCount;
  const ys = yCount % 2 === 0 ? yCount + 1 : yCount;
  const xRatio = 1 / xs;
  const yRatio = 1 / ys;
  const points: SNPoint[] = [];

  for (let x = 0; x < xs; x++) {
    for (let y = 0; y < ys; y++) {
      if (x % 2 === xMod && y % 2 === yMod) continue;
      points.push(SNPoint.of(cellCentre(x, xRatio), cellCentre(y, yRatio)));
    }
  }
  return points;
}

/**
 * Grid whose rows are shifted alternately by a quarter and three quarters
 * of a cell.
 */
export function triGridPoints(xCount: number, yCount: number): SNPoint[] {
  const xRatio = 1 / xCount;
  const yRatio = 1 / yCount;
  const points: SNPoint[] = [];

  for (let x = 0; x < xCount; x++) {
    for (let y = 0; y < yCount; y++) {
      const shift = y % 2 === 0 ? 0.25 : 0.75;
      points.push(SNPoint.of(cellCentre(x, xRatio, shift), cellCentre(y, yRatio)));
    }
  }
  return points;
}

/**
 * Tri grid with the x count padded to 2 mod 3, the y count padded to even,
 * and the cells with `y % 2 == x % 3` removed, which leaves hexagons.
 */
export function hexGridPoints(xCount: number, yCount: number): SNPoint[] {
  const xs = xCount + ((2 - (xCount % 3) + 3) % 3);
  const ys = yCount % 2 === 1 ? yCount + 1 : yCount;
  const xRatio = 1 / xs;
  const yRatio = 1 / ys;
  const points: SNPoint[] = [];

  for (let x = 0; x < xs; x++) {
    for (let y = 0; y < ys; y++) {
      if (y % 2 === x % 3) continue;
      const shift = y % 2 === 0 ? 0.25 : 0.75;
      points.push(SNPoint.of(cellCentre(x, xRatio, shift), cellCentre(y, yRatio)));
    }
  }
  return points;
}

// =============================================================================
// SPIRAL
// =============================================================================

export interface SpiralParams {
  readonly count: number;
  readonly scalar: number;
  /** Radians. */
  readonly maximum: number;
  readonly linear: boolean;
  readonly nonlinearity: number;
}

/**
 * `count` points with radius `i / count` and angle
 * `count * maximum * scalar * f(rho)`, where `f` is the identity or
 * `rho ^ nonlinearity`.
 */
export function spiralPoints(params: SpiralParams): SNPoint[] {
  const { count, scalar, maximum, linear, nonlinearity } = params;
  return Array.from({ length: count }, (_, i) => {
    const rho = i / count;
    const theta = count * maximum * scalar * (linear ? rho : Math.pow(rho, nonlinearity));
    return SNPoint.of(rho * Math.sin(theta), rho * Math.cos(theta));
  });
}

// =============================================================================
// RINGS
// =============================================================================

/**
 * Concentric rings: ring `i` of `n` sits at radius `i / n`, its points
 * spread evenly from angle -π.
 */
export function ringPoints(sizes: readonly number[]): SNPoint[] {
  const ringCount = sizes.length;
  return sizes.flatMap((size, index) => {
    const rho = index / ringCount;
    return Array.from({ length: size }, (_, i) => {
      const theta = i * (TAU / size) - Math.PI;
      return SNPoint.of(rho * Math.sin(theta), rho * Math.cos(theta));
    });
  });
}

/**
 * Take ring sizes from `sizes` while the running total stays within
 * `max(maxCount, 1)`. The first ring is always kept.
 */
export function takeRingSizes(maxCount: number, sizes: Iterable<number>): number[] {
  const limit = Math.max(maxCount, 1);
  const taken: number[] = [];
  let total = 0;

  for (const size of sizes) {
    if (taken.length > 0 && total + size > limit) break;
    taken.push(size);
    total += size;
  }
  return taken;
}

/** 1, 1 + δ, 1 + 2δ, ... */
export function* linearRingSizes(delta: number): Generator<number> {
  for (let size = 1; ; size += delta) {
    yield size;
  }
}

/** 1, 1, 2, 3, 5, ... */
export function* fibonacciRingSizes(): Generator<number> {
  let [a, b] = [1, 1];
  for (;;) {
    yield a;
    [a, b] = [b, a + b];
  }
}

/** 1, 4, 9, 16, ... */
export function* squaredRingSizes(): Generator<number> {
  for (let n = 1; ; n++) {
    yield n * n;
  }
}
