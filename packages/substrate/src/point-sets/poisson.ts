/**
 * Poisson-disk Sampling
 *
 * Blue-noise scatter over [-1, 1]² with a minimum separation. Candidates
 * are spawned around active points and stepped back into range by a
 * signed normaliser, so wrapping policies give toroidal-looking layouts.
 *
 * @example
 * ```typescript
 * const points = poissonDisk(rng, { count: 40, radius: 0.2, normaliser: "sawtooth" });
 * ```
 */

import { intBelow, invariant, uniform, type RandomSource } from "@evoforge/contracts";
import { resolveConfig, trace, type GenContext } from "../core/context/generation";
import { SNPoint } from "../core/geometry/sn-point";
import { TAU } from "../core/numeric/math";
import type { SignedNormaliser } from "../core/numeric/normalisers";

export interface PoissonOptions {
  /** Upper bound on the number of points placed. */
  readonly count: number;
  /** Minimum separation between any two points. */
  readonly radius: number;
  readonly normaliser: SignedNormaliser;
  /** Candidates tried per active point; defaults to the context config. */
  readonly attempts?: number;
}

/** Cells either side of a candidate's cell that can hold a conflicting point. */
const WINDOW = 2;

/**
 * Place up to `count` points, each farther than `radius` from every other.
 * Stops early once no active point can spawn a valid candidate.
 */
export function poissonDisk(
  rng: RandomSource,
  options: PoissonOptions,
  ctx?: GenContext,
): SNPoint[] {
  const { count, radius, normaliser } = options;
  const attempts = options.attempts ?? resolveConfig(ctx).poissonAttempts;

  invariant(radius > 0, `Poisson radius must be positive, got ${radius}`);
  invariant(count > 0, `Poisson count must be positive, got ${count}`);

  const cellSize = radius / Math.SQRT2;
  const gridSize = Math.ceil(2 / cellSize);
  const toCell = (v: number): number => Math.min(Math.floor((v + 1) / cellSize), gridSize - 1);

  // Point index per cell, -1 when empty. The cell diagonal equals the
  // radius, so a cell never holds two points.
  const grid = new Int32Array(gridSize * gridSize).fill(-1);
  const points: SNPoint[] = [];
  const active: number[] = [];

  const place = (p: SNPoint): void => {
    grid[toCell(p.y.value) * gridSize + toCell(p.x.value)] = points.length;
    active.push(points.length);
    points.push(p);
  };

  const isFree = (p: SNPoint): boolean => {
    const gx = toCell(p.x.value);
    const gy = toCell(p.y.value);
    for (let y = Math.max(gy - WINDOW, 0); y <= Math.min(gy + WINDOW, gridSize - 1); y++) {
      for (let x = Math.max(gx - WINDOW, 0); x <= Math.min(gx + WINDOW, gridSize - 1); x++) {
        const index = grid[y * gridSize + x] ?? -1;
        if (index < 0) continue;
        const other = points[index];
        if (other !== undefined && other.distanceTo(p) <= radius) {
          return false;
        }
      }
    }
    return true;
  };

  place(SNPoint.random(rng));

  while (points.length < count && active.length > 0) {
    const activeIdx = intBelow(rng, active.length);
    const origin = points[active[activeIdx] ?? 0];
    invariant(origin !== undefined, "Active Poisson point is missing");

    let placed = false;
    for (let attempt = 0; attempt < attempts; attempt++) {
      const theta = uniform(rng, 0, TAU);
      const r = uniform(rng, radius, radius * 2);
      const candidate = SNPoint.normalised(
        origin.x.value + Math.cos(theta) * r,
        origin.y.value + Math.sin(theta) * r,
        normaliser,
        rng,
      );

      if (isFree(candidate)) {
        place(candidate);
        placed = true;
        break;
      }
    }

    if (!placed) {
      active.splice(activeIdx, 1);
    }
  }

  if (points.length < count) {
    trace(ctx, "Poisson", `Placed ${points.length}/${count} points at radius ${radius.toFixed(4)}`);
  }

  return points;
}
