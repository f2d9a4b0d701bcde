/**
 * Integer raster operations.
 */

import type { Dimensions, Point, Segment } from "./types";

// =============================================================================
// SEGMENT OPERATIONS
// =============================================================================

/**
 * Get all integer points along a segment (Bresenham's line algorithm).
 * Both end points are included.
 */
export function segmentPoints(s: Segment): Point[] {
  const points: Point[] = [];
  let x0 = s.start.x;
  let y0 = s.start.y;
  const x1 = s.end.x;
  const y1 = s.end.y;

  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx - dy;

  while (true) {
    points.push({ x: x0, y: y0 });

    if (x0 === x1 && y0 === y1) break;

    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x0 += sx;
    }
    if (e2 < dx) {
      err += dx;
      y0 += sy;
    }
  }

  return points;
}

/**
 * Bresenham's line algorithm - takes two points directly
 */
export function bresenhamLine(from: Point, to: Point): Point[] {
  return segmentPoints({ start: from, end: to });
}

// =============================================================================
// DIMENSION OPERATIONS
// =============================================================================

export function isInBounds(p: Point, dim: Dimensions): boolean {
  return p.x >= 0 && p.x < dim.width && p.y >= 0 && p.y < dim.height;
}

/**
 * Convert 2D coordinates to 1D index (row-major)
 */
export function toIndex(x: number, y: number, width: number): number {
  return y * width + x;
}
