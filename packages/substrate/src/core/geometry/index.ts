/**
 * Geometry module - bounded points, complex values and transforms.
 */

export * from "./distance";
export * from "./iterative";
export * from "./matrix";
export { bresenhamLine, isInBounds, segmentPoints, toIndex } from "./operations";
export { SNComplex } from "./sn-complex";
export { SNPoint } from "./sn-point";
export type { Dimensions, Point, Segment } from "./types";
