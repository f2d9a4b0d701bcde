/**
 * Integer raster geometry. Values are immutable.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Line segment between two points
 */
export interface Segment {
  readonly start: Point;
  readonly end: Point;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}
