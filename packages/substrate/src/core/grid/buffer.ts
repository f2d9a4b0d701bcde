/**
 * Row-major 2D raster addressed either by integer cell or by `SNPoint`.
 */

import { intBelow, invariant, type RandomSource } from "@evoforge/contracts";
import { emit, type GenContext } from "../context/generation";
import { bresenhamLine, isInBounds, toIndex } from "../geometry/operations";
import type { SNPoint } from "../geometry/sn-point";
import type { Dimensions, Point } from "../geometry/types";

/**
 * Serialized form of a buffer: its shape only, contents are not kept.
 */
export interface BufferInfo {
  readonly width: number;
  readonly height: number;
}

/** Largest side produced by `Buffer.generate`. */
const MAX_GENERATED_SIDE = 256;

/**
 * 2D raster of non-nullish cells.
 *
 * @remarks
 * Internally mutable like any raster; `set`, `drawDot` and `drawLine` write
 * in place.
 */
export class Buffer<T extends {}> implements Dimensions {
  static readonly KEY = "Buffer";

  readonly width: number;
  readonly height: number;
  private readonly data: T[];

  constructor(width: number, height: number, init: (x: number, y: number) => T) {
    invariant(
      Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0,
      `Invalid buffer dimensions: ${width}x${height}`,
      { width, height },
    );

    this.width = width;
    this.height = height;
    this.data = new Array<T>(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        this.data[toIndex(x, y, width)] = init(x, y);
      }
    }
  }

  static filled<T extends {}>(width: number, height: number, value: T): Buffer<T> {
    return new Buffer(width, height, () => value);
  }

  /**
   * Rebuild a buffer from its serialized shape, every cell set to the default.
   */
  static fromInfo<T extends {}>(info: BufferInfo, makeDefault: () => T): Buffer<T> {
    return new Buffer(info.width, info.height, makeDefault);
  }

  /**
   * Random shape (1 to 256 per side) with every cell generated.
   */
  static generate<T extends {}>(
    rng: RandomSource,
    generateCell: (rng: RandomSource, ctx?: GenContext) => T,
    ctx?: GenContext,
  ): Buffer<T> {
    emit(ctx, "generate", Buffer.KEY);
    const width = intBelow(rng, MAX_GENERATED_SIDE) + 1;
    const height = intBelow(rng, MAX_GENERATED_SIDE) + 1;
    return new Buffer(width, height, () => generateCell(rng, ctx));
  }

  // ===========================================================================
  // ADDRESSING
  // ===========================================================================

  /**
   * Cell under a point: each axis is mapped to [0, 1], scaled by the side,
   * rounded, and capped at the last cell.
   */
  pointToUint(point: SNPoint): Point {
    return {
      x: Math.min(Math.round(point.x.toUnsigned().value * this.width), this.width - 1),
      y: Math.min(Math.round(point.y.toUnsigned().value * this.height), this.height - 1),
    };
  }

  isInBounds(x: number, y: number): boolean {
    return isInBounds({ x, y }, this);
  }

  get(x: number, y: number): T {
    invariant(this.isInBounds(x, y), `Cell (${x}, ${y}) outside ${this.width}x${this.height} buffer`);
    const value = this.data[toIndex(x, y, this.width)];
    invariant(value !== undefined, `Cell (${x}, ${y}) is unset`);
    return value;
  }

  set(x: number, y: number, value: T): void {
    invariant(this.isInBounds(x, y), `Cell (${x}, ${y}) outside ${this.width}x${this.height} buffer`);
    this.data[toIndex(x, y, this.width)] = value;
  }

  getAt(point: SNPoint): T {
    const p = this.pointToUint(point);
    return this.get(p.x, p.y);
  }

  setAt(point: SNPoint, value: T): void {
    const p = this.pointToUint(point);
    this.set(p.x, p.y, value);
  }

  // ===========================================================================
  // DRAWING
  // ===========================================================================

  drawDot(point: SNPoint, value: T): void {
    this.setAt(point, value);
  }

  /**
   * Rasterize a line between two points; both end cells are written.
   */
  drawLine(from: SNPoint, to: SNPoint, value: T): void {
    for (const p of bresenhamLine(this.pointToUint(from), this.pointToUint(to))) {
      this.set(p.x, p.y, value);
    }
  }

  fill(value: T): void {
    this.data.fill(value);
  }

  // ===========================================================================
  // WHOLE-BUFFER OPERATIONS
  // ===========================================================================

  map<U extends {}>(fn: (value: T, x: number, y: number) => U): Buffer<U> {
    return new Buffer(this.width, this.height, (x, y) => fn(this.get(x, y), x, y));
  }

  forEach(fn: (value: T, x: number, y: number) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        fn(this.get(x, y), x, y);
      }
    }
  }

  clone(): Buffer<T> {
    return this.map((value) => value);
  }

  info(): BufferInfo {
    return { width: this.width, height: this.height };
  }

  /**
   * Buffers are left unchanged by mutation.
   */
  mutate(_rng: RandomSource, ctx?: GenContext): Buffer<T> {
    emit(ctx, "mutate", Buffer.KEY);
    return this;
  }

  update(ctx?: GenContext): Buffer<T> {
    emit(ctx, "update", Buffer.KEY);
    return this;
  }

  toJSON(): BufferInfo {
    return this.info();
  }
}
