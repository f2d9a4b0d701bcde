/**
 * 3x3 homogeneous transform for 2D points, stored row-major.
 */

import type { RandomSource } from "@evoforge/contracts";
import type { Angle, SignedNormFloat } from "../numeric/continuous";
import type { SignedNormaliser } from "../numeric/normalisers";
import { SNPoint } from "./sn-point";

export type Matrix3Values = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

export class SNFloatMatrix3 {
  static readonly IDENTITY = new SNFloatMatrix3([1, 0, 0, 0, 1, 0, 0, 0, 1]);

  private constructor(readonly values: Matrix3Values) {}

  static identity(): SNFloatMatrix3 {
    return SNFloatMatrix3.IDENTITY;
  }

  static translation(x: SignedNormFloat, y: SignedNormFloat): SNFloatMatrix3 {
    return new SNFloatMatrix3([1, 0, x.value, 0, 1, y.value, 0, 0, 1]);
  }

  static rotation(theta: Angle): SNFloatMatrix3 {
    const c = Math.cos(theta.value);
    const s = Math.sin(theta.value);
    return new SNFloatMatrix3([c, -s, 0, s, c, 0, 0, 0, 1]);
  }

  static scaling(x: SignedNormFloat, y: SignedNormFloat): SNFloatMatrix3 {
    return new SNFloatMatrix3([x.value, 0, 0, 0, y.value, 0, 0, 0, 1]);
  }

  static shear(x: SignedNormFloat, y: SignedNormFloat): SNFloatMatrix3 {
    return new SNFloatMatrix3([1, x.value, 0, y.value, 1, 0, 0, 0, 1]);
  }

  /**
   * Matrix product `this * other`; `other` is applied first.
   */
  multiply(other: SNFloatMatrix3): SNFloatMatrix3 {
    const a = this.values;
    const b = other.values;
    const at = (m: Matrix3Values, row: number, col: number): number => m[row * 3 + col] ?? 0;
    const cell = (row: number, col: number): number =>
      at(a, row, 0) * at(b, 0, col) + at(a, row, 1) * at(b, 1, col) + at(a, row, 2) * at(b, 2, col);
    return new SNFloatMatrix3([
      cell(0, 0), cell(0, 1), cell(0, 2),
      cell(1, 0), cell(1, 1), cell(1, 2),
      cell(2, 0), cell(2, 1), cell(2, 2),
    ]);
  }

  /**
   * Apply to a raw point, dividing through by the homogeneous coordinate.
   */
  apply(x: number, y: number): { x: number; y: number } {
    const [m00, m01, m02, m10, m11, m12, m20, m21, m22] = this.values;
    const w = m20 * x + m21 * y + m22;
    const scale = w === 0 ? 1 : 1 / w;
    return {
      x: (m00 * x + m01 * y + m02) * scale,
      y: (m10 * x + m11 * y + m12) * scale,
    };
  }

  /**
   * Transform a point, folding the result back into the unit square.
   */
  transformPoint(point: SNPoint, normaliser: SignedNormaliser, rng: RandomSource): SNPoint {
    const { x, y } = this.apply(point.x.value, point.y.value);
    return SNPoint.normalised(x, y, normaliser, rng);
  }
}
