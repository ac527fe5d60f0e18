/**
 * Quadric Error Metric
 *
 * A symmetric 4x4 matrix Q over homogeneous points v = (x, y, z, 1); the
 * error of a point is vᵀQv. Only the 10 coefficients of the upper triangle
 * are stored:
 *
 *   [ m0 m1 m2 m3 ]
 *   [    m4 m5 m6 ]
 *   [       m7 m8 ]
 *   [          m9 ]
 */

import type { Vec3 } from "../types.js";

export class Quadric {
  readonly m: Float64Array;

  constructor(coefficients?: ArrayLike<number>) {
    this.m = new Float64Array(10);
    if (coefficients) {
      for (let i = 0; i < 10; i++) {
        this.m[i] = coefficients[i] ?? 0;
      }
    }
  }

  /**
   * Fundamental quadric p·pᵀ of the plane ax + by + cz + d = 0
   */
  static fromPlane(a: number, b: number, c: number, d: number): Quadric {
    return new Quadric([
      a * a, a * b, a * c, a * d,
      b * b, b * c, b * d,
      c * c, c * d,
      d * d,
    ]);
  }

  /**
   * Quadric of the plane through point p with unit normal n
   */
  static fromPointNormal(p: Vec3, n: Vec3): Quadric {
    const d = -(n[0] * p[0] + n[1] * p[1] + n[2] * p[2]);
    return Quadric.fromPlane(n[0], n[1], n[2], d);
  }

  clone(): Quadric {
    return new Quadric(this.m);
  }

  /** Sum of two quadrics as a new quadric */
  add(other: Quadric): Quadric {
    const result = this.clone();
    result.addInPlace(other);
    return result;
  }

  addInPlace(other: Quadric): this {
    for (let i = 0; i < 10; i++) {
      this.m[i] += other.m[i];
    }
    return this;
  }

  /**
   * Determinant of the 3x3 matrix picked from the stored coefficients
   */
  det(
    a11: number, a12: number, a13: number,
    a21: number, a22: number, a23: number,
    a31: number, a32: number, a33: number,
  ): number {
    const m = this.m;
    return (
      m[a11] * m[a22] * m[a33] +
      m[a13] * m[a21] * m[a32] +
      m[a12] * m[a23] * m[a31] -
      m[a13] * m[a22] * m[a31] -
      m[a11] * m[a23] * m[a32] -
      m[a12] * m[a21] * m[a33]
    );
  }

  /**
   * Point minimizing the error, or null when the upper-left 3x3 block is
   * singular. Solved with Cramer's rule.
   */
  optimalPoint(): Vec3 | null {
    const det = this.det(0, 1, 2, 1, 4, 5, 2, 5, 7);
    if (det === 0) return null;
    return [
      (-1 / det) * this.det(1, 2, 3, 4, 5, 6, 5, 7, 8),
      (1 / det) * this.det(0, 2, 3, 1, 5, 6, 2, 7, 8),
      (-1 / det) * this.det(0, 1, 3, 1, 4, 6, 2, 5, 8),
    ];
  }

  /** vᵀQv for v = (x, y, z, 1) */
  evaluate(p: Vec3): number {
    const m = this.m;
    const [x, y, z] = p;
    return (
      m[0] * x * x +
      2 * m[1] * x * y +
      2 * m[2] * x * z +
      2 * m[3] * x +
      m[4] * y * y +
      2 * m[5] * y * z +
      2 * m[6] * y +
      m[7] * z * z +
      2 * m[8] * z +
      m[9]
    );
  }

  equals(other: Quadric, eps: number = 1e-12): boolean {
    for (let i = 0; i < 10; i++) {
      if (Math.abs(this.m[i] - other.m[i]) > eps) return false;
    }
    return true;
  }
}
