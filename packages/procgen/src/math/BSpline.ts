/**
 * B-Spline Surfaces
 *
 * Tensor-product B-spline surfaces with clamped knot vectors, used for
 * petals and sepals. Basis functions use the Cox-de Boor recursion.
 *
 * Knot vectors and control grids are validated when a surface is built;
 * evaluation itself never throws and never divides by zero.
 */

import * as THREE from "three";

const EPSILON = 1e-10;
const DERIVATIVE_STEP = 0.001;

/**
 * Cox-de Boor basis function N(i, p) at u.
 *
 * The last non-degenerate span is closed on the right so that u equal to the
 * final knot evaluates to the last control point instead of zero. Terms with
 * a zero-width denominator are treated as 0.
 */
export function basisFunction(
  i: number,
  p: number,
  u: number,
  knots: readonly number[],
): number {
  if (i + p + 1 >= knots.length) return 0;

  if (p === 0) {
    const left = knots[i];
    const right = knots[i + 1];
    if (right - left < EPSILON) return 0;
    if (u >= left && u < right) return 1;
    const last = knots[knots.length - 1];
    return u === last && right === last ? 1 : 0;
  }

  let result = 0;

  const leftDenom = knots[i + p] - knots[i];
  if (Math.abs(leftDenom) > EPSILON) {
    result += ((u - knots[i]) / leftDenom) * basisFunction(i, p - 1, u, knots);
  }

  const rightDenom = knots[i + p + 1] - knots[i + 1];
  if (Math.abs(rightDenom) > EPSILON) {
    result +=
      ((knots[i + p + 1] - u) / rightDenom) *
      basisFunction(i + 1, p - 1, u, knots);
  }

  return result;
}

/**
 * Clamped uniform knot vector for `count` control points of degree `degree`:
 * degree+1 zeros, evenly spaced interior knots, degree+1 ones.
 */
export function generateKnotVector(count: number, degree: number): number[] {
  if (!Number.isInteger(degree) || degree < 0) {
    throw new Error(`B-spline degree must be a non-negative integer, got ${degree}`);
  }
  if (!Number.isInteger(count) || count < degree + 1) {
    throw new Error(
      `B-spline of degree ${degree} needs at least ${degree + 1} control points, got ${count}`,
    );
  }

  const knots: number[] = [];
  for (let i = 0; i < count + degree + 1; i++) {
    if (i <= degree) {
      knots.push(0);
    } else if (i >= count) {
      knots.push(1);
    } else {
      knots.push((i - degree) / (count - degree));
    }
  }
  return knots;
}

/**
 * Throw if a knot vector cannot drive `count` control points of `degree`:
 * wrong length, decreasing values, or unclamped ends.
 */
export function validateKnotVector(
  knots: readonly number[],
  count: number,
  degree: number,
): void {
  const expected = count + degree + 1;
  if (knots.length !== expected) {
    throw new Error(
      `Knot vector length ${knots.length} does not match control points + degree + 1 = ${expected}`,
    );
  }
  for (let i = 0; i < knots.length; i++) {
    if (!Number.isFinite(knots[i])) {
      throw new Error(`Knot ${i} is not a finite number`);
    }
    if (i > 0 && knots[i] < knots[i - 1]) {
      throw new Error(
        `Knot vector must be non-decreasing: knot ${i} (${knots[i]}) < knot ${i - 1} (${knots[i - 1]})`,
      );
    }
  }
  const first = knots[0];
  const last = knots[knots.length - 1];
  if (last - first < EPSILON) {
    throw new Error("Knot vector spans an empty parameter range");
  }
  for (let i = 0; i <= degree; i++) {
    if (knots[i] !== first || knots[knots.length - 1 - i] !== last) {
      throw new Error(
        `Knot vector must be clamped: first and last ${degree + 1} knots must repeat`,
      );
    }
  }
}

/**
 * A tensor-product B-spline surface.
 *
 * `controlPoints[i][j]` runs along u with i and along v with j.
 * The parameter domain is [0, 1]² after normalization by the knot range.
 */
export class BSplineSurface {
  readonly controlPoints: readonly (readonly THREE.Vector3[])[];
  readonly degreeU: number;
  readonly degreeV: number;
  readonly knotsU: readonly number[];
  readonly knotsV: readonly number[];

  constructor(
    controlPoints: THREE.Vector3[][],
    degreeU: number,
    degreeV: number,
    knotsU: number[],
    knotsV: number[],
  ) {
    const countU = controlPoints.length;
    if (countU === 0) {
      throw new Error("B-spline control grid is empty");
    }
    const countV = controlPoints[0].length;
    for (let i = 0; i < countU; i++) {
      if (controlPoints[i].length !== countV) {
        throw new Error(
          `B-spline control grid is ragged: row ${i} has ${controlPoints[i].length} points, expected ${countV}`,
        );
      }
      for (const point of controlPoints[i]) {
        if (
          !Number.isFinite(point.x) ||
          !Number.isFinite(point.y) ||
          !Number.isFinite(point.z)
        ) {
          throw new Error(`B-spline control grid row ${i} contains a non-finite point`);
        }
      }
    }
    if (!Number.isInteger(degreeU) || degreeU < 1 || countU < degreeU + 1) {
      throw new Error(
        `B-spline degree ${degreeU} along u needs at least ${degreeU + 1} control rows, got ${countU}`,
      );
    }
    if (!Number.isInteger(degreeV) || degreeV < 1 || countV < degreeV + 1) {
      throw new Error(
        `B-spline degree ${degreeV} along v needs at least ${degreeV + 1} control columns, got ${countV}`,
      );
    }
    validateKnotVector(knotsU, countU, degreeU);
    validateKnotVector(knotsV, countV, degreeV);

    this.controlPoints = controlPoints.map((row) => row.map((p) => p.clone()));
    this.degreeU = degreeU;
    this.degreeV = degreeV;
    this.knotsU = knotsU.slice();
    this.knotsV = knotsV.slice();
  }

  /**
   * Build a surface with clamped uniform knot vectors on both axes.
   */
  static uniform(
    controlPoints: THREE.Vector3[][],
    degreeU: number,
    degreeV: number,
  ): BSplineSurface {
    const countU = controlPoints.length;
    const countV = countU > 0 ? controlPoints[0].length : 0;
    if (countU < degreeU + 1 || countV < degreeV + 1) {
      throw new Error(
        `B-spline control grid ${countU}x${countV} is too small for degree ${degreeU}x${degreeV}`,
      );
    }
    return new BSplineSurface(
      controlPoints,
      degreeU,
      degreeV,
      generateKnotVector(countU, degreeU),
      generateKnotVector(countV, degreeV),
    );
  }

  get countU(): number {
    return this.controlPoints.length;
  }

  get countV(): number {
    return this.controlPoints[0].length;
  }

  /**
   * Surface point at (u, v) ∈ [0, 1]².
   */
  evaluate(u: number, v: number): THREE.Vector3 {
    const uu = this.toKnotSpace(u, this.knotsU);
    const vv = this.toKnotSpace(v, this.knotsV);

    const basisV: number[] = [];
    for (let j = 0; j < this.countV; j++) {
      basisV.push(basisFunction(j, this.degreeV, vv, this.knotsV));
    }

    const point = new THREE.Vector3();
    for (let i = 0; i < this.countU; i++) {
      const nu = basisFunction(i, this.degreeU, uu, this.knotsU);
      if (nu < EPSILON) continue;
      const row = this.controlPoints[i];
      for (let j = 0; j < this.countV; j++) {
        const weight = nu * basisV[j];
        if (weight < EPSILON) continue;
        point.addScaledVector(row[j], weight);
      }
    }
    return point;
  }

  /**
   * ∂S/∂u by finite difference (central inside the domain, one-sided at edges).
   */
  derivativeU(u: number, v: number): THREE.Vector3 {
    const u0 = Math.max(0, u - DERIVATIVE_STEP);
    const u1 = Math.min(1, u + DERIVATIVE_STEP);
    return this.evaluate(u1, v)
      .sub(this.evaluate(u0, v))
      .divideScalar(u1 - u0);
  }

  /**
   * ∂S/∂v by finite difference.
   */
  derivativeV(u: number, v: number): THREE.Vector3 {
    const v0 = Math.max(0, v - DERIVATIVE_STEP);
    const v1 = Math.min(1, v + DERIVATIVE_STEP);
    return this.evaluate(u, v1)
      .sub(this.evaluate(u, v0))
      .divideScalar(v1 - v0);
  }

  /**
   * Unit normal ∂S/∂u × ∂S/∂v, or +Y where the surface is degenerate.
   */
  normal(u: number, v: number): THREE.Vector3 {
    const n = new THREE.Vector3().crossVectors(
      this.derivativeU(u, v),
      this.derivativeV(u, v),
    );
    if (n.length() <= 1e-6) return new THREE.Vector3(0, 1, 0);
    return n.normalize();
  }

  private toKnotSpace(t: number, knots: readonly number[]): number {
    const first = knots[0];
    const last = knots[knots.length - 1];
    const clamped = Math.min(1, Math.max(0, t));
    return clamped === 1 ? last : first + clamped * (last - first);
  }
}
