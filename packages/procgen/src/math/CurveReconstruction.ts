/**
 * 3D Curve Reconstruction
 *
 * Lifts a 2D (lateral, vertical) stem sketch into 3D. The depth coordinate is
 * chosen so the curvature magnitude stays at the sketch's peak lateral
 * curvature everywhere:
 *
 * 1. resample to uniform vertical steps
 * 2. second derivative of the lateral coordinate
 * 3. budget = max |x''|
 * 4. z'' = √(max(budget² − x''², 0)), sign flipping where x'' changes sign
 * 5. integrate z'' twice from zero position and velocity
 *
 * The sign rule keeps depth smooth across inflection points of the sketch.
 */

import * as THREE from "three";

const STRAIGHT_BUDGET = 1e-9;

export interface UniformSamples {
  x: number[];
  y: number[];
  /** Vertical step between consecutive samples */
  step: number;
}

/**
 * Resample a polyline at `count` evenly spaced heights between its first and
 * last vertical coordinate. Heights must be non-decreasing.
 */
export function resampleUniformY(
  points: readonly THREE.Vector2[],
  count: number,
): UniformSamples {
  const first = points[0];
  const last = points[points.length - 1];
  const step = (last.y - first.y) / (count - 1);

  const x: number[] = [];
  const y: number[] = [];
  let segment = 0;

  for (let k = 0; k < count; k++) {
    const targetY = k === count - 1 ? last.y : first.y + k * step;
    while (segment < points.length - 2 && points[segment + 1].y < targetY) {
      segment++;
    }
    const a = points[segment];
    const b = points[segment + 1];
    const t = Math.min(1, Math.max(0, (targetY - a.y) / Math.max(b.y - a.y, 1e-6)));
    x.push(a.x + (b.x - a.x) * t);
    y.push(targetY);
  }

  return { x, y, step };
}

/**
 * Second derivative of x with respect to the uniform step: forward difference
 * at the first sample, central inside, backward at the last.
 */
export function computeSecondDerivativesX(x: readonly number[], step: number): number[] {
  const n = x.length;
  const h2 = step * step;
  const result: number[] = [];
  for (let i = 0; i < n; i++) {
    const c = Math.min(n - 2, Math.max(1, i));
    result.push((x[c + 1] - 2 * x[c] + x[c - 1]) / h2);
  }
  return result;
}

/**
 * Apply depth signs in place: start positive and flip exactly where the
 * lateral second derivative crosses zero.
 */
export function determineDepthSigns(
  lateral: readonly number[],
  depth: number[],
): number[] {
  let sign = 1;
  for (let i = 0; i < depth.length; i++) {
    if (i > 0 && lateral[i] * lateral[i - 1] < 0) {
      sign = -sign;
    }
    depth[i] *= sign;
  }
  return depth;
}

/**
 * Trapezoidal double integration with zero initial velocity and position.
 */
export function integrateTwice(secondDerivative: readonly number[], step: number): number[] {
  const position = [0];
  let velocity = 0;
  for (let i = 1; i < secondDerivative.length; i++) {
    const nextVelocity =
      velocity + 0.5 * (secondDerivative[i - 1] + secondDerivative[i]) * step;
    position.push(position[i - 1] + 0.5 * (velocity + nextVelocity) * step);
    velocity = nextVelocity;
  }
  return position;
}

/**
 * Reconstruct a 3D curve (x lateral, y vertical, z depth) from a 2D sketch.
 *
 * @param points - Sketch points as (lateral, vertical), vertical non-decreasing
 * @param sampleCount - Number of output samples (≥ 3)
 */
export function reconstructCurve3d(
  points: readonly THREE.Vector2[],
  sampleCount = 32,
): THREE.Vector3[] {
  if (points.length < 3) {
    throw new Error(`Curve reconstruction needs at least 3 points, got ${points.length}`);
  }
  if (!Number.isInteger(sampleCount) || sampleCount < 3) {
    throw new Error(`Curve reconstruction needs at least 3 samples, got ${sampleCount}`);
  }
  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new Error(`Curve point ${i} is not finite`);
    }
    if (i > 0 && p.y < points[i - 1].y) {
      throw new Error(
        `Curve heights must be non-decreasing: point ${i} (${p.y}) is below point ${i - 1}`,
      );
    }
  }
  if (points[points.length - 1].y - points[0].y <= 0) {
    throw new Error("Curve has no vertical extent");
  }

  const { x, y, step } = resampleUniformY(points, sampleCount);
  const lateral = computeSecondDerivativesX(x, step);
  const budget = lateral.reduce((max, value) => Math.max(max, Math.abs(value)), 0);

  let depth: number[];
  if (budget < STRAIGHT_BUDGET) {
    depth = new Array<number>(sampleCount).fill(0);
  } else {
    const depth2 = lateral.map((value) =>
      Math.sqrt(Math.max(budget * budget - value * value, 0)),
    );
    depth = integrateTwice(determineDepthSigns(lateral, depth2), step);
  }

  return x.map((xi, i) => new THREE.Vector3(xi, y[i], depth[i]));
}
